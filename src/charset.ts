import { Buffer } from 'node:buffer';

import iconv from 'iconv-lite';
import jschardet from 'jschardet';

import { ExtractionError } from './errors.js';
import { logDebug } from './observability.js';

const REPLACEMENT_CHAR = '�';
const FALLBACK_ENCODING = 'utf-8';

export function getCharsetFromContentType(
  contentType: string | undefined
): string | undefined {
  if (!contentType) return undefined;
  const match = /charset=([^;]+)/i.exec(contentType);
  const charsetGroup = match?.[1];

  if (!charsetGroup) return undefined;
  let charset = charsetGroup.trim();
  if (
    charset.length >= 2 &&
    ((charset.startsWith('"') && charset.endsWith('"')) ||
      (charset.startsWith("'") && charset.endsWith("'")))
  ) {
    charset = charset.slice(1, -1);
  }
  const trimmed = charset.trim().toLowerCase();
  return trimmed === '' ? undefined : trimmed;
}

interface BomMatch {
  readonly encoding: string;
  readonly length: number;
}

const BOM_SIGNATURES: readonly {
  bytes: readonly number[];
  encoding: string;
}[] = [
  { bytes: [0xef, 0xbb, 0xbf], encoding: 'utf-8' },
  { bytes: [0xff, 0xfe], encoding: 'utf-16le' },
  { bytes: [0xfe, 0xff], encoding: 'utf-16be' },
];

function startsWithBytes(
  buffer: Uint8Array,
  signature: readonly number[]
): boolean {
  if (buffer.length < signature.length) return false;

  for (let i = 0; i < signature.length; i += 1) {
    if (buffer[i] !== signature[i]) return false;
  }
  return true;
}

export function detectBomEncoding(buffer: Uint8Array): BomMatch | undefined {
  for (const { bytes, encoding } of BOM_SIGNATURES) {
    if (startsWithBytes(buffer, bytes)) {
      return { encoding, length: bytes.length };
    }
  }
  return undefined;
}

/** Returns undefined when the WHATWG decoder does not know the label. */
function createFatalDecoder(label: string): TextDecoder | undefined {
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(label, { fatal: true, ignoreBOM: true });
  } catch (error) {
    if (error instanceof RangeError) return undefined;
    throw error;
  }
  // The "replacement" encoding decodes every input to a single U+FFFD.
  return decoder.encoding === 'replacement' ? undefined : decoder;
}

function decodeFailure(label: string, cause: unknown): ExtractionError {
  return new ExtractionError(
    'DECODE',
    `Failed to decode content as ${label}`,
    { encoding: label },
    { cause }
  );
}

function decodeStrict(
  decoder: TextDecoder,
  label: string,
  bytes: Uint8Array
): string {
  try {
    return decoder.decode(bytes);
  } catch (error) {
    throw decodeFailure(label, error);
  }
}

function decodeWithIconv(label: string, bytes: Uint8Array): string {
  const buffer = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const text = iconv.decode(buffer, label);
  if (text.includes(REPLACEMENT_CHAR)) {
    throw decodeFailure(label, new Error('Decoded text contains U+FFFD'));
  }
  return text;
}

function detectStatistically(bytes: Uint8Array): string | undefined {
  if (bytes.length === 0) return undefined;

  const buffer = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const detection = jschardet.detect(buffer);
  return typeof detection.encoding === 'string' && detection.encoding !== ''
    ? detection.encoding.toLowerCase()
    : undefined;
}

function decodeGuessed(label: string, bytes: Uint8Array): string {
  const decoder = createFatalDecoder(label);
  if (decoder) return decodeStrict(decoder, label, bytes);

  if (iconv.encodingExists(label)) return decodeWithIconv(label, bytes);

  const fallback = createFatalDecoder(FALLBACK_ENCODING);
  if (!fallback) throw decodeFailure(FALLBACK_ENCODING, undefined);
  return decodeStrict(fallback, FALLBACK_ENCODING, bytes);
}

/**
 * Decodes fetched bytes without ever substituting U+FFFD.
 *
 * Order: byte-order mark, declared `charset=` parameter, statistical guess.
 * A BOM or a known declared label is authoritative: if its decode fails the
 * whole call fails.
 */
export function decodeText(bytes: Uint8Array, contentType?: string): string {
  const bom = detectBomEncoding(bytes);
  if (bom) {
    const decoder = createFatalDecoder(bom.encoding);
    if (!decoder) throw decodeFailure(bom.encoding, undefined);
    return decodeStrict(decoder, bom.encoding, bytes.subarray(bom.length));
  }

  const declared = getCharsetFromContentType(contentType);
  if (declared) {
    const decoder = createFatalDecoder(declared);
    if (decoder) return decodeStrict(decoder, declared, bytes);
    logDebug('Ignoring unknown declared charset', { charset: declared });
  }

  const guessed = detectStatistically(bytes) ?? FALLBACK_ENCODING;
  return decodeGuessed(guessed, bytes);
}
