import { config } from './config.js';

export type ClassificationVerdict =
  | { readonly kind: 'binary'; readonly contentType?: string }
  | { readonly kind: 'text' };

const TEXTUAL_MIME_TYPES: ReadonlySet<string> = new Set([
  'application/json',
  'application/xml',
  'application/javascript',
  'application/xhtml+xml',
  'application/x-www-form-urlencoded',
]);

const BINARY_MIME_PREFIXES = [
  'image/',
  'audio/',
  'video/',
  'font/',
  'application/x-',
  'application/vnd.',
] as const;

const BINARY_MIME_TYPES: ReadonlySet<string> = new Set([
  'application/pdf',
  'application/zip',
  'application/gzip',
  'application/octet-stream',
]);

function ascii(text: string): readonly number[] {
  return Array.from(text, (char) => char.charCodeAt(0));
}

const PDF_SIGNATURE = ascii('%PDF-');

const BINARY_SIGNATURES: readonly (readonly number[])[] = [
  PDF_SIGNATURE,
  [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a],
  [0xff, 0xd8, 0xff],
  ascii('GIF8'),
  [0x50, 0x4b, 0x03, 0x04],
  [0x1f, 0x8b],
  ascii('Rar!'),
  [0x37, 0x7a, 0xbc, 0xaf, 0x27, 0x1c],
];

const RIFF_SIGNATURE = ascii('RIFF');
const WEBP_MARKER = ascii('WEBP');
const WEBP_MARKER_OFFSET = 8;
const MP4_FTYP_MARKER = ascii('ftyp');
const MP4_SCAN_LIMIT = 64;

export function parseMimeType(contentType: string | undefined): string {
  if (!contentType) return '';
  const [primary = ''] = contentType.split(';');
  return primary.trim().toLowerCase();
}

function isTextualMime(mime: string): boolean {
  return mime.startsWith('text/') || TEXTUAL_MIME_TYPES.has(mime);
}

function isBinaryMime(mime: string): boolean {
  return (
    BINARY_MIME_TYPES.has(mime) ||
    BINARY_MIME_PREFIXES.some((prefix) => mime.startsWith(prefix))
  );
}

function matchesAt(
  buffer: Uint8Array,
  signature: readonly number[],
  offset = 0
): boolean {
  if (buffer.length < offset + signature.length) return false;

  for (let i = 0; i < signature.length; i += 1) {
    if (buffer[offset + i] !== signature[i]) return false;
  }
  return true;
}

function containsWithin(
  buffer: Uint8Array,
  marker: readonly number[],
  limit: number
): boolean {
  const end = Math.min(limit, buffer.length) - marker.length;
  for (let offset = 0; offset <= end; offset += 1) {
    if (matchesAt(buffer, marker, offset)) return true;
  }
  return false;
}

function hasBinarySignature(head: Uint8Array): boolean {
  if (BINARY_SIGNATURES.some((signature) => matchesAt(head, signature))) {
    return true;
  }

  if (
    matchesAt(head, RIFF_SIGNATURE) &&
    matchesAt(head, WEBP_MARKER, WEBP_MARKER_OFFSET)
  ) {
    return true;
  }

  return containsWithin(head, MP4_FTYP_MARKER, MP4_SCAN_LIMIT);
}

/**
 * Decides whether fetched bytes may be decoded as text.
 *
 * A header that claims text is trusted outright; a header that claims a
 * binary family is trusted as well. Anything else is settled by sniffing
 * magic numbers in `head`.
 */
export function classifyContent(
  contentType: string | undefined,
  head: Uint8Array
): ClassificationVerdict {
  if (contentType !== undefined) {
    const mime = parseMimeType(contentType);
    if (isTextualMime(mime)) return { kind: 'text' };
    if (isBinaryMime(mime)) return { kind: 'binary', contentType: mime };
  }

  return hasBinarySignature(head) ? { kind: 'binary' } : { kind: 'text' };
}

export function isPdf(contentType: string | undefined, head: Uint8Array): boolean {
  const lowered = contentType?.toLowerCase() ?? '';
  return lowered.includes('application/pdf') || matchesAt(head, PDF_SIGNATURE);
}

export function sliceHead(bytes: Uint8Array): Uint8Array {
  return bytes.subarray(0, Math.min(bytes.length, config.extraction.headSniffBytes));
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

function cutAtCodePoint(text: string, end: number): string {
  let cut = end;
  if (cut > 0 && cut < text.length && isLowSurrogate(text.charCodeAt(cut))) {
    cut -= 1;
  }
  return text.slice(0, cut);
}

/**
 * Cuts `text` to at most `max` UTF-16 units, suffix included, without
 * splitting a surrogate pair. When the suffix does not fit, the text is cut
 * bare.
 */
export function safeTruncate(text: string, max: number, suffix: string): string {
  if (text.length <= max) return text;
  if (max <= 0) return '';
  if (max <= suffix.length) return cutAtCodePoint(text, max);

  return `${cutAtCodePoint(text, max - suffix.length)}${suffix}`;
}
