import { decodeText } from './charset.js';
import {
  classifyContent,
  isPdf,
  parseMimeType,
  sliceHead,
} from './content-guard.js';
import {
  ExtractionError,
  getErrorMessage,
  UNKNOWN_ERROR_MESSAGE,
} from './errors.js';
import { selectMainContent } from './main-content.js';
import {
  createDefaultHandlers,
  type MarkdownOptions,
} from './markdown-handlers.js';
import { convertHtmlToMarkdown } from './markdown-writer.js';
import { logInfo, logWarn, redactUrl } from './observability.js';
import { extractPdfText, type PdfExtractOptions } from './pdf.js';

export interface RawFetch {
  readonly bytes: Uint8Array;
  readonly contentType?: string;
  /** Used for diagnostics only. */
  readonly url: string;
}

export type ExtractionKind = 'html-main' | 'html-full' | 'pdf' | 'plain-text';

export interface ExtractedContent {
  readonly text: string;
  readonly contentType?: string;
  readonly kind: ExtractionKind;
  readonly mainFragmentUsed: boolean;
}

export interface ExtractOptions {
  readonly extractMain: boolean;
  readonly markdown?: Partial<MarkdownOptions>;
  readonly pdf?: PdfExtractOptions;
}

const HTML_MIME_TYPES: ReadonlySet<string> = new Set([
  'text/html',
  'application/xhtml+xml',
]);

export function isHtmlContentType(contentType: string | undefined): boolean {
  return HTML_MIME_TYPES.has(parseMimeType(contentType));
}

function withContentType(
  content: Omit<ExtractedContent, 'contentType'>,
  contentType: string | undefined
): ExtractedContent {
  return contentType === undefined ? content : { ...content, contentType };
}

function convertHtml(
  decoded: string,
  options: ExtractOptions,
  url: string
): Omit<ExtractedContent, 'contentType'> {
  const toMarkdown = (html: string): string =>
    convertHtmlToMarkdown(html, createDefaultHandlers(options.markdown));

  if (!options.extractMain) {
    return {
      text: toMarkdown(decoded),
      kind: 'html-full',
      mainFragmentUsed: false,
    };
  }

  const fragment = selectMainContent(decoded);
  if (fragment?.kind === 'main') {
    logInfo('Main content fragment selected', {
      url,
      fragmentLength: fragment.html.length,
    });
    return {
      text: toMarkdown(fragment.html),
      kind: 'html-main',
      mainFragmentUsed: true,
    };
  }

  // A body-only match is discarded: the whole document is converted.
  logWarn('Main content fragment not found; converting full document', {
    url,
    fallback: fragment?.kind ?? 'none',
  });
  return {
    text: toMarkdown(decoded),
    kind: 'html-full',
    mainFragmentUsed: false,
  };
}

async function runPipeline(
  raw: RawFetch,
  options: ExtractOptions,
  url: string
): Promise<ExtractedContent> {
  const { bytes, contentType } = raw;
  const head = sliceHead(bytes);
  const size = bytes.byteLength;

  if (isPdf(contentType, head)) {
    logInfo('Starting PDF text extraction', { url, size });
    const text = await extractPdfText(bytes, options.pdf);
    return withContentType(
      { text, kind: 'pdf', mainFragmentUsed: false },
      contentType
    );
  }

  const verdict = classifyContent(contentType, head);
  if (verdict.kind === 'binary') {
    logInfo('Binary content detected; refusing', { url, size });
    throw new ExtractionError(
      'UNSUPPORTED_BINARY',
      'Fetch cannot be performed for this type of content',
      { contentType: verdict.contentType ?? contentType ?? 'unknown', size }
    );
  }

  const decoded = decodeText(bytes, contentType);

  if (isHtmlContentType(contentType)) {
    return withContentType(
      convertHtml(decoded, options, url),
      contentType
    );
  }

  return withContentType(
    { text: decoded, kind: 'plain-text', mainFragmentUsed: false },
    contentType
  );
}

/**
 * Turns fetched bytes into text. Every failure surfaces as an
 * `ExtractionError`; unexpected ones become `UNKNOWN` and their raw message
 * is logged rather than returned.
 */
export async function extractContent(
  raw: RawFetch,
  options: ExtractOptions
): Promise<ExtractedContent> {
  const url = redactUrl(raw.url);
  try {
    return await runPipeline(raw, options, url);
  } catch (error) {
    if (error instanceof ExtractionError) {
      logWarn('Extraction failed', { url, code: error.code });
      throw error;
    }
    logWarn('Extraction failed unexpectedly', {
      url,
      error: getErrorMessage(error),
    });
    throw new ExtractionError(
      'UNKNOWN',
      UNKNOWN_ERROR_MESSAGE,
      { hint: 'Please try again later or provide a different URL.' },
      { cause: error }
    );
  }
}
