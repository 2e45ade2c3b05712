import 'pdfjs-dist/legacy/build/pdf.worker.mjs';

import { setTimeout as setTimeoutPromise } from 'node:timers/promises';

import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';

import { config } from './config.js';
import { ExtractionError, getErrorMessage } from './errors.js';
import { logDebug } from './observability.js';

/** Resolves to the document text; must stop work once `signal` aborts. */
export type PdfTextParser = (
  data: Uint8Array,
  signal: AbortSignal
) => Promise<string>;

export interface PdfExtractOptions {
  readonly parser?: PdfTextParser;
  readonly maxBytes?: number;
  readonly timeoutMs?: number;
}

const TIMED_OUT = Symbol('pdf-timeout');

export const parsePdfWithPdfjs: PdfTextParser = async (data, signal) => {
  const loadingTask = getDocument({
    data,
    isEvalSupported: false,
    useSystemFonts: true,
    disableFontFace: true,
    verbosity: 0,
  });
  const onAbort = (): void => {
    loadingTask.destroy().catch((error: unknown) => {
      logDebug('PDF loading task teardown failed', {
        error: getErrorMessage(error),
      });
    });
  };
  signal.addEventListener('abort', onAbort, { once: true });

  try {
    const doc = await loadingTask.promise;
    try {
      const pages: string[] = [];
      for (let pageNumber = 1; pageNumber <= doc.numPages; pageNumber += 1) {
        signal.throwIfAborted();
        const page = await doc.getPage(pageNumber);
        const content = await page.getTextContent();
        let text = '';
        for (const item of content.items) {
          if (!('str' in item)) continue;
          text += item.str;
          if (item.hasEOL) text += '\n';
        }
        pages.push(text);
      }
      return pages.join('\n\n');
    } finally {
      await doc.destroy();
    }
  } finally {
    signal.removeEventListener('abort', onAbort);
  }
};

function isEncryptionFailure(error: unknown): boolean {
  const message = getErrorMessage(error).toLowerCase();
  return message.includes('encrypt') || message.includes('password');
}

function toPdfError(error: unknown, size: number): ExtractionError {
  if (isEncryptionFailure(error)) {
    return new ExtractionError(
      'PDF_ENCRYPTED',
      'Encrypted PDF is not supported',
      {
        size,
        hint: 'Try providing an unencrypted PDF or remove password protection',
      },
      { cause: error }
    );
  }
  return new ExtractionError(
    'PDF_PARSE',
    'Failed to parse PDF content',
    {
      size,
      hint: 'Try another file or re-save the PDF to simplify its structure',
    },
    { cause: error }
  );
}

async function raceTimeout<T>(
  work: Promise<T>,
  timeoutMs: number,
  controller: AbortController
): Promise<T | typeof TIMED_OUT> {
  // Referenced: an in-process parse may be the only pending work.
  const timerController = new AbortController();
  const timer = setTimeoutPromise(timeoutMs, TIMED_OUT, {
    signal: timerController.signal,
  }).catch((error: unknown) => {
    if (timerController.signal.aborted) return new Promise<never>(() => {});
    throw error;
  });

  try {
    const outcome = await Promise.race([work, timer]);
    if (outcome === TIMED_OUT) controller.abort();
    return outcome;
  } finally {
    timerController.abort();
  }
}

/**
 * Extracts text from an in-memory PDF. Oversized input is refused before
 * parsing; a parser that outlives the time budget is aborted.
 */
export async function extractPdfText(
  bytes: Uint8Array,
  options: PdfExtractOptions = {}
): Promise<string> {
  const maxBytes = options.maxBytes ?? config.extraction.pdfMaxBytes;
  const timeoutMs = options.timeoutMs ?? config.extraction.pdfTimeoutMs;
  const parser = options.parser ?? parsePdfWithPdfjs;
  const size = bytes.byteLength;

  if (size > maxBytes) {
    throw new ExtractionError(
      'PDF_TOO_LARGE',
      'PDF exceeds the allowed size limit',
      { size, limit: maxBytes }
    );
  }

  const controller = new AbortController();
  // The parser may transfer or detach its input, so it gets a copy.
  const work = parser(new Uint8Array(bytes), controller.signal);

  let outcome: string | typeof TIMED_OUT;
  try {
    outcome =
      timeoutMs > 0 ? await raceTimeout(work, timeoutMs, controller) : await work;
  } catch (error) {
    throw toPdfError(error, size);
  }

  if (outcome === TIMED_OUT) {
    work.catch((error: unknown) => {
      logDebug('PDF parser failed after timeout', {
        error: getErrorMessage(error),
      });
    });
    throw new ExtractionError(
      'PDF_PARSE',
      'PDF parsing timed out',
      { size, timeoutMs },
      { cause: new Error(`Timed out after ${timeoutMs}ms`) }
    );
  }

  return outcome;
}
