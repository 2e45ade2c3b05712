import { STATUS_CODES } from 'node:http';
import os from 'node:os';

import type { Dispatcher } from 'undici';
import { Agent } from 'undici';

import { config } from './config.js';
import { ExtractionError, getErrorMessage } from './errors.js';
import type { RawFetch } from './extract.js';
import { logDebug, logInfo, logWarn, redactUrl } from './observability.js';

export interface FetchOptions {
  signal?: AbortSignal;
}

/* -------------------------------------------------------------------------------------------------
 * URL normalization
 * ------------------------------------------------------------------------------------------------- */

const SCHEME_PATTERN = /^[a-z][a-z\d+.-]*:/i;
const HOST_WITH_PORT_PATTERN = /^[^:/]+:\d/;

function invalidUrl(message: string, url: string): ExtractionError {
  return new ExtractionError('FETCH_HTTP', message, {
    url,
    hint: 'Please provide an absolute http(s) URL.',
  });
}

/**
 * Returns an absolute http(s) URL. A bare host such as `example.com/page`
 * gets `https://` prepended.
 */
export function normalizeUrl(urlString: string): string {
  const trimmed = urlString.trim();
  if (!trimmed) throw invalidUrl('URL cannot be empty', urlString);

  const hasScheme =
    SCHEME_PATTERN.test(trimmed) && !HOST_WITH_PORT_PATTERN.test(trimmed);
  const candidate = hasScheme ? trimmed : `https://${trimmed}`;

  if (!URL.canParse(candidate)) throw invalidUrl('Invalid URL format', trimmed);
  const url = new URL(candidate);

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw invalidUrl(
      `Invalid protocol: ${url.protocol}. Only http: and https: are allowed`,
      trimmed
    );
  }
  if (!url.hostname) throw invalidUrl('URL must have a valid hostname', trimmed);

  return url.href;
}

/* -------------------------------------------------------------------------------------------------
 * Dispatcher / Agent lifecycle
 * ------------------------------------------------------------------------------------------------- */

function getAgentOptions(): ConstructorParameters<typeof Agent>[0] {
  const cpuCount = os.availableParallelism();
  return {
    keepAliveTimeout: 60000,
    connections: Math.max(cpuCount * 2, 25),
    pipelining: 1,
  };
}

export const dispatcher: Dispatcher = new Agent(getAgentOptions());

export async function destroyAgents(): Promise<void> {
  await dispatcher.close();
}

/* -------------------------------------------------------------------------------------------------
 * Fetch error mapping
 * ------------------------------------------------------------------------------------------------- */

class FetchErrorFactory {
  canceled(url: string): ExtractionError {
    return new ExtractionError('FETCH_HTTP', 'Request was canceled', {
      url,
      reason: 'aborted',
    });
  }

  timeout(url: string, timeoutMs: number): ExtractionError {
    return new ExtractionError(
      'FETCH_HTTP',
      `Request timeout after ${timeoutMs}ms`,
      { url, timeout: timeoutMs, hint: 'Please try again later.' }
    );
  }

  http(url: string, status: number): ExtractionError {
    const reason = STATUS_CODES[status] ?? 'Unknown error';
    return new ExtractionError('FETCH_HTTP', `HTTP error ${status}: ${reason}`, {
      url,
      httpStatus: status,
      reason,
      hint:
        status === 404
          ? 'The resource was not found (404).'
          : 'Please verify the URL and try again.',
    });
  }

  tooManyRedirects(url: string): ExtractionError {
    return new ExtractionError('FETCH_HTTP', 'Too many redirects', { url });
  }

  missingRedirectLocation(url: string): ExtractionError {
    return new ExtractionError(
      'FETCH_HTTP',
      'Redirect response missing Location header',
      { url }
    );
  }

  badRedirect(url: string, message: string): ExtractionError {
    return new ExtractionError('FETCH_HTTP', message, { url });
  }

  sizeLimit(url: string, maxBytes: number): ExtractionError {
    return new ExtractionError(
      'FETCH_HTTP',
      `Response exceeds maximum size of ${maxBytes} bytes`,
      { url, limit: maxBytes }
    );
  }

  network(url: string, cause: unknown): ExtractionError {
    return new ExtractionError(
      'FETCH_HTTP',
      'Network error during HTTP fetch',
      {
        url,
        hint: 'Please verify the URL or try again later.',
        error: getErrorMessage(cause),
      },
      { cause }
    );
  }
}

const fetchErrors = new FetchErrorFactory();

function isAbortError(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === 'AbortError' || error.name === 'TimeoutError')
  );
}

function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && error.name === 'TimeoutError';
}

function mapFetchError(
  error: unknown,
  url: string,
  timeoutMs: number,
  signal: AbortSignal
): ExtractionError {
  if (error instanceof ExtractionError) return error;

  if (isAbortError(error) || signal.aborted) {
    const timedOut =
      isTimeoutError(error) || isTimeoutError(signal.reason);
    return timedOut
      ? fetchErrors.timeout(url, timeoutMs)
      : fetchErrors.canceled(url);
  }

  return fetchErrors.network(url, error);
}

/* -------------------------------------------------------------------------------------------------
 * Redirects
 * ------------------------------------------------------------------------------------------------- */

const REDIRECT_STATUSES: ReadonlySet<number> = new Set([
  301, 302, 303, 307, 308,
]);

function isRedirectStatus(status: number): boolean {
  return REDIRECT_STATUSES.has(status);
}

function cancelResponseBody(response: Response): void {
  response.body?.cancel().catch((error: unknown) => {
    logDebug('Response body cancel failed', { error: getErrorMessage(error) });
  });
}

class RedirectFollower {
  async fetchWithRedirects(
    url: string,
    init: RequestInit,
    maxRedirects: number
  ): Promise<{ response: Response; url: string }> {
    let currentUrl = url;
    const redirectLimit = Math.max(0, maxRedirects);

    for (
      let redirectCount = 0;
      redirectCount <= redirectLimit;
      redirectCount += 1
    ) {
      const response = await fetch(currentUrl, { ...init, redirect: 'manual' });
      if (!isRedirectStatus(response.status)) {
        return { response, url: currentUrl };
      }

      cancelResponseBody(response);
      if (redirectCount >= redirectLimit) {
        throw fetchErrors.tooManyRedirects(currentUrl);
      }

      const location = response.headers.get('location');
      if (!location) throw fetchErrors.missingRedirectLocation(currentUrl);

      currentUrl = this.resolveRedirectTarget(currentUrl, location);
      logDebug('Following redirect', {
        status: response.status,
        to: redactUrl(currentUrl),
      });
    }

    throw fetchErrors.tooManyRedirects(currentUrl);
  }

  private resolveRedirectTarget(baseUrl: string, location: string): string {
    if (!URL.canParse(location, baseUrl)) {
      throw fetchErrors.badRedirect(baseUrl, 'Invalid redirect target');
    }

    const resolved = new URL(location, baseUrl);
    if (resolved.username || resolved.password) {
      throw fetchErrors.badRedirect(
        baseUrl,
        'Redirect target includes credentials'
      );
    }
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') {
      throw fetchErrors.badRedirect(
        baseUrl,
        `Redirect to unsupported protocol: ${resolved.protocol}`
      );
    }

    return resolved.href;
  }
}

const redirectFollower = new RedirectFollower();

/* -------------------------------------------------------------------------------------------------
 * Response reading
 * ------------------------------------------------------------------------------------------------- */

function assertContentLengthWithinLimit(
  response: Response,
  url: string,
  maxBytes: number
): void {
  const header = response.headers.get('content-length');
  if (!header) return;

  const contentLength = Number.parseInt(header, 10);
  if (Number.isNaN(contentLength) || contentLength <= maxBytes) return;

  cancelResponseBody(response);
  throw fetchErrors.sizeLimit(url, maxBytes);
}

function concatChunks(chunks: readonly Uint8Array[], total: number): Uint8Array {
  const bytes = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    bytes.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return bytes;
}

/** Reads the whole body; `maxBytes` of 0 means unlimited. */
async function readResponseBytes(
  response: Response,
  url: string,
  maxBytes: number
): Promise<Uint8Array> {
  const limited = maxBytes > 0;
  if (limited) assertContentLengthWithinLimit(response, url, maxBytes);

  if (!response.body) return new Uint8Array(await response.arrayBuffer());

  const chunks: Uint8Array[] = [];
  let total = 0;
  const reader = response.body.getReader();
  try {
    let result = await reader.read();
    while (!result.done) {
      total += result.value.byteLength;
      if (limited && total > maxBytes) {
        await reader.cancel();
        throw fetchErrors.sizeLimit(url, maxBytes);
      }
      chunks.push(result.value);
      result = await reader.read();
    }
  } finally {
    reader.releaseLock();
  }

  return concatChunks(chunks, total);
}

/* -------------------------------------------------------------------------------------------------
 * HTTP fetcher
 * ------------------------------------------------------------------------------------------------- */

function buildHeaders(): Record<string, string> {
  return {
    'User-Agent': config.fetcher.userAgent,
    Accept:
      'text/html,application/xhtml+xml,application/xml;q=0.9,application/pdf,text/plain;q=0.8,*/*;q=0.5',
    'Accept-Language': 'en-US,en;q=0.5',
  };
}

function buildRequestSignal(
  timeoutMs: number,
  external?: AbortSignal
): AbortSignal {
  const timeoutSignal = AbortSignal.timeout(timeoutMs);
  return external ? AbortSignal.any([external, timeoutSignal]) : timeoutSignal;
}

function buildRequestInit(
  signal: AbortSignal
): RequestInit & { dispatcher: Dispatcher } {
  return { method: 'GET', headers: buildHeaders(), signal, dispatcher };
}

/**
 * GETs `url` and returns the raw body with its declared content type.
 * Every failure, including non-2xx statuses, is a `FETCH_HTTP` error.
 */
export async function fetchRaw(
  url: string,
  options: FetchOptions = {}
): Promise<RawFetch> {
  const normalizedUrl = normalizeUrl(url);
  const timeoutMs = config.fetcher.timeout;
  const signal = buildRequestSignal(timeoutMs, options.signal);
  const init = buildRequestInit(signal);
  const logUrl = redactUrl(normalizedUrl);

  logInfo('Starting HTTP fetch', { url: logUrl });
  const startedAt = performance.now();

  try {
    const { response, url: finalUrl } =
      await redirectFollower.fetchWithRedirects(
        normalizedUrl,
        init,
        config.fetcher.maxRedirects
      );

    if (!response.ok) {
      cancelResponseBody(response);
      throw fetchErrors.http(finalUrl, response.status);
    }

    const bytes = await readResponseBytes(
      response,
      finalUrl,
      config.fetcher.maxContentLength
    );
    const contentType = response.headers.get('content-type') ?? undefined;

    logInfo('HTTP fetch completed', {
      url: redactUrl(finalUrl),
      status: response.status,
      size: bytes.byteLength,
      contentType,
      durationMs: Math.round(performance.now() - startedAt),
    });

    return contentType === undefined
      ? { bytes, url: finalUrl }
      : { bytes, contentType, url: finalUrl };
  } catch (error: unknown) {
    const mapped = mapFetchError(error, normalizedUrl, timeoutMs, signal);
    logWarn('HTTP fetch failed', {
      url: logUrl,
      message: mapped.message,
      ...(error instanceof ExtractionError ? {} : { error: getErrorMessage(error) }),
    });
    throw mapped;
  }
}
