import { randomUUID } from 'node:crypto';

import { z } from 'zod';

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type {
  CallToolResult,
  ToolAnnotations,
} from '@modelcontextprotocol/sdk/types.js';

import { ContentCache } from './cache.js';
import { decodeText } from './charset.js';
import { config } from './config.js';
import {
  classifyContent,
  parseMimeType,
  safeTruncate,
  sliceHead,
} from './content-guard.js';
import {
  buildErrorPayload,
  ExtractionError,
  toErrorPayload,
} from './errors.js';
import {
  extractContent,
  type ExtractedContent,
  type RawFetch,
} from './extract.js';
import { fetchRaw, normalizeUrl, type FetchOptions } from './fetch.js';
import type { MarkdownOptions } from './markdown-handlers.js';
import { convertHtmlToMarkdown } from './markdown-writer.js';
import {
  extractPageMetadata,
  formatPageMetadata,
  type PageMetadata,
} from './metadata.js';
import {
  getRequestId,
  logError,
  logInfo,
  logWarn,
  redactUrl,
  runWithRequestContext,
} from './observability.js';
import { isObject } from './type-guards.js';

export type RawFetcher = (url: string, options?: FetchOptions) => Promise<RawFetch>;

export interface ToolServices {
  readonly fetchRaw: RawFetcher;
  readonly cache: ContentCache<ExtractedContent>;
  readonly metadataCache: ContentCache<PageMetadata>;
}

export interface ToolHandlerExtra {
  signal?: AbortSignal;
  requestId?: string | number;
}

export function createToolServices(
  overrides: Partial<ToolServices> = {}
): ToolServices {
  return {
    fetchRaw: overrides.fetchRaw ?? fetchRaw,
    cache: overrides.cache ?? new ContentCache<ExtractedContent>(),
    metadataCache:
      overrides.metadataCache ?? new ContentCache<PageMetadata>(),
  };
}

export const TRUNCATION_SUFFIX = '... [Content truncated due to length]';
export const NO_TEXT_CONTENT_MESSAGE = 'No textual content found';

export const DEFAULT_EXCLUDED_TAGS = [
  'script',
  'style',
  'noscript',
  'iframe',
  'svg',
  'nav',
  'footer',
  'header',
  'aside',
] as const;

/* -------------------------------------------------------------------------------------------------
 * Schemas
 * ------------------------------------------------------------------------------------------------- */

const fetchUrlInputSchema = z.strictObject({
  url: z.string().min(1).describe('The URL to fetch'),
  maxLength: z
    .number()
    .int()
    .min(config.tools.minMaxLength)
    .max(config.tools.maxMaxLength)
    .default(config.tools.defaultMaxLength)
    .describe('Maximum length of content to return (default: 10000)'),
  extractMainContent: z
    .boolean()
    .default(true)
    .describe('Whether to attempt to extract main content (default: true)'),
  includeLinks: z
    .boolean()
    .default(true)
    .describe('Whether to keep link targets in the markdown (default: true)'),
  includeImages: z
    .boolean()
    .default(true)
    .describe('Whether to include image references (default: true)'),
  excludeTags: z
    .array(z.string().trim().toLowerCase().min(1).max(64))
    .max(100)
    .default(() => [...DEFAULT_EXCLUDED_TAGS])
    .describe(
      `HTML tags to exclude with their contents (default: ${DEFAULT_EXCLUDED_TAGS.join(', ')})`
    ),
});

export type FetchUrlInput = z.infer<typeof fetchUrlInputSchema>;

const fetchUrlOutputSchema = z.strictObject({
  url: z.string().describe('The fetched URL'),
  kind: z
    .enum(['html-main', 'html-full', 'pdf', 'plain-text'])
    .describe('How the text was obtained'),
  contentType: z
    .string()
    .optional()
    .describe('Content-Type declared by the server'),
  mainFragmentUsed: z
    .boolean()
    .describe('Whether a main-content fragment was selected'),
  contentLength: z.number().describe('Length of the full extracted text'),
  truncated: z.boolean().describe('Whether the content was cut to maxLength'),
  content: z.string().describe('The extracted text'),
});

const urlFetchInputSchema = z.strictObject({
  url: z.string().min(1).describe('The URL to fetch and convert to markdown'),
});

export type UrlFetchInput = z.infer<typeof urlFetchInputSchema>;

const urlMetadataInputSchema = z.strictObject({
  url: z.string().min(1).describe('The URL to extract metadata from'),
});

export type UrlMetadataInput = z.infer<typeof urlMetadataInputSchema>;

const urlMetadataOutputSchema = z.strictObject({
  url: z.string().describe('The fetched URL'),
  title: z.string().describe('Document title, empty when missing'),
  description: z.string().describe('Meta or Open Graph description'),
  image: z.string().optional().describe('Open Graph preview image'),
  favicon: z.string().describe('Icon link, or /favicon.ico on the origin'),
});

export const FETCH_URL_TOOL_NAME = 'fetch-url';
export const URL_FETCH_TOOL_NAME = 'url-fetch';
export const URL_METADATA_TOOL_NAME = 'url-metadata';

const READ_ONLY_ANNOTATIONS = {
  readOnlyHint: true,
  destructiveHint: false,
  idempotentHint: true,
  openWorldHint: true,
} satisfies ToolAnnotations;

/* -------------------------------------------------------------------------------------------------
 * Responses
 * ------------------------------------------------------------------------------------------------- */

function textResult(text: string): CallToolResult {
  return { content: [{ type: 'text', text }] };
}

function errorResult(text: string): CallToolResult {
  return { content: [{ type: 'text', text }], isError: true };
}

export function handleToolError(
  toolName: string,
  error: unknown,
  url: string
): CallToolResult {
  if (error instanceof ExtractionError) {
    logWarn(`${toolName} failed`, { url: redactUrl(url), code: error.code });
  } else {
    logError(
      `${toolName} failed unexpectedly`,
      error instanceof Error ? error : { error: String(error) }
    );
  }
  return errorResult(buildErrorPayload(toErrorPayload(error, url)));
}

export interface FooterSettings {
  readonly extractMain: boolean;
  readonly includeLinks: boolean;
  readonly includeImages: boolean;
}

function yesNo(value: boolean): string {
  return value ? 'Yes' : 'No';
}

export function buildExtractionFooter(
  url: string,
  settings: FooterSettings,
  extracted: ExtractedContent,
  maxLength: number
): string {
  const length = extracted.text.length;
  const truncatedNote =
    length > maxLength ? ` (truncated to ${maxLength})` : '';
  return [
    '',
    '---',
    'Extraction settings:',
    `- URL: ${url}`,
    `- Main content extraction: ${settings.extractMain ? 'Enabled' : 'Disabled'}`,
    `- Links included: ${yesNo(settings.includeLinks)}`,
    `- Images included: ${yesNo(settings.includeImages)}`,
    `- Extraction kind: ${extracted.kind}`,
    `- Main fragment used: ${yesNo(extracted.mainFragmentUsed)}`,
    `- Content length: ${length} characters${truncatedNote}`,
    '---',
  ].join('\n');
}

async function withCache<T>(
  cache: ContentCache<T>,
  parts: Record<string, unknown>,
  produce: () => Promise<T>
): Promise<T> {
  const cached = cache.get(parts);
  if (cached !== undefined) {
    logInfo('Serving cached content', { tool: parts['tool'] });
    return cached;
  }
  const value = await produce();
  cache.set(parts, value);
  return value;
}

function fetchOptionsFrom(extra: ToolHandlerExtra | undefined): FetchOptions {
  return extra?.signal ? { signal: extra.signal } : {};
}

function refuseBinary(raw: RawFetch): void {
  const { bytes, contentType } = raw;
  const verdict = classifyContent(contentType, sliceHead(bytes));
  if (verdict.kind === 'binary') {
    throw new ExtractionError(
      'UNSUPPORTED_BINARY',
      'Fetch cannot be performed for this type of content',
      {
        contentType: verdict.contentType ?? contentType ?? 'unknown',
        size: bytes.byteLength,
      }
    );
  }
}

/* -------------------------------------------------------------------------------------------------
 * fetch-url
 * ------------------------------------------------------------------------------------------------- */

async function executeFetchUrl(
  services: ToolServices,
  input: FetchUrlInput,
  extra?: ToolHandlerExtra
): Promise<CallToolResult> {
  const url = normalizeUrl(input.url);
  const extractMain = input.extractMainContent;
  const { maxLength, includeLinks, includeImages } = input;
  const markdown: MarkdownOptions = {
    includeLinks,
    includeImages,
    excludeTags: [...new Set(input.excludeTags)].sort(),
  };

  logInfo('Fetching content', {
    url: redactUrl(url),
    maxLength,
    extractMain,
    includeLinks,
    includeImages,
  });

  const extracted = await withCache(
    services.cache,
    { tool: FETCH_URL_TOOL_NAME, url, extractMain, ...markdown },
    async () => {
      const raw = await services.fetchRaw(url, fetchOptionsFrom(extra));
      return extractContent(raw, { extractMain, markdown });
    }
  );

  const truncated = extracted.text.length > maxLength;
  const content = truncated
    ? safeTruncate(extracted.text, maxLength, TRUNCATION_SUFFIX)
    : extracted.text;

  const structuredContent = {
    url,
    kind: extracted.kind,
    ...(extracted.contentType === undefined
      ? {}
      : { contentType: extracted.contentType }),
    mainFragmentUsed: extracted.mainFragmentUsed,
    contentLength: extracted.text.length,
    truncated,
    content,
  } satisfies z.infer<typeof fetchUrlOutputSchema>;

  return {
    content: [
      {
        type: 'text',
        text: `${content}${buildExtractionFooter(
          url,
          { extractMain, includeLinks, includeImages },
          extracted,
          maxLength
        )}`,
      },
    ],
    structuredContent,
  };
}

export function createFetchUrlHandler(
  services: ToolServices
): (input: FetchUrlInput, extra?: ToolHandlerExtra) => Promise<CallToolResult> {
  return async (input, extra) => {
    try {
      return await executeFetchUrl(services, input, extra);
    } catch (error: unknown) {
      return handleToolError(FETCH_URL_TOOL_NAME, error, input.url);
    }
  };
}

/* -------------------------------------------------------------------------------------------------
 * url-fetch
 * ------------------------------------------------------------------------------------------------- */

type UrlFetchFormat = 'html' | 'plain' | 'json';

function resolveUrlFetchFormat(contentType: string | undefined): UrlFetchFormat {
  const mime = parseMimeType(contentType);
  if (mime === 'text/plain') return 'plain';
  if (mime === 'application/json' || mime.endsWith('+json')) return 'json';
  return 'html';
}

function formatJson(decoded: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(decoded);
  } catch (error: unknown) {
    throw new ExtractionError(
      'DECODE',
      'Response is not valid JSON',
      { contentType: 'application/json' },
      { cause: error }
    );
  }
  return `\`\`\`json\n${JSON.stringify(parsed, null, 2)}\n\`\`\``;
}

/** Converts a response for `url-fetch`: HTML by default, plain text and JSON as-is. */
export function convertForUrlFetch(raw: RawFetch): ExtractedContent {
  refuseBinary(raw);
  const { bytes, contentType } = raw;
  const decoded = decodeText(bytes, contentType);
  const contentTypeField = contentType === undefined ? {} : { contentType };

  switch (resolveUrlFetchFormat(contentType)) {
    case 'plain':
      return {
        text: decoded,
        kind: 'plain-text',
        mainFragmentUsed: false,
        ...contentTypeField,
      };
    case 'json':
      return {
        text: formatJson(decoded),
        kind: 'plain-text',
        mainFragmentUsed: false,
        ...contentTypeField,
      };
    case 'html':
      return {
        text: convertHtmlToMarkdown(decoded),
        kind: 'html-full',
        mainFragmentUsed: false,
        ...contentTypeField,
      };
  }
}

async function executeUrlFetch(
  services: ToolServices,
  input: UrlFetchInput,
  extra?: ToolHandlerExtra
): Promise<CallToolResult> {
  const url = normalizeUrl(input.url);
  logInfo('Fetching and converting URL to markdown', { url: redactUrl(url) });

  const converted = await withCache(
    services.cache,
    { tool: URL_FETCH_TOOL_NAME, url },
    async () =>
      convertForUrlFetch(await services.fetchRaw(url, fetchOptionsFrom(extra)))
  );

  if (converted.text.trim() === '') return errorResult(NO_TEXT_CONTENT_MESSAGE);
  return textResult(converted.text);
}

export function createUrlFetchHandler(
  services: ToolServices
): (input: UrlFetchInput, extra?: ToolHandlerExtra) => Promise<CallToolResult> {
  return async (input, extra) => {
    try {
      return await executeUrlFetch(services, input, extra);
    } catch (error: unknown) {
      return handleToolError(URL_FETCH_TOOL_NAME, error, input.url);
    }
  };
}

/* -------------------------------------------------------------------------------------------------
 * url-metadata
 * ------------------------------------------------------------------------------------------------- */

export function readPageMetadata(raw: RawFetch): PageMetadata {
  refuseBinary(raw);
  return extractPageMetadata(decodeText(raw.bytes, raw.contentType), raw.url);
}

async function executeUrlMetadata(
  services: ToolServices,
  input: UrlMetadataInput,
  extra?: ToolHandlerExtra
): Promise<CallToolResult> {
  const url = normalizeUrl(input.url);
  logInfo('Extracting URL metadata', { url: redactUrl(url) });

  const metadata = await withCache(
    services.metadataCache,
    { tool: URL_METADATA_TOOL_NAME, url },
    async () =>
      readPageMetadata(await services.fetchRaw(url, fetchOptionsFrom(extra)))
  );

  const structuredContent = {
    url,
    ...metadata,
  } satisfies z.infer<typeof urlMetadataOutputSchema>;

  return {
    content: [{ type: 'text', text: formatPageMetadata(url, metadata) }],
    structuredContent,
  };
}

export function createUrlMetadataHandler(
  services: ToolServices
): (
  input: UrlMetadataInput,
  extra?: ToolHandlerExtra
) => Promise<CallToolResult> {
  return async (input, extra) => {
    try {
      return await executeUrlMetadata(services, input, extra);
    } catch (error: unknown) {
      return handleToolError(URL_METADATA_TOOL_NAME, error, input.url);
    }
  };
}

/* -------------------------------------------------------------------------------------------------
 * Registration
 * ------------------------------------------------------------------------------------------------- */

export function withRequestContextIfMissing<TParams, TResult, TExtra = unknown>(
  handler: (params: TParams, extra?: TExtra) => Promise<TResult>
): (params: TParams, extra?: TExtra) => Promise<TResult> {
  return async (params, extra) => {
    const existingRequestId = getRequestId();
    if (existingRequestId) {
      return handler(params, extra);
    }

    const derivedRequestId = resolveRequestIdFromExtra(extra) ?? randomUUID();
    return runWithRequestContext(
      { requestId: derivedRequestId, operationId: derivedRequestId },
      () => handler(params, extra)
    );
  };
}

function resolveRequestIdFromExtra(extra: unknown): string | undefined {
  if (!isObject(extra)) return undefined;
  const { requestId } = extra;
  if (typeof requestId === 'string') return requestId;
  if (typeof requestId === 'number') return String(requestId);
  return undefined;
}

export function registerTools(server: McpServer, services: ToolServices): void {
  server.registerTool(
    FETCH_URL_TOOL_NAME,
    {
      title: 'Fetch URL Content',
      description:
        'Fetch the content of a URL and return it as text, with options to control extraction',
      inputSchema: fetchUrlInputSchema,
      outputSchema: fetchUrlOutputSchema,
      annotations: READ_ONLY_ANNOTATIONS,
    },
    withRequestContextIfMissing(createFetchUrlHandler(services))
  );

  server.registerTool(
    URL_FETCH_TOOL_NAME,
    {
      title: 'URL Fetch Tool',
      description: 'Fetch web pages and convert them to markdown format',
      inputSchema: urlFetchInputSchema,
      annotations: READ_ONLY_ANNOTATIONS,
    },
    withRequestContextIfMissing(createUrlFetchHandler(services))
  );

  server.registerTool(
    URL_METADATA_TOOL_NAME,
    {
      title: 'URL Metadata',
      description:
        'Extract metadata from a URL: title, description, preview image and favicon',
      inputSchema: urlMetadataInputSchema,
      outputSchema: urlMetadataOutputSchema,
      annotations: READ_ONLY_ANNOTATIONS,
    },
    withRequestContextIfMissing(createUrlMetadataHandler(services))
  );
}
