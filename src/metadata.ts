import { parseHtmlDocument } from './html-document.js';

export interface PageMetadata {
  readonly title: string;
  readonly description: string;
  readonly image?: string;
  readonly favicon: string;
}

const DESCRIPTION_SELECTORS = [
  'meta[name="description"]',
  'meta[property="og:description"]',
] as const;

const FAVICON_SELECTOR = 'link[rel="icon"], link[rel="shortcut icon"]';
const DEFAULT_FAVICON_PATH = '/favicon.ico';

function resolveAgainst(value: string, baseUrl: string): string {
  return URL.canParse(value, baseUrl) ? new URL(value, baseUrl).href : value;
}

function readAttribute(
  document: Document,
  selector: string,
  name: string
): string | undefined {
  return document.querySelector(selector)?.getAttribute(name) ?? undefined;
}

function readDescription(document: Document): string {
  for (const selector of DESCRIPTION_SELECTORS) {
    const content = readAttribute(document, selector, 'content')?.trim();
    if (content) return content;
  }
  return '';
}

/**
 * Reads the title, description, preview image and favicon of an HTML page.
 * Relative image and favicon references resolve against `pageUrl`; a page
 * without an icon link gets `/favicon.ico` on its origin.
 */
export function extractPageMetadata(html: string, pageUrl: string): PageMetadata {
  const document = parseHtmlDocument(html);
  const title = document.querySelector('title')?.textContent?.trim() ?? '';
  const description = readDescription(document);
  const favicon = resolveAgainst(
    readAttribute(document, FAVICON_SELECTOR, 'href') ?? DEFAULT_FAVICON_PATH,
    pageUrl
  );

  const image = readAttribute(document, 'meta[property="og:image"]', 'content');
  if (image === undefined || image.trim() === '') {
    return { title, description, favicon };
  }
  return {
    title,
    description,
    image: resolveAgainst(image.trim(), pageUrl),
    favicon,
  };
}

export function formatPageMetadata(url: string, metadata: PageMetadata): string {
  return [
    `## URL Metadata for ${url}`,
    `**Title:** ${metadata.title}`,
    `**Description:** ${metadata.description}`,
    `**Image:** ${metadata.image ?? 'None'}`,
    `**Favicon:** ${metadata.favicon}`,
  ].join('\n\n');
}
