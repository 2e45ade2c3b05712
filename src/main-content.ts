import { readFileSync } from 'node:fs';

import { config } from './config.js';
import { parseHtmlDocument } from './html-document.js';

export type ContentFragment =
  | { readonly kind: 'main'; readonly html: string }
  | { readonly kind: 'body'; readonly html: string }
  | { readonly kind: 'full' };

export type SelectedFragment = Exclude<ContentFragment, { kind: 'full' }>;

function loadSelectors(): readonly string[] {
  const raw = readFileSync(
    new URL('../data/main-content-selectors.json', import.meta.url),
    'utf8'
  );
  const parsed: unknown = JSON.parse(raw);
  if (
    !Array.isArray(parsed) ||
    !parsed.every((entry): entry is string => typeof entry === 'string')
  ) {
    throw new Error('main-content-selectors.json must be an array of strings');
  }
  return Object.freeze(parsed);
}

/** Curated, in priority order. */
export const MAIN_CONTENT_SELECTORS: readonly string[] = loadSelectors();

const POSITIVE_PATTERN =
  /article|body|content|entry|hentry|h-entry|main|page|pagination|post|text|blog|story|paragraph/i;

function trimmedText(element: Element): string {
  return (element.textContent ?? '').trim();
}

function codePointLength(text: string): number {
  return Array.from(text).length;
}

function selectByCuratedList(document: Document): Element | undefined {
  for (const selector of MAIN_CONTENT_SELECTORS) {
    const element = document.querySelector(selector);
    if (element && trimmedText(element) !== '') return element;
  }
  return undefined;
}

function attributeTokens(element: Element): string {
  const className = element.getAttribute('class') ?? '';
  const id = element.getAttribute('id') ?? '';
  if (className && id) return `${className} ${id}`;
  return className || id;
}

function selectByClassHeuristic(document: Document): Element | undefined {
  let best: { element: Element; length: number } | undefined;

  for (const element of document.querySelectorAll('[class],[id]')) {
    const tokens = attributeTokens(element);
    if (!tokens) continue;

    // Chrome-like names (nav, sidebar, comment) only count alongside a content name.
    if (!POSITIVE_PATTERN.test(tokens)) continue;

    const length = codePointLength(trimmedText(element));
    if (length < config.extraction.minDynamicTextChars) continue;

    if (!best || length > best.length) best = { element, length };
  }

  return best?.element;
}

/**
 * Locates the substantive region of an HTML document.
 *
 * Curated selectors are tried first, then elements whose class or id reads
 * like content and carry enough text, then `<body>`. Returns undefined for
 * blank input or a document without any text.
 */
export function selectMainContent(html: string): SelectedFragment | undefined {
  if (html.trim() === '') return undefined;

  const document = parseHtmlDocument(html);

  const curated = selectByCuratedList(document);
  if (curated) return { kind: 'main', html: curated.outerHTML };

  const scored = selectByClassHeuristic(document);
  if (scored) return { kind: 'main', html: scored.outerHTML };

  const body = document.querySelector('body');
  if (body && trimmedText(body) !== '') {
    return { kind: 'body', html: body.outerHTML };
  }

  return undefined;
}
