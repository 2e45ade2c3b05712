import { parseHTML } from 'linkedom';

function needsDocumentWrapper(html: string): boolean {
  const trimmed = html.trim().toLowerCase();
  return (
    !trimmed.startsWith('<!doctype') &&
    !trimmed.startsWith('<html') &&
    !trimmed.startsWith('<body')
  );
}

function wrapHtmlFragment(html: string): string {
  return `<!DOCTYPE html><html><body>${html}</body></html>`;
}

/** Parses leniently; bare fragments get a document shell first. */
export function parseHtmlDocument(html: string): Document {
  const htmlToParse = needsDocumentWrapper(html) ? wrapHtmlFragment(html) : html;
  return parseHTML(htmlToParse).document;
}
