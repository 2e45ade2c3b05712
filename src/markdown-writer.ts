import { ExtractionError, getErrorMessage } from './errors.js';
import { parseHtmlDocument } from './html-document.js';
import { createDefaultHandlers } from './markdown-handlers.js';

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;

const INLINE_TAGS: ReadonlySet<string> = new Set([
  'a', 'abbr', 'acronym', 'audio', 'b', 'bdi', 'bdo', 'big', 'br', 'button',
  'canvas', 'cite', 'code', 'data', 'datalist', 'del', 'dfn', 'em', 'embed',
  'i', 'iframe', 'img', 'input', 'ins', 'kbd', 'label', 'map', 'mark',
  'meter', 'noscript', 'object', 'output', 'picture', 'progress', 'q', 'ruby',
  's', 'samp', 'script', 'select', 'slot', 'small', 'span', 'strong', 'sub',
  'sup', 'svg', 'template', 'textarea', 'time', 'tt', 'u', 'var', 'video',
  'wbr',
]);

/** A tag name plus its attributes, detached from the DOM. */
export class HtmlElement {
  readonly tag: string;
  readonly attributes: ReadonlyMap<string, string>;

  constructor(tag: string, attributes: Iterable<readonly [string, string]> = []) {
    this.tag = tag.toLowerCase();
    const map = new Map<string, string>();
    for (const [name, value] of attributes) {
      if (!map.has(name)) map.set(name, value);
    }
    this.attributes = map;
  }

  static fromElement(element: Element): HtmlElement {
    return new HtmlElement(
      element.localName,
      Array.from(element.attributes, (attr): [string, string] => [
        attr.name,
        attr.value,
      ])
    );
  }

  get isInline(): boolean {
    return INLINE_TAGS.has(this.tag);
  }

  attr(name: string): string | undefined {
    return this.attributes.get(name);
  }

  classes(): string[] {
    const value = this.attributes.get('class');
    if (value === undefined) return [];
    return value.split(' ').map((token) => token.trim());
  }

  hasClass(name: string): boolean {
    return this.hasAnyClass([name]);
  }

  hasAnyClass(names: readonly string[]): boolean {
    return this.classes().some((token) => names.includes(token));
  }
}

export type StartTagOutcome = 'continue' | 'skip';
export type TextOutcome = 'handled' | 'noop';

export interface TagHandler {
  shouldHandle(tag: string): boolean;
  onStart?(element: HtmlElement, writer: MarkdownWriter): StartTagOutcome;
  onEnd?(element: HtmlElement, writer: MarkdownWriter): void;
  onText?(text: string, writer: MarkdownWriter): TextOutcome;
}

const WHITESPACE_ONLY_LINE = /^[ \t]+$/gm;
const EXCESS_NEWLINES = /\n{3,}/g;

export function prettifyMarkdown(markdown: string): string {
  return markdown
    .replace(WHITESPACE_ONLY_LINE, '')
    .replace(EXCESS_NEWLINES, '\n\n')
    .trim();
}

function isElementNode(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

type Frame =
  | { readonly type: 'enter'; readonly node: Node }
  | { readonly type: 'exit'; readonly element: HtmlElement };

function trimControlNewlines(text: string): string {
  return text.replace(/^[\n\r\t]+|[\n\r\t]+$/g, '');
}

export class MarkdownWriter {
  private readonly stack: HtmlElement[] = [];
  private output = '';

  constructor(private readonly handlers: readonly TagHandler[]) {}

  get markdown(): string {
    return this.output;
  }

  get elementStack(): readonly HtmlElement[] {
    return this.stack;
  }

  get parent(): HtmlElement | undefined {
    return this.stack.at(-1);
  }

  isInside(tag: string): boolean {
    return this.stack.some((element) => element.tag === tag);
  }

  endsWith(suffix: string): boolean {
    return this.output.endsWith(suffix);
  }

  push(text: string): void {
    this.output += text;
  }

  pushNewline(): void {
    this.push('\n');
  }

  pushBlankLine(): void {
    this.push('\n\n');
  }

  run(root: Node): string {
    const pending: Frame[] = [{ type: 'enter', node: root }];

    for (let frame = pending.pop(); frame; frame = pending.pop()) {
      if (frame.type === 'exit') {
        this.stack.pop();
        this.endTag(frame.element);
        continue;
      }

      const { node } = frame;
      if (node.nodeType === TEXT_NODE) {
        this.visitText(node.textContent ?? '');
        continue;
      }

      if (isElementNode(node)) {
        const element = HtmlElement.fromElement(node);
        if (element.tag === '' || this.startTag(element) === 'skip') continue;

        this.stack.push(element);
        pending.push({ type: 'exit', element });
      }

      const children = Array.from(node.childNodes);
      for (let i = children.length - 1; i >= 0; i -= 1) {
        const child = children[i];
        if (child) pending.push({ type: 'enter', node: child });
      }
    }

    return prettifyMarkdown(this.output);
  }

  private startTag(element: HtmlElement): StartTagOutcome {
    for (const handler of this.handlers) {
      if (!handler.shouldHandle(element.tag)) continue;
      if (handler.onStart?.(element, this) === 'skip') return 'skip';
    }
    return 'continue';
  }

  private endTag(element: HtmlElement): void {
    for (const handler of this.handlers) {
      if (handler.shouldHandle(element.tag)) handler.onEnd?.(element, this);
    }
  }

  private visitText(text: string): void {
    for (const handler of this.handlers) {
      if (handler.onText?.(text, this) === 'handled') return;
    }
    this.push(trimControlNewlines(text).replace(/\n/g, ' '));
  }
}

/**
 * Converts an HTML document or fragment to Markdown. Handlers default to a
 * fresh built-in set, since some of them keep per-table state.
 */
export function convertHtmlToMarkdown(
  html: string,
  handlers: readonly TagHandler[] = createDefaultHandlers()
): string {
  try {
    const document = parseHtmlDocument(html);
    return new MarkdownWriter(handlers).run(document);
  } catch (error) {
    if (error instanceof ExtractionError) throw error;
    throw new ExtractionError(
      'HTML_CONVERSION',
      'Failed to convert HTML content to text',
      {
        hint: 'The page structure could not be converted into text content.',
        error: getErrorMessage(error),
      },
      { cause: error }
    );
  }
}
