import type {
  HtmlElement,
  MarkdownWriter,
  StartTagOutcome,
  TagHandler,
  TextOutcome,
} from './markdown-writer.js';

export interface MarkdownOptions {
  readonly includeLinks: boolean;
  readonly includeImages: boolean;
  /** Skipped with their subtree, on top of the built-in chrome tags. */
  readonly excludeTags: readonly string[];
}

export const DEFAULT_MARKDOWN_OPTIONS: MarkdownOptions = {
  includeLinks: true,
  includeImages: true,
  excludeTags: [],
};

const CHROME_TAGS: ReadonlySet<string> = new Set([
  'head',
  'script',
  'style',
  'nav',
  'footer',
  'aside',
]);

const CHROME_CLASSES = [
  'ad',
  'ads',
  'advertisement',
  'banner',
  'popup',
  'modal',
  'cookie',
  'newsletter',
  'sidebar',
  'widget',
  'promo',
  'sponsored',
  'affiliate',
  'tracking',
  'sponsored-content',
] as const;

const CHROME_CLASS_FRAGMENTS = ['ad', 'banner', 'popup', 'promo'] as const;

const CHROME_ID_FRAGMENTS = [
  'ad',
  'banner',
  'popup',
  'cookie',
  'newsletter',
  'sidebar',
] as const;

/** Drops page chrome: head, scripts, navigation, ads and overlays. */
export class ChromeRemover implements TagHandler {
  private readonly excludedTags: ReadonlySet<string>;

  constructor(excludedTags: Iterable<string> = []) {
    this.excludedTags = new Set(
      Array.from(excludedTags, (tag) => tag.trim().toLowerCase())
    );
  }

  shouldHandle(): boolean {
    return true;
  }

  onStart(element: HtmlElement): StartTagOutcome {
    if (CHROME_TAGS.has(element.tag) || this.excludedTags.has(element.tag)) {
      return 'skip';
    }
    if (element.hasAnyClass(CHROME_CLASSES)) return 'skip';

    const hasChromeFragment = element
      .classes()
      .some((token) =>
        CHROME_CLASS_FRAGMENTS.some((fragment) => token.includes(fragment))
      );
    if (hasChromeFragment) return 'skip';

    const id = element.attr('id')?.toLowerCase();
    if (id && CHROME_ID_FRAGMENTS.some((fragment) => id.includes(fragment))) {
      return 'skip';
    }

    return 'continue';
  }
}

export class ParagraphHandler implements TagHandler {
  shouldHandle(): boolean {
    return true;
  }

  onStart(element: HtmlElement, writer: MarkdownWriter): StartTagOutcome {
    if (element.isInline && writer.isInside('p')) {
      const { parent } = writer;
      if (
        parent &&
        !parent.isInline &&
        !writer.endsWith(' ') &&
        !writer.endsWith('\n')
      ) {
        writer.push(' ');
      }
    }

    if (element.tag === 'p') writer.pushBlankLine();
    return 'continue';
  }
}

const HEADING_LEVELS: ReadonlyMap<string, number> = new Map([
  ['h1', 1],
  ['h2', 2],
  ['h3', 3],
  ['h4', 4],
  ['h5', 5],
  ['h6', 6],
]);

export class HeadingHandler implements TagHandler {
  shouldHandle(tag: string): boolean {
    return HEADING_LEVELS.has(tag);
  }

  onStart(element: HtmlElement, writer: MarkdownWriter): StartTagOutcome {
    const level = HEADING_LEVELS.get(element.tag);
    if (level !== undefined) writer.push(`\n\n${'#'.repeat(level)} `);
    return 'continue';
  }

  onEnd(_element: HtmlElement, writer: MarkdownWriter): void {
    writer.pushBlankLine();
  }
}

export class ListHandler implements TagHandler {
  shouldHandle(tag: string): boolean {
    return tag === 'ul' || tag === 'ol' || tag === 'li';
  }

  onStart(element: HtmlElement, writer: MarkdownWriter): StartTagOutcome {
    if (element.tag === 'li') writer.push('- ');
    else writer.pushNewline();
    return 'continue';
  }

  onEnd(_element: HtmlElement, writer: MarkdownWriter): void {
    writer.pushNewline();
  }
}

const TABLE_TAGS: ReadonlySet<string> = new Set([
  'table',
  'thead',
  'tbody',
  'tr',
  'th',
  'td',
]);

/** Emits pipe tables. Column count comes from the header cells seen so far. */
export class TableHandler implements TagHandler {
  private columns = 0;
  private firstHeaderCell = true;
  private firstRowCell = true;

  shouldHandle(tag: string): boolean {
    return TABLE_TAGS.has(tag);
  }

  onStart(element: HtmlElement, writer: MarkdownWriter): StartTagOutcome {
    switch (element.tag) {
      case 'thead':
        writer.pushBlankLine();
        break;
      case 'tr':
        writer.pushNewline();
        break;
      case 'th':
        this.columns += 1;
        if (this.firstHeaderCell) this.firstHeaderCell = false;
        else writer.push(' ');
        writer.push('| ');
        break;
      case 'td':
        if (this.firstRowCell) this.firstRowCell = false;
        else writer.push(' ');
        writer.push('| ');
        break;
      default:
        break;
    }
    return 'continue';
  }

  onEnd(element: HtmlElement, writer: MarkdownWriter): void {
    switch (element.tag) {
      case 'thead':
        writer.push(
          `\n${Array.from({ length: this.columns }, () => '| ---').join(' ')} |`
        );
        this.firstHeaderCell = true;
        break;
      case 'tr':
        writer.push(' |');
        this.firstRowCell = true;
        break;
      case 'table':
        this.columns = 0;
        break;
      default:
        break;
    }
  }
}

const STYLE_MARKERS: ReadonlyMap<string, string> = new Map([
  ['strong', '**'],
  ['em', '_'],
]);

export class StyledTextHandler implements TagHandler {
  shouldHandle(tag: string): boolean {
    return STYLE_MARKERS.has(tag);
  }

  onStart(element: HtmlElement, writer: MarkdownWriter): StartTagOutcome {
    writer.push(STYLE_MARKERS.get(element.tag) ?? '');
    return 'continue';
  }

  onEnd(element: HtmlElement, writer: MarkdownWriter): void {
    writer.push(STYLE_MARKERS.get(element.tag) ?? '');
  }
}

/** With `includeMarkup` off, the anchor text stays and the target is dropped. */
export class LinkHandler implements TagHandler {
  constructor(private readonly includeMarkup = true) {}

  shouldHandle(tag: string): boolean {
    return tag === 'a';
  }

  onStart(element: HtmlElement, writer: MarkdownWriter): StartTagOutcome {
    if (this.includeMarkup && element.attr('href') !== undefined) {
      writer.push('[');
    }
    return 'continue';
  }

  onEnd(element: HtmlElement, writer: MarkdownWriter): void {
    const href = element.attr('href');
    if (this.includeMarkup && href !== undefined) writer.push(`](${href})`);
  }
}

export class ImageHandler implements TagHandler {
  constructor(private readonly includeImages = true) {}

  shouldHandle(tag: string): boolean {
    return tag === 'img';
  }

  onStart(element: HtmlElement, writer: MarkdownWriter): StartTagOutcome {
    const src = element.attr('src');
    if (this.includeImages && src !== undefined) {
      writer.push(`![${element.attr('alt') ?? 'image'}](${src})`);
    }
    return 'skip';
  }
}

export class CodeHandler implements TagHandler {
  shouldHandle(tag: string): boolean {
    return tag === 'pre' || tag === 'code';
  }

  onStart(element: HtmlElement, writer: MarkdownWriter): StartTagOutcome {
    if (element.tag === 'pre') writer.push('\n\n```\n');
    else if (!writer.isInside('pre')) writer.push('`');
    return 'continue';
  }

  onEnd(element: HtmlElement, writer: MarkdownWriter): void {
    if (element.tag === 'pre') writer.push('\n```\n');
    else if (!writer.isInside('pre')) writer.push('`');
  }

  // Called for every text node, not only those under pre or code.
  onText(text: string, writer: MarkdownWriter): TextOutcome {
    if (!writer.isInside('pre')) return 'noop';
    writer.push(text);
    return 'handled';
  }
}

/** Fresh instances in registration order; never share across conversions. */
export function createDefaultHandlers(
  options: Partial<MarkdownOptions> = {}
): TagHandler[] {
  const { includeLinks, includeImages, excludeTags } = {
    ...DEFAULT_MARKDOWN_OPTIONS,
    ...options,
  };
  return [
    new ChromeRemover(excludeTags),
    new ParagraphHandler(),
    new HeadingHandler(),
    new ListHandler(),
    new TableHandler(),
    new StyledTextHandler(),
    new LinkHandler(includeLinks),
    new ImageHandler(includeImages),
    new CodeHandler(),
  ];
}
