/**
 * Token builder.
 *
 * Assembles the scanner's flat unit list into a token tree rooted at a
 * `document` token, and extracts document-level metadata (code blocks,
 * languages, images, links) in a single walk over the tree.
 *
 * Malformed Markdown never raises: unmatched emphasis markers and broken
 * link syntax turn into `literal` tokens carrying the source characters.
 * Only a unit stream that breaks the scanner's own guarantees raises a
 * {@link StructuralError}.
 *
 * @module core/parser
 */
import { scan } from './scanner.js';
import { StructuralError } from './types.js';
import type {
  BlockToken,
  CodeBlockToken,
  DocumentToken,
  HeadingToken,
  InlineToken,
  LexicalUnit,
  ListItemToken,
  ListToken,
  Token,
} from './types.js';

// ---------------------------------------------------------------------------
// Lines
// ---------------------------------------------------------------------------

interface Line {
  /** Indentation width, tabs counted to the next multiple of four. */
  indent: number;
  /** Units of the line without indentation and line terminator. */
  units: LexicalUnit[];
  newline?: LexicalUnit;
}

function indentWidth(whitespace: string): number {
  let width = 0;
  for (const ch of whitespace) {
    width = ch === '\t' ? width + 4 - (width % 4) : width + 1;
  }
  return width;
}

function splitLines(units: readonly LexicalUnit[]): Line[] {
  const lines: Line[] = [];
  let current: Line = { indent: 0, units: [] };

  for (const unit of units) {
    if (unit.kind === 'newline') {
      current.newline = unit;
      lines.push(current);
      current = { indent: 0, units: [] };
    } else if (unit.kind === 'indent' && current.units.length === 0) {
      current.indent = indentWidth(unit.text);
    } else {
      current.units.push(unit);
    }
  }
  lines.push(current);

  return lines;
}

/** Join the inline units of several lines, keeping the line breaks. */
function joinLines(lines: readonly Line[]): LexicalUnit[] {
  const joined: LexicalUnit[] = [];
  lines.forEach((line, idx) => {
    if (idx > 0) {
      const previous = lines[idx - 1];
      joined.push(
        previous.newline ?? { kind: 'newline', text: '\n', offset: line.units[0]?.offset ?? 0 },
      );
    }
    joined.push(...line.units);
  });
  return joined;
}

// ---------------------------------------------------------------------------
// Inline construction
// ---------------------------------------------------------------------------

interface Delimiter {
  kind: 'delimiter';
  char: string;
  length: number;
  canOpen: boolean;
  canClose: boolean;
  /** Set once a later run closes this one. */
  opens: boolean;
  /** Openers this run closes, innermost first. */
  closes: Delimiter[];
  /** Characters of the run left over as literal text. */
  leftover: number;
}

type Piece =
  | { kind: 'text'; content: string }
  | { kind: 'token'; token: InlineToken }
  | { kind: 'link'; image: boolean; label: LexicalUnit[]; url: string }
  | Delimiter;

const WHITESPACE_RE = /\s/;
const ALNUM_RE = /[\p{L}\p{N}]/u;

function isWhitespace(ch: string | undefined): boolean {
  return ch === undefined || WHITESPACE_RE.test(ch);
}

function makeDelimiter(
  unit: LexicalUnit,
  prev: LexicalUnit | undefined,
  next: LexicalUnit | undefined,
): Delimiter {
  const before = prev?.text.at(-1);
  const after = next?.text[0];
  const char = unit.text[0];

  let canOpen = !isWhitespace(after);
  let canClose = !isWhitespace(before);
  if (char === '_') {
    // Intraword underscores stay literal.
    canOpen = canOpen && !(before !== undefined && ALNUM_RE.test(before));
    canClose = canClose && !(after !== undefined && ALNUM_RE.test(after));
  }

  return {
    kind: 'delimiter',
    char,
    length: unit.text.length,
    canOpen,
    canClose,
    opens: false,
    closes: [],
    leftover: unit.text.length,
  };
}

/** Strip one space on each side when both are present. */
function trimCodeSpan(content: string): string {
  if (
    content.length >= 2 &&
    content.startsWith(' ') &&
    content.endsWith(' ') &&
    content.trim().length > 0
  ) {
    return content.slice(1, -1);
  }
  return content;
}

function plainLabel(units: readonly LexicalUnit[]): string {
  return units
    .filter((u) => u.kind === 'text' || u.kind === 'raw-text' || u.kind === 'newline')
    .map((u) => u.text)
    .join('');
}

function unitsToPieces(units: readonly LexicalUnit[]): Piece[] {
  const pieces: Piece[] = [];

  for (let i = 0; i < units.length; i++) {
    const unit = units[i];

    switch (unit.kind) {
      case 'text':
      case 'newline':
        pieces.push({ kind: 'text', content: unit.text });
        break;

      case 'emphasis-marker':
        pieces.push(makeDelimiter(unit, units[i - 1], units[i + 1]));
        break;

      case 'code-span-marker': {
        let j = i + 1;
        let content = '';
        const inner = units[j];
        if (inner?.kind === 'raw-text') {
          content = inner.text;
          j++;
        }
        const close = units[j];
        if (close?.kind !== 'code-span-marker' || close.text !== unit.text) {
          throw new StructuralError(`Unclosed code span at offset ${unit.offset}`);
        }
        pieces.push({ kind: 'token', token: { type: 'code-span', content: trimCodeSpan(content) } });
        i = j;
        break;
      }

      case 'link-bracket': {
        if (unit.text !== '[' && unit.text !== '![') {
          throw new StructuralError(`Stray link bracket "${unit.text}" at offset ${unit.offset}`);
        }
        let middle = i + 1;
        while (
          middle < units.length &&
          !(units[middle].kind === 'link-bracket' && units[middle].text === '](')
        ) {
          middle++;
        }
        if (middle >= units.length) {
          throw new StructuralError(`Link label at offset ${unit.offset} has no destination`);
        }

        let k = middle + 1;
        let url = '';
        const urlUnit = units[k];
        if (urlUnit?.kind === 'raw-text') {
          url = urlUnit.text;
          k++;
        }
        const closing = units[k];
        const closed = closing?.kind === 'link-bracket' && closing.text === ')';
        const last = closed ? k : k - 1;

        if (!closed || url.trim() === '') {
          const raw = units
            .slice(i, last + 1)
            .map((u) => u.text)
            .join('');
          pieces.push({ kind: 'token', token: { type: 'literal', content: raw } });
        } else {
          pieces.push({
            kind: 'link',
            image: unit.text === '![',
            label: units.slice(i + 1, middle),
            url: url.trim(),
          });
        }
        i = last;
        break;
      }

      default:
        throw new StructuralError(`Unexpected ${unit.kind} unit at offset ${unit.offset}`);
    }
  }

  return pieces;
}

/**
 * Pair emphasis runs with a delimiter stack. A closing run pairs with the
 * nearest opener of the same character whose length does not exceed what
 * is left of the closer; openers skipped over stay literal.
 */
function matchDelimiters(pieces: readonly Piece[]): void {
  const openers: Delimiter[] = [];

  for (const piece of pieces) {
    if (piece.kind !== 'delimiter') {
      continue;
    }

    if (piece.canClose) {
      while (piece.leftover > 0) {
        let idx = openers.length - 1;
        while (idx >= 0 && openers[idx].char !== piece.char) {
          idx--;
        }
        if (idx < 0) {
          break;
        }
        const opener = openers[idx];
        if (opener.length > piece.leftover) {
          break;
        }
        openers.length = idx;
        opener.opens = true;
        opener.leftover = 0;
        piece.closes.push(opener);
        piece.leftover -= opener.length;
      }
    }

    if (piece.closes.length === 0 && piece.canOpen) {
      openers.push(piece);
    }
  }
}

interface Frame {
  level: number;
  opener?: Delimiter;
  children: InlineToken[];
}

function appendInline(children: InlineToken[], token: InlineToken): void {
  const last = children[children.length - 1];
  if (token.type === 'text' && last?.type === 'text') {
    children[children.length - 1] = { type: 'text', content: last.content + token.content };
    return;
  }
  children.push(token);
}

/**
 * Build inline tokens from a unit run.
 *
 * @param baseLevel - Emphasis level of the enclosing context; nested spans
 *   add their run length to it.
 */
function buildInline(units: readonly LexicalUnit[], baseLevel = 0): InlineToken[] {
  const pieces = unitsToPieces(units);
  matchDelimiters(pieces);

  const frames: Frame[] = [{ level: baseLevel, children: [] }];
  const top = (): Frame => {
    const frame = frames[frames.length - 1];
    if (!frame) {
      throw new StructuralError('Emphasis stack underflow');
    }
    return frame;
  };

  for (const piece of pieces) {
    switch (piece.kind) {
      case 'text':
        appendInline(top().children, { type: 'text', content: piece.content });
        break;

      case 'token':
        appendInline(top().children, piece.token);
        break;

      case 'link':
        if (piece.image) {
          appendInline(top().children, { type: 'image', alt: plainLabel(piece.label), url: piece.url });
        } else {
          appendInline(top().children, {
            type: 'link',
            label: buildInline(piece.label, top().level),
            url: piece.url,
          });
        }
        break;

      case 'delimiter': {
        if (piece.opens) {
          frames.push({ level: top().level + piece.length, opener: piece, children: [] });
          break;
        }
        for (const opener of piece.closes) {
          const frame = frames.pop();
          if (!frame || frame.opener !== opener) {
            throw new StructuralError('Emphasis spans closed out of order');
          }
          appendInline(top().children, {
            type: 'emphasis',
            level: frame.level,
            children: frame.children,
          });
        }
        if (piece.leftover > 0) {
          appendInline(top().children, {
            type: 'literal',
            content: piece.char.repeat(piece.leftover),
          });
        }
        break;
      }
    }
  }

  if (frames.length !== 1) {
    throw new StructuralError('Emphasis span left open');
  }
  return top().children;
}

// ---------------------------------------------------------------------------
// Block construction
// ---------------------------------------------------------------------------

interface ItemDraft {
  lines: Line[];
  lists: ListToken[];
}

interface ListFrame {
  ordered: boolean;
  indent: number;
  items: ItemDraft[];
}

function fenceLanguage(fence: string): string | undefined {
  const info = fence.replace(/^`+/, '').trim();
  const word = info.split(/\s+/)[0];
  return word ? word : undefined;
}

function headingLevel(marker: string): HeadingToken['level'] {
  const count = marker.trim().length;
  switch (count) {
    case 1:
    case 2:
    case 3:
    case 4:
    case 5:
    case 6:
      return count;
    default:
      throw new StructuralError(`Heading marker "${marker}" has ${count} hashes`);
  }
}

class TreeBuilder {
  private readonly blocks: BlockToken[] = [];
  private paragraph: Line[] | null = null;
  private quote: Line[] | null = null;
  private readonly lists: ListFrame[] = [];

  line(line: Line): void {
    const [first, ...rest] = line.units;

    if (!first) {
      this.closeAll();
      return;
    }

    switch (first.kind) {
      case 'code-fence':
        this.closeAll();
        this.blocks.push(this.codeBlock(line.units));
        return;

      case 'heading-marker':
        this.closeAll();
        this.blocks.push({
          type: 'heading',
          level: headingLevel(first.text),
          children: buildInline(rest),
        });
        return;

      case 'rule':
        this.closeAll();
        this.blocks.push({ type: 'rule' });
        return;

      case 'quote-marker':
        this.closeParagraph();
        this.closeLists();
        this.quote ??= [];
        this.quote.push({ ...line, units: rest });
        return;

      case 'list-marker':
        this.closeParagraph();
        this.closeQuote();
        this.addItem(line.indent, first.text.trim().endsWith('.'), { ...line, units: rest });
        return;

      default:
        if (this.quote) {
          this.quote.push(line);
        } else if (this.lists.length > 0) {
          this.currentItem(this.lists[this.lists.length - 1]).lines.push(line);
        } else {
          this.paragraph ??= [];
          this.paragraph.push(line);
        }
    }
  }

  finish(): DocumentToken {
    this.closeAll();
    return { type: 'document', children: this.blocks };
  }

  private codeBlock(units: readonly LexicalUnit[]): CodeBlockToken {
    const [open, ...rest] = units;
    let content = '';
    let idx = 0;
    if (rest[idx]?.kind === 'raw-text') {
      content = rest[idx].text;
      idx++;
    }
    if (rest[idx]?.kind === 'code-fence') {
      idx++;
    }
    if (idx !== rest.length) {
      throw new StructuralError(`Unexpected units after code fence at offset ${open.offset}`);
    }

    const language = fenceLanguage(open.text);
    return language ? { type: 'code-block', language, content } : { type: 'code-block', content };
  }

  private addItem(indent: number, ordered: boolean, content: Line): void {
    while (this.lists.length > 0 && this.lists[this.lists.length - 1].indent > indent) {
      this.popList();
    }

    const top = this.lists[this.lists.length - 1];
    if (top && top.indent === indent) {
      if (top.ordered === ordered) {
        top.items.push({ lines: [content], lists: [] });
        return;
      }
      // A different marker class ends the list.
      this.popList();
    }

    this.lists.push({ ordered, indent, items: [{ lines: [content], lists: [] }] });
  }

  private currentItem(frame: ListFrame): ItemDraft {
    const item = frame.items[frame.items.length - 1];
    if (!item) {
      throw new StructuralError('List frame without items');
    }
    return item;
  }

  private popList(): void {
    const frame = this.lists.pop();
    if (!frame) {
      throw new StructuralError('List stack underflow');
    }

    const items: ListItemToken[] = frame.items.map((draft) => ({
      type: 'list-item',
      children: [...buildInline(joinLines(draft.lines)), ...draft.lists],
    }));
    const list: ListToken = { type: 'list', ordered: frame.ordered, items };

    const parent = this.lists[this.lists.length - 1];
    if (parent) {
      this.currentItem(parent).lists.push(list);
    } else {
      this.blocks.push(list);
    }
  }

  private closeParagraph(): void {
    if (this.paragraph) {
      this.blocks.push({ type: 'paragraph', children: buildInline(joinLines(this.paragraph)) });
      this.paragraph = null;
    }
  }

  private closeQuote(): void {
    if (this.quote) {
      this.blocks.push({ type: 'block-quote', children: buildInline(joinLines(this.quote)) });
      this.quote = null;
    }
  }

  private closeLists(): void {
    while (this.lists.length > 0) {
      this.popList();
    }
  }

  private closeAll(): void {
    this.closeParagraph();
    this.closeQuote();
    this.closeLists();
  }
}

// ---------------------------------------------------------------------------
// Tree helpers
// ---------------------------------------------------------------------------

/** Direct children of a token, in document order. */
export function childTokens(token: Token): readonly Token[] {
  switch (token.type) {
    case 'document':
    case 'heading':
    case 'paragraph':
    case 'block-quote':
    case 'emphasis':
    case 'list-item':
      return token.children;
    case 'list':
      return token.items;
    case 'link':
      return token.label;
    default:
      return [];
  }
}

/**
 * Walk a token tree depth-first in document order, invoking `visitor` on
 * every token. Iterative, so deeply nested input cannot exhaust the stack.
 */
export function walkTokens(root: Token, visitor: (token: Token) => void): void {
  const stack: Token[] = [root];
  while (stack.length > 0) {
    const token = stack.pop();
    if (!token) {
      break;
    }
    visitor(token);
    const children = childTokens(token);
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
  }
}

/** Concatenated text of a token subtree. */
export function flattenText(root: Token): string {
  let text = '';
  walkTokens(root, (token) => {
    switch (token.type) {
      case 'text':
      case 'literal':
      case 'code-span':
      case 'code-block':
        text += token.content;
        break;
      case 'image':
        text += token.alt;
        break;
      default:
        break;
    }
  });
  return text;
}

// ---------------------------------------------------------------------------
// Metadata
// ---------------------------------------------------------------------------

/** Metadata extracted from the token tree. */
export interface ParseMetadata {
  /** Whether the document contains any fenced code blocks. */
  hasCodeBlocks: boolean;

  /** Deduplicated languages declared on fenced code blocks. */
  languages: string[];

  /** Whether the document contains any images. */
  hasImages: boolean;

  /** Number of well-formed links. */
  linkCount: number;
}

/** The result of parsing a Markdown string. */
export interface ParseResult {
  document: DocumentToken;
  metadata: ParseMetadata;
}

/** Collect document metadata in one walk over the tree. */
export function extractMetadata(document: DocumentToken): ParseMetadata {
  let hasCodeBlocks = false;
  const languageSet = new Set<string>();
  let hasImages = false;
  let linkCount = 0;

  walkTokens(document, (token) => {
    switch (token.type) {
      case 'code-block':
        hasCodeBlocks = true;
        if (token.language) {
          languageSet.add(token.language);
        }
        break;
      case 'image':
        hasImages = true;
        break;
      case 'link':
        linkCount++;
        break;
      default:
        break;
    }
  });

  return {
    hasCodeBlocks,
    languages: Array.from(languageSet),
    hasImages,
    linkCount,
  };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Assemble lexical units into a token tree.
 *
 * @throws {StructuralError} When the unit stream breaks a scanner guarantee.
 */
export function buildTokens(units: readonly LexicalUnit[]): DocumentToken {
  const builder = new TreeBuilder();
  for (const line of splitLines(units)) {
    builder.line(line);
  }
  return builder.finish();
}

/**
 * Parse a Markdown string into a token tree with metadata.
 *
 * @param markdown - The Markdown source. Non-string input is treated as
 *   the empty string.
 *
 * @example
 * ```ts
 * const { document } = parseMarkdown('# Hello\n\nWorld');
 * document.children[0].type; // 'heading'
 * ```
 */
export function parseMarkdown(markdown: string): ParseResult {
  const source: string = typeof markdown === 'string' ? markdown : '';
  const document = buildTokens(scan(source));
  return { document, metadata: extractMetadata(document) };
}
