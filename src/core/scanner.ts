/**
 * Markdown scanner.
 *
 * Walks the source once, line by line, and emits a flat list of
 * {@link LexicalUnit}s. Block constructs (headings, fences, list and quote
 * markers, thematic breaks) are only recognized at the start of a line;
 * everything after them is scanned for inline constructs.
 *
 * The scanner never rejects Markdown. Syntax it does not recognize stays in
 * `text` units. Paired constructs (code spans, link brackets) are only
 * emitted as markers once their closing half has been found, so the token
 * builder can rely on the pairs being present.
 *
 * @module core/scanner
 */
import { MalformedInputError } from './types.js';
import type { LexicalUnit, LexicalUnitKind } from './types.js';

// ---------------------------------------------------------------------------
// Patterns
// ---------------------------------------------------------------------------

/** ASCII punctuation that a backslash turns into a literal character. */
const ESCAPABLE = new Set('!"#$%&\'()*+,-./:;<=>?@[\\]^_`{|}~');

const UNPAIRED_SURROGATE_RE =
  /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/** Opening fence: three or more backticks, info string without backticks. */
export const FENCE_RE = /^(`{3,})[^`]*$/;
/** Closing fence: only backticks, at least as many as the opener. */
export const CLOSING_FENCE_RE = /^`{3,}$/;
const HEADING_RE = /^#{1,6}[ \t]+/;
const RULE_RE = /^([-*_])(?:[ \t]*\1){2,}[ \t]*$/;
const QUOTE_RE = /^>[ \t]?/;
const LIST_RE = /^(?:[-*+]|\d{1,9}\.)[ \t]+/;

// ---------------------------------------------------------------------------
// Scanner
// ---------------------------------------------------------------------------

class Scanner {
  private readonly units: LexicalUnit[] = [];

  constructor(private readonly source: string) {}

  run(): LexicalUnit[] {
    const length = this.source.length;
    let pos = 0;

    while (pos < length) {
      const lineEnd = this.lineEnd(pos);
      const consumedTo = this.scanLine(pos, lineEnd);
      if (consumedTo >= length) {
        break;
      }
      this.push('newline', '\n', consumedTo);
      pos = consumedTo + 1;
    }

    return this.units;
  }

  /**
   * Scan one line. Returns the offset of the newline that ends the last
   * consumed line (or the input length), which is past `end` for fences.
   */
  private scanLine(start: number, end: number): number {
    let i = start;
    while (i < end && (this.source[i] === ' ' || this.source[i] === '\t')) {
      i++;
    }
    if (i > start) {
      this.push('indent', this.source.slice(start, i), start);
    }

    const rest = this.source.slice(i, end);

    const fence = FENCE_RE.exec(rest);
    if (fence) {
      return this.scanFence(i, end, fence[1].length);
    }

    const heading = HEADING_RE.exec(rest);
    if (heading) {
      this.push('heading-marker', heading[0], i);
      this.scanInline(i + heading[0].length, end, true);
      return end;
    }

    if (RULE_RE.test(rest)) {
      this.push('rule', rest, i);
      return end;
    }

    const quote = QUOTE_RE.exec(rest);
    if (quote) {
      this.push('quote-marker', quote[0], i);
      this.scanInline(i + quote[0].length, end, true);
      return end;
    }

    const list = LIST_RE.exec(rest);
    if (list) {
      this.push('list-marker', list[0], i);
      this.scanInline(i + list[0].length, end, true);
      return end;
    }

    this.scanInline(i, end, true);
    return end;
  }

  /**
   * Copy a fenced region verbatim. The region ends at the first line made
   * only of at least `fenceLength` backticks, or at the end of input.
   */
  private scanFence(start: number, lineEnd: number, fenceLength: number): number {
    const length = this.source.length;
    this.push('code-fence', this.source.slice(start, lineEnd).trimEnd(), start);

    if (lineEnd >= length) {
      return length;
    }

    const contentStart = lineEnd + 1;
    let pos = contentStart;
    while (pos < length) {
      const end = this.lineEnd(pos);
      const line = this.source.slice(pos, end);
      const trimmed = line.trim();

      if (trimmed.length >= fenceLength && CLOSING_FENCE_RE.test(trimmed)) {
        if (pos > contentStart) {
          this.push('raw-text', this.source.slice(contentStart, pos), contentStart);
        }
        this.push('code-fence', trimmed, pos + line.indexOf('`'));
        return end;
      }
      pos = end + 1;
    }

    if (length > contentStart) {
      this.push('raw-text', this.source.slice(contentStart), contentStart);
    }
    return length;
  }

  /**
   * Scan `[start, end)` for inline constructs. Link labels are scanned with
   * `allowLinks` off, so links never nest.
   */
  private scanInline(start: number, end: number, allowLinks: boolean): void {
    const src = this.source;
    let textStart = start;
    let i = start;

    const flush = (upTo: number): void => {
      if (upTo > textStart) {
        this.push('text', src.slice(textStart, upTo), textStart);
      }
    };

    while (i < end) {
      const ch = src[i];

      if (ch === '\\' && i + 1 < end && ESCAPABLE.has(src[i + 1])) {
        flush(i);
        this.push('text', src[i + 1], i);
        i += 2;
        textStart = i;
        continue;
      }

      if (ch === '*' || ch === '_') {
        const runEnd = this.runEnd(i, end, ch);
        flush(i);
        this.push('emphasis-marker', src.slice(i, runEnd), i);
        i = runEnd;
        textStart = i;
        continue;
      }

      if (ch === '`') {
        const runEnd = this.runEnd(i, end, '`');
        const width = runEnd - i;
        const close = this.findBacktickRun(runEnd, end, width);
        if (close === -1) {
          // Unpaired backticks are plain text.
          i = runEnd;
          continue;
        }
        flush(i);
        this.push('code-span-marker', src.slice(i, runEnd), i);
        if (close > runEnd) {
          this.push('raw-text', src.slice(runEnd, close), runEnd);
        }
        this.push('code-span-marker', src.slice(close, close + width), close);
        i = close + width;
        textStart = i;
        continue;
      }

      const isImage = ch === '!' && i + 1 < end && src[i + 1] === '[';
      if (allowLinks && (ch === '[' || isImage)) {
        const open = isImage ? i + 1 : i;
        const labelEnd = this.findLabelEnd(open + 1, end);
        if (labelEnd !== -1 && labelEnd + 1 < end && src[labelEnd + 1] === '(') {
          flush(i);
          this.push('link-bracket', isImage ? '![' : '[', i);
          this.scanInline(open + 1, labelEnd, false);
          this.push('link-bracket', '](', labelEnd);

          const urlStart = labelEnd + 2;
          const paren = src.indexOf(')', urlStart);
          const urlEnd = paren !== -1 && paren < end ? paren : end;
          if (urlEnd > urlStart) {
            this.push('raw-text', src.slice(urlStart, urlEnd), urlStart);
          }
          if (urlEnd < end) {
            this.push('link-bracket', ')', urlEnd);
            i = urlEnd + 1;
          } else {
            i = end;
          }
          textStart = i;
          continue;
        }
      }

      i++;
    }

    flush(end);
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private push(kind: LexicalUnitKind, text: string, offset: number): void {
    this.units.push({ kind, text, offset });
  }

  private lineEnd(pos: number): number {
    const idx = this.source.indexOf('\n', pos);
    return idx === -1 ? this.source.length : idx;
  }

  private runEnd(start: number, end: number, ch: string): number {
    let i = start;
    while (i < end && this.source[i] === ch) {
      i++;
    }
    return i;
  }

  /** Find a backtick run of exactly `width` characters in `[from, end)`. */
  private findBacktickRun(from: number, end: number, width: number): number {
    let i = from;
    while (i < end) {
      if (this.source[i] !== '`') {
        i++;
        continue;
      }
      const runEnd = this.runEnd(i, end, '`');
      if (runEnd - i === width) {
        return i;
      }
      i = runEnd;
    }
    return -1;
  }

  /** Offset of the `]` balancing an already consumed `[`, or -1. */
  private findLabelEnd(from: number, end: number): number {
    let depth = 1;
    let i = from;
    while (i < end) {
      const ch = this.source[i];
      if (ch === '\\') {
        i += 2;
        continue;
      }
      if (ch === '[') {
        depth++;
      } else if (ch === ']') {
        depth--;
        if (depth === 0) {
          return i;
        }
      }
      i++;
    }
    return -1;
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Split Markdown source into lexical units.
 *
 * @param text - Markdown source. Line endings are expected to be `\n`; the
 *   preprocessor normalizes them.
 * @returns Units in source order.
 * @throws {MalformedInputError} When `text` holds an unpaired surrogate.
 *
 * @example
 * ```ts
 * scan('# Hi').map((u) => u.kind); // ['heading-marker', 'text']
 * ```
 */
export function scan(text: string): LexicalUnit[] {
  const bad = UNPAIRED_SURROGATE_RE.exec(text);
  if (bad) {
    throw new MalformedInputError(
      bad.index,
      `Unpaired surrogate at offset ${bad.index}`,
    );
  }
  return new Scanner(text).run();
}
