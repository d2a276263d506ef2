/**
 * Document builder.
 *
 * Walks a token tree in document order and emits the flat sequence of
 * styled elements an external page renderer consumes. Key design decisions:
 *
 * - Block tokens are bracketed by `break` elements; the `after` break carries
 *   the block's resolved spacing
 * - A link is one element holding its text, URL and styled label runs, so
 *   the clickable region always covers exactly the link text
 * - List items are bracketed by `item-start` / `item-end`, numbered from 1
 *   within each list
 * - The walk uses an explicit work stack, so nesting depth is bounded only
 *   by memory
 *
 * @module core/renderer
 */

import { parseMarkdown } from './parser.js';
import { compositesOf, resolveStyle, tokenKey } from './resolver.js';
import type { Composite } from './resolver.js';
import { getStyleTemplate } from './styles.js';
import type {
  InlineToken,
  LinkToken,
  Style,
  StyleMatch,
  StyledElement,
  StyledRun,
  Token,
  TokenKindKey,
} from './types.js';

// ---------------------------------------------------------------------------
// Work items
// ---------------------------------------------------------------------------

type Work =
  | { op: 'visit'; token: Token; ancestry: readonly TokenKindKey[]; depth: number }
  | { op: 'emit'; element: StyledElement };

const BULLETS = ['•', '◦', '▪'];

function bulletFor(depth: number): string {
  return BULLETS[(depth - 1) % BULLETS.length];
}

/** Soft line breaks inside a block render as spaces. */
function softBreaks(content: string): string {
  return content.replace(/\n/g, ' ');
}

function visit(token: Token, ancestry: readonly TokenKindKey[], depth: number): Work {
  return { op: 'visit', token, ancestry, depth };
}

function emit(element: StyledElement): Work {
  return { op: 'emit', element };
}

// ---------------------------------------------------------------------------
// DocumentRenderer class
// ---------------------------------------------------------------------------

/**
 * Turns token trees into styled element sequences against one style table.
 */
export class DocumentRenderer {
  private readonly composites: readonly Composite[];

  constructor(private readonly table: StyleMatch = {}) {
    this.composites = compositesOf(table);
  }

  /**
   * Render a token tree.
   *
   * @param root - Usually a `document` token, but any token renders.
   * @param ancestry - Kind keys enclosing `root`; empty for a document.
   */
  render(root: Token, ancestry: readonly TokenKindKey[] = []): StyledElement[] {
    const elements: StyledElement[] = [];
    const stack: Work[] = [visit(root, ancestry, 0)];

    while (stack.length > 0) {
      const work = stack.pop();
      if (!work) break;

      if (work.op === 'emit') {
        elements.push(work.element);
        continue;
      }

      const next = this.expand(work.token, work.ancestry, work.depth);
      for (let i = next.length - 1; i >= 0; i--) {
        stack.push(next[i]);
      }
    }

    return elements;
  }

  /** The work a token contributes, in document order. */
  private expand(token: Token, ancestry: readonly TokenKindKey[], depth: number): Work[] {
    const key = tokenKey(token);
    const inner: readonly TokenKindKey[] = [...ancestry, key];

    switch (token.type) {
      case 'document':
      case 'emphasis':
      case 'list-item': {
        const children: readonly Token[] = token.children;
        return children.map((child) => visit(child, inner, depth));
      }

      case 'heading':
      case 'paragraph':
      case 'block-quote':
        return this.block(
          token,
          ancestry,
          token.children.map((child) => visit(child, inner, depth)),
        );

      case 'code-block': {
        const style = this.resolve(token, ancestry);
        return this.block(token, ancestry, [
          emit(
            token.language
              ? { type: 'code-block', language: token.language, content: token.content, style }
              : { type: 'code-block', content: token.content, style },
          ),
        ]);
      }

      case 'rule':
        return this.block(token, ancestry, [
          emit({ type: 'rule', style: this.resolve(token, ancestry) }),
        ]);

      case 'list': {
        const itemDepth = depth + 1;
        const body = token.items.flatMap((item, idx) => {
          const number = idx + 1;
          return [
            emit({
              type: 'item-start',
              depth: itemDepth,
              ordered: token.ordered,
              number,
              marker: token.ordered ? `${number}.` : bulletFor(itemDepth),
              style: this.resolve(item, inner),
            }),
            visit(item, inner, itemDepth),
            emit({ type: 'item-end', depth: itemDepth }),
          ];
        });
        return this.block(token, ancestry, body);
      }

      case 'text':
      case 'literal':
      case 'code-span':
        return [
          emit({
            type: 'text',
            content: softBreaks(token.content),
            style: this.resolve(token, ancestry),
          }),
        ];

      case 'link':
        return [emit(this.link(token, ancestry))];

      case 'image':
        return [
          emit({
            type: 'image',
            alt: token.alt,
            url: token.url,
            style: this.resolve(token, ancestry),
          }),
        ];
    }
  }

  private resolve(token: Token, ancestry: readonly TokenKindKey[]): Style {
    return resolveStyle(token, ancestry, this.table, this.composites);
  }

  private block(token: Token, ancestry: readonly TokenKindKey[], body: Work[]): Work[] {
    const key = tokenKey(token);
    const { afterSpacing } = this.resolve(token, ancestry);
    return [
      emit({ type: 'break', edge: 'before', block: key, spacing: 0 }),
      ...body,
      emit({ type: 'break', edge: 'after', block: key, spacing: afterSpacing }),
    ];
  }

  /** Flatten a link label into styled runs, keeping text and URL together. */
  private link(token: LinkToken, ancestry: readonly TokenKindKey[]): StyledElement {
    const style = this.resolve(token, ancestry);
    const runs: StyledRun[] = [];
    const pending: Array<{ token: InlineToken; ancestry: readonly TokenKindKey[] }> = token.label
      .map((child) => ({ token: child, ancestry: [...ancestry, tokenKey(token)] }))
      .reverse();

    while (pending.length > 0) {
      const entry = pending.pop();
      if (!entry) break;
      const { token: child, ancestry: chain } = entry;

      switch (child.type) {
        case 'emphasis': {
          const inner = [...chain, tokenKey(child)];
          for (let i = child.children.length - 1; i >= 0; i--) {
            pending.push({ token: child.children[i], ancestry: inner });
          }
          break;
        }
        case 'link': {
          const inner = [...chain, tokenKey(child)];
          for (let i = child.label.length - 1; i >= 0; i--) {
            pending.push({ token: child.label[i], ancestry: inner });
          }
          break;
        }
        case 'image':
          runs.push({ content: child.alt, style: this.resolve(child, chain) });
          break;
        default:
          runs.push({
            content: softBreaks(child.content),
            style: this.resolve(child, chain),
          });
      }
    }

    const text = runs.map((run) => run.content).join('');
    if (text.trim() === '') {
      return { type: 'link', text: token.url, url: token.url, style, runs: [{ content: token.url, style }] };
    }
    return { type: 'link', text, url: token.url, style, runs };
  }
}

/**
 * Build the styled element sequence for a token tree.
 *
 * @example
 * ```ts
 * const { document } = parseMarkdown('Hello');
 * buildDocument(document, {}).map((e) => e.type);
 * // => ['break', 'text', 'break']
 * ```
 */
export function buildDocument(root: Token, table: StyleMatch): StyledElement[] {
  return new DocumentRenderer(table).render(root);
}

/**
 * Convert raw Markdown to styled elements in a single call.
 *
 * This is a convenience wrapper around {@link parseMarkdown} +
 * {@link buildDocument}; it does not preprocess or merge runs.
 *
 * @param templateName - Optional style template name ('default', 'compact'
 *   or 'document').
 */
export function markdownToElements(markdown: string, templateName = 'default'): StyledElement[] {
  const { document } = parseMarkdown(markdown);
  return buildDocument(document, getStyleTemplate(templateName).styles);
}
