/**
 * Style resolver.
 *
 * Resolves the style of a token from its ancestry and a style table. The
 * lookup is an ordered list of keys tried against the built-in defaults and
 * then the table; each hit is one layer, and later layers replace earlier
 * ones property by property.
 *
 * The `text` entry is the body style: it applies first, right after the
 * base style, so every enclosing block can override it. Then, for every
 * node of the chain `[...ancestry, token]`, in order:
 *
 * 1. built-in default for the generic key, then the specific key
 * 2. table entry for the generic key, then the specific key (`text` excluded)
 * 3. composite keys (`list-item.emphasis`) whose last segment names the
 *    node and whose earlier segments name enclosing nodes in order; fewer
 *    segments apply first
 *
 * The token's own inline overrides apply last.
 *
 * @module core/resolver
 */

import { BASE_STYLE, BUILTIN_STYLES, mergeStyle } from './styles.js';
import type { Style, StyleMatch, Token, TokenKindKey } from './types.js';

// ---------------------------------------------------------------------------
// Kind keys
// ---------------------------------------------------------------------------

/** Emphasis kind for a cumulative emphasis level. */
export function emphasisKey(level: number): 'italic' | 'bold' | 'bold-italic' {
  if (level <= 1) return 'italic';
  if (level === 2) return 'bold';
  return 'bold-italic';
}

/** The most specific key a token is styled under. */
export function tokenKey(token: Token): TokenKindKey {
  switch (token.type) {
    case 'heading':
      return `heading-${token.level}`;
    case 'emphasis':
      return emphasisKey(token.level);
    case 'list':
      return token.ordered ? 'ordered-list' : 'bullet-list';
    default:
      return token.type;
  }
}

/** The generic key shared by all variants of a kind. */
export function genericKey(key: TokenKindKey): TokenKindKey {
  switch (key) {
    case 'heading-1':
    case 'heading-2':
    case 'heading-3':
    case 'heading-4':
    case 'heading-5':
    case 'heading-6':
      return 'heading';
    case 'italic':
    case 'bold':
    case 'bold-italic':
      return 'emphasis';
    case 'ordered-list':
    case 'bullet-list':
      return 'list';
    case 'literal':
      return 'text';
    default:
      return key;
  }
}

function keyMatches(segment: string, key: TokenKindKey): boolean {
  return segment === key || segment === genericKey(key);
}

// ---------------------------------------------------------------------------
// Composite keys
// ---------------------------------------------------------------------------

export interface Composite {
  key: string;
  segments: string[];
}

/** Composite keys of `table`, in application order. */
export function compositesOf(table: StyleMatch): Composite[] {
  return Object.keys(table)
    .filter((key) => key.includes('.'))
    .map((key) => ({ key, segments: key.split('.') }))
    .sort((a, b) =>
      a.segments.length !== b.segments.length
        ? a.segments.length - b.segments.length
        : a.key < b.key
          ? -1
          : a.key > b.key
            ? 1
            : 0,
    );
}

/**
 * Whether `segments` match the chain ending at `chain[index]`: the last
 * segment names that node and the rest name enclosing nodes in order.
 */
function compositeMatches(
  segments: readonly string[],
  chain: readonly TokenKindKey[],
  index: number,
): boolean {
  const last = segments[segments.length - 1];
  if (last === undefined || !keyMatches(last, chain[index])) return false;

  let node = index - 1;
  for (let s = segments.length - 2; s >= 0; s--) {
    while (node >= 0 && !keyMatches(segments[s], chain[node])) {
      node--;
    }
    if (node < 0) return false;
    node--;
  }
  return true;
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/** Key of the body layer. */
const BODY_KEY: TokenKindKey = 'text';

/**
 * Resolve the style of `token`.
 *
 * @param ancestry - Specific kind keys of the enclosing tokens, outermost
 *   first (usually starting with `'document'`).
 * @param composites - `compositesOf(table)`, when the caller resolves many
 *   tokens against one table.
 *
 * @example
 * ```ts
 * resolveStyle({ type: 'emphasis', level: 2, children: [] }, ['document', 'heading-1'], {});
 * // => bold, size 24
 * ```
 */
export function resolveStyle(
  token: Token,
  ancestry: readonly TokenKindKey[],
  table: StyleMatch,
  composites: readonly Composite[] = compositesOf(table),
): Style {
  const chain: TokenKindKey[] = [...ancestry, tokenKey(token)];
  let style: Style = mergeStyle(BASE_STYLE, {});

  for (const source of [BUILTIN_STYLES, table]) {
    const body = source[BODY_KEY];
    if (body) style = mergeStyle(style, body);
  }

  chain.forEach((key, index) => {
    const generic = genericKey(key);
    const lookups = (generic === key ? [key] : [generic, key]).filter((k) => k !== BODY_KEY);

    for (const source of [BUILTIN_STYLES, table]) {
      for (const lookup of lookups) {
        const layer = source[lookup];
        if (layer) style = mergeStyle(style, layer);
      }
    }

    for (const composite of composites) {
      const layer = table[composite.key];
      if (layer && compositeMatches(composite.segments, chain, index)) {
        style = mergeStyle(style, layer);
      }
    }
  });

  if (token.style) {
    style = mergeStyle(style, token.style);
  }
  return style;
}
