import {
  compositesOf,
  emphasisKey,
  genericKey,
  resolveStyle,
  tokenKey,
} from '../../src/core/resolver';
import { BASE_STYLE } from '../../src/core/styles';
import type { EmphasisToken, StyleMatch, TextToken, TokenKindKey } from '../../src/core/types';

const text: TextToken = { type: 'text', content: 'x' };
const em = (level: number): EmphasisToken => ({ type: 'emphasis', level, children: [text] });

// ---------------------------------------------------------------------------
// Kind keys
// ---------------------------------------------------------------------------

describe('tokenKey', () => {
  it('returns the level-specific key for headings', () => {
    expect(tokenKey({ type: 'heading', level: 3, children: [] })).toBe('heading-3');
  });

  it.each([
    [1, 'italic'],
    [2, 'bold'],
    [3, 'bold-italic'],
    [7, 'bold-italic'],
  ])('maps emphasis level %i to %s', (level, key) => {
    expect(tokenKey(em(level))).toBe(key);
    expect(emphasisKey(level)).toBe(key);
  });

  it('distinguishes ordered and bullet lists', () => {
    expect(tokenKey({ type: 'list', ordered: true, items: [] })).toBe('ordered-list');
    expect(tokenKey({ type: 'list', ordered: false, items: [] })).toBe('bullet-list');
  });

  it('uses the type name for other tokens', () => {
    expect(tokenKey({ type: 'code-span', content: 'a' })).toBe('code-span');
  });
});

describe('genericKey', () => {
  it.each<[TokenKindKey, TokenKindKey]>([
    ['heading-2', 'heading'],
    ['bold-italic', 'emphasis'],
    ['ordered-list', 'list'],
    ['literal', 'text'],
    ['link', 'link'],
  ])('maps %s to %s', (key, generic) => {
    expect(genericKey(key)).toBe(generic);
  });
});

// ---------------------------------------------------------------------------
// resolveStyle
// ---------------------------------------------------------------------------

describe('resolveStyle', () => {
  it('returns the base style for bare text', () => {
    expect(resolveStyle(text, ['document', 'paragraph'], {})).toEqual(BASE_STYLE);
  });

  it('inherits built-in defaults from ancestors', () => {
    const style = resolveStyle(text, ['document', 'heading-1'], {});
    expect(style.size).toBe(24);
    expect(style.bold).toBe(true);
  });

  it('combines built-in emphasis flags', () => {
    const style = resolveStyle(em(3), ['document', 'paragraph'], {});
    expect(style.bold).toBe(true);
    expect(style.italic).toBe(true);
  });

  it('applies the specific table entry after the generic one', () => {
    const table: StyleMatch = {
      heading: { textColor: { r: 255, g: 0, b: 0 }, fontFamily: 'Georgia' },
      'heading-2': { textColor: { r: 0, g: 0, b: 255 } },
    };
    const style = resolveStyle(text, ['document', 'heading-2'], table);
    expect(style.textColor).toEqual({ r: 0, g: 0, b: 255 });
    expect(style.fontFamily).toBe('Georgia');
  });

  it('replaces numeric properties instead of adding them', () => {
    const style = resolveStyle(text, ['document', 'heading-1'], { 'heading-1': { size: 10 } });
    expect(style.size).toBe(10);
  });

  it('applies the text entry as the body style under every block', () => {
    const table: StyleMatch = {
      'heading-1': { size: 14 },
      text: { size: 8, fontFamily: 'Georgia' },
    };
    const heading = resolveStyle(text, ['document', 'heading-1'], table);
    expect(heading.size).toBe(14);
    expect(heading.fontFamily).toBe('Georgia');
    expect(resolveStyle(text, ['document', 'paragraph'], table).size).toBe(8);
  });

  it('lets built-in block defaults override the text entry', () => {
    const table: StyleMatch = { text: { size: 8 } };
    expect(resolveStyle(em(1), ['document', 'heading-2'], table).size).toBe(20);
    expect(resolveStyle(text, ['document', 'bullet-list', 'list-item'], table).size).toBe(8);
  });

  it('still applies composites ending in text at the leaf', () => {
    const table: StyleMatch = { text: { size: 8 }, 'heading.text': { size: 30 } };
    expect(resolveStyle(text, ['document', 'heading-1'], table).size).toBe(30);
  });

  it('accepts precomputed composites', () => {
    const table: StyleMatch = { 'list-item.emphasis': { size: 18 } };
    const composites = compositesOf(table);
    expect(composites.map((c) => c.key)).toEqual(['list-item.emphasis']);
    expect(
      resolveStyle(em(1), ['document', 'bullet-list', 'list-item'], table, composites).size,
    ).toBe(18);
  });

  it('lets a composite entry win over a kind entry', () => {
    const table: StyleMatch = {
      emphasis: { size: 14 },
      'list-item.emphasis': { size: 18 },
    };
    expect(resolveStyle(em(1), ['document', 'bullet-list', 'list-item'], table).size).toBe(18);
    expect(resolveStyle(em(1), ['document', 'paragraph'], table).size).toBe(14);
  });

  it('applies longer composites after shorter ones', () => {
    const table: StyleMatch = {
      'bullet-list.list-item.emphasis': { size: 13 },
      'list-item.emphasis': { size: 12 },
      emphasis: { size: 11 },
    };
    const style = resolveStyle(em(2), ['document', 'bullet-list', 'list-item'], table);
    expect(style.size).toBe(13);
  });

  it('matches composite segments against enclosing nodes that are not adjacent', () => {
    const table: StyleMatch = { 'block-quote.text': { underline: true } };
    expect(resolveStyle(text, ['document', 'block-quote', 'italic'], table).underline).toBe(true);
    expect(resolveStyle(text, ['document', 'paragraph', 'italic'], table).underline).toBe(false);
  });

  it('passes composite styles on to descendants', () => {
    const table: StyleMatch = { 'list-item.emphasis': { textColor: { r: 1, g: 2, b: 3 } } };
    const style = resolveStyle(text, ['document', 'ordered-list', 'list-item', 'bold'], table);
    expect(style.textColor).toEqual({ r: 1, g: 2, b: 3 });
  });

  it('requires composite segments in order', () => {
    const table: StyleMatch = { 'list-item.heading': { size: 40 } };
    const style = resolveStyle(text, ['document', 'heading-1', 'list-item'], table);
    expect(style.size).toBe(24);
  });

  it('applies inline overrides last', () => {
    const table: StyleMatch = { 'paragraph.text': { size: 30 } };
    const token: TextToken = { type: 'text', content: 'x', style: { size: 40 } };
    expect(resolveStyle(token, ['document', 'paragraph'], table).size).toBe(40);
  });

  it('is idempotent and leaves the table untouched', () => {
    const table: StyleMatch = Object.freeze({
      'heading-1': Object.freeze({ size: 28 }),
      'heading.emphasis': Object.freeze({ italic: false }),
    });
    const snapshot = JSON.stringify(table);
    const first = resolveStyle(em(1), ['document', 'heading-1'], table);
    const second = resolveStyle(em(1), ['document', 'heading-1'], table);
    expect(first).toEqual(second);
    expect(first.italic).toBe(false);
    expect(first.size).toBe(28);
    expect(JSON.stringify(table)).toBe(snapshot);
  });
});
