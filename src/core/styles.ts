/**
 * Style tables.
 *
 * Built-in per-kind defaults, the named style templates, and normalization
 * of raw configuration objects (as produced by a TOML parser) into a typed
 * {@link StyleMatch}.
 *
 * A style table maps a kind key (`heading-1`, `bold`, `code-block`, ...) or
 * a dotted composite key (`list-item.emphasis`) to a partial style. Tables
 * are never mutated once built.
 */

import type { Rgb, Style, StyleMatch, StyleOverride, TextAlignment, TokenKindKey } from './types.js';

// ---------------------------------------------------------------------------
// Built-in defaults
// ---------------------------------------------------------------------------

const BLACK: Rgb = { r: 0, g: 0, b: 0 };
const CODE_BACKGROUND: Rgb = { r: 245, g: 245, b: 245 };

/** The style every resolution starts from. */
export const BASE_STYLE: Readonly<Style> = {
  fontFamily: 'Helvetica',
  size: 12,
  bold: false,
  italic: false,
  underline: false,
  strikethrough: false,
  textColor: BLACK,
  afterSpacing: 1,
  alignment: 'left',
};

/** Per-kind defaults layered over {@link BASE_STYLE}. */
export const BUILTIN_STYLES: StyleMatch = {
  'heading-1': { size: 24, bold: true, afterSpacing: 2.5 },
  'heading-2': { size: 20, bold: true, afterSpacing: 2 },
  'heading-3': { size: 16, bold: true, afterSpacing: 1.5 },
  'heading-4': { size: 14, bold: true, afterSpacing: 1 },
  'heading-5': { size: 12, bold: true, afterSpacing: 1 },
  'heading-6': { size: 12, bold: true, italic: true, afterSpacing: 1 },
  italic: { italic: true },
  bold: { bold: true },
  'bold-italic': { bold: true, italic: true },
  'code-span': { fontFamily: 'Courier', backgroundColor: CODE_BACKGROUND },
  'code-block': {
    fontFamily: 'Courier',
    size: 10,
    backgroundColor: CODE_BACKGROUND,
    afterSpacing: 1.5,
  },
  link: { textColor: { r: 51, g: 112, b: 255 }, underline: true },
  'block-quote': { italic: true, textColor: { r: 102, g: 102, b: 102 } },
  'list-item': { afterSpacing: 0.5 },
  rule: { textColor: { r: 217, g: 217, b: 217 }, afterSpacing: 1.5 },
  image: { italic: true, alignment: 'center' },
};

// ---------------------------------------------------------------------------
// Templates
// ---------------------------------------------------------------------------

export type StyleTemplateName = 'default' | 'compact' | 'document';

export interface StyleTemplate {
  name: StyleTemplateName;
  label: string;
  description: string;
  styles: StyleMatch;
}

/**
 * Default template: the built-in styles with no further layer.
 */
const defaultTemplate: StyleTemplate = {
  name: 'default',
  label: 'Default',
  description: 'Built-in styles only.',
  styles: {},
};

/**
 * Compact template: smaller type and tighter block spacing.
 */
const compact: StyleTemplate = {
  name: 'compact',
  label: 'Compact',
  description: 'Smaller type and tighter spacing for dense handouts.',
  styles: {
    paragraph: { size: 10, afterSpacing: 0.5 },
    'heading-1': { size: 18, afterSpacing: 1.5 },
    'heading-2': { size: 15, afterSpacing: 1 },
    'heading-3': { size: 13, afterSpacing: 1 },
    'code-block': { size: 9, afterSpacing: 1 },
    'list-item': { size: 10, afterSpacing: 0 },
    'block-quote': { size: 10, afterSpacing: 0.5 },
  },
};

/**
 * Document template: serif body, wider spacing, suited for formal documents.
 */
const documentTemplate: StyleTemplate = {
  name: 'document',
  label: 'Document',
  description: 'Serif body with wider spacing. Ideal for formal docs.',
  styles: {
    document: { fontFamily: 'Times' },
    paragraph: { afterSpacing: 2, alignment: 'justify' },
    'heading-1': { size: 26, afterSpacing: 4, alignment: 'center' },
    'heading-2': { size: 20, afterSpacing: 3 },
    'block-quote': { textColor: { r: 85, g: 85, b: 85 }, afterSpacing: 2 },
    link: { textColor: { r: 41, g: 98, b: 255 } },
    'list-item': { afterSpacing: 1 },
  },
};

export const STYLE_TEMPLATES: Record<StyleTemplateName, StyleTemplate> = {
  default: defaultTemplate,
  compact,
  document: documentTemplate,
};

function isTemplateName(name: string): name is StyleTemplateName {
  return Object.prototype.hasOwnProperty.call(STYLE_TEMPLATES, name);
}

/**
 * Get a style template by name. Falls back to 'default' for unknown names.
 */
export function getStyleTemplate(name: string): StyleTemplate {
  return isTemplateName(name) ? STYLE_TEMPLATES[name] : STYLE_TEMPLATES.default;
}

// ---------------------------------------------------------------------------
// Merging
// ---------------------------------------------------------------------------

function copyRgb(color: Rgb): Rgb {
  return { r: color.r, g: color.g, b: color.b };
}

/**
 * Apply one partial style over a full style. Every property the layer
 * defines replaces the base value.
 */
export function mergeStyle(base: Readonly<Style>, layer: Readonly<StyleOverride>): Style {
  const merged: Style = {
    fontFamily: layer.fontFamily ?? base.fontFamily,
    size: layer.size ?? base.size,
    bold: layer.bold ?? base.bold,
    italic: layer.italic ?? base.italic,
    underline: layer.underline ?? base.underline,
    strikethrough: layer.strikethrough ?? base.strikethrough,
    textColor: copyRgb(layer.textColor ?? base.textColor),
    afterSpacing: layer.afterSpacing ?? base.afterSpacing,
    alignment: layer.alignment ?? base.alignment,
  };
  const background = layer.backgroundColor ?? base.backgroundColor;
  if (background) {
    merged.backgroundColor = copyRgb(background);
  }
  return merged;
}

function mergeOverride(
  base: Readonly<StyleOverride> | undefined,
  layer: Readonly<StyleOverride> | undefined,
): StyleOverride {
  const merged: StyleOverride = {};
  for (const source of [base, layer]) {
    if (!source) continue;
    for (const [prop, value] of Object.entries(source)) {
      if (value !== undefined) {
        Object.assign(merged, { [prop]: value });
      }
    }
  }
  return merged;
}

/**
 * Merge two style tables key by key. Properties in `override` win.
 */
export function mergeStyleTables(base: StyleMatch, override: StyleMatch): StyleMatch {
  const merged: Record<string, StyleOverride> = {};
  const keys = new Set([...Object.keys(base), ...Object.keys(override)]);
  for (const key of keys) {
    merged[key] = mergeOverride(base[key], override[key]);
  }
  return merged;
}

function sameRgb(a: Rgb | undefined, b: Rgb | undefined): boolean {
  if (!a || !b) return a === b;
  return a.r === b.r && a.g === b.g && a.b === b.b;
}

/** Property-wise equality of two resolved styles. */
export function sameStyle(a: Readonly<Style>, b: Readonly<Style>): boolean {
  return (
    a.fontFamily === b.fontFamily &&
    a.size === b.size &&
    a.bold === b.bold &&
    a.italic === b.italic &&
    a.underline === b.underline &&
    a.strikethrough === b.strikethrough &&
    a.afterSpacing === b.afterSpacing &&
    a.alignment === b.alignment &&
    sameRgb(a.textColor, b.textColor) &&
    sameRgb(a.backgroundColor, b.backgroundColor)
  );
}

// ---------------------------------------------------------------------------
// Raw table normalization
// ---------------------------------------------------------------------------

const KIND_KEYS: ReadonlySet<string> = new Set<TokenKindKey>([
  'document',
  'heading',
  'heading-1',
  'heading-2',
  'heading-3',
  'heading-4',
  'heading-5',
  'heading-6',
  'paragraph',
  'emphasis',
  'italic',
  'bold',
  'bold-italic',
  'code-block',
  'code-span',
  'link',
  'image',
  'list',
  'ordered-list',
  'bullet-list',
  'list-item',
  'block-quote',
  'rule',
  'text',
  'literal',
]);

/** Section names of the TOML style file that differ from kind keys. */
const LEGACY_SECTIONS: Readonly<Record<string, readonly string[]>> = {
  'strong-emphasis': ['bold'],
  'horizontal-rule': ['rule'],
  code: ['code-block', 'code-span'],
};

type PropertyName = keyof Style;

const PROPERTY_ALIASES: Readonly<Record<string, PropertyName>> = {
  size: 'size',
  textcolor: 'textColor',
  color: 'textColor',
  backgroundcolor: 'backgroundColor',
  background: 'backgroundColor',
  afterspacing: 'afterSpacing',
  spacing: 'afterSpacing',
  fontfamily: 'fontFamily',
  font: 'fontFamily',
  alignment: 'alignment',
  bold: 'bold',
  italic: 'italic',
  underline: 'underline',
  strikethrough: 'strikethrough',
};

const ALIGNMENTS: readonly TextAlignment[] = ['left', 'center', 'right', 'justify'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function propertyName(key: string): PropertyName | undefined {
  const normalized = key.toLowerCase().replace(/[_-]/g, '');
  return Object.prototype.hasOwnProperty.call(PROPERTY_ALIASES, normalized)
    ? PROPERTY_ALIASES[normalized]
    : undefined;
}

function isChannel(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 255;
}

const HEX_COLOR_RE = /^#([0-9a-f]{3}|[0-9a-f]{6})$/i;

/**
 * Parse a colour given as `{ r, g, b }` (0-255 each) or `#rgb` / `#rrggbb`.
 */
export function parseColor(value: unknown): Rgb | undefined {
  if (typeof value === 'string') {
    const match = HEX_COLOR_RE.exec(value.trim());
    if (!match) return undefined;
    const hex =
      match[1].length === 3
        ? match[1]
            .split('')
            .map((ch) => ch + ch)
            .join('')
        : match[1];
    return {
      r: parseInt(hex.slice(0, 2), 16),
      g: parseInt(hex.slice(2, 4), 16),
      b: parseInt(hex.slice(4, 6), 16),
    };
  }
  if (isRecord(value) && isChannel(value.r) && isChannel(value.g) && isChannel(value.b)) {
    return { r: value.r, g: value.g, b: value.b };
  }
  return undefined;
}

function isNonNegative(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

/** Set one property on `target` when `value` is valid for it. */
function assignProperty(target: StyleOverride, name: PropertyName, value: unknown): void {
  switch (name) {
    case 'size':
      if (isNonNegative(value) && value > 0) target.size = value;
      break;
    case 'afterSpacing':
      if (isNonNegative(value)) target.afterSpacing = value;
      break;
    case 'fontFamily':
      if (typeof value === 'string' && value.trim() !== '') target.fontFamily = value.trim();
      break;
    case 'textColor':
    case 'backgroundColor': {
      const color = parseColor(value);
      if (color) target[name] = color;
      break;
    }
    case 'alignment': {
      const alignment = ALIGNMENTS.find(
        (a) => typeof value === 'string' && a === value.trim().toLowerCase(),
      );
      if (alignment) target.alignment = alignment;
      break;
    }
    case 'bold':
    case 'italic':
    case 'underline':
    case 'strikethrough':
      if (typeof value === 'boolean') target[name] = value;
      break;
  }
}

/** Map one section name segment to the kind keys it stands for. */
function segmentKeys(segment: string): readonly string[] {
  const normalized = segment.trim().toLowerCase().replace(/_/g, '-');
  if (Object.prototype.hasOwnProperty.call(LEGACY_SECTIONS, normalized)) {
    return LEGACY_SECTIONS[normalized];
  }
  return KIND_KEYS.has(normalized) ? [normalized] : [];
}

/**
 * Expand a dotted section path into table keys. `heading.2` folds into
 * `heading-2`; `code` expands to both code kinds. Unknown segments yield
 * no keys.
 */
function sectionKeys(path: string): string[] {
  const raw = path.split('.');
  const segments: string[] = [];
  for (const segment of raw) {
    const previous = segments[segments.length - 1];
    if (/^[1-6]$/.test(segment.trim()) && previous?.trim().toLowerCase() === 'heading') {
      segments[segments.length - 1] = `heading-${segment.trim()}`;
    } else {
      segments.push(segment);
    }
  }

  let keys: string[] = [''];
  for (const segment of segments) {
    const options = segmentKeys(segment);
    if (options.length === 0) return [];
    keys = keys.flatMap((prefix) => options.map((opt) => (prefix ? `${prefix}.${opt}` : opt)));
  }
  return keys;
}

/**
 * Normalize a raw configuration object into a typed style table.
 *
 * Accepts both flat keys (`"heading-1"`, `"list-item.emphasis"`) and the
 * nested section form a TOML parser produces for `[heading.1]`. Unknown
 * sections, unknown properties and malformed values are ignored.
 *
 * @example
 * ```ts
 * createStyleMatch({ heading: { 1: { size: 30 } }, strong_emphasis: { textcolor: '#f00' } });
 * // => { 'heading-1': { size: 30 }, bold: { textColor: { r: 255, g: 0, b: 0 } } }
 * ```
 */
export function createStyleMatch(raw: unknown): StyleMatch {
  const table: Record<string, StyleOverride> = {};
  if (!isRecord(raw)) return table;

  const pending: Array<[string, Record<string, unknown>]> = Object.entries(raw).flatMap(
    ([key, value]): Array<[string, Record<string, unknown>]> =>
      isRecord(value) ? [[key, value]] : [],
  );

  while (pending.length > 0) {
    const next = pending.shift();
    if (!next) break;
    const [path, section] = next;

    const layer: StyleOverride = {};
    for (const [key, value] of Object.entries(section)) {
      const name = propertyName(key);
      if (name) {
        assignProperty(layer, name, value);
      } else if (isRecord(value)) {
        pending.push([`${path}.${key}`, value]);
      }
    }

    if (Object.keys(layer).length === 0) continue;
    for (const key of sectionKeys(path)) {
      table[key] = mergeOverride(table[key], layer);
    }
  }

  return table;
}
