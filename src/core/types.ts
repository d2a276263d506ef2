/**
 * Core type definitions for the conversion pipeline.
 *
 * Three families of types live here: the lexical units produced by the
 * scanner, the token tree produced by the token builder, and the styled
 * elements produced by the document builder.
 *
 * @module core/types
 */

// ---------------------------------------------------------------------------
// Lexical units
// ---------------------------------------------------------------------------

export type LexicalUnitKind =
  | 'text'
  | 'heading-marker'
  | 'emphasis-marker'
  | 'code-fence'
  | 'code-span-marker'
  | 'list-marker'
  | 'link-bracket'
  | 'raw-text'
  | 'quote-marker'
  | 'rule'
  | 'indent'
  | 'newline';

/**
 * A classified span of the (preprocessed) input.
 *
 * For escaped characters `text` holds only the escaped character and
 * `offset` points at the backslash.
 */
export interface LexicalUnit {
  kind: LexicalUnitKind;
  text: string;
  offset: number;
}

// ---------------------------------------------------------------------------
// Styles
// ---------------------------------------------------------------------------

export interface Rgb {
  r: number;
  g: number;
  b: number;
}

export type TextAlignment = 'left' | 'center' | 'right' | 'justify';

/** A fully resolved style. */
export interface Style {
  fontFamily: string;
  /** Font size in points. */
  size: number;
  bold: boolean;
  italic: boolean;
  underline: boolean;
  strikethrough: boolean;
  textColor: Rgb;
  backgroundColor?: Rgb;
  /** Vertical space after the element, in millimetres. */
  afterSpacing: number;
  alignment: TextAlignment;
}

/** A partial style: one layer of the resolution chain. */
export type StyleOverride = Partial<Style>;

/**
 * Style table: kind key (or dotted composite key) to a partial style.
 */
export type StyleMatch = Readonly<Record<string, Readonly<StyleOverride>>>;

// ---------------------------------------------------------------------------
// Tokens
// ---------------------------------------------------------------------------

interface TokenBase {
  /** One-off inline overrides, applied last during style resolution. */
  readonly style?: Readonly<StyleOverride>;
}

export interface DocumentToken extends TokenBase {
  readonly type: 'document';
  readonly children: readonly BlockToken[];
}

export interface HeadingToken extends TokenBase {
  readonly type: 'heading';
  readonly level: 1 | 2 | 3 | 4 | 5 | 6;
  readonly children: readonly InlineToken[];
}

export interface ParagraphToken extends TokenBase {
  readonly type: 'paragraph';
  readonly children: readonly InlineToken[];
}

export interface BlockQuoteToken extends TokenBase {
  readonly type: 'block-quote';
  readonly children: readonly InlineToken[];
}

export interface CodeBlockToken extends TokenBase {
  readonly type: 'code-block';
  readonly language?: string;
  readonly content: string;
}

export interface ListToken extends TokenBase {
  readonly type: 'list';
  readonly ordered: boolean;
  readonly items: readonly ListItemToken[];
}

export interface ListItemToken extends TokenBase {
  readonly type: 'list-item';
  readonly children: readonly (InlineToken | ListToken)[];
}

export interface RuleToken extends TokenBase {
  readonly type: 'rule';
}

export interface EmphasisToken extends TokenBase {
  readonly type: 'emphasis';
  /** 1 = italic, 2 = bold, 3 and above = bold-italic. */
  readonly level: number;
  readonly children: readonly InlineToken[];
}

export interface CodeSpanToken extends TokenBase {
  readonly type: 'code-span';
  readonly content: string;
}

export interface LinkToken extends TokenBase {
  readonly type: 'link';
  readonly label: readonly InlineToken[];
  readonly url: string;
}

export interface ImageToken extends TokenBase {
  readonly type: 'image';
  readonly alt: string;
  readonly url: string;
}

export interface TextToken extends TokenBase {
  readonly type: 'text';
  readonly content: string;
}

/** Source characters of a construct that did not parse. */
export interface LiteralToken extends TokenBase {
  readonly type: 'literal';
  readonly content: string;
}

export type InlineToken =
  | EmphasisToken
  | CodeSpanToken
  | LinkToken
  | ImageToken
  | TextToken
  | LiteralToken;

export type BlockToken =
  | HeadingToken
  | ParagraphToken
  | BlockQuoteToken
  | CodeBlockToken
  | ListToken
  | RuleToken;

export type Token = DocumentToken | BlockToken | ListItemToken | InlineToken;

export type TokenType = Token['type'];

export type HeadingKey = `heading-${HeadingToken['level']}`;

/** Keys a style table may be indexed by. */
export type TokenKindKey =
  | TokenType
  | 'heading'
  | HeadingKey
  | 'italic'
  | 'bold'
  | 'bold-italic'
  | 'ordered-list'
  | 'bullet-list';

// ---------------------------------------------------------------------------
// Styled elements
// ---------------------------------------------------------------------------

export interface TextRunElement {
  type: 'text';
  content: string;
  style: Style;
}

/** One styled piece of a link label. */
export interface StyledRun {
  content: string;
  style: Style;
}

/**
 * A hyperlink. Text and destination travel together so the renderer can
 * place the clickable region over exactly this run.
 */
export interface LinkElement {
  type: 'link';
  text: string;
  url: string;
  style: Style;
  runs: StyledRun[];
}

export interface BlockBreakElement {
  type: 'break';
  edge: 'before' | 'after';
  block: TokenKindKey;
  /** Spacing in millimetres; zero on the `before` edge. */
  spacing: number;
}

export interface CodeBlockElement {
  type: 'code-block';
  /** Hint for the renderer only. */
  language?: string;
  content: string;
  style: Style;
}

export interface ListItemStartElement {
  type: 'item-start';
  /** Nesting depth, starting at 1 for a top-level list. */
  depth: number;
  ordered: boolean;
  /** Position within its list, starting at 1. */
  number: number;
  /** Text to draw in front of the item, e.g. `"3."` or `"•"`. */
  marker: string;
  style: Style;
}

export interface ListItemEndElement {
  type: 'item-end';
  depth: number;
}

export interface ImageElement {
  type: 'image';
  alt: string;
  url: string;
  style: Style;
}

export interface RuleElement {
  type: 'rule';
  style: Style;
}

export type StyledElement =
  | TextRunElement
  | LinkElement
  | BlockBreakElement
  | CodeBlockElement
  | ListItemStartElement
  | ListItemEndElement
  | ImageElement
  | RuleElement;

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/** Base error class for conversion failures. */
export class ConversionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConversionError';
  }
}

/** Thrown by the scanner when the input holds an unpaired surrogate. */
export class MalformedInputError extends ConversionError {
  constructor(
    public readonly offset: number,
    message: string,
  ) {
    super(message);
    this.name = 'MalformedInputError';
  }
}

/**
 * Thrown when the scanner and the token builder disagree about the unit
 * stream. Always a bug, never bad input.
 */
export class StructuralError extends ConversionError {
  constructor(message: string) {
    super(message);
    this.name = 'StructuralError';
  }
}
