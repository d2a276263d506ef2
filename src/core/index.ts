/**
 * Core module barrel exports.
 *
 * Re-exports all public APIs from the scanner, parser, resolver, renderer,
 * style and type definition modules.
 *
 * @module core
 */

// Scanner
export { scan } from './scanner.js';

// Parser
export {
  buildTokens,
  parseMarkdown,
  extractMetadata,
  walkTokens,
  childTokens,
  flattenText,
} from './parser.js';
export type { ParseResult, ParseMetadata } from './parser.js';

// Resolver
export { resolveStyle, tokenKey, genericKey, emphasisKey, compositesOf } from './resolver.js';
export type { Composite } from './resolver.js';

// Renderer
export { buildDocument, markdownToElements, DocumentRenderer } from './renderer.js';

// Preprocessor
export { preprocessMarkdown } from './preprocessor.js';

// Postprocessor
export { postprocessElements, mergeAdjacentRuns } from './postprocessor.js';

// Styles
export {
  BASE_STYLE,
  BUILTIN_STYLES,
  STYLE_TEMPLATES,
  getStyleTemplate,
  createStyleMatch,
  mergeStyleTables,
  mergeStyle,
  sameStyle,
  parseColor,
} from './styles.js';
export type { StyleTemplate, StyleTemplateName } from './styles.js';

// Errors
export { ConversionError, MalformedInputError, StructuralError } from './types.js';

// Types
export type {
  LexicalUnit,
  LexicalUnitKind,
  Rgb,
  TextAlignment,
  Style,
  StyleOverride,
  StyleMatch,
  Token,
  TokenType,
  TokenKindKey,
  HeadingKey,
  DocumentToken,
  BlockToken,
  InlineToken,
  HeadingToken,
  ParagraphToken,
  BlockQuoteToken,
  CodeBlockToken,
  ListToken,
  ListItemToken,
  RuleToken,
  EmphasisToken,
  CodeSpanToken,
  LinkToken,
  ImageToken,
  TextToken,
  LiteralToken,
  StyledElement,
  StyledRun,
  TextRunElement,
  LinkElement,
  BlockBreakElement,
  CodeBlockElement,
  ListItemStartElement,
  ListItemEndElement,
  ImageElement,
  RuleElement,
} from './types.js';
