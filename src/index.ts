/**
 * md2doc - Markdown to styled document converter
 */

// High-level conversion API
export { convert, convertToElements } from './converter';

// Types
export type { ConvertOptions, ConvertResult, ConvertMetadata } from './types';

// Core module re-exports
export {
  scan,
  parseMarkdown,
  buildTokens,
  walkTokens,
  resolveStyle,
  buildDocument,
  markdownToElements,
  DocumentRenderer,
  createStyleMatch,
  mergeStyleTables,
  getStyleTemplate,
  STYLE_TEMPLATES,
  ConversionError,
  MalformedInputError,
  StructuralError,
} from './core/index';

export type {
  ParseResult,
  ParseMetadata,
  Style,
  StyleMatch,
  Token,
  TokenKindKey,
  StyledElement,
  StyleTemplate,
  StyleTemplateName,
} from './core/index';
