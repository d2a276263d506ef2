import type { ConvertOptions, ConvertResult } from './types';
import type { DocumentToken, StyledElement } from './core/types';
import { scan } from './core/scanner';
import { buildTokens, extractMetadata, flattenText } from './core/parser';
import { buildDocument } from './core/renderer';
import { createStyleMatch, getStyleTemplate, mergeStyleTables } from './core/styles';
import { preprocessMarkdown } from './core/preprocessor';
import { postprocessElements } from './core/postprocessor';

const LOG_PREFIX = '[md2doc]';

/**
 * Produce the plain-text fallback of an element sequence.
 *
 * Every block and list item ends a line; runs of line breaks collapse to
 * one.
 *
 * @param elements - Styled elements in document order.
 * @returns Plain text with surrounding whitespace trimmed.
 */
function elementsToPlainText(elements: readonly StyledElement[]): string {
  let text = '';
  for (const element of elements) {
    switch (element.type) {
      case 'text':
      case 'link':
        text += element.type === 'text' ? element.content : element.text;
        break;
      case 'code-block':
        text += element.content;
        break;
      case 'image':
        text += element.alt;
        break;
      case 'break':
        if (element.edge === 'after') text += '\n';
        break;
      case 'item-end':
        text += '\n';
        break;
      default:
        break;
    }
  }
  return text.replace(/\n{2,}/g, '\n').trim();
}

/**
 * Count words in a plain text string.
 *
 * Handles both Latin/ASCII words (split on whitespace) and CJK characters
 * (each CJK character counts as one word).
 *
 * @param text - Plain text string.
 * @returns Approximate word count.
 */
function countWords(text: string): number {
  if (!text.trim()) {
    return 0;
  }

  // CJK Unicode ranges: CJK Unified Ideographs, Hiragana, Katakana, etc.
  const cjkRegex = /[\u3000-\u9fff\uf900-\ufaff\u{20000}-\u{2fa1f}]/gu;
  const cjkMatches = text.match(cjkRegex);
  const cjkCount = cjkMatches ? cjkMatches.length : 0;

  // Remove CJK characters, then count Latin words by splitting on whitespace.
  const withoutCjk = text.replace(cjkRegex, ' ');
  const latinWords = withoutCjk.split(/\s+/).filter((w) => w.length > 0);

  return latinWords.length + cjkCount;
}

/**
 * Extract the text of the first level-1 or level-2 heading.
 *
 * @param document - Parsed token tree.
 * @returns The heading text, or `undefined` if none was found.
 */
function extractTitle(document: DocumentToken): string | undefined {
  for (const block of document.children) {
    if (block.type === 'heading' && block.level <= 2) {
      const text = flattenText(block).replace(/\s+/g, ' ').trim();
      if (text) return text;
    }
  }
  return undefined;
}

/**
 * Convert Markdown to a styled element document.
 *
 * This is the primary conversion API. It runs the full pipeline:
 * 1. Preprocess (line endings, comments, blank lines, checkboxes)
 * 2. Scan into lexical units
 * 3. Build the token tree
 * 4. Resolve styles and emit styled elements
 * 5. Merge adjacent runs
 * 6. Generate plain-text fallback and metadata
 *
 * @param options - Conversion options (markdown source, template, styles).
 * @returns A {@link ConvertResult} with the elements, plain text, and metadata.
 * @throws {MalformedInputError} When the input holds an unpaired surrogate.
 *
 * @example
 * ```ts
 * const result = convert({ markdown: '# Hello\n\nWorld' });
 * console.log(result.plainText);      // 'Hello\nWorld'
 * console.log(result.metadata.title); // 'Hello'
 * ```
 */
export function convert(options: ConvertOptions): ConvertResult {
  const { markdown, title, template = 'default', styles, mergeRuns = true, debug = false } = options;
  const log = (...args: unknown[]): void => {
    if (debug) console.debug(LOG_PREFIX, ...args);
  };

  try {
    // Step 0: Style table (template layered under user styles)
    const base = getStyleTemplate(template).styles;
    const table = styles ? mergeStyleTables(base, createStyleMatch(styles)) : base;

    // Step 1: Preprocess
    const preprocessed = preprocessMarkdown(typeof markdown === 'string' ? markdown : '');

    // Step 2: Scan
    const units = scan(preprocessed);
    log(`scanned ${units.length} units`);

    // Step 3: Build tokens
    const document = buildTokens(units);
    log(`built ${document.children.length} blocks`);

    // Step 4: Styled elements
    const built = buildDocument(document, table);

    // Step 5: Postprocess
    const elements = mergeRuns ? postprocessElements(built) : built;
    log(`emitted ${elements.length} elements`);

    // Step 6: Plain text and metadata
    const plainText = elementsToPlainText(elements);
    const parsed = extractMetadata(document);

    return {
      elements,
      plainText,
      metadata: {
        title: title ?? extractTitle(document) ?? 'Untitled',
        wordCount: countWords(plainText),
        hasCodeBlocks: parsed.hasCodeBlocks,
        languages: parsed.languages,
        hasImages: parsed.hasImages,
        linkCount: parsed.linkCount,
      },
    };
  } catch (err) {
    console.debug(LOG_PREFIX, 'conversion failed:', err);
    throw err;
  }
}

/**
 * Convert Markdown to styled elements only.
 *
 * @param options - Conversion options.
 * @returns The styled element sequence.
 */
export function convertToElements(options: ConvertOptions): StyledElement[] {
  return convert(options).elements;
}
