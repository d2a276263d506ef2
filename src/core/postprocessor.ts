/**
 * Element Postprocessor
 *
 * Applies post-build transformations to the styled element sequence.
 *
 * @module core/postprocessor
 */

import { sameStyle } from './styles.js';
import type { StyledElement } from './types.js';

/**
 * Merge consecutive text runs that carry identical styles.
 *
 * Escapes and delimiters that degrade to literal text split a run into
 * several tokens; a renderer draws them as one.
 *
 * @param elements - Elements from the document builder.
 * @returns A new sequence; the input is not modified.
 */
export function mergeAdjacentRuns(elements: readonly StyledElement[]): StyledElement[] {
  const result: StyledElement[] = [];

  for (const element of elements) {
    const last = result[result.length - 1];
    if (
      element.type === 'text' &&
      last?.type === 'text' &&
      sameStyle(last.style, element.style)
    ) {
      result[result.length - 1] = { ...last, content: last.content + element.content };
      continue;
    }
    result.push(element);
  }

  return result;
}

/**
 * Apply all postprocessor transformations in sequence.
 *
 * @param elements - Elements from the document builder.
 * @returns Post-processed elements.
 */
export function postprocessElements(elements: readonly StyledElement[]): StyledElement[] {
  return mergeAdjacentRuns(elements);
}
