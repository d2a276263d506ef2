/**
 * Markdown Preprocessor
 *
 * Normalizes Markdown input before scanning to handle edge cases common in
 * files saved by different editors and in generated output.
 *
 * @module core/preprocessor
 */
import { CLOSING_FENCE_RE, FENCE_RE } from './scanner.js';

function placeholder(store: string[], content: string): string {
  store.push(content);
  return `\x00CODEBLOCK${store.length - 1}\x00`;
}

/**
 * Replace every fenced code block with a placeholder line.
 *
 * Fences follow the scanner's rule: an opening line of three or more
 * backticks, closed by a line of at least as many backticks, or by the end
 * of input.
 */
function protectFences(markdown: string, store: string[]): string {
  const lines = markdown.split('\n');
  const out: string[] = [];

  let i = 0;
  while (i < lines.length) {
    const open = FENCE_RE.exec(lines[i].trimStart());
    if (!open) {
      out.push(lines[i]);
      i++;
      continue;
    }

    const fenceLength = open[1].length;
    let end = i + 1;
    while (end < lines.length) {
      const trimmed = lines[end].trim();
      if (trimmed.length >= fenceLength && CLOSING_FENCE_RE.test(trimmed)) break;
      end++;
    }
    const last = Math.min(end, lines.length - 1);
    out.push(placeholder(store, lines.slice(i, last + 1).join('\n')));
    i = last + 1;
  }

  return out.join('\n');
}

/**
 * Normalize line endings to `\n` and drop a leading byte-order mark.
 *
 * The scanner only splits lines on `\n`, so a stray `\r` would otherwise
 * end up inside text runs.
 *
 * @param markdown - Raw markdown string.
 * @returns Markdown with `\n` line endings only.
 */
function normalizeLineEndings(markdown: string): string {
  return markdown.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n');
}

/**
 * Remove HTML comments.
 *
 * Comments are invisible in rendered Markdown, so they must not reach the
 * scanner as text.
 *
 * @param markdown - Raw markdown string.
 * @returns Markdown without `<!-- ... -->` spans.
 */
function stripHtmlComments(markdown: string): string {
  return markdown.replace(/<!--[\s\S]*?-->/g, '');
}

/**
 * Normalize consecutive blank lines (3+ newlines to 2).
 *
 * @param markdown - Raw markdown string.
 * @returns Markdown with consecutive blank lines reduced.
 */
function normalizeBlankLines(markdown: string): string {
  return markdown.replace(/\n{3,}/g, '\n\n');
}

/**
 * Convert checkbox syntax to ballot box characters.
 *
 * - `- [x]` or `- [X]` becomes `- ☑`
 * - `- [ ]` becomes `- ☐`
 *
 * A bracket followed by `(` is a link label and is left alone.
 *
 * @param markdown - Raw markdown string.
 * @returns Markdown with checkbox syntax replaced.
 */
function convertCheckboxes(markdown: string): string {
  let result = markdown.replace(/^(\s*[-*+]\s)\[x\](?!\()/gim, '$1☑');
  result = result.replace(/^(\s*[-*+]\s)\[ \](?!\()/gm, '$1☐');
  return result;
}

/**
 * Apply all preprocessor transformations in sequence.
 *
 * The order matters:
 * 1. Normalize line endings (every later pattern assumes `\n`)
 * 2. Protect fenced and inline code
 * 3. Strip HTML comments
 * 4. Normalize blank lines
 * 5. Convert checkboxes
 *
 * @param markdown - Raw markdown input.
 * @returns Preprocessed markdown ready for the scanner.
 *
 * @example
 * ```ts
 * preprocessMarkdown('a\r\n\r\n\r\n\r\nb'); // 'a\n\nb'
 * ```
 */
export function preprocessMarkdown(markdown: string): string {
  let result = normalizeLineEndings(markdown);

  // Protect fenced code blocks (an unterminated fence runs to the end).
  const codeBlocks: string[] = [];
  result = protectFences(result, codeBlocks);

  // Protect inline code (single backtick) from modification.
  result = result.replace(/`[^`\n]+`/g, (match) => placeholder(codeBlocks, match));

  // Apply transformations on unprotected text.
  result = stripHtmlComments(result);
  result = normalizeBlankLines(result);
  result = convertCheckboxes(result);

  // Restore code blocks.
  result = result.replace(/\x00CODEBLOCK(\d+)\x00/g, (_match, idx: string) => {
    return codeBlocks[parseInt(idx, 10)] ?? '';
  });

  return result;
}
