import type { StyleMatch, StyledElement } from './core/types';

/**
 * Options for Markdown to styled document conversion
 */
export interface ConvertOptions {
  /** Source markdown string */
  markdown: string;
  /** Document title; defaults to the first level-1 or level-2 heading */
  title?: string;
  /** Style template name ('default', 'compact' or 'document') */
  template?: string;
  /**
   * Style table layered over the template. Either a typed table or a raw
   * object as parsed from a TOML style file.
   */
  styles?: StyleMatch | Record<string, unknown>;
  /** Merge adjacent text runs with identical styles (default `true`) */
  mergeRuns?: boolean;
  /** Log per-stage counts through `console.debug` */
  debug?: boolean;
}

/**
 * Metadata about the converted document.
 */
export interface ConvertMetadata {
  /** Document title (extracted from first heading or options) */
  title: string;
  /** Approximate word count of the rendered text */
  wordCount: number;
  /** Whether the document contains fenced code blocks */
  hasCodeBlocks: boolean;
  /** Programming languages found in fenced code blocks */
  languages: string[];
  /** Whether the document contains images */
  hasImages: boolean;
  /** Number of well-formed links */
  linkCount: number;
}

/**
 * Result of the conversion pipeline.
 *
 * Contains the styled elements, a plain-text fallback, and document-level
 * metadata.
 */
export interface ConvertResult {
  /** Styled elements in document order */
  elements: StyledElement[];
  /** Plain text version */
  plainText: string;
  /** Document metadata */
  metadata: ConvertMetadata;
}
