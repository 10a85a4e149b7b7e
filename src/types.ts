import type { TocEntry } from './core/renderer';

/**
 * How a source file is rendered.
 */
export type SourceKind = 'markdown' | 'yaml' | 'config';

/**
 * Metadata about a converted source file.
 */
export interface ConvertMetadata {
  /** Document title (file name without extension unless overridden) */
  title: string;
  /** Rendering path chosen from the file extension */
  kind: SourceKind;
  /** Approximate word count of the source */
  wordCount: number;
  /** Number of headings in the document */
  headingCount: number;
  /** Whether the document contains code blocks */
  hasCodeBlocks: boolean;
  /** Info strings found on fenced code blocks */
  languages: string[];
  /** Whether the document contains links */
  hasLinks: boolean;
}

/**
 * Result of converting a source file to PDF.
 */
export interface PdfConversionResult {
  /** Serialized PDF document */
  pdf: Uint8Array;
  /** Pages in the document, including overflow pages */
  pageCount: number;
  /** Headings listed in the table of contents (empty when disabled) */
  toc: TocEntry[];
  /** Document metadata */
  metadata: ConvertMetadata;
}
