/**
 * Core module barrel exports.
 *
 * Re-exports the parser, renderer, reconstructor and their supporting
 * types.
 *
 * @module core
 */

// Parser
export { parseDocument, parseMarkdownDocument, walkNodes } from './parser.js';

// Rendering
export { renderDocument, PageRenderer, inlineText } from './renderer.js';
export type { RenderSummary, TocEntry } from './renderer.js';
export { initialRenderState, headingSize } from './render-state.js';
export type { RenderState, FontRole, FontWeight } from './render-state.js';
export { RecordingPageWriter, replayOperations, BLACK, LINK_BLUE, HIGHLIGHT_GREY } from './page-writer.js';
export type { PageWriter, PageOperation, RgbColor } from './page-writer.js';

// Reconstruction
export { classifyLine, FENCE_MARKER, INITIAL_RECONSTRUCTION_STATE } from './line-classifier.js';
export type { LineClassification, ReconstructionState, ClassifiedLine } from './line-classifier.js';
export { reconstructText, reconstructTextWithReport, formatDate } from './reconstructor.js';
export type {
  ReconstructionContext,
  ReconstructionIrregularity,
  ReconstructionReport,
} from './reconstructor.js';

// Options and errors
export { createRenderingOptions, createReconstructionOptions, PAGE_SIZES } from './options.js';
export type { RenderingOptions, ReconstructionOptions, PageSizeName } from './options.js';
export {
  ConversionError,
  ParseError,
  RenderError,
  OptionsError,
  UnsupportedFileError,
} from './errors.js';

// Types
export type {
  Node,
  DocumentNode,
  BlockNode,
  InlineNode,
  HeadingNode,
  ParagraphNode,
  CodeBlockNode,
  ListNode,
  ListItemNode,
  LinkNode,
  TextNode,
  HeadingLevel,
  ParseMetadata,
  ParseResult,
} from './types.js';
