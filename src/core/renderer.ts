/**
 * Page renderer.
 *
 * Walks a parsed document in source order and drives a {@link PageWriter}.
 * Rendering state is a value passed down the traversal; each handler hands
 * its children the state they should see and returns the state its following
 * siblings should see.
 *
 * - Heading, code block and list item state is scoped to the node.
 * - Link colour persists to later text of the same block, and is cleared on
 *   entry to every paragraph, heading and list item.
 * - Font and colour changes are emitted lazily, right before the text that
 *   needs them, so consecutive text runs share one `setFont`.
 */

import type { RenderingOptions } from './options.js';
import {
  BLACK,
  HIGHLIGHT_GREY,
  LINK_BLUE,
  RecordingPageWriter,
  replayOperations,
  type PageWriter,
  type RgbColor,
} from './page-writer.js';
import {
  enterBlock,
  enterCode,
  enterHeading,
  enterLink,
  initialRenderState,
  leaveCode,
  type RenderState,
} from './render-state.js';
import type {
  BlockNode,
  DocumentNode,
  HeadingLevel,
  InlineNode,
  ListItemNode,
} from './types.js';

// ---------------------------------------------------------------------------
// Layout constants (millimetres)
// ---------------------------------------------------------------------------

const HEADING_SPACING = 5;
const PARAGRAPH_SPACING = 5;
const LIST_SPACING = 3;
const BULLET_GLYPH = '•';

/** A heading recorded for the table of contents. */
export interface TocEntry {
  title: string;
  level: HeadingLevel;
  /**
   * 1-based page counted from the start of the rendered output: the
   * contents page, then one more for each page break emitted before the
   * heading. Pages a writer adds on its own when text overflows are not
   * known here and not counted.
   */
  page: number;
}

export interface RenderSummary {
  toc: TocEntry[];
}

/** Visible text of an inline run, with link markup dropped. */
export function inlineText(nodes: readonly InlineNode[]): string {
  let text = '';
  for (const node of nodes) {
    text += node.type === 'text' ? node.text : inlineText(node.children);
  }
  return text;
}

// ---------------------------------------------------------------------------
// Render context
// ---------------------------------------------------------------------------

/**
 * Per-job bookkeeping: the writer, what was last applied to it, and the
 * headings seen so far.
 */
class RenderContext {
  private appliedFont: string | undefined;
  private appliedColor: RgbColor = BLACK;
  readonly toc: TocEntry[] = [];

  constructor(
    readonly writer: PageWriter,
    readonly options: RenderingOptions,
    private readonly pagesBefore: () => number,
  ) {}

  applyFont(state: RenderState, force = false): void {
    const family = state.fontFamily === 'mono' ? this.options.monoFont : this.options.mainFont;
    const key = `${family}|${state.weight}|${state.sizePt}`;
    if (force || key !== this.appliedFont) {
      this.writer.setFont(family, state.weight, state.sizePt);
      this.appliedFont = key;
    }
  }

  applyTextColor(state: RenderState): void {
    const color = state.linkColorActive ? LINK_BLUE : BLACK;
    if (color !== this.appliedColor) {
      this.writer.setTextColor(color);
      this.appliedColor = color;
    }
  }

  recordHeading(title: string, level: HeadingLevel): void {
    this.toc.push({ title, level, page: this.pagesBefore() + 1 });
  }
}

// ---------------------------------------------------------------------------
// Node handlers
// ---------------------------------------------------------------------------

function renderText(text: string, state: RenderState, ctx: RenderContext): RenderState {
  const textState: RenderState = state.inCode ? { ...state, fontFamily: 'mono' } : state;
  ctx.applyFont(textState);
  ctx.applyTextColor(textState);
  ctx.writer.writeTextBlock(text, state.inCode && ctx.options.highlight);
  if (state.inCode) {
    ctx.applyFont({ ...state, fontFamily: 'main' });
  }
  return state;
}

function renderInlines(
  nodes: readonly InlineNode[],
  state: RenderState,
  ctx: RenderContext,
): RenderState {
  let current = state;
  for (const node of nodes) {
    if (node.type === 'text') {
      current = renderText(node.text, current, ctx);
    } else {
      current = renderInlines(node.children, enterLink(current, ctx.options), ctx);
    }
  }
  return current;
}

function renderCodeBlock(literal: string, state: RenderState, ctx: RenderContext): void {
  const codeState = enterCode(state, ctx.options);
  ctx.applyFont(codeState);
  ctx.applyTextColor(codeState);
  if (codeState.highlightFill) {
    ctx.writer.setFill(HIGHLIGHT_GREY, true);
  }
  ctx.writer.writeTextBlock(literal, codeState.highlightFill);
  ctx.applyFont(leaveCode(codeState));
  if (codeState.highlightFill) {
    ctx.writer.setFill(HIGHLIGHT_GREY, false);
  }
}

function renderListItem(item: ListItemNode, state: RenderState, ctx: RenderContext): void {
  const itemState = enterBlock(state);
  ctx.applyFont(itemState);
  ctx.applyTextColor(itemState);
  ctx.writer.writeGlyph(BULLET_GLYPH);
  for (const child of item.children) {
    renderBlock(child, itemState, ctx);
  }
}

function renderBlock(node: BlockNode, state: RenderState, ctx: RenderContext): void {
  switch (node.type) {
    case 'heading': {
      const headingState = enterHeading(state, node.level, ctx.options);
      ctx.writer.lineBreak(HEADING_SPACING);
      ctx.applyFont(headingState, true);
      ctx.recordHeading(inlineText(node.children), node.level);
      renderInlines(node.children, headingState, ctx);
      break;
    }
    case 'paragraph':
      ctx.writer.lineBreak(PARAGRAPH_SPACING);
      renderInlines(node.children, enterBlock(state), ctx);
      break;
    case 'codeBlock':
      renderCodeBlock(node.literal, state, ctx);
      break;
    case 'list':
      ctx.writer.lineBreak(LIST_SPACING);
      for (const item of node.items) {
        renderListItem(item, state, ctx);
      }
      break;
  }
}

function renderBody(
  document: DocumentNode,
  options: RenderingOptions,
  writer: PageWriter,
  pagesBefore: () => number,
): TocEntry[] {
  const ctx = new RenderContext(writer, options, pagesBefore);
  const state = initialRenderState(options);
  ctx.applyFont(state, true);
  for (const child of document.children) {
    renderBlock(child, state, ctx);
  }
  return ctx.toc;
}

function renderTableOfContents(
  entries: readonly TocEntry[],
  options: RenderingOptions,
  writer: PageWriter,
): void {
  writer.setFont(options.mainFont, 'bold', options.baseFontSize + 4);
  writer.writeTextBlock('Contents', false);
  writer.lineBreak(HEADING_SPACING);
  writer.setFont(options.mainFont, 'regular', options.baseFontSize);
  for (const entry of entries) {
    const indent = '  '.repeat(entry.level - 1);
    writer.writeTextBlock(`${indent}${entry.title}  ${entry.page}`, false);
  }
  writer.newPage();
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Render a document tree into `writer`.
 *
 * With `options.toc` on and at least one heading present, the body is
 * buffered first so that a "Contents" section can precede it.
 *
 * Errors thrown by the writer propagate unchanged.
 *
 * @example
 * ```ts
 * const writer = new RecordingPageWriter();
 * renderDocument(parseDocument('# Hi'), createRenderingOptions({ toc: false }), writer);
 * ```
 */
export function renderDocument(
  document: DocumentNode,
  options: RenderingOptions,
  writer: PageWriter,
): RenderSummary {
  if (!options.toc) {
    renderBody(document, options, writer, () => 0);
    return { toc: [] };
  }

  const body = new RecordingPageWriter();
  // The contents section ends with a page break of its own.
  const toc = renderBody(document, options, body, () => body.pageBreakCount + 1);
  if (toc.length > 0) {
    renderTableOfContents(toc, options, writer);
  }
  replayOperations(body.operations, writer);
  return { toc };
}

/**
 * Class wrapper binding rendering options once, for callers converting
 * several documents with the same settings.
 *
 * @example
 * ```ts
 * const renderer = new PageRenderer(createRenderingOptions());
 * renderer.render(parseDocument('# Hello'), writer);
 * ```
 */
export class PageRenderer {
  constructor(private readonly options: RenderingOptions) {}

  render(document: DocumentNode, writer: PageWriter): RenderSummary {
    return renderDocument(document, this.options, writer);
  }
}
