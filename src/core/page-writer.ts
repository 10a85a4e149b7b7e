/**
 * Page writer boundary.
 *
 * The renderer never touches a page format directly: it drives a
 * {@link PageWriter}, which turns draw operations into pages. Writers may
 * throw; callers receive those errors unmodified.
 *
 * @module core/page-writer
 */
import type { FontWeight } from './render-state.js';

export interface RgbColor {
  readonly r: number;
  readonly g: number;
  readonly b: number;
}

export const BLACK: RgbColor = Object.freeze({ r: 0, g: 0, b: 0 });
export const LINK_BLUE: RgbColor = Object.freeze({ r: 0, g: 0, b: 255 });
export const HIGHLIGHT_GREY: RgbColor = Object.freeze({ r: 245, g: 245, b: 245 });

/** Sink for draw and layout operations. */
export interface PageWriter {
  newPage(): void;
  setFont(family: string, weight: FontWeight, sizePt: number): void;
  setFill(color: RgbColor, on: boolean): void;
  setTextColor(color: RgbColor): void;
  /** Write a wrapped block of text, over the current fill when `filled`. */
  writeTextBlock(text: string, filled: boolean): void;
  /** Move to a new line, `height` millimetres below the current one. */
  lineBreak(height: number): void;
  /** Write a glyph inline, without ending the line. */
  writeGlyph(glyph: string): void;
}

export type PageOperation =
  | { type: 'newPage' }
  | { type: 'setFont'; family: string; weight: FontWeight; sizePt: number }
  | { type: 'setFill'; color: RgbColor; on: boolean }
  | { type: 'setTextColor'; color: RgbColor }
  | { type: 'writeTextBlock'; text: string; filled: boolean }
  | { type: 'lineBreak'; height: number }
  | { type: 'writeGlyph'; glyph: string };

/**
 * A writer that records every operation it receives.
 *
 * Used to buffer a body before replaying it into another writer, and to
 * inspect the operation stream in tests.
 */
export class RecordingPageWriter implements PageWriter {
  private readonly recorded: PageOperation[] = [];
  private pageBreaks = 0;

  get operations(): readonly PageOperation[] {
    return this.recorded;
  }

  /** Number of `newPage` operations received so far. */
  get pageBreakCount(): number {
    return this.pageBreaks;
  }

  newPage(): void {
    this.pageBreaks++;
    this.recorded.push({ type: 'newPage' });
  }

  setFont(family: string, weight: FontWeight, sizePt: number): void {
    this.recorded.push({ type: 'setFont', family, weight, sizePt });
  }

  setFill(color: RgbColor, on: boolean): void {
    this.recorded.push({ type: 'setFill', color, on });
  }

  setTextColor(color: RgbColor): void {
    this.recorded.push({ type: 'setTextColor', color });
  }

  writeTextBlock(text: string, filled: boolean): void {
    this.recorded.push({ type: 'writeTextBlock', text, filled });
  }

  lineBreak(height: number): void {
    this.recorded.push({ type: 'lineBreak', height });
  }

  writeGlyph(glyph: string): void {
    this.recorded.push({ type: 'writeGlyph', glyph });
  }
}

/** Forward a recorded operation stream to `writer`, in order. */
export function replayOperations(operations: readonly PageOperation[], writer: PageWriter): void {
  for (const op of operations) {
    switch (op.type) {
      case 'newPage':
        writer.newPage();
        break;
      case 'setFont':
        writer.setFont(op.family, op.weight, op.sizePt);
        break;
      case 'setFill':
        writer.setFill(op.color, op.on);
        break;
      case 'setTextColor':
        writer.setTextColor(op.color);
        break;
      case 'writeTextBlock':
        writer.writeTextBlock(op.text, op.filled);
        break;
      case 'lineBreak':
        writer.lineBreak(op.height);
        break;
      case 'writeGlyph':
        writer.writeGlyph(op.glyph);
        break;
    }
  }
}
