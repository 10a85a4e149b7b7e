/**
 * Per-job rendering state.
 *
 * The renderer threads a {@link RenderState} value through its traversal.
 * Transitions are pure functions returning a new value, so a handler that
 * changes the font for its children cannot leak the change to its siblings.
 */
import type { RenderingOptions } from './options.js';
import type { HeadingLevel } from './types.js';

export type FontRole = 'main' | 'mono';

export type FontWeight = 'regular' | 'bold';

export interface RenderState {
  readonly fontFamily: FontRole;
  readonly weight: FontWeight;
  readonly sizePt: number;
  /** Whether text blocks are drawn over the highlight fill. */
  readonly highlightFill: boolean;
  readonly inCode: boolean;
  readonly linkColorActive: boolean;
}

/** Smallest heading size; keeps sizes positive for any base size. */
export const MIN_HEADING_SIZE_PT = 6;

export function initialRenderState(options: RenderingOptions): RenderState {
  return {
    fontFamily: 'main',
    weight: 'regular',
    sizePt: options.baseFontSize,
    highlightFill: false,
    inCode: false,
    linkColorActive: false,
  };
}

/** Font size of a heading: one point larger per level above 6, at least 6pt. */
export function headingSize(baseFontSize: number, level: HeadingLevel): number {
  return Math.max(MIN_HEADING_SIZE_PT, baseFontSize + (7 - level));
}

/** Entering any block clears link colour. */
export function enterBlock(state: RenderState): RenderState {
  return state.linkColorActive ? { ...state, linkColorActive: false } : state;
}

export function enterHeading(
  state: RenderState,
  level: HeadingLevel,
  options: RenderingOptions,
): RenderState {
  return {
    ...enterBlock(state),
    weight: 'bold',
    sizePt: headingSize(options.baseFontSize, level),
  };
}

export function enterCode(state: RenderState, options: RenderingOptions): RenderState {
  return {
    ...state,
    fontFamily: 'mono',
    weight: 'regular',
    sizePt: options.baseFontSize,
    highlightFill: options.highlight,
    inCode: true,
  };
}

export function leaveCode(state: RenderState): RenderState {
  return { ...state, fontFamily: 'main', highlightFill: false, inCode: false };
}

export function enterLink(state: RenderState, options: RenderingOptions): RenderState {
  return { ...state, linkColorActive: options.colorLinks };
}
