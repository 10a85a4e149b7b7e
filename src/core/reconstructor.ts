/**
 * Text reconstructor.
 *
 * Recovers approximate structured text from a flat text extraction: one
 * forward pass over the lines, classifying each with {@link classifyLine}
 * and normalizing markers, with O(1) running state.
 *
 * @module core/reconstructor
 */
import {
  classifyLine,
  INITIAL_RECONSTRUCTION_STATE,
  type LineClassification,
  type ReconstructionState,
} from './line-classifier.js';
import type { ReconstructionOptions } from './options.js';

/** Source tag written into generated frontmatter. */
export const FRONTMATTER_SOURCE = 'remarkable';

/**
 * Something unusual seen during reconstruction. Never fatal; callers
 * usually log these as warnings.
 */
export type ReconstructionIrregularity =
  | { kind: 'unterminated-fence'; line: number }
  | { kind: 'heading-level-clamped'; line: number; requestedLevel: number; level: number };

/** Document facts used for frontmatter. */
export interface ReconstructionContext {
  /** Document title. @default 'Untitled' */
  title?: string;
  /** Date written into frontmatter. @default now */
  date?: Date;
}

export interface ReconstructionReport {
  text: string;
  irregularities: ReconstructionIrregularity[];
}

/** Format a date as `YYYY-MM-DD` in local time. */
export function formatDate(date: Date): string {
  const year = String(date.getFullYear()).padStart(4, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

function buildFrontmatter(context: ReconstructionContext): string {
  const title = context.title ?? 'Untitled';
  const date = formatDate(context.date ?? new Date());
  return `---\ntitle: ${title}\nsource: ${FRONTMATTER_SOURCE}\ndate: ${date}\n---\n\n`;
}

function clampLevel(level: number): number {
  return Math.min(6, Math.max(1, level));
}

function formatLine(
  classification: Exclude<LineClassification, { kind: 'blank' }>,
  raw: string,
  lineNumber: number,
  options: ReconstructionOptions,
  irregularities: ReconstructionIrregularity[],
): string {
  switch (classification.kind) {
    case 'fenceToggle':
      return raw.trim();
    case 'passthrough':
      // Code keeps its indentation.
      return raw.trimEnd();
    case 'heading': {
      const requested = classification.rawLevel + options.headerLevelAdjust;
      const level = clampLevel(requested);
      if (level !== requested) {
        irregularities.push({ kind: 'heading-level-clamped', line: lineNumber, requestedLevel: requested, level });
      }
      const marker = '#'.repeat(level);
      return classification.title ? `${marker} ${classification.title}` : marker;
    }
    case 'bullet':
      return `- ${classification.text}`;
    case 'numbered':
      return `${classification.label}. ${classification.text}`;
    case 'plain':
      return raw.trim();
  }
}

function cleanupLines(
  lines: readonly string[],
  options: ReconstructionOptions,
): ReconstructionReport {
  const output: string[] = [];
  const irregularities: ReconstructionIrregularity[] = [];
  let state: ReconstructionState = INITIAL_RECONSTRUCTION_STATE;
  let fenceOpenedAt = 0;

  for (let i = 0; i < lines.length; i++) {
    const raw = lines[i];
    const { classification, state: next } = classifyLine(raw, state);

    if (classification.kind === 'blank') {
      // Collapse runs of blank lines to one.
      if (!state.lastEmittedWasBlank) output.push('');
      state = { ...next, lastEmittedWasBlank: true };
      continue;
    }

    if (classification.kind === 'fenceToggle' && !state.inFence) {
      fenceOpenedAt = i + 1;
    }

    output.push(formatLine(classification, raw, i + 1, options, irregularities));
    state = { ...next, lastEmittedWasBlank: false };
  }

  if (state.inFence) {
    irregularities.push({ kind: 'unterminated-fence', line: fenceOpenedAt });
  }

  return { text: output.join('\n'), irregularities };
}

/**
 * Reconstruct structured text and report irregularities.
 *
 * With `cleanupEnabled` off every line is only trimmed, and nothing is
 * reported.
 *
 * @example
 * ```ts
 * const { text } = reconstructTextWithReport('# Title\n* item', createReconstructionOptions({
 *   addFrontmatter: false,
 * }));
 * // text === '## Title\n- item'
 * ```
 */
export function reconstructTextWithReport(
  flatText: string,
  options: ReconstructionOptions,
  context: ReconstructionContext = {},
): ReconstructionReport {
  const lines = flatText.split(/\r?\n/);
  const body = options.cleanupEnabled
    ? cleanupLines(lines, options)
    : { text: lines.map((line) => line.trim()).join('\n'), irregularities: [] };

  const prefix = options.addFrontmatter ? buildFrontmatter(context) : '';
  return { text: prefix + body.text, irregularities: body.irregularities };
}

/**
 * Reconstruct structured text from a flat extraction.
 *
 * See {@link reconstructTextWithReport} for a variant that also returns the
 * irregularities found.
 */
export function reconstructText(
  flatText: string,
  options: ReconstructionOptions,
  context: ReconstructionContext = {},
): string {
  return reconstructTextWithReport(flatText, options, context).text;
}
