/**
 * Line classifier for flat extracted text.
 *
 * A pure function from one line and the running fence state to a tagged
 * classification and the next state. Lines inside a fence are never
 * reclassified, however much they look like markup.
 *
 * @module core/line-classifier
 */

/** Running state of a reconstruction pass. */
export interface ReconstructionState {
  readonly inFence: boolean;
  readonly lastEmittedWasBlank: boolean;
}

export type LineClassification =
  | { kind: 'passthrough' }
  | { kind: 'fenceToggle' }
  | { kind: 'blank' }
  | { kind: 'heading'; rawLevel: number; title: string }
  | { kind: 'bullet'; text: string }
  | { kind: 'numbered'; number: number; label: string; text: string }
  | { kind: 'plain' };

export interface ClassifiedLine {
  classification: LineClassification;
  state: ReconstructionState;
}

export const FENCE_MARKER = '```';

export const INITIAL_RECONSTRUCTION_STATE: ReconstructionState = Object.freeze({
  inFence: false,
  lastEmittedWasBlank: false,
});

const HEADING_RE = /^(#+)(?:\s+(.*))?$/;
const NUMBERED_RE = /^(\d+)\.\s+(.*)$/;

/**
 * Whether a trimmed line toggles the fence state.
 *
 * Inside a fence only the bare marker closes it. Outside, the marker may be
 * followed by an info string naming the language.
 */
function isFenceLine(trimmed: string, inFence: boolean): boolean {
  if (trimmed === FENCE_MARKER) return true;
  if (inFence || !trimmed.startsWith(FENCE_MARKER)) return false;
  return !trimmed.slice(FENCE_MARKER.length).includes('`');
}

/**
 * Classify one line of extracted text.
 *
 * @param line - The raw line; it is trimmed before classification.
 * @param state - State before this line.
 * @returns The classification and the state after this line. Only a fence
 *   toggle changes the state; `lastEmittedWasBlank` is left to the caller,
 *   which knows what it emitted.
 */
export function classifyLine(line: string, state: ReconstructionState): ClassifiedLine {
  const trimmed = line.trim();

  if (isFenceLine(trimmed, state.inFence)) {
    return {
      classification: { kind: 'fenceToggle' },
      state: { ...state, inFence: !state.inFence },
    };
  }

  if (state.inFence) {
    return { classification: { kind: 'passthrough' }, state };
  }

  if (trimmed.length === 0) {
    return { classification: { kind: 'blank' }, state };
  }

  const heading = HEADING_RE.exec(trimmed);
  if (heading) {
    return {
      classification: {
        kind: 'heading',
        rawLevel: heading[1].length,
        title: (heading[2] ?? '').trim(),
      },
      state,
    };
  }

  if (trimmed.startsWith('* ') || trimmed.startsWith('- ')) {
    return { classification: { kind: 'bullet', text: trimmed.slice(2).trim() }, state };
  }

  const numbered = NUMBERED_RE.exec(trimmed);
  if (numbered) {
    return {
      classification: {
        kind: 'numbered',
        number: parseInt(numbered[1], 10),
        // The digits as written; `number` loses leading zeros and precision.
        label: numbered[1],
        text: numbered[2].trim(),
      },
      state,
    };
  }

  return { classification: { kind: 'plain' }, state };
}
