/**
 * Busy → Idle debounce state machine for idle polling
 */

import type { OutputSnapshot } from '../types/pane.types.js';

export type IdlePhase = 'busy' | 'idle';

export interface IdleState {
  readonly phase: IdlePhase;
  /** Consecutive samples in which the busy predicate did not match */
  readonly quietSamples: number;
  readonly samples: number;
}

export const INITIAL_IDLE_STATE: IdleState = { phase: 'busy', quietSamples: 0, samples: 0 };

/**
 * Feed one sample. The target turns idle only after `quietSamplesRequired`
 * consecutive quiet samples; a single quiet read between redraw frames
 * does not count. Idle is terminal.
 */
export function advanceIdleState(
  state: IdleState,
  stillRunning: boolean,
  quietSamplesRequired = 2
): IdleState {
  if (state.phase === 'idle') {
    return state;
  }

  const samples = state.samples + 1;
  if (stillRunning) {
    return { phase: 'busy', quietSamples: 0, samples };
  }

  const quietSamples = state.quietSamples + 1;
  return {
    phase: quietSamples >= quietSamplesRequired ? 'idle' : 'busy',
    quietSamples,
    samples,
  };
}

/**
 * Index of the sample at which a sequence of busy readings turns idle, or -1
 */
export function findIdleIndex(readings: readonly boolean[], quietSamplesRequired = 2): number {
  let state = INITIAL_IDLE_STATE;
  for (let i = 0; i < readings.length; i++) {
    state = advanceIdleState(state, readings[i] ?? false, quietSamplesRequired);
    if (state.phase === 'idle') {
      return i;
    }
  }
  return -1;
}

/**
 * Busy predicate: the marker appears on any captured line
 */
export function busyMarker(pattern: RegExp | string): (snapshot: OutputSnapshot) => boolean {
  const matches = typeof pattern === 'string'
    ? (line: string) => line.includes(pattern)
    : (line: string) => {
        pattern.lastIndex = 0;
        return pattern.test(line);
      };

  return (snapshot) => snapshot.lines.some(matches);
}
