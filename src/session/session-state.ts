// src/session/session-state.ts

import { DEFAULT_DEBOUNCE_SECONDS, SESSION_RESET_LAST_TIME } from '../constants/constants.js';
import type { Reading, SampleDecision, SessionState } from '../types/ut803-types.js';

export function createSessionState(): SessionState {
  return { currentKind: null, initialTime: 0, lastTime: 0 };
}

/**
 * Decides whether a decoded reading is written.
 *
 * A change of measurement kind starts a new run: the clock restarts at 0 and
 * the first sample of the run is always accepted. Within a run, samples that
 * arrive less than `debounceSeconds` after the last accepted one are the
 * meter's duplicate transmissions and are dropped.
 *
 * @param state - Session state, updated in place
 * @param reading - Decoded reading
 * @param now - Current time in seconds
 */
export function acceptSample(
  state: SessionState,
  reading: Reading,
  now: number,
  debounceSeconds: number = DEFAULT_DEBOUNCE_SECONDS
): SampleDecision {
  let elapsed = now - state.initialTime;
  let newRun = false;

  if (reading.kind !== state.currentKind) {
    state.currentKind = reading.kind;
    state.initialTime = now;
    state.lastTime = SESSION_RESET_LAST_TIME;
    elapsed = 0;
    newRun = true;
  }

  if (elapsed - state.lastTime < debounceSeconds) {
    return { accepted: false };
  }

  state.lastTime = elapsed;
  return { accepted: true, elapsed, newRun };
}
