/**
 * Effects: POJOs describing what the Sequencer must do after a transition.
 * All use type + dashed-lower-case naming.
 * Factories are pure functions.
 */

export type Effect =
  | { type: 'arm'; periodMs: number }
  | { type: 'cancel' }
  | { type: 'reschedule'; previousPeriodMs: number; periodMs: number }
  | { type: 'emit'; terms: bigint[]; truncated: boolean }
  | { type: 'log'; message: string }
  | { type: 'release' };

// ─── Effect factories ─────────────────────────────────────────────────────────

/** Full re-arm: fire now, then every periodMs. */
export function arm(periodMs: number): Effect {
  return { type: 'arm', periodMs };
}

export function cancel(): Effect {
  return { type: 'cancel' };
}

/** Keep the run going, move the next tick according to the new period. */
export function reschedule(previousPeriodMs: number, periodMs: number): Effect {
  return { type: 'reschedule', previousPeriodMs, periodMs };
}

export function emit(terms: bigint[], truncated: boolean): Effect {
  return { type: 'emit', terms, truncated };
}

export function log(message: string): Effect {
  return { type: 'log', message };
}

export function release(): Effect {
  return { type: 'release' };
}
