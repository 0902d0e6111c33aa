/**
 * CORE: Runtime State
 * Plain data. The Sequencer owns the only live instance.
 */

export type Phase = 'stopped' | 'paused' | 'running' | 'exited';

/** The two terms immediately preceding the next generated value. */
export interface SeedPair {
    a: bigint;
    b: bigint;
}

export interface SequencerConfig {
    /** Tick period in milliseconds. Never below minPeriodMs. */
    periodMs: number;
    /** Floor for periodMs. A bare `speed` resets to this value. */
    minPeriodMs: number;
    /** Highest term that may be emitted; null means unbounded. */
    ceiling: bigint | null;
    /** Terms produced per tick. */
    batchSize: number;
}

export interface RuntimeState {
    phase: Phase;
    start: SeedPair;
    current: SeedPair;
    config: SequencerConfig;
    /** Block computed by start/restart, emitted by the first tick of the run. */
    queued: bigint[] | null;
}

/** At most five blocks per second. */
export const MIN_PERIOD_MS = 200;
/** Longest delay a Node timer keeps; longer ones fire after 1 ms. */
export const MAX_PERIOD_MS = 2_147_483_647;
export const DEFAULT_PERIOD_MS = 1000;
export const DEFAULT_BATCH_SIZE = 10;

export const DEFAULT_SEED: Readonly<SeedPair> = Object.freeze({ a: 0n, b: 1n });

export const DEFAULT_CONFIG: Readonly<SequencerConfig> = Object.freeze({
    periodMs: DEFAULT_PERIOD_MS,
    minPeriodMs: MIN_PERIOD_MS,
    ceiling: null,
    batchSize: DEFAULT_BATCH_SIZE,
});

export function createInitialState(config: SequencerConfig = DEFAULT_CONFIG): RuntimeState {
    return {
        phase: 'stopped',
        start: { ...DEFAULT_SEED },
        current: { ...DEFAULT_SEED },
        config: { ...config },
        queued: null,
    };
}

/** Deep copy, safe to hand to callers outside the Sequencer. */
export function cloneState(state: RuntimeState): RuntimeState {
    return {
        phase: state.phase,
        start: { ...state.start },
        current: { ...state.current },
        config: { ...state.config },
        queued: state.queued ? [...state.queued] : null,
    };
}

/** Clamp a period into [minPeriodMs, MAX_PERIOD_MS]. */
export function clampPeriod(periodMs: number, minPeriodMs: number): number {
    return Math.min(MAX_PERIOD_MS, Math.max(minPeriodMs, periodMs));
}

export function formatSeed(seed: SeedPair): string {
    return `(${seed.a}, ${seed.b})`;
}
