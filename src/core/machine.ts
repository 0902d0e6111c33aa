/**
 * CORE: State Machine
 * Pure functions: (State, Event) -> [State, Effect[]].
 * No I/O, no timers, no mutation. Invalid events throw before anything is built.
 */

import { arm, cancel, emit, log, release, reschedule, type Effect } from './effects';
import { validateEvent } from './rules';
import { continuationBlock, nextSeed, seedBlock, truncateAtCeiling } from './sequence';
import {
    clampPeriod,
    DEFAULT_SEED,
    formatSeed,
    type RuntimeState,
    type SeedPair,
    type SequencerConfig,
} from './state';

export type SequencerEvent =
    | { type: 'start'; seed: SeedPair | null }
    | { type: 'pause' }
    | { type: 'stop' }
    | { type: 'restart' }
    | { type: 'exit' }
    /** null resets to the floor */
    | { type: 'speed'; periodMs: number | null }
    | { type: 'max'; ceiling: bigint | null }
    | { type: 'reset'; config: SequencerConfig };

export type Transition = [RuntimeState, Effect[]];

function formatPeriod(periodMs: number): string {
    return `${periodMs / 1000}s`;
}

export function transition(state: RuntimeState, event: SequencerEvent): Transition {
    validateEvent(state, event);

    switch (event.type) {
        case 'start':
            return startSequence(state, event.seed);

        case 'pause':
            return [
                { ...state, phase: 'paused' },
                [cancel(), log(`Paused at ${formatSeed(state.current)}.`)],
            ];

        case 'stop': {
            if (state.phase === 'stopped') {
                return [state, [log('Sequence is already stopped.')]];
            }
            return [
                { ...state, phase: 'stopped', current: { ...state.start }, queued: null },
                [cancel(), log(`Stopped. Next run starts from ${formatSeed(state.start)}.`)],
            ];
        }

        case 'restart': {
            const { batchSize, periodMs } = state.config;
            const queued = seedBlock(batchSize, state.start.a, state.start.b);
            return [
                { ...state, phase: 'running', current: { ...state.start }, queued },
                [arm(periodMs), log(`Restarted from ${formatSeed(state.start)}.`)],
            ];
        }

        case 'exit':
            return [
                { ...state, phase: 'exited', queued: null },
                [cancel(), release(), log('Goodbye.')],
            ];

        case 'speed': {
            const { minPeriodMs, periodMs: previous } = state.config;
            const periodMs = clampPeriod(event.periodMs ?? minPeriodMs, minPeriodMs);
            const effects: Effect[] = [];
            if (state.phase === 'running') {
                effects.push(reschedule(previous, periodMs));
            }
            effects.push(log(`Period set to ${formatPeriod(periodMs)}.`));
            return [{ ...state, config: { ...state.config, periodMs } }, effects];
        }

        case 'max': {
            const message = event.ceiling === null
                ? 'Maximum cleared.'
                : `Maximum set to ${event.ceiling}.`;
            return [
                { ...state, config: { ...state.config, ceiling: event.ceiling } },
                [log(message)],
            ];
        }

        case 'reset': {
            const effects: Effect[] = state.phase === 'stopped' ? [] : [cancel()];
            effects.push(log(`Reset to ${formatSeed(DEFAULT_SEED)} with startup settings.`));
            return [
                {
                    phase: 'stopped',
                    start: { ...DEFAULT_SEED },
                    current: { ...DEFAULT_SEED },
                    config: { ...event.config },
                    queued: null,
                },
                effects,
            ];
        }
    }
}

function startSequence(state: RuntimeState, requested: SeedPair | null): Transition {
    const { batchSize, periodMs } = state.config;

    if (state.phase === 'paused') {
        // Resume: a block not yet emitted is kept, otherwise continue after the seed
        const seed = requested ?? state.current;
        const queued = requested === null && state.queued
            ? state.queued
            : continuationBlock(batchSize, seed.a, seed.b);
        const verb = requested ? 'Resumed from' : 'Resumed at';
        return [
            { ...state, phase: 'running', start: { ...seed }, current: { ...seed }, queued },
            [arm(periodMs), log(`${verb} ${formatSeed(seed)}.`)],
        ];
    }

    const seed = requested ?? DEFAULT_SEED;
    const queued = seedBlock(batchSize, seed.a, seed.b);
    const verb = state.phase === 'running' ? 'Restarted from' : 'Started from';
    return [
        { ...state, phase: 'running', start: { ...seed }, current: { ...seed }, queued },
        [arm(periodMs), log(`${verb} ${formatSeed(seed)}.`)],
    ];
}

/**
 * One scheduler tick. Emits the queued block if there is one, otherwise the
 * continuation of `current`. Stops the run when the ceiling cuts the block.
 */
export function tick(state: RuntimeState): Transition {
    if (state.phase !== 'running') return [state, []];

    const { batchSize, ceiling } = state.config;
    const block = state.queued ?? continuationBlock(batchSize, state.current.a, state.current.b);
    const { terms, truncated } = truncateAtCeiling(block, ceiling);

    // Cancel before emit: a block listener may arm a new run
    const effects: Effect[] = truncated ? [cancel()] : [];
    if (terms.length > 0) {
        effects.push(emit(terms, truncated));
    }

    if (truncated) {
        effects.push(log(`Reached maximum ${ceiling}. Stopped.`));
        return [
            { ...state, phase: 'stopped', current: { ...state.start }, queued: null },
            effects,
        ];
    }

    return [{ ...state, current: nextSeed(block), queued: null }, effects];
}
