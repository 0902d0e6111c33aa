/**
 * CORE: Transition Rules
 * Pure validation logic.
 */

import { IllegalTransitionError } from './errors';
import type { SequencerEvent } from './machine';
import type { Phase, RuntimeState } from './state';

export type Verb =
    | 'help'
    | 'max'
    | 'pause'
    | 'reset'
    | 'restart'
    | 'speed'
    | 'start'
    | 'stop'
    | 'exit';

export function validateEvent(state: RuntimeState, event: SequencerEvent): void {
    if (state.phase === 'exited') {
        throw new IllegalTransitionError('Sequencer has exited.');
    }

    switch (event.type) {
        case 'start':
            // A bare start cannot restart a running sequence; `start a b` can
            if (state.phase === 'running' && event.seed === null) {
                throw new IllegalTransitionError('Sequence is already running.');
            }
            break;

        case 'pause':
            if (state.phase === 'paused') {
                throw new IllegalTransitionError('Sequence is already paused.');
            }
            if (state.phase !== 'running') {
                throw new IllegalTransitionError('No sequence is running.');
            }
            break;

        case 'restart':
            if (state.phase === 'stopped') {
                throw new IllegalTransitionError('No active sequence to restart.');
            }
            break;
    }
}

const PROMPTS: Record<Phase, string> = {
    stopped: 'stopped> ',
    paused: 'paused> ',
    running: 'running> ',
    exited: '',
};

const ALLOWED_VERBS: Record<Phase, readonly Verb[]> = {
    stopped: ['start', 'speed', 'max', 'reset', 'help', 'exit'],
    paused: ['start', 'restart', 'stop', 'speed', 'max', 'reset', 'help', 'exit'],
    running: ['start', 'pause', 'restart', 'stop', 'speed', 'max', 'reset', 'help', 'exit'],
    exited: [],
};

export function getPrompt(phase: Phase): string {
    return PROMPTS[phase];
}

/** Verbs that do something in this phase. `stop` while stopped is accepted but left out. */
export function getAllowedVerbs(phase: Phase): readonly Verb[] {
    return ALLOWED_VERBS[phase];
}
