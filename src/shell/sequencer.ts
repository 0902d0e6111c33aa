/**
 * SHELL: Sequencer
 * Owns the runtime state and the scheduler, and interprets machine effects.
 *
 * Commands and ticks both run to completion on the event loop, so every
 * transition, tick and reschedule is serialized without a separate lock.
 * State is committed before its effects run; a listener that submits a
 * command from inside `block` sees the new phase. Phase events report the
 * change since the last one announced, so nested commands never leave a stale one.
 */

import { registry as defaultRegistry, type CommandRegistry } from '../core/commands';
import type { Effect } from '../core/effects';
import { SequencerError, type ErrorKind } from '../core/errors';
import { ConsoleLogger, type SequencerLogger } from '../core/logger';
import { tick, transition } from '../core/machine';
import {
    cloneState,
    createInitialState,
    DEFAULT_CONFIG,
    type Phase,
    type RuntimeState,
    type SequencerConfig,
} from '../core/state';
import { EventListener, type Listener } from './event-listener';
import { TickScheduler } from './scheduler';
import type { TimerHost } from './timer-host';

export interface StatusMessage {
    ok: boolean;
    kind: 'info' | ErrorKind;
    message: string;
    hint?: string;
    phase: Phase;
}

export interface BlockEvent {
    terms: bigint[];
    /** The ceiling cut this block; the run has stopped. */
    truncated: boolean;
}

export interface PhaseChange {
    from: Phase;
    to: Phase;
}

type SequencerEvents = {
    block: BlockEvent;
    phase: PhaseChange;
};

export interface SequencerOptions {
    config?: SequencerConfig;
    host?: TimerHost;
    logger?: SequencerLogger;
    registry?: CommandRegistry;
}

export class Sequencer {
    private state: RuntimeState;
    private readonly startupConfig: SequencerConfig;
    private readonly scheduler: TickScheduler;
    private readonly events = new EventListener<SequencerEvents>();
    private readonly logger: SequencerLogger;
    private readonly registry: CommandRegistry;
    private closing: Promise<void> | null = null;
    /** Last phase sent to `phase` listeners. */
    private announcedPhase: Phase;

    constructor(options: SequencerOptions = {}) {
        this.startupConfig = { ...(options.config ?? DEFAULT_CONFIG) };
        this.state = createInitialState(this.startupConfig);
        this.announcedPhase = this.state.phase;
        this.logger = options.logger ?? new ConsoleLogger();
        this.registry = options.registry ?? defaultRegistry;
        this.scheduler = new TickScheduler(() => this.handleTick(), options.host);
    }

    get phase(): Phase {
        return this.state.phase;
    }

    /** Copy of the runtime state. */
    snapshot(): RuntimeState {
        return cloneState(this.state);
    }

    /** Milliseconds until the next tick, or null when not running. */
    nextTickIn(): number | null {
        return this.scheduler.remainingMs();
    }

    onBlock(listener: Listener<BlockEvent>): void {
        this.events.on('block', listener);
    }

    offBlock(listener: Listener<BlockEvent>): void {
        this.events.off('block', listener);
    }

    onPhase(listener: Listener<PhaseChange>): void {
        this.events.on('phase', listener);
    }

    offPhase(listener: Listener<PhaseChange>): void {
        this.events.off('phase', listener);
    }

    /**
     * Apply one command. Rejected commands leave the state untouched and come
     * back with ok: false; anything that is not a SequencerError is rethrown.
     */
    submit(verb: string, argString = ''): StatusMessage {
        try {
            const outcome = this.registry.resolve(verb, argString, {
                phase: this.state.phase,
                startupConfig: this.startupConfig,
            });
            if (outcome.kind === 'reply') {
                return this.status(true, 'info', outcome.message);
            }

            const [next, effects] = transition(this.state, outcome.event);
            const messages = this.commit(next, effects);
            return this.status(true, 'info', messages.join('\n'));
        } catch (error) {
            if (error instanceof SequencerError) {
                return this.status(false, error.kind, error.message, error.recoveryHint);
            }
            throw error;
        }
    }

    /** Exit if not already exited; resolves once the scheduler is quiet. */
    close(): Promise<void> {
        if (this.state.phase !== 'exited') {
            this.submit('exit');
        }
        return this.closing ?? Promise.resolve();
    }

    private handleTick(): void {
        if (this.state.phase !== 'running') return;

        const [next, effects] = tick(this.state);
        const messages = this.commit(next, effects);
        messages.forEach((message) => this.logger.info(message));
    }

    private commit(next: RuntimeState, effects: Effect[]): string[] {
        this.state = next;

        const messages: string[] = [];
        for (const effect of effects) {
            switch (effect.type) {
                case 'arm':
                    this.scheduler.arm(effect.periodMs);
                    break;
                case 'cancel':
                    this.scheduler.cancel();
                    break;
                case 'reschedule':
                    this.scheduler.reschedule(effect.previousPeriodMs, effect.periodMs);
                    break;
                case 'emit':
                    this.events.trigger('block', { terms: effect.terms, truncated: effect.truncated });
                    break;
                case 'log':
                    messages.push(effect.message);
                    break;
                case 'release':
                    this.closing = this.scheduler.release();
                    break;
            }
        }

        this.announcePhase();
        return messages;
    }

    /** A listener may have submitted commands during the effects; report where the state ended up. */
    private announcePhase(): void {
        const from = this.announcedPhase;
        const to = this.state.phase;
        if (from === to) return;
        this.announcedPhase = to;
        this.events.trigger('phase', { from, to });
    }

    private status(ok: boolean, kind: StatusMessage['kind'], message: string, hint?: string): StatusMessage {
        const status: StatusMessage = { ok, kind, message, phase: this.state.phase };
        if (hint) status.hint = hint;
        return status;
    }
}
