/**
 * SHELL: Tick Scheduler
 * Owns at most one pending timer. The recurring tick is a chain of one-shot
 * timers: each fire arms the next link before running the tick, so a tick that
 * cancels (ceiling reached) also cancels its successor.
 * Every arm bumps a generation; a callback from an older generation is a no-op.
 */

import { systemTimerHost, type TimerHandle, type TimerHost } from './timer-host';

export interface PendingTick {
    handle: TimerHandle;
    /** Monotonic time the current link was armed. */
    armedAt: number;
    /** Delay the current link was armed with. */
    delayMs: number;
    /** Delay of every link after this one. */
    intervalMs: number;
    generation: number;
}

export class TickScheduler {
    private pending: PendingTick | null = null;
    private generation = 0;
    private released = false;
    private ticking = false;
    private idleWaiters: Array<() => void> = [];

    constructor(
        private readonly onTick: () => void,
        private readonly host: TimerHost = systemTimerHost
    ) {}

    get isArmed(): boolean {
        return this.pending !== null;
    }

    get intervalMs(): number | null {
        return this.pending?.intervalMs ?? null;
    }

    /** Milliseconds until the next fire, or null when nothing is armed. */
    remainingMs(): number | null {
        if (!this.pending) return null;
        const { armedAt, delayMs } = this.pending;
        return Math.max(0, armedAt + delayMs - this.host.now());
    }

    /** Full re-arm: cancel whatever is pending, fire now, then every intervalMs. */
    arm(intervalMs: number): void {
        this.armLink(0, intervalMs);
    }

    cancel(): void {
        if (!this.pending) return;
        this.host.clearTimeout(this.pending.handle);
        this.pending = null;
        this.generation++;
    }

    /**
     * Move the pending tick to a new period without restarting the run.
     * The time already waited counts against the new period:
     * delay = max(0, new - (old - remaining)). The result may be off by up to
     * one tick when the current link was not armed with the old period.
     * @returns the new initial delay, or null when nothing was armed
     */
    reschedule(previousPeriodMs: number, periodMs: number): number | null {
        const remaining = this.remainingMs();
        if (remaining === null) return null;

        const elapsed = previousPeriodMs - remaining;
        const delayMs = Math.max(0, periodMs - elapsed);
        this.armLink(delayMs, periodMs);
        return delayMs;
    }

    /**
     * Cancel for good. Resolves once no tick is executing.
     */
    release(): Promise<void> {
        this.cancel();
        this.released = true;
        this.generation++;
        if (!this.ticking) return Promise.resolve();
        return new Promise((resolve) => this.idleWaiters.push(resolve));
    }

    private armLink(delayMs: number, intervalMs: number): void {
        if (this.released) {
            throw new Error('Scheduler has been released.');
        }
        this.cancel();
        const generation = ++this.generation;
        const handle = this.host.setTimeout(() => this.fire(generation), delayMs);
        this.pending = { handle, armedAt: this.host.now(), delayMs, intervalMs, generation };
    }

    private fire(generation: number): void {
        if (this.released || !this.pending || this.pending.generation !== generation) return;

        this.armLink(this.pending.intervalMs, this.pending.intervalMs);
        this.ticking = true;
        try {
            this.onTick();
        } finally {
            this.ticking = false;
            if (this.released) {
                const waiters = this.idleWaiters.splice(0);
                waiters.forEach((resolve) => resolve());
            }
        }
    }
}
