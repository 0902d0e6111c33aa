/**
 * SHELL: Timer Host
 * The only environment dependency of the core: a monotonic clock and one-shot timers.
 */

export type TimerHandle = unknown;

export interface TimerHost {
    /** Monotonic milliseconds. */
    now(): number;
    setTimeout(callback: () => void, delayMs: number): TimerHandle;
    clearTimeout(handle: TimerHandle): void;
}

function isNodeTimeout(handle: TimerHandle): handle is NodeJS.Timeout {
    return typeof handle === 'object' && handle !== null && 'hasRef' in handle;
}

export const systemTimerHost: TimerHost = {
    now: () => performance.now(),
    setTimeout: (callback, delayMs) => setTimeout(callback, delayMs),
    clearTimeout: (handle) => {
        if (isNodeTimeout(handle)) clearTimeout(handle);
    },
};

interface PendingTimer {
    id: number;
    dueAt: number;
    callback: () => void;
}

/**
 * Virtual clock. Time only moves through advance(); due timers fire in order
 * of due time, then of creation.
 */
export class ManualTimerHost implements TimerHost {
    private current = 0;
    private nextId = 1;
    private timers: PendingTimer[] = [];

    now(): number {
        return this.current;
    }

    setTimeout(callback: () => void, delayMs: number): TimerHandle {
        const id = this.nextId++;
        this.timers.push({ id, dueAt: this.current + Math.max(0, delayMs), callback });
        return id;
    }

    clearTimeout(handle: TimerHandle): void {
        this.timers = this.timers.filter((timer) => timer.id !== handle);
    }

    get pendingCount(): number {
        return this.timers.length;
    }

    /** Due time of the earliest pending timer, or null. */
    nextDueAt(): number | null {
        if (this.timers.length === 0) return null;
        return Math.min(...this.timers.map((timer) => timer.dueAt));
    }

    advance(ms: number): void {
        const target = this.current + ms;
        for (;;) {
            const due = this.timers
                .filter((timer) => timer.dueAt <= target)
                .sort((x, y) => x.dueAt - y.dueAt || x.id - y.id)[0];
            if (!due) break;
            this.timers = this.timers.filter((timer) => timer.id !== due.id);
            this.current = due.dueAt;
            due.callback();
        }
        this.current = target;
    }
}
