export interface SequencerLogger {
    info(msg: string, ...args: unknown[]): void;
    error(msg: string, ...args: unknown[]): void;
    success(msg: string, ...args: unknown[]): void;
    warn(msg: string, ...args: unknown[]): void;
}

export class ConsoleLogger implements SequencerLogger {
    info(msg: string, ...args: unknown[]): void {
        console.log(msg, ...args);
    }

    error(msg: string, ...args: unknown[]): void {
        console.error(msg, ...args);
    }

    success(msg: string, ...args: unknown[]): void {
        console.log(msg, ...args);
    }

    warn(msg: string, ...args: unknown[]): void {
        console.warn(msg, ...args);
    }
}

export type LogLevel = 'info' | 'error' | 'success' | 'warn';

/** Keeps every line in memory. Used by tests and by callers that render logs themselves. */
export class MemoryLogger implements SequencerLogger {
    readonly lines: { level: LogLevel; message: string }[] = [];

    info(msg: string): void {
        this.lines.push({ level: 'info', message: msg });
    }

    error(msg: string): void {
        this.lines.push({ level: 'error', message: msg });
    }

    success(msg: string): void {
        this.lines.push({ level: 'success', message: msg });
    }

    warn(msg: string): void {
        this.lines.push({ level: 'warn', message: msg });
    }

    messages(level?: LogLevel): string[] {
        return this.lines
            .filter((line) => !level || line.level === level)
            .map((line) => line.message);
    }
}
