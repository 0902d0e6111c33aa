/**
 * CORE: Command Handlers
 * One handler per verb. A handler parses its argument string and returns the
 * event to apply; it holds no state of its own.
 */

import { z } from 'zod';
import { CommandSyntaxError, IllegalTransitionError, InvalidSeedError } from './errors';
import type { SequencerEvent } from './machine';
import { getAllowedVerbs, type Verb } from './rules';
import type { Phase, SequencerConfig } from './state';

export interface CommandContext {
    phase: Phase;
    /** Configuration the process started with; `reset` goes back to it. */
    startupConfig: SequencerConfig;
}

export type CommandOutcome =
    | { kind: 'event'; event: SequencerEvent }
    | { kind: 'reply'; message: string };

export interface CommandDefinition {
    verb: Verb;
    usage: string;
    description: string;
    handle(args: string[], ctx: CommandContext): CommandOutcome;
}

const SecondsSchema = z.coerce.number().finite();
const CeilingSchema = z.string().regex(/^\d+$/);
const TermSchema = z.string().regex(/^-?\d+$/);

export function splitArgs(argString: string): string[] {
    return argString.trim().split(/\s+/).filter((arg) => arg.length > 0);
}

/** Split a raw input line into its verb and the rest of the line. */
export function parseCommandLine(line: string): { verb: string; argString: string } {
    const trimmed = line.trim();
    const match = trimmed.match(/^(\S+)\s*(.*)$/);
    if (!match) return { verb: '', argString: '' };
    return { verb: match[1].toLowerCase(), argString: match[2] };
}

function expectNoArgs(definition: CommandDefinition, args: string[]): void {
    if (args.length > 0) {
        throw new CommandSyntaxError(`"${definition.verb}" takes no arguments.`, definition.usage);
    }
}

function event(e: SequencerEvent): CommandOutcome {
    return { kind: 'event', event: e };
}

/**
 * Maps verbs to their handlers
 */
export class CommandRegistry {
    private handlers: Map<string, CommandDefinition> = new Map();

    register(definition: CommandDefinition): void {
        this.handlers.set(definition.verb, definition);
    }

    get(verb: string): CommandDefinition | undefined {
        return this.handlers.get(verb.toLowerCase());
    }

    list(): CommandDefinition[] {
        return [...this.handlers.values()];
    }

    resolve(verb: string, argString: string, ctx: CommandContext): CommandOutcome {
        const definition = this.get(verb);
        if (!definition) {
            throw new CommandSyntaxError(`Unknown command: "${verb}".`);
        }
        return definition.handle(splitArgs(argString), ctx);
    }

    formatHelp(phase: Phase): string {
        const width = Math.max(...this.list().map((d) => d.usage.length));
        const lines = this.list().map((d) => `  ${d.usage.padEnd(width)}  ${d.description}`);
        const allowed = getAllowedVerbs(phase);
        lines.push('', `Available now: ${allowed.length > 0 ? allowed.join(', ') : 'none'}`);
        return ['Commands:', ...lines].join('\n');
    }
}

const help: CommandDefinition = {
    verb: 'help',
    usage: 'help',
    description: 'Show this list',
    handle(_args, ctx) {
        if (ctx.phase === 'exited') {
            throw new IllegalTransitionError('Sequencer has exited.');
        }
        return { kind: 'reply', message: registry.formatHelp(ctx.phase) };
    },
};

const max: CommandDefinition = {
    verb: 'max',
    usage: 'max [integer]',
    description: 'Stop after the last term not above this value; no value removes the limit',
    handle(args) {
        if (args.length === 0) return event({ type: 'max', ceiling: null });
        if (args.length > 1) {
            throw new CommandSyntaxError('"max" takes at most one argument.', this.usage);
        }
        const parsed = CeilingSchema.safeParse(args[0]);
        if (!parsed.success) {
            throw new CommandSyntaxError(`Not a non-negative integer: "${args[0]}".`, this.usage);
        }
        return event({ type: 'max', ceiling: BigInt(parsed.data) });
    },
};

const pause: CommandDefinition = {
    verb: 'pause',
    usage: 'pause',
    description: 'Pause the running sequence',
    handle(args) {
        expectNoArgs(this, args);
        return event({ type: 'pause' });
    },
};

const reset: CommandDefinition = {
    verb: 'reset',
    usage: 'reset',
    description: 'Stop and return to terms (0, 1) and the startup settings',
    handle(args, ctx) {
        expectNoArgs(this, args);
        return event({ type: 'reset', config: { ...ctx.startupConfig } });
    },
};

const restart: CommandDefinition = {
    verb: 'restart',
    usage: 'restart',
    description: 'Run again from the last starting terms',
    handle(args) {
        expectNoArgs(this, args);
        return event({ type: 'restart' });
    },
};

const speed: CommandDefinition = {
    verb: 'speed',
    usage: 'speed [seconds]',
    description: 'Seconds between blocks; no value means as fast as allowed',
    handle(args) {
        if (args.length === 0) return event({ type: 'speed', periodMs: null });
        if (args.length > 1) {
            throw new CommandSyntaxError('"speed" takes at most one argument.', this.usage);
        }
        const parsed = SecondsSchema.safeParse(args[0]);
        if (!parsed.success) {
            throw new CommandSyntaxError(`Not a number: "${args[0]}".`, this.usage);
        }
        return event({ type: 'speed', periodMs: Math.round(parsed.data * 1000) });
    },
};

const start: CommandDefinition = {
    verb: 'start',
    usage: 'start [term1 term2]',
    description: 'Start, resume, or restart from two given terms',
    handle(args) {
        if (args.length === 0) return event({ type: 'start', seed: null });
        if (args.length !== 2) {
            throw new CommandSyntaxError('"start" takes either no arguments or two terms.', this.usage);
        }
        const [first, second] = args.map((arg) => TermSchema.safeParse(arg));
        if (!first.success || !second.success) {
            throw new CommandSyntaxError(`Terms must be integers: "${args.join(' ')}".`, this.usage);
        }
        const a = BigInt(first.data);
        const b = BigInt(second.data);
        if (a < 0n || b < a) {
            throw new InvalidSeedError(a, b);
        }
        return event({ type: 'start', seed: { a, b } });
    },
};

const stop: CommandDefinition = {
    verb: 'stop',
    usage: 'stop',
    description: 'Stop and rewind to the starting terms',
    handle(args) {
        expectNoArgs(this, args);
        return event({ type: 'stop' });
    },
};

const exit: CommandDefinition = {
    verb: 'exit',
    usage: 'exit',
    description: 'Stop everything and quit',
    handle(args) {
        expectNoArgs(this, args);
        return event({ type: 'exit' });
    },
};

export const registry = new CommandRegistry();
for (const definition of [help, max, pause, reset, restart, speed, start, stop, exit]) {
    registry.register(definition);
}
