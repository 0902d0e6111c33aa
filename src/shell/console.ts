/**
 * SHELL: Console
 * Line-oriented front end. Reads one command per line, prints status through
 * the logger and blocks to the output stream.
 */

import readline from 'readline';
import { parseCommandLine } from '../core/commands';
import type { SequencerLogger } from '../core/logger';
import { getPrompt } from '../core/rules';
import type { BlockEvent, PhaseChange, Sequencer, StatusMessage } from './sequencer';

export interface ConsoleOptions {
    input: NodeJS.ReadableStream;
    output: NodeJS.WritableStream;
    logger: SequencerLogger;
}

export function formatBlock(block: BlockEvent): string {
    const line = block.terms.join(', ');
    return block.truncated ? `${line} (max reached)` : line;
}

export function reportStatus(logger: SequencerLogger, status: StatusMessage): void {
    if (status.ok) {
        if (status.message) logger.info(status.message);
        return;
    }
    logger.error(`[${status.kind}] ${status.message}`);
    if (status.hint) {
        logger.info(`Hint: ${status.hint}`);
    }
}

export class SequenceConsole {
    constructor(
        private readonly sequencer: Sequencer,
        private readonly options: ConsoleOptions
    ) {}

    /** Submit one raw line. Blank lines are ignored. */
    handleLine(line: string): StatusMessage | null {
        const { verb, argString } = parseCommandLine(line);
        if (!verb) return null;

        const status = this.sequencer.submit(verb, argString);
        reportStatus(this.options.logger, status);
        return status;
    }

    /** Resolves when input ends or `exit` is entered, after the sequencer is closed. */
    run(): Promise<void> {
        const { input, output } = this.options;
        const rl = readline.createInterface({ input, output, prompt: getPrompt(this.sequencer.phase) });

        const onBlock = (block: BlockEvent): void => {
            output.write(`${formatBlock(block)}\n`);
        };
        const onPhase = (change: PhaseChange): void => {
            rl.setPrompt(getPrompt(change.to));
        };
        this.sequencer.onBlock(onBlock);
        this.sequencer.onPhase(onPhase);

        rl.on('line', (line) => {
            this.handleLine(line);
            if (this.sequencer.phase === 'exited') {
                rl.close();
            } else {
                rl.prompt();
            }
        });
        rl.on('SIGINT', () => rl.close());

        return new Promise((resolve, reject) => {
            rl.on('close', () => {
                this.sequencer.offBlock(onBlock);
                this.sequencer.offPhase(onPhase);
                this.sequencer.close().then(resolve, reject);
            });
            rl.prompt();
        });
    }
}
