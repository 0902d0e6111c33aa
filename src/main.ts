/**
 * Single entry: main(options, ctx).
 * Loads configuration, builds the sequencer and runs the console until exit.
 */

import { ConfigLoader, type ConfigOverrides } from './core/config';
import { logError } from './core/errors';
import { ConsoleLogger, type SequencerLogger } from './core/logger';
import { SequenceConsole } from './shell/console';
import { Sequencer } from './shell/sequencer';
import type { TimerHost } from './shell/timer-host';

export interface MainOptions extends ConfigOverrides {
  config?: string;
}

export interface MainContext {
  workDir: string;
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  logger?: SequencerLogger;
  host?: TimerHost;
}

export async function main(options: MainOptions, ctx: MainContext): Promise<number> {
  const logger = ctx.logger ?? new ConsoleLogger();

  let sequencer: Sequencer;
  try {
    const loader = new ConfigLoader(ctx.workDir, options.config);
    const config = await loader.resolve({
      period: options.period,
      max: options.max,
      batch: options.batch,
    });
    sequencer = new Sequencer({ config, host: ctx.host, logger });
  } catch (error) {
    if (error instanceof Error) {
      logError(logger, error);
      return 1;
    }
    throw error;
  }

  logger.info('Type "help" for a list of commands.');
  await new SequenceConsole(sequencer, { input: ctx.input, output: ctx.output, logger }).run();
  return 0;
}
