#!/usr/bin/env node
import { Command } from 'commander';
import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { logError } from './core/errors';
import { ConsoleLogger } from './core/logger';
import { main, type MainOptions } from './main';

// From dist/cli.js or src/cli.ts, package.json is one level up
const pkg = z
    .object({ version: z.string() })
    .parse(fs.readJsonSync(path.join(__dirname, '..', 'package.json')));

const logger = new ConsoleLogger();
const program = new Command();

program
    .name('seqcon')
    .description('Print a Fibonacci-style sequence in the background while taking commands')
    .version(pkg.version)
    .option('-p, --period <seconds>', 'seconds between blocks')
    .option('-m, --max <integer>', 'stop after the last term not above this value')
    .option('-b, --batch <size>', 'terms printed per block')
    .option('-c, --config <path>', 'config file (default: sequencer.config.jsonc or sequencer.config.json)')
    .action(async (options: MainOptions) => {
        process.exitCode = await main(options, {
            workDir: process.cwd(),
            input: process.stdin,
            output: process.stdout,
            logger,
        });
    });

program.parseAsync(process.argv).catch((error: unknown) => {
    logError(logger, error instanceof Error ? error : new Error(String(error)));
    process.exitCode = 1;
});
