import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors';
import { clampPeriod, DEFAULT_CONFIG, MAX_PERIOD_MS, type SequencerConfig } from './state';

const CeilingSchema = z
    .union([z.number().int().nonnegative(), z.string().regex(/^\d+$/)])
    .transform((value) => BigInt(value));

/** Shape of sequencer.config.json(c). All fields optional. */
export const ConfigFileSchema = z
    .object({
        periodSeconds: z.number().finite().describe('Seconds between blocks'),
        minPeriodSeconds: z.number().finite().min(0.001).describe('Shortest allowed period'),
        ceiling: CeilingSchema.nullable().describe('Highest term to print; null for no limit'),
        batchSize: z.number().int().min(2).max(10000).describe('Terms printed per block'),
    })
    .partial()
    .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Command-line overrides arrive as strings. */
export const ConfigOverridesSchema = z
    .object({
        period: z.coerce.number().finite(),
        max: z.string().regex(/^\d+$/, 'must be a non-negative integer'),
        batch: z.coerce.number().int().min(2).max(10000),
    })
    .partial();

export interface ConfigOverrides {
    period?: string;
    max?: string;
    batch?: string;
}

export const CONFIG_FILENAMES = ['sequencer.config.jsonc', 'sequencer.config.json'] as const;

/**
 * Merge a config file and command-line overrides over the defaults.
 * The period is clamped between the floor and MAX_PERIOD_MS, never rejected.
 */
export function resolveConfig(file: ConfigFile = {}, overrides: ConfigOverrides = {}): SequencerConfig {
    const parsed = ConfigOverridesSchema.safeParse(overrides);
    if (!parsed.success) {
        throw new ConfigError(`Invalid option: ${formatIssues(parsed.error)}`);
    }
    const cli = parsed.data;

    const minPeriodMs = file.minPeriodSeconds !== undefined
        ? Math.min(MAX_PERIOD_MS, Math.max(1, Math.round(file.minPeriodSeconds * 1000)))
        : DEFAULT_CONFIG.minPeriodMs;
    const periodSeconds = cli.period ?? file.periodSeconds;
    const periodMs = periodSeconds !== undefined
        ? Math.round(periodSeconds * 1000)
        : DEFAULT_CONFIG.periodMs;

    let ceiling = DEFAULT_CONFIG.ceiling;
    if (cli.max !== undefined) {
        ceiling = BigInt(cli.max);
    } else if (file.ceiling !== undefined) {
        ceiling = file.ceiling;
    }

    return {
        periodMs: clampPeriod(periodMs, minPeriodMs),
        minPeriodMs,
        ceiling,
        batchSize: cli.batch ?? file.batchSize ?? DEFAULT_CONFIG.batchSize,
    };
}

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
}

export class ConfigLoader {
    private configPath: string;

    /**
     * @param workDir directory searched for sequencer.config.jsonc, then sequencer.config.json
     * @param explicitPath a path given on the command line; it must exist
     */
    constructor(workDir: string, private readonly explicitPath?: string) {
        if (explicitPath) {
            this.configPath = path.resolve(workDir, explicitPath);
            return;
        }
        const found = CONFIG_FILENAMES
            .map((name) => path.join(workDir, name))
            .find((candidate) => fs.existsSync(candidate));
        this.configPath = found ?? path.join(workDir, CONFIG_FILENAMES[1]);
    }

    get path(): string {
        return this.configPath;
    }

    /** A missing default file means defaults; a missing explicit file is an error. */
    async load(): Promise<ConfigFile> {
        if (!await fs.pathExists(this.configPath)) {
            if (this.explicitPath) {
                throw new ConfigError(`Config file not found: ${this.configPath}`);
            }
            return {};
        }

        // Load and parse (strip comments for jsonc)
        let content = await fs.readFile(this.configPath, 'utf-8');
        content = this.stripJsonComments(content);

        let raw: unknown;
        try {
            raw = JSON.parse(content);
        } catch (e) {
            const reason = e instanceof Error ? e.message : String(e);
            throw new ConfigError(`Invalid config JSON in ${this.configPath}: ${reason}`);
        }

        const parsed = ConfigFileSchema.safeParse(raw);
        if (!parsed.success) {
            throw new ConfigError(`Invalid config in ${this.configPath}: ${formatIssues(parsed.error)}`);
        }
        return parsed.data;
    }

    async resolve(overrides: ConfigOverrides = {}): Promise<SequencerConfig> {
        return resolveConfig(await this.load(), overrides);
    }

    private stripJsonComments(content: string): string {
        return content.replace(/^\s*\/\/.*$/gm, '');
    }
}
