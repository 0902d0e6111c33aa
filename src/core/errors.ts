import type { SequencerLogger } from './logger';

export type ErrorKind =
    | 'InvalidSeed'
    | 'InvalidLength'
    | 'SyntaxError'
    | 'IllegalTransition'
    | 'ConfigError';

/**
 * Base error class for the sequencer with recovery hints
 */
export class SequencerError extends Error {
    constructor(
        message: string,
        public readonly kind: ErrorKind,
        public recoveryHint?: string
    ) {
        super(message);
        this.name = 'SequencerError';
    }
}

/**
 * Negative or out-of-order seed terms
 */
export class InvalidSeedError extends SequencerError {
    constructor(a: bigint, b: bigint) {
        super(
            `Terms must be non-negative and the second must not be less than the first: term1=${a} term2=${b}`,
            'InvalidSeed',
            'Try: start 0 1'
        );
        this.name = 'InvalidSeedError';
    }
}

/**
 * Non-positive term count or index
 */
export class InvalidLengthError extends SequencerError {
    constructor(message: string) {
        super(message, 'InvalidLength');
        this.name = 'InvalidLengthError';
    }
}

/**
 * Wrong argument count, non-numeric argument or unknown verb
 */
export class CommandSyntaxError extends SequencerError {
    constructor(message: string, usage?: string) {
        super(message, 'SyntaxError', usage ? `Usage: ${usage}` : 'Type "help" for a list of commands.');
        this.name = 'CommandSyntaxError';
    }
}

/**
 * Command not valid in the current phase
 */
export class IllegalTransitionError extends SequencerError {
    constructor(message: string) {
        super(message, 'IllegalTransition');
        this.name = 'IllegalTransitionError';
    }
}

/**
 * Unreadable or invalid startup configuration
 */
export class ConfigError extends SequencerError {
    constructor(message: string) {
        super(message, 'ConfigError', 'Fix sequencer.config.json or remove it to use defaults.');
        this.name = 'ConfigError';
    }
}

/**
 * Log error with recovery hint
 */
export function logError(logger: SequencerLogger, error: Error): void {
    logger.error(`[ERROR] ${error.message}`);
    if (error instanceof SequencerError && error.recoveryHint) {
        logger.info(`Hint: ${error.recoveryHint}`);
    }
}
