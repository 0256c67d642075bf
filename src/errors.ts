/**
 * Custom error types for skyfetch
 */

/**
 * Base error class for skyfetch errors
 */
export class SkyfetchError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SkyfetchError';
        // Maintains proper stack trace for where our error was thrown (only available on V8)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }
}

/**
 * Error thrown when configuration is invalid or incomplete
 */
export class ConfigError extends SkyfetchError {
    public readonly configKey?: string;

    constructor(message: string, configKey?: string) {
        super(message);
        this.name = 'ConfigError';
        this.configKey = configKey;
    }
}

/**
 * Error thrown when a query cannot be processed at all
 */
export class QueryError extends SkyfetchError {
    public readonly query: string;

    constructor(message: string, query: string) {
        super(message);
        this.name = 'QueryError';
        this.query = query;
    }
}

export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}
