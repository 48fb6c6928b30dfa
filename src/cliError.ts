export type CliErrorOptions = {
    instructions?: string[];
    cause?: unknown;
};

/**
 * Error caused by the user's setup rather than by a bug.
 * It is displayed without the stack trace together with the instructions.
 */
export class CliError extends Error {
    /**
     * Provides guidance on how to proceed after encountering the error.
     */
    instructions: string[] = [];

    constructor(message: string, options: CliErrorOptions = {}) {
        super(message, { cause: options.cause });
        this.name = new.target.name;
        this.instructions = options.instructions || [];
    }

    /**
     * Determines whether there are any suggested next steps available.
     */
    hasInstructions(): boolean {
        return this.instructions.length > 0;
    }
}

/**
 * Invalid port, timeout, header name or other configuration value.
 * Always raised before the server binds its socket.
 */
export class ConfigError extends CliError {}

/**
 * The listening socket could not be bound.
 */
export class BindError extends CliError {
    /** System error code such as EADDRINUSE or EACCES */
    code?: string;

    constructor(message: string, options: CliErrorOptions & { code?: string } = {}) {
        super(message, options);
        this.code = options.code;
    }
}
