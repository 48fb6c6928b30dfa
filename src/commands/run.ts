import { InvalidArgumentError } from 'commander';
import { ConfigOptions, parseList } from '../config.js';
import { run } from '../lifecycle/lifecycle.js';
import { logger } from '../logger.js';

export interface RunCommandOptions {
    host?: string;
    port?: number;
    proxyHeaders?: boolean;
    forwardedAllowIps?: string;
    timeout?: number;
    gracePeriod?: number;
    corsOrigins?: string;
}

export async function runCommand(entrypoint: string | undefined, options: RunCommandOptions) {
    // Route the console.* calls of the application through our logger
    logger.overrideConsole();
    const exitCode = await run({ entrypoint, overrides: toConfigOverrides(options) });
    process.exit(exitCode);
}

/**
 * Maps the CLI flags to the config options.
 * Flags that were not passed stay undefined, so the environment variables apply.
 */
export function toConfigOverrides(options: RunCommandOptions): ConfigOptions {
    return {
        host: options.host,
        port: options.port,
        requestTimeout: options.timeout,
        shutdownGracePeriod: options.gracePeriod,
        corsOrigins: parseList(options.corsOrigins),
        trust: {
            enabled: options.proxyHeaders,
            trustedProxies: parseList(options.forwardedAllowIps),
        },
    };
}

/**
 * Commander parser for the numeric flags.
 * e.g.: --port 8080 => 8080, --port abc => error: option '-p, --port <port>' argument 'abc' is invalid.
 */
export function parseIntegerOption(value: string): number {
    if (!/^\d+$/.test(value.trim())) {
        throw new InvalidArgumentError('Expected a non-negative integer.');
    }
    return Number(value.trim());
}
