import { ConfigError } from './cliError.js';
import {
    ANY_PROXY,
    BRAND,
    DEFAULT_KEEP_ALIVE_TIMEOUT,
    DEFAULT_MAX_BODY_SIZE,
    DEFAULT_REQUEST_TIMEOUT,
    DEFAULT_SHUTDOWN_GRACE_PERIOD,
    ENV_VARS,
    HOST,
    PORT,
} from './constants.js';
import { createTrustConfig, isValidHeaderName, parseProxyEntry, TrustConfig, TrustConfigOptions } from './frontend/trust/trustConfig.js';

export interface ConfigOptions {
    /**
     * The interface to listen on.
     * @default 0.0.0.0
     */
    host?: string;

    /**
     * The port to listen on. Use 0 to let the OS pick a free one.
     * @default 3000
     */
    port?: number;

    /**
     * Which forwarding headers are trusted and from whom.
     */
    trust?: TrustConfigOptions;

    /**
     * Max time in milliseconds a single request can take
     * before the connection is closed.
     * @default 30000
     */
    requestTimeout?: number;

    /**
     * Max time in milliseconds the in-flight requests have
     * to finish after the termination signal.
     * @default 10000
     */
    shutdownGracePeriod?: number;

    /**
     * How long in milliseconds an idle keep-alive connection stays open.
     * @default 5000
     */
    keepAliveTimeout?: number;

    /**
     * Max size of the request body in bytes.
     * @default 10 MiB
     */
    maxBodySize?: number;

    /**
     * Origins allowed to make cross-origin requests.
     * Empty list disables the CORS handling, '*' allows any origin.
     * @default []
     */
    corsOrigins?: string[];
}

export type Environment = Record<string, string | undefined>;

/**
 * Immutable process-wide configuration of the front end.
 * Construct it once at startup and pass it to every component.
 */
export class Config {
    readonly host: string;
    readonly port: number;
    readonly trust: TrustConfig;
    readonly requestTimeout: number;
    readonly shutdownGracePeriod: number;
    readonly keepAliveTimeout: number;
    readonly maxBodySize: number;
    readonly corsOrigins: readonly string[];

    constructor(options: ConfigOptions = {}) {
        this.host = options.host ?? HOST;
        this.port = options.port ?? PORT;
        this.trust = createTrustConfig(options.trust);
        this.requestTimeout = options.requestTimeout ?? DEFAULT_REQUEST_TIMEOUT;
        this.shutdownGracePeriod = options.shutdownGracePeriod ?? DEFAULT_SHUTDOWN_GRACE_PERIOD;
        this.keepAliveTimeout = options.keepAliveTimeout ?? DEFAULT_KEEP_ALIVE_TIMEOUT;
        this.maxBodySize = options.maxBodySize ?? DEFAULT_MAX_BODY_SIZE;
        this.corsOrigins = Object.freeze([...(options.corsOrigins ?? [])]);
        Object.freeze(this);
    }

    /**
     * Throws ConfigError when any of the values is out of range.
     */
    validate(): this {
        if (!this.host.trim()) {
            throw new ConfigError(`Invalid host '${this.host}' in ${BRAND} config. The host cannot be empty.`);
        }
        if (!Number.isInteger(this.port) || this.port < 0 || this.port > 65535) {
            throw new ConfigError(`Invalid port '${this.port}' in ${BRAND} config. Port must be an integer between 0 and 65535.`, {
                instructions: [`Set the ${ENV_VARS.Port} environment variable or the --port option to a valid port, e.g. 3000.`],
            });
        }

        const durations = {
            requestTimeout: this.requestTimeout,
            shutdownGracePeriod: this.shutdownGracePeriod,
            keepAliveTimeout: this.keepAliveTimeout,
        };
        for (const [name, value] of Object.entries(durations)) {
            // setTimeout() fires immediately for delays over 2^31-1 ms
            if (!Number.isInteger(value) || value <= 0 || value > 2_147_483_647) {
                throw new ConfigError(`Invalid ${name} '${value}' in ${BRAND} config. It must be a positive number of milliseconds.`);
            }
        }
        if (!Number.isInteger(this.maxBodySize) || this.maxBodySize <= 0) {
            throw new ConfigError(`Invalid maxBodySize '${this.maxBodySize}' in ${BRAND} config. It must be a positive number of bytes.`);
        }

        const { forwardedForHeader, forwardedProtoHeader, forwardedHostHeader, trustedProxies } = this.trust;
        for (const headerName of [forwardedForHeader, forwardedProtoHeader, forwardedHostHeader]) {
            if (!isValidHeaderName(headerName)) {
                throw new ConfigError(`Invalid trust header name '${headerName}' in ${BRAND} config.`, {
                    instructions: ['Header names can contain only letters, digits and the characters !#$%&\'*+-.^_`|~'],
                });
            }
        }
        for (const entry of trustedProxies) {
            if (entry !== ANY_PROXY && !parseProxyEntry(entry)) {
                throw new ConfigError(`Invalid trusted proxy '${entry}' in ${BRAND} config.`, {
                    instructions: [`Use an IP address (10.0.0.1), a CIDR range (10.0.0.0/8) or '${ANY_PROXY}' to trust any proxy.`],
                });
            }
        }

        for (const origin of this.corsOrigins) {
            if (origin !== '*' && !isOrigin(origin)) {
                throw new ConfigError(`Invalid CORS origin '${origin}' in ${BRAND} config.`, {
                    instructions: [`Use the scheme, host and optional port only, e.g. https://app.example.com or '*'.`],
                });
            }
        }

        return this;
    }

    serialize(): string {
        return JSON.stringify(this, null, 2);
    }

    /**
     * Builds the config from the environment variables.
     * Explicit options (e.g. from the CLI flags) take precedence over the environment.
     */
    static fromEnv(env: Environment = process.env, overrides: ConfigOptions = {}): Config {
        const trust = overrides.trust ?? {};

        return new Config({
            host: overrides.host ?? (env[ENV_VARS.Host] || undefined),
            port: overrides.port ?? parseInteger(env[ENV_VARS.Port], ENV_VARS.Port),
            requestTimeout: overrides.requestTimeout ?? parseInteger(env[ENV_VARS.RequestTimeout], ENV_VARS.RequestTimeout),
            shutdownGracePeriod: overrides.shutdownGracePeriod ?? parseInteger(env[ENV_VARS.ShutdownGracePeriod], ENV_VARS.ShutdownGracePeriod),
            keepAliveTimeout: overrides.keepAliveTimeout ?? parseInteger(env[ENV_VARS.KeepAliveTimeout], ENV_VARS.KeepAliveTimeout),
            maxBodySize: overrides.maxBodySize ?? parseInteger(env[ENV_VARS.MaxBodySize], ENV_VARS.MaxBodySize),
            corsOrigins: overrides.corsOrigins ?? parseList(env[ENV_VARS.CorsOrigins]),
            trust: {
                enabled: trust.enabled ?? parseBoolean(env[ENV_VARS.ProxyHeaders], ENV_VARS.ProxyHeaders),
                forwardedForHeader: trust.forwardedForHeader ?? (env[ENV_VARS.ForwardedForHeader] || undefined),
                forwardedProtoHeader: trust.forwardedProtoHeader ?? (env[ENV_VARS.ForwardedProtoHeader] || undefined),
                forwardedHostHeader: trust.forwardedHostHeader ?? (env[ENV_VARS.ForwardedHostHeader] || undefined),
                trustedProxies: trust.trustedProxies ?? parseList(env[ENV_VARS.ForwardedAllowIps]),
            },
        }).validate();
    }
}

function parseInteger(value: string | undefined, name: string): number | undefined {
    if (value === undefined || value.trim() === '') return undefined;
    if (!/^\d+$/.test(value.trim())) {
        throw new ConfigError(`Invalid value '${value}' of the ${name} environment variable. Expected a non-negative integer.`);
    }
    return Number(value.trim());
}

function parseBoolean(value: string | undefined, name: string): boolean | undefined {
    if (value === undefined || value.trim() === '') return undefined;
    const normalized = value.trim().toLowerCase();
    if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
    if (['false', '0', 'no', 'off'].includes(normalized)) return false;
    throw new ConfigError(`Invalid value '${value}' of the ${name} environment variable. Expected true or false.`);
}

/**
 * Splits comma separated list and drops empty entries.
 * e.g.: 'https://a.com, https://b.com,' => ['https://a.com', 'https://b.com']
 */
export function parseList(value: string | undefined): string[] | undefined {
    if (value === undefined || value.trim() === '') return undefined;
    return value
        .split(',')
        .map((item) => item.trim())
        .filter(Boolean);
}

function isOrigin(value: string): boolean {
    try {
        return new URL(value).origin === value;
    } catch {
        return false;
    }
}
