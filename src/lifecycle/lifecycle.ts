import chalk from 'chalk';
import { AddressInfo } from 'net';
import { Config, ConfigOptions, Environment } from '../config.js';
import { BRAND, EXIT_CODES, HEALTH_PATH } from '../constants.js';
import { echoHandler } from '../frontend/handlers/echoHandler.js';
import { FrontEnd, RequestHandler } from '../frontend/server/frontEnd.js';
import { LOG_FORMATS, logger, LogLevel } from '../logger.js';
import { getDefaultEnvFiles, loadEnvVariables } from '../utils/envUtils.js';
import { printError } from '../utils/errorUtils.js';
import { loadHandler, ModuleImporter } from '../utils/moduleUtils.js';

export const TERMINATION_SIGNALS: readonly NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

export interface LifecycleOptions {
    config: Config;
    handler: RequestHandler;
    /**
     * Source of the termination signals.
     * @default process
     */
    signals?: NodeJS.EventEmitter;
    terminationSignals?: readonly NodeJS.Signals[];
}

/**
 * Owns the front end for the whole life of the process.
 * The first termination signal starts the graceful shutdown,
 * the second one closes all the connections right away.
 */
export class Lifecycle {
    readonly config: Config;
    readonly frontEnd: FrontEnd;

    protected signals: NodeJS.EventEmitter;
    protected terminationSignals: readonly NodeJS.Signals[];
    protected shutdownPromise?: Promise<number>;
    protected exitCode: Promise<number>;
    protected resolveExitCode: (code: number) => void = () => undefined;
    protected signalListener = (signal: NodeJS.Signals) => this.onSignal(signal);

    constructor(options: LifecycleOptions) {
        this.config = options.config;
        this.frontEnd = new FrontEnd(options.handler, options.config);
        this.signals = options.signals ?? process;
        this.terminationSignals = options.terminationSignals ?? TERMINATION_SIGNALS;
        this.exitCode = new Promise((resolve) => {
            this.resolveExitCode = resolve;
        });
    }

    /**
     * Binds the front end and starts listening for the termination signals.
     */
    async start(): Promise<AddressInfo> {
        const address = await this.frontEnd.listen();
        for (const signal of this.terminationSignals) {
            this.signals.on(signal, this.signalListener);
        }
        this.logStartup(address);
        return address;
    }

    /**
     * Resolves the exit code once the shutdown is finished.
     */
    waitForShutdown(): Promise<number> {
        return this.exitCode;
    }

    /**
     * Stops accepting new connections and gives the in-flight requests
     * the grace period to finish. Calling it again returns the same promise.
     */
    shutdown(reason: string = 'shutdown'): Promise<number> {
        this.shutdownPromise ??= this.drain(reason);
        return this.shutdownPromise;
    }

    protected onSignal(signal: NodeJS.Signals): void {
        if (this.shutdownPromise) {
            logger.warn(`Received ${signal} again, closing ${this.frontEnd.activeRequests} connection(s) immediately`);
            this.frontEnd.forceClose();
            return;
        }
        this.shutdown(signal).catch((e: unknown) => {
            printError(e);
            this.resolveExitCode(EXIT_CODES.Failure);
        });
    }

    protected async drain(reason: string): Promise<number> {
        logger.info(`Received ${reason}, shutting down ${BRAND} within ${this.config.shutdownGracePeriod}ms`);
        const drained = await this.frontEnd.close(this.config.shutdownGracePeriod);
        for (const signal of this.terminationSignals) {
            this.signals.off(signal, this.signalListener);
        }

        if (drained) {
            logger.success(`${BRAND} stopped`);
        } else {
            logger.warn(`${BRAND} stopped after the grace period, unfinished requests were closed`);
        }
        this.resolveExitCode(EXIT_CODES.Success);
        return EXIT_CODES.Success;
    }

    protected logStartup(address: AddressInfo): void {
        const { trust } = this.config;
        const trustInfo = trust.enabled ? `${trust.forwardedForHeader}, ${trust.forwardedProtoHeader} from ${trust.trustedProxies.join(', ')}` : 'disabled';

        if (logger.format === LOG_FORMATS.json) {
            logger.success(`${BRAND} is ready`, { host: address.address, port: address.port, proxyHeaders: trust.enabled });
            return;
        }

        logger.success(`${BRAND} is ready`);
        logger.drawTable(
            [
                `Listening: ${chalk.cyan(`http://${address.address}:${address.port}`)}`,
                `Proxy headers: ${chalk.cyan(trustInfo)}`,
                `Health check: ${chalk.cyan(HEALTH_PATH)}`,
                ``,
                chalk.gray(`Add ${chalk.cyan(`--debug`)} flag to see all logs.`),
                chalk.gray(`Press ${chalk.cyan('CTRL+C')} to stop the server.`),
            ],
            {
                logLevel: LogLevel.SUCCESS,
            },
        );
        logger.info('');
    }
}

export interface RunOptions {
    /**
     * Path to the module that exports the handler.
     * The echo handler is used when neither this nor the handler is given.
     */
    entrypoint?: string;
    handler?: RequestHandler;
    /**
     * Loads the entrypoint module. Defaults to the native import().
     */
    importer?: ModuleImporter;
    env?: Environment;
    /**
     * Values from the CLI flags. They win over the environment.
     */
    overrides?: ConfigOptions;
    signals?: NodeJS.EventEmitter;
    /**
     * Load the .env files from the working directory first.
     * @default true
     */
    loadEnv?: boolean;
    onReady?: (address: AddressInfo) => void;
}

/**
 * Runs the front end until the termination signal and resolves the process exit code.
 * Any failure before the server is ready is printed and resolves 1.
 */
export async function run(options: RunOptions = {}): Promise<number> {
    const env = options.env ?? process.env;
    try {
        if (options.loadEnv ?? true) {
            await loadEnvVariables(getDefaultEnvFiles(), env);
        }
        const config = Config.fromEnv(env, options.overrides);
        logger.debug(`Resolved config: ${config.serialize()}`);

        const handler = options.handler ?? (options.entrypoint ? await loadHandler(options.entrypoint, process.cwd(), options.importer) : echoHandler);
        const lifecycle = new Lifecycle({ config, handler, signals: options.signals });
        const address = await lifecycle.start();
        options.onReady?.(address);

        return await lifecycle.waitForShutdown();
    } catch (e) {
        printError(e);
        return EXIT_CODES.Failure;
    }
}
