import { existsSync } from 'fs';
import { resolve } from 'path';
import { pathToFileURL } from 'url';
import { CliError } from '../cliError.js';
import { logger } from '../logger.js';
import type { RequestHandler } from '../frontend/server/frontEnd.js';
import type { HandlerResult } from '../frontend/router/response.js';
import type { RequestContext } from '../frontend/router/requestContext.js';

export type ModuleImporter = (specifier: string) => Promise<unknown>;

const importModule: ModuleImporter = (specifier) => import(specifier);

/**
 * Loads the application handler from the given entrypoint.
 * The module exports the handler as `handler` or `default`.
 * @example
 * // app.mjs
 * export default (ctx) => ({ hello: ctx.clientAddress });
 */
export async function loadHandler(entrypoint: string, cwd: string = process.cwd(), importer: ModuleImporter = importModule): Promise<RequestHandler> {
    const entrypointPath = resolve(cwd, entrypoint);
    if (!existsSync(entrypointPath)) {
        throw new CliError(`The entrypoint '${entrypointPath}' does not exist.`, {
            instructions: [`Pass the path to the built application module, e.g. edgefront run ./dist/server.js`],
        });
    }

    logger.debug(`Loading the handler from '${entrypointPath}'`);
    let loadedModule: unknown;
    try {
        loadedModule = await importer(pathToFileURL(entrypointPath).href);
    } catch (error) {
        throw new CliError(`Failed to load the entrypoint '${entrypointPath}': ${error instanceof Error ? error.message : String(error)}`, {
            cause: error,
        });
    }

    const handler = findHandler(loadedModule);
    if (!handler) {
        throw new CliError(`The entrypoint '${entrypointPath}' does not export a handler function.`, {
            instructions: [`Export the handler as default or as named 'handler' export, e.g. export default (ctx) => 'Hello'`],
        });
    }
    return handler;
}

/**
 * Picks the handler function from the loaded module namespace.
 * CommonJS modules imported from ESM have their module.exports under `default`.
 */
export function findHandler(loadedModule: unknown): RequestHandler | undefined {
    const candidates = [property(loadedModule, 'handler'), property(loadedModule, 'default'), property(property(loadedModule, 'default'), 'handler')];
    const fn = candidates.find((candidate) => typeof candidate === 'function');
    if (typeof fn !== 'function') return undefined;
    return async (ctx: RequestContext): Promise<HandlerResult> => fn(ctx);
}

function property(value: unknown, key: string): unknown {
    if ((typeof value !== 'object' && typeof value !== 'function') || value === null) return undefined;
    return key in value ? Reflect.get(value, key) : undefined;
}
