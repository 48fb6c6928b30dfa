import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { logger } from '../logger.js';
import type { Environment } from '../config.js';

/**
 * Returns the default list of .env files in the order they are loaded.
 * e.g.: NODE_ENV=production => ['.env', '.env.production', '.env.local']
 */
export function getDefaultEnvFiles(cwd: string = process.cwd(), nodeEnv: string = process.env.NODE_ENV || 'development'): string[] {
    return [resolve(cwd, '.env'), resolve(cwd, `.env.${nodeEnv}`), resolve(cwd, '.env.local')];
}

/**
 * Loads environment variables from .env file(s) into the target environment.
 * Variables that are already set are never overwritten,
 * so the values from the container runtime always win.
 * @returns Object containing the variables that were applied
 */
export async function loadEnvVariables(
    paths: string | string[] = getDefaultEnvFiles(),
    target: Environment = process.env,
    throwOnError: boolean = false,
): Promise<Record<string, string>> {
    const fileVars: Record<string, string> = {};
    const normalizedPaths = Array.isArray(paths) ? paths : [paths];

    for (const path of normalizedPaths) {
        if (!existsSync(path)) {
            if (throwOnError) throw new Error(`The ENV variables file at '${path}' does not exist`);
            continue;
        }

        logger.debug(`Loading ENV variables from '${path}' file`);
        try {
            const content = await readFile(path, 'utf-8');
            // Later files override the earlier ones
            Object.assign(fileVars, parseEnvVariables(content));
        } catch (error) {
            const errorMsg = `Failed to parse ENV variables from '${path}' file: ${error}`;
            if (throwOnError) throw new Error(errorMsg);
            logger.warn(errorMsg);
        }
    }

    const appliedVars: Record<string, string> = {};
    for (const [key, value] of Object.entries(fileVars)) {
        if (target[key] !== undefined) continue;
        target[key] = value;
        appliedVars[key] = value;
    }
    return appliedVars;
}

/**
 * Parses a .env file content and returns key-value pairs
 * @example
 * parseEnvVariables('PORT=3000\n# comment\nexport CORS_ORIGINS="https://a.com"')
 * => { PORT: '3000', CORS_ORIGINS: 'https://a.com' }
 */
export function parseEnvVariables(content: string): Record<string, string> {
    const envVars: Record<string, string> = {};
    const lines = content.split(/\r?\n/);

    for (const line of lines) {
        // Skip empty lines and comments
        const trimmedLine = line.trim();
        if (!trimmedLine || trimmedLine.startsWith('#')) {
            continue;
        }

        const equalIndex = trimmedLine.indexOf('=');
        if (equalIndex === -1) {
            continue;
        }

        const key = trimmedLine
            .substring(0, equalIndex)
            .replace(/^export\s+/, '')
            .trim();
        let value = trimmedLine.substring(equalIndex + 1).trim();

        if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
            // Remove surrounding quotes
            value = value.slice(1, -1);
        } else {
            // Strip inline comments from unquoted values
            value = value.replace(/\s+#.*$/, '');
        }

        if (key) {
            envVars[key] = value;
        }
    }

    return envVars;
}
