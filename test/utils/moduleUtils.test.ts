import { jest } from '@jest/globals';
import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { CliError } from '../../src/cliError.js';
import { createTrustConfig } from '../../src/frontend/trust/trustConfig.js';
import { resolve } from '../../src/frontend/trust/trustResolver.js';
import { findHandler, loadHandler, ModuleImporter } from '../../src/utils/moduleUtils.js';

describe('moduleUtils', () => {
    const ctx = resolve({ remoteAddress: '127.0.0.1', encrypted: false }, {}, createTrustConfig(), { url: '/hello' });
    const handler = (context: { path: string }) => `path: ${context.path}`;

    describe('findHandler', () => {
        it('should pick the named handler export', async () => {
            const found = findHandler({ handler });
            await expect(found?.(ctx)).resolves.toBe('path: /hello');
        });

        it('should pick the default export', async () => {
            const found = findHandler({ default: handler });
            await expect(found?.(ctx)).resolves.toBe('path: /hello');
        });

        it('should pick the handler of CommonJS module imported as default', async () => {
            const found = findHandler({ default: { handler } });
            await expect(found?.(ctx)).resolves.toBe('path: /hello');
        });

        it('should return undefined when there is no function', () => {
            expect(findHandler({ handler: 'not a function' })).toBeUndefined();
            expect(findHandler({})).toBeUndefined();
            expect(findHandler(null)).toBeUndefined();
        });
    });

    describe('loadHandler', () => {
        let testDir: string;

        // Jest runs the tests as CommonJS, so the entrypoints are loaded with require.
        const requireImporter: ModuleImporter = async (specifier) => require(fileURLToPath(specifier));
        // import() exposes module.exports of CommonJS modules as the default export
        const namespaceImporter: ModuleImporter = async (specifier) => ({ default: require(fileURLToPath(specifier)) });

        beforeAll(() => {
            testDir = join(tmpdir(), `module-utils-test-${Date.now()}-${Math.random().toString(36).substring(7)}`);
            mkdirSync(testDir, { recursive: true });
            writeFileSync(join(testDir, 'named.cjs'), `exports.handler = (ctx) => 'named: ' + ctx.path;`);
            writeFileSync(join(testDir, 'default.cjs'), `module.exports = (ctx) => 'default: ' + ctx.path;`);
            writeFileSync(join(testDir, 'empty.cjs'), `exports.port = 3000;`);
        });

        afterAll(() => {
            rmSync(testDir, { recursive: true, force: true });
        });

        it('should load the named handler export', async () => {
            const loaded = await loadHandler('named.cjs', testDir, requireImporter);
            await expect(loaded(ctx)).resolves.toBe('named: /hello');
        });

        it('should load the default export', async () => {
            const loaded = await loadHandler('default.cjs', testDir, namespaceImporter);
            await expect(loaded(ctx)).resolves.toBe('default: /hello');
        });

        it('should pass the file URL of the entrypoint to the importer', async () => {
            const importer = jest.fn(requireImporter);
            await loadHandler('named.cjs', testDir, importer);
            expect(importer).toHaveBeenCalledWith(`file://${join(testDir, 'named.cjs')}`);
        });

        it('should fail when the module exports no function', async () => {
            await expect(loadHandler('empty.cjs', testDir, requireImporter)).rejects.toThrow(CliError);
            await expect(loadHandler('empty.cjs', testDir, requireImporter)).rejects.toThrow(
                `The entrypoint '${join(testDir, 'empty.cjs')}' does not export a handler function.`,
            );
        });

        it('should fail when the module cannot be imported', async () => {
            const failingImporter: ModuleImporter = async () => {
                throw new SyntaxError('Unexpected token');
            };
            await expect(loadHandler('named.cjs', testDir, failingImporter)).rejects.toThrow(
                `Failed to load the entrypoint '${join(testDir, 'named.cjs')}': Unexpected token`,
            );
        });

        it('should fail for missing entrypoint', async () => {
            await expect(loadHandler('missing/server.js', '/srv/app')).rejects.toThrow(CliError);
            await expect(loadHandler('missing/server.js', '/srv/app')).rejects.toThrow(`The entrypoint '/srv/app/missing/server.js' does not exist.`);
        });
    });
});
