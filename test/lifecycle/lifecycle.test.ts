import { jest } from '@jest/globals';
import { EventEmitter } from 'events';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { Config } from '../../src/config.js';
import { FRONT_END_STATES, FrontEnd } from '../../src/frontend/server/frontEnd.js';
import { Lifecycle, run } from '../../src/lifecycle/lifecycle.js';
import { request, sleep, TestResponse } from '../helpers/http.js';

describe('Lifecycle', () => {
    const originalLogLevel = process.env.LOG_LEVEL;

    beforeEach(() => {
        process.env.LOG_LEVEL = 'none';
        jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
        jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    });

    afterEach(() => {
        jest.restoreAllMocks();
        if (originalLogLevel === undefined) delete process.env.LOG_LEVEL;
        else process.env.LOG_LEVEL = originalLogLevel;
    });

    const slowHandler = (ms: number) => async () => {
        await sleep(ms);
        return 'done';
    };

    describe('run', () => {
        it('should resolve 0 after SIGTERM once the slow in-flight request finished', async () => {
            const signals = new EventEmitter();
            const inFlight: { response?: Promise<TestResponse> } = {};

            const exitCode = await run({
                env: { HOST: '127.0.0.1', PORT: '0', SHUTDOWN_GRACE_PERIOD: '2000' },
                loadEnv: false,
                signals,
                handler: slowHandler(300),
                onReady: (address) => {
                    inFlight.response = request(address.port);
                    setTimeout(() => signals.emit('SIGTERM', 'SIGTERM'), 50);
                },
            });

            expect(exitCode).toBe(0);
            const res = await inFlight.response;
            expect(res?.status).toBe(200);
            expect(res?.body).toBe('done');
            expect(signals.listenerCount('SIGTERM')).toBe(0);
            expect(signals.listenerCount('SIGINT')).toBe(0);
        });

        it('should resolve 1 when the port is already in use', async () => {
            const occupied = new FrontEnd(() => 'occupied', new Config({ host: '127.0.0.1', port: 0 }));
            const { port } = await occupied.listen();
            const handler = jest.fn(() => 'never');

            try {
                const exitCode = await run({
                    env: { HOST: '127.0.0.1', PORT: String(port) },
                    loadEnv: false,
                    signals: new EventEmitter(),
                    handler,
                });
                expect(exitCode).toBe(1);
                expect(handler).not.toHaveBeenCalled();
            } finally {
                await occupied.close(50);
            }
        });

        it('should resolve 1 for invalid configuration', async () => {
            const onReady = jest.fn();
            const exitCode = await run({ env: { PORT: 'not-a-port' }, loadEnv: false, signals: new EventEmitter(), onReady });
            expect(exitCode).toBe(1);
            expect(onReady).not.toHaveBeenCalled();
        });

        it('should serve the handler of the entrypoint module', async () => {
            const testDir = mkdtempSync(join(tmpdir(), 'lifecycle-test-'));
            const entrypoint = join(testDir, 'app.cjs');
            writeFileSync(entrypoint, `exports.handler = (ctx) => 'from entrypoint: ' + ctx.path;`);
            const signals = new EventEmitter();
            const served: { response?: Promise<TestResponse> } = {};

            try {
                const exitCode = await run({
                    env: { HOST: '127.0.0.1', PORT: '0' },
                    entrypoint,
                    importer: async (specifier) => require(fileURLToPath(specifier)),
                    loadEnv: false,
                    signals,
                    onReady: (address) => {
                        const stop = () => signals.emit('SIGTERM', 'SIGTERM');
                        served.response = request(address.port, { path: '/orders' });
                        served.response.then(stop, stop);
                    },
                });

                expect(exitCode).toBe(0);
                const res = await served.response;
                expect(res?.status).toBe(200);
                expect(res?.body).toBe('from entrypoint: /orders');
            } finally {
                rmSync(testDir, { recursive: true, force: true });
            }
        });

        it('should resolve 1 for missing entrypoint', async () => {
            const exitCode = await run({
                env: { HOST: '127.0.0.1', PORT: '0' },
                entrypoint: './does-not-exist.js',
                loadEnv: false,
                signals: new EventEmitter(),
            });
            expect(exitCode).toBe(1);
        });
    });

    describe('signals', () => {
        it('should close all connections on the second signal', async () => {
            const signals = new EventEmitter();
            const lifecycle = new Lifecycle({
                config: new Config({ host: '127.0.0.1', port: 0, shutdownGracePeriod: 5000 }),
                handler: slowHandler(1000),
                signals,
            });
            const { port } = await lifecycle.start();
            expect(signals.listenerCount('SIGTERM')).toBe(1);

            const pending = request(port).catch((e: unknown) => e);
            await sleep(50);
            signals.emit('SIGTERM', 'SIGTERM');
            await sleep(50);
            expect(lifecycle.frontEnd.state).toBe(FRONT_END_STATES.Closed);
            signals.emit('SIGINT', 'SIGINT');

            await expect(lifecycle.waitForShutdown()).resolves.toBe(0);
            expect(await pending).toMatchObject({ code: 'ECONNRESET' });
        });

        it('should listen only for the configured signals', async () => {
            const signals = new EventEmitter();
            const lifecycle = new Lifecycle({
                config: new Config({ host: '127.0.0.1', port: 0 }),
                handler: () => 'ok',
                signals,
                terminationSignals: ['SIGUSR2'],
            });
            await lifecycle.start();
            expect(signals.listenerCount('SIGTERM')).toBe(0);

            signals.emit('SIGUSR2', 'SIGUSR2');
            await expect(lifecycle.waitForShutdown()).resolves.toBe(0);
        });

        it('should share one shutdown between the callers', async () => {
            const lifecycle = new Lifecycle({
                config: new Config({ host: '127.0.0.1', port: 0 }),
                handler: () => 'ok',
                signals: new EventEmitter(),
            });
            await lifecycle.start();

            const first = lifecycle.shutdown();
            expect(lifecycle.shutdown()).toBe(first);
            await expect(first).resolves.toBe(0);
            await expect(lifecycle.waitForShutdown()).resolves.toBe(0);
        });
    });
});
