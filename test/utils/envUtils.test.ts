import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { getDefaultEnvFiles, loadEnvVariables, parseEnvVariables } from '../../src/utils/envUtils.js';
import type { Environment } from '../../src/config.js';

describe('envUtils', () => {
    const testEnvContent = `
# This is a comment
PORT=8080
CORS_ORIGINS=https://app.example.com
PROXY_HEADERS=true
EMPTY_VAR=
QUOTED_VAR="quoted value"
SINGLE_QUOTED_VAR='single quoted value'
export FORWARDED_ALLOW_IPS=10.0.0.0/8
`;

    let testDir: string;
    const path = (name: string) => join(testDir, name);

    beforeAll(() => {
        // Create a unique temporary directory for all tests
        testDir = join(tmpdir(), `env-utils-test-${Date.now()}-${Math.random().toString(36).substring(7)}`);
        mkdirSync(testDir, { recursive: true });
    });

    afterAll(() => {
        rmSync(testDir, { recursive: true, force: true });
    });

    describe('loadEnvVariables', () => {
        it('should load the file into the target environment', async () => {
            writeFileSync(path('.env'), testEnvContent);
            const target: Environment = {};

            const envVars = await loadEnvVariables(path('.env'), target);

            expect(envVars).toEqual({
                PORT: '8080',
                CORS_ORIGINS: 'https://app.example.com',
                PROXY_HEADERS: 'true',
                EMPTY_VAR: '',
                QUOTED_VAR: 'quoted value',
                SINGLE_QUOTED_VAR: 'single quoted value',
                FORWARDED_ALLOW_IPS: '10.0.0.0/8',
            });
            expect(target).toEqual(envVars);
        });

        it('should not overwrite variables that are already set', async () => {
            writeFileSync(path('.env'), 'PORT=8080\nHOST=127.0.0.1');
            const target: Environment = { PORT: '9000' };

            const envVars = await loadEnvVariables(path('.env'), target);

            expect(envVars).toEqual({ HOST: '127.0.0.1' });
            expect(target).toEqual({ PORT: '9000', HOST: '127.0.0.1' });
        });

        it('should load multiple files with later files overriding earlier ones', async () => {
            writeFileSync(path('.env'), 'PORT=3001\nHOST=0.0.0.0');
            writeFileSync(path('.env.local'), 'PORT=3002\nNEW_VAR=new-value');
            const target: Environment = {};

            const envVars = await loadEnvVariables([path('.env'), path('.env.local')], target);

            expect(envVars).toEqual({ PORT: '3002', HOST: '0.0.0.0', NEW_VAR: 'new-value' });
        });

        it('should load the default files in the priority order', async () => {
            writeFileSync(path('.env'), 'PORT=3001');
            writeFileSync(path('.env.production'), 'PORT=3002\nREQUEST_TIMEOUT=5000');
            writeFileSync(path('.env.local'), 'PORT=3003');
            const target: Environment = {};

            const envVars = await loadEnvVariables(getDefaultEnvFiles(testDir, 'production'), target);

            expect(envVars).toEqual({ PORT: '3003', REQUEST_TIMEOUT: '5000' });
        });

        it('should skip non-existent files by default', async () => {
            const envVars = await loadEnvVariables([path('.env.nonexistent')], {});
            expect(envVars).toEqual({});
        });

        it('should throw error for non-existent files when throwOnError is true', async () => {
            await expect(loadEnvVariables([path('.env.nonexistent')], {}, true)).rejects.toThrow(
                `The ENV variables file at '${path('.env.nonexistent')}' does not exist`,
            );
        });
    });

    describe('getDefaultEnvFiles', () => {
        it('should return the files for the given NODE_ENV', () => {
            expect(getDefaultEnvFiles('/srv/app', 'test')).toEqual(['/srv/app/.env', '/srv/app/.env.test', '/srv/app/.env.local']);
        });
    });

    describe('parseEnvVariables', () => {
        it('should skip comments, empty and malformed lines', () => {
            expect(parseEnvVariables('# comment\n\nVALID_VAR=valid\nMALFORMED_LINE\n=no-key\nANOTHER_VALID=another')).toEqual({
                VALID_VAR: 'valid',
                ANOTHER_VALID: 'another',
            });
        });

        it('should keep equals signs and quotes inside values', () => {
            expect(
                parseEnvVariables(`CONNECTION_STRING=postgresql://user:test-secret@db:5432/app?sslmode=require\nMIXED_QUOTES="mixed 'quotes' inside"`),
            ).toEqual({
                CONNECTION_STRING: 'postgresql://user:test-secret@db:5432/app?sslmode=require',
                MIXED_QUOTES: "mixed 'quotes' inside",
            });
        });

        it('should strip inline comments from unquoted values only', () => {
            expect(parseEnvVariables('PORT=8080 # main port\nNOTE="keep # this"')).toEqual({ PORT: '8080', NOTE: 'keep # this' });
        });

        it('should handle Windows line endings', () => {
            expect(parseEnvVariables('A=1\r\nB=2\r\n')).toEqual({ A: '1', B: '2' });
        });
    });
});
