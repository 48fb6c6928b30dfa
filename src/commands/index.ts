#!/usr/bin/env node
import { Command } from 'commander';
import { logger } from '../logger.js';
import { BRAND, DESCRIPTION, ENV_VARS, HOST, NAME, PORT, VERSION } from '../constants.js';
import { printError } from '../utils/errorUtils.js';
import { parseIntegerOption, runCommand } from './run.js';
import { configPrint } from './config/print.js';

// Attach default error handler
process.on('uncaughtException', handleException);

const program = new Command()
    .name(NAME)
    .description(DESCRIPTION)
    .version(VERSION, '-v, --version')
    .addHelpText('beforeAll', () => {
        logger.drawTitle('help');
        return '';
    })
    .helpOption('-h, --help', 'Display help for command')
    .option('-d, --debug', 'Enable debug mode')
    .hook('preAction', preAction);

program
    .command('run [entrypoint]')
    .description('Start the server with the handler exported from the entrypoint module')
    .option('--host <host>', `The interface to listen on. Defaults to ${ENV_VARS.Host} or ${HOST}`)
    .option('-p, --port <port>', `The port to listen on. Defaults to ${ENV_VARS.Port} or ${PORT}`, parseIntegerOption)
    .option('--proxy-headers', 'Trust the forwarding headers set by the proxy')
    .option('--no-proxy-headers', 'Ignore the forwarding headers and use the transport address')
    .option('--forwarded-allow-ips <list>', 'Comma separated IPs or CIDR ranges of the trusted proxies, or * for any')
    .option('--timeout <ms>', 'Max time a single request can take', parseIntegerOption)
    .option('--grace-period <ms>', 'Max time the in-flight requests have to finish on shutdown', parseIntegerOption)
    .option('--cors-origins <list>', 'Comma separated origins allowed to make cross-origin requests')
    .action(runCommand);

const configCommand = program.command('config').description(`Manage the ${BRAND} config`);
configCommand.command('print').description(`Prints the resolved ${BRAND} config`).action(configPrint);

program.addHelpText(
    'after',
    `
Examples:
  npx ${NAME} run ./dist/server.js
  npx ${NAME} run ./dist/server.js --port 8080 --forwarded-allow-ips 10.0.0.0/8
  ${ENV_VARS.ProxyHeaders}=false npx ${NAME} run
`,
);

/**
 * Global hook that always runs before any command.
 * @param thisCommand - The command that is being executed.
 * @param actionCommand - The action command that is being executed.
 */
export async function preAction(thisCommand: Command, actionCommand: Command) {
    const { debug } = thisCommand.opts();
    if (debug) process.env.LOG_LEVEL = 'debug';
    logger.drawTitle(actionCommand.name());
}

/**
 * Default error handler for all the errors inside the CLI.
 */
export function handleException(e: unknown) {
    printError(e);
    process.exit(1);
}

program.parseAsync(process.argv).catch(handleException);
