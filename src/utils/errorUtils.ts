import chalk from 'chalk';
import { CliError } from '../cliError.js';
import { logger, LogLevel } from '../logger.js';

/**
 * Prints the error that stopped the process.
 * The stack trace is shown only for unexpected errors, not for CliErrors
 * that are caused by the user's setup.
 */
export function printError(e: unknown): void {
    const error = e instanceof Error ? e : new Error(String(e));

    // Do not show stack trace in table, the lines are too long.
    if (!(error instanceof CliError)) {
        const errorStack = (error.stack ?? '')
            .split('\n')
            .map((line) => line.trim())
            .slice(1) // remove the first line with the error message
            .join('\n');

        logger.info('');
        logger.error(
            chalk.gray.bold(`Stack trace`) +
                '\r\n\r\n' +
                chalk.gray(errorStack) +
                '\r\n\r\n' +
                chalk.gray(`You can try to run the command again with the ${chalk.cyan('--debug')} flag to get more information.`),
        );
    }

    logger.info('');
    logger.drawTable([error.message], {
        title: 'Error',
        logLevel: LogLevel.ERROR,
        minWidth: 70,
        maxWidth: 70,
    });

    if (error instanceof CliError && error.hasInstructions()) {
        logger.info('');
        logger.drawTable(error.instructions, {
            title: 'Next Steps',
            logLevel: LogLevel.INFO,
            minWidth: 70,
            maxWidth: 70,
        });
    }
}
