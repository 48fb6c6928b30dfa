import chalk from 'chalk';
import { AsyncLocalStorage } from 'async_hooks';
import { BRAND, NAME, VERSION } from './constants.js';

const originalConsoleInfo = globalThis.console.info;
const originalConsoleDebug = globalThis.console.debug;
const originalConsoleLog = globalThis.console.log;
const originalConsoleWarn = globalThis.console.warn;
const originalConsoleError = globalThis.console.error;
const originalConsoleTrace = globalThis.console.trace;

/**
 * Log levels in increasing order of severity
 */
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    NONE = 4,
    SUCCESS = 5,
}

/**
 * Maps string log level to LogLevel enum
 */
const LOG_LEVELS_MAP: Record<string, LogLevel> = {
    debug: LogLevel.DEBUG,
    info: LogLevel.INFO,
    warn: LogLevel.WARN,
    error: LogLevel.ERROR,
    none: LogLevel.NONE,
    success: LogLevel.SUCCESS,
};

const LOG_LEVEL_STYLES = {
    [LogLevel.DEBUG]: { symbol: '•', color: chalk.gray },
    [LogLevel.INFO]: { symbol: '•', color: chalk.blueBright },
    [LogLevel.WARN]: { symbol: '⚠', color: chalk.yellowBright },
    [LogLevel.ERROR]: { symbol: '✗', color: chalk.redBright },
    [LogLevel.NONE]: { symbol: '•', color: chalk.white },
    [LogLevel.SUCCESS]: { symbol: '✓', color: chalk.greenBright },
};

const TABLE_COLORS = {
    [LogLevel.DEBUG]: chalk.gray,
    [LogLevel.INFO]: chalk.blue,
    [LogLevel.WARN]: chalk.yellow,
    [LogLevel.ERROR]: chalk.red,
    [LogLevel.NONE]: chalk.white,
    [LogLevel.SUCCESS]: chalk.green,
};

export const LOG_FORMATS = {
    text: 'text',
    json: 'json',
} as const;
export type LogFormat = (typeof LOG_FORMATS)[keyof typeof LOG_FORMATS];

export type LogMetadata = Record<string, unknown>;

export interface DrawTableOptions {
    title?: string;
    padding?: number;
    logLevel?: LogLevel;
    minWidth?: number; // Minimum width for the table content area
    maxWidth?: number; // Maximum width for the table content area
}

const ANSI_PATTERN = /\u001b\[[0-9;]*m/g;

export class Logger {
    private metadata: LogMetadata = {};
    private requestMetadata = new AsyncLocalStorage<LogMetadata>();

    // Load list of secret ENV variables that should be removed from the logs.
    // e.g.: process.env.EDGEFRONT_SECRETS = 'API_KEY,DB_PASSWORD' => [EDGEFRONT_REDACTED_API_KEY]
    private secretKeys = process.env['EDGEFRONT_SECRETS']?.split(',').filter(Boolean) ?? [];
    private secretValuePlaceholder = 'EDGEFRONT_REDACTED';

    // Forwarded requests carry credentials in these headers.
    // e.g. { cookie: 'session_id=1234567890' } => { cookie: '[EDGEFRONT_REDACTED]' }
    private secretKeyPattern = /secret|token|authorization|api[_-]?key|session|cookie|set[_-]?cookie|passwd|password|credential|private[_-]?key|signature/i;

    /**
     * Sets process-wide metadata attached to every log entry.
     */
    init(metadata: LogMetadata = {}): void {
        this.metadata = metadata;
    }

    /**
     * Runs the callback with metadata that is attached only to the entries
     * logged within its async execution, so concurrent requests never share it.
     */
    runWithMetadata<T>(metadata: LogMetadata, callback: () => T): T {
        const parent = this.requestMetadata.getStore() ?? {};
        return this.requestMetadata.run({ ...parent, ...metadata }, callback);
    }

    get currentMetadata(): LogMetadata {
        return { ...this.metadata, ...this.requestMetadata.getStore() };
    }

    get format(): LogFormat {
        const envFormat = process.env.LOG_FORMAT?.toLowerCase();
        return envFormat === LOG_FORMATS.json ? LOG_FORMATS.json : LOG_FORMATS.text;
    }

    get level(): LogLevel {
        const envLevel = process.env.LOG_LEVEL?.toLowerCase();
        return envLevel && envLevel in LOG_LEVELS_MAP ? LOG_LEVELS_MAP[envLevel] : LogLevel.INFO;
    }

    public debug(message: unknown, metadata: LogMetadata = {}): void {
        this.logInternal(LogLevel.DEBUG, message, metadata);
    }

    public info(message: unknown, metadata: LogMetadata = {}): void {
        this.logInternal(LogLevel.INFO, message, metadata);
    }

    public warn(message: unknown, metadata: LogMetadata = {}): void {
        this.logInternal(LogLevel.WARN, message, metadata);
    }

    public error(message: unknown, metadata: LogMetadata = {}): void {
        this.logInternal(LogLevel.ERROR, message, metadata);
    }

    public success(message: unknown, metadata: LogMetadata = {}): void {
        this.logInternal(LogLevel.SUCCESS, message, metadata);
    }

    /**
     * Log to stdout with NONE log level that is always displayed
     * regardless of the configured log level.
     */
    public none(message: unknown, metadata: LogMetadata = {}): void {
        this.logInternal(LogLevel.NONE, message, metadata);
    }

    /**
     * Log to stdout with INFO log level and no prefix.
     */
    public log(message: unknown, metadata: LogMetadata = {}): void {
        this.logInternal(LogLevel.INFO, message, metadata, false);
    }

    private logInternal(logLevel: LogLevel, messages: unknown, metadata: LogMetadata = {}, addPrefix = logLevel != LogLevel.NONE): void {
        if (logLevel < this.level) return;

        (Array.isArray(messages) ? messages : [messages]).forEach((message) => {
            const formattedMessage = this.formatMessage(logLevel, stringify(message), metadata, addPrefix);
            const stdStream = logLevel === LogLevel.ERROR ? process.stderr : process.stdout;
            stdStream.write(`${formattedMessage}\r\n`);
        });
    }

    /**
     * Helper function to format time consistently: HH:MM:SS AM/PM
     * or ISO string if json format is enabled
     */
    private getTimeStamp(): string {
        const now = new Date();
        if (this.format === LOG_FORMATS.json) {
            return now.toISOString();
        }
        const hours = now.getHours();
        const minutes = now.getMinutes().toString().padStart(2, '0');
        const seconds = now.getSeconds().toString().padStart(2, '0');
        const ampm = hours >= 12 ? 'PM' : 'AM';
        const hour12 = (hours % 12 || 12).toString().padStart(2, '0');
        return `${hour12}:${minutes}:${seconds} ${ampm}`;
    }

    formatMessage(logLevel: LogLevel, message = '', metadata: LogMetadata = {}, addPrefix = logLevel != LogLevel.NONE): string {
        if (this.format === LOG_FORMATS.json) {
            const level = logLevel <= LogLevel.NONE ? LogLevel[logLevel] : LogLevel[LogLevel.INFO];
            return JSON.stringify(
                this.hideSecrets({
                    type: `${NAME}.log`,
                    ...this.currentMetadata,
                    ...metadata,
                    message: message.replace(ANSI_PATTERN, ''),
                    level,
                    timestamp: this.getTimeStamp(),
                }),
            );
        }

        // Add message prefix to first line and padding to other lines
        const { symbol, color } = LOG_LEVEL_STYLES[logLevel];
        const messagePrefix = addPrefix ? color(`${symbol} ${chalk.dim(this.getTimeStamp())}  `) : '';
        const messagePrefixPadding = messagePrefix ? ' '.repeat(15) : '';

        return this.hideSecretValues(message)
            .split('\n')
            .map((line, index) => {
                if (line.length === 0) return line;
                return index === 0 ? `${messagePrefix}${line}` : `${messagePrefixPadding}${line}`;
            })
            .join('\n');
    }

    /**
     * Draws "nice-looking" title to the console
     */
    public drawTitle(label = ''): void {
        const title = ` ${BRAND} `;
        const subtitle = ` v${VERSION} `;
        this.log(`${chalk.bgBlueBright(' ')}${chalk.bgWhite.bold.blackBright(title)}${chalk.white.bgBlackBright(subtitle)} ${chalk.gray(label)}`);
        this.log('');
    }

    /**
     * Draws a table to the console
     * @example
     *  ╭─ Error ─────────────────────╮
     *  │ Port 3000 is already in use │
     *  ╰─────────────────────────────╯
     */
    public drawTable(lines: string[], options: DrawTableOptions = {}): void {
        if (lines.length === 0) return;

        const padding = options.padding ?? 1;
        const logLevel = options.logLevel ?? LogLevel.INFO;
        const terminalWidth = process.stdout.columns || 80;
        const maxAvailableWidth = Math.max(20, terminalWidth - padding * 2 - 2 - 15);
        const maxContentWidth = options.maxWidth ? Math.min(options.maxWidth, maxAvailableWidth) : maxAvailableWidth;
        const minContentWidth = options.minWidth ? Math.min(options.minWidth, maxAvailableWidth) : 0;

        const wrappedLines = lines
            .flatMap((line) => line.replace(/\r\n?/g, '\n').split('\n'))
            .flatMap((line) => wrapText(line, maxContentWidth));

        const contentWidth = Math.max(minContentWidth, ...wrappedLines.map(visibleLength));
        const totalWidth = contentWidth + padding * 2;

        let topBorder = `╭${'─'.repeat(totalWidth)}╮`;
        if (options.title) {
            const title = ` ${options.title} `;
            const rightBorder = '─'.repeat(Math.max(0, totalWidth - title.length - 2));
            topBorder = `╭──${chalk.bold(title)}${rightBorder}╮`;
        }
        const bottomBorder = `╰${'─'.repeat(totalWidth)}╯`;
        const contentLines = wrappedLines.map((line) => {
            const fill = contentWidth - visibleLength(line);
            return `│${' '.repeat(padding)}${line}${' '.repeat(fill + padding)}│`;
        });

        const table = [topBorder, ...contentLines, bottomBorder].join('\n');
        this.logInternal(logLevel, TABLE_COLORS[logLevel](table));
    }

    /**
     * Override console methods to respect log levels and format,
     * so the output of the application handler ends up in the same stream.
     */
    public overrideConsole(): void {
        // NOTE: Override just the methods, not whole globalThis.console object,
        // so libs can still use other methods and hold reference to this (e.g. console.dir)
        globalThis.console.trace = (...messages: unknown[]) => this.logInternal(LogLevel.DEBUG, messages, {}, false);
        globalThis.console.debug = (...messages: unknown[]) => this.logInternal(LogLevel.DEBUG, messages, {}, false);
        globalThis.console.log = (...messages: unknown[]) => this.logInternal(LogLevel.INFO, messages, {}, false);
        globalThis.console.info = (...messages: unknown[]) => this.logInternal(LogLevel.INFO, messages, {}, false);
        globalThis.console.warn = (...messages: unknown[]) => this.logInternal(LogLevel.WARN, messages, {}, false);
        globalThis.console.error = (...messages: unknown[]) => this.logInternal(LogLevel.ERROR, messages, {}, false);
    }

    public restoreConsole(): void {
        globalThis.console.trace = originalConsoleTrace;
        globalThis.console.debug = originalConsoleDebug;
        globalThis.console.log = originalConsoleLog;
        globalThis.console.info = originalConsoleInfo;
        globalThis.console.warn = originalConsoleWarn;
        globalThis.console.error = originalConsoleError;
    }

    private hideSecretValues(value: string): string {
        return this.secretKeys.reduce((result, key) => {
            const secret = process.env[key];
            if (!secret) return result;
            return result.replaceAll(secret, `[${this.secretValuePlaceholder}_${key.toUpperCase()}]`);
        }, value);
    }

    hideSecrets(object: unknown): unknown {
        // Remove ENV variables marked as secret from all the strings
        // e.g.: `Connecting with ${process.env.DB_PASSWORD}` => "Connecting with [EDGEFRONT_REDACTED_DB_PASSWORD]"
        if (typeof object === 'string') {
            return this.hideSecretValues(object);
        }

        if (Array.isArray(object)) {
            return object.map((item) => this.hideSecrets(item));
        }

        // Remove whole keys from objects that are considered sensitive
        // and run recursively on all values of the object
        // e.g.: { cookie: 'session_id=1234567890' } => { cookie: '[EDGEFRONT_REDACTED]' }
        if (typeof object === 'object' && object !== null) {
            const result: Record<string, unknown> = {};
            for (const [key, value] of Object.entries(object)) {
                result[key] = this.secretKeyPattern.test(key) ? `[${this.secretValuePlaceholder}]` : this.hideSecrets(value);
            }
            return result;
        }

        return object;
    }
}

/**
 * Formats objects to human readable string representation
 * and handles circular references.
 * e.g.: const obj = { key: 'value' }; obj.self = obj; => { key: 'value', self: '[CIRCULAR]' }
 */
function stringify(message: unknown): string {
    if (typeof message === 'string') return message;
    if (message instanceof Error) return message.stack || message.toString();
    if (message === undefined) return 'undefined';

    const seen = new WeakSet<object>();
    return JSON.stringify(
        message,
        (_key, value: unknown) => {
            if (typeof value === 'object' && value !== null) {
                if (seen.has(value)) return '[CIRCULAR]';
                seen.add(value);
            }
            return value;
        },
        2,
    );
}

function visibleLength(text: string): number {
    return text.replace(ANSI_PATTERN, '').length;
}

function wrapText(text: string, maxWidth: number): string[] {
    if (visibleLength(text) <= maxWidth) return [text];

    const result: string[] = [];
    let line = '';
    for (const word of text.split(/(\s+)/)) {
        if (visibleLength(line + word) <= maxWidth) {
            line += word;
            continue;
        }
        if (line.trim()) result.push(line.trimEnd());
        line = word.trimStart();

        // Break words that are longer than the whole line
        while (visibleLength(line) > maxWidth) {
            result.push(line.slice(0, maxWidth));
            line = line.slice(maxWidth);
        }
    }
    if (line) result.push(line);
    return result;
}

// Export a default instance for convenience
export const logger = new Logger();
