import { Response } from '../router/response.js';
import { BRAND, HEADERS, STATUS_CODES, VERSION } from '../../constants.js';

export interface ServerErrorOptions {
    title?: string;
    statusCode?: number;
    stack?: string;
    requestId?: string;
    cause?: unknown;
}

/**
 * Failure of a single request.
 * It's rendered as the error response on that request only.
 */
export class ServerError extends Error {
    title: string;
    statusCode: number;
    requestId?: string;

    constructor(message?: string, options: ServerErrorOptions = {}) {
        super(message || `The unknown error occurred while processing the request. Please see the logs for more details.`, { cause: options.cause });
        this.name = new.target.name;
        this.title = options.title || 'Internal Server Error';
        this.statusCode = options.statusCode || STATUS_CODES.StatusInternalError;
        this.stack = options.stack || this.stack;
        this.requestId = options.requestId;
    }

    get component() {
        return `${BRAND} v${VERSION}`;
    }

    get canIncludeStack() {
        return process.env.LOG_LEVEL === 'debug';
    }

    /**
     * Wraps any thrown value into ServerError.
     * ServerError instances, including subclasses, are returned as they are.
     */
    static fromError(e: unknown): ServerError {
        if (e instanceof ServerError) return e;
        if (e instanceof Error) return new ServerError(e.message, { stack: e.stack, cause: e });
        return new ServerError(String(e));
    }

    toResponse(acceptContentType?: string): Response {
        const html = acceptContentType?.includes('text/html') ?? false;
        return new Response(html ? this.toHtml() : this.toJSON(), {
            statusCode: this.statusCode,
            headers: {
                [HEADERS.ContentType]: html ? 'text/html; charset=utf-8' : 'application/json; charset=utf-8',
            },
        });
    }

    toJSON(includeStack = this.canIncludeStack) {
        return JSON.stringify(
            {
                errorStatus: this.statusCode,
                errorTitle: this.title,
                errorMessage: this.message,
                errorStack: includeStack ? this.stack?.split('\n') : undefined,
                requestId: this.requestId,
                component: this.component,
            },
            null,
            2,
        );
    }

    toHtml(includeStack = this.canIncludeStack) {
        const details = escapeHtml(includeStack ? `${this.message}\n${this.stack}` : this.message);
        return [
            '<!DOCTYPE html>',
            '<html>',
            `<head><meta charset="UTF-8"><title>Error ${this.statusCode}</title></head>`,
            '<body>',
            `<h1>${this.statusCode} ${escapeHtml(this.title)}</h1>`,
            `<pre>${details}</pre>`,
            `<p>Request ID: ${escapeHtml(this.requestId || 'UNKNOWN')}<br>Component: ${this.component}</p>`,
            '</body>',
            '</html>',
        ].join('\n');
    }
}

function escapeHtml(value: string): string {
    return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;').replace(/'/g, '&#39;');
}
