import http from 'http';
import { finished } from 'stream/promises';
import { HEADERS, STATUS_CODES } from '../../constants.js';

export type ResponseHeaders = Record<string, string | string[]>;

export interface ResponseOptions {
    statusCode?: number;
    headers?: ResponseHeaders;
}

/**
 * Anything the application handler can return.
 * Plain values are converted by Response.from().
 */
export type HandlerResult = Response | string | Buffer | Record<string, unknown> | unknown[] | null | undefined | void;

export class Response {
    statusCode: number;
    headers: ResponseHeaders = {};
    chunks: Buffer[] = [];
    startTime: number = Date.now();

    constructor(body: string | Buffer | undefined | null = undefined, options: ResponseOptions = {}) {
        this.statusCode = options.statusCode ?? STATUS_CODES.StatusOk;
        this.setHeaders(options.headers ?? {});
        if (body !== undefined && body !== null) this.write(body);
    }

    get body(): Buffer {
        return Buffer.concat(this.chunks);
    }

    setHeader(key: string, value: string | string[]) {
        this.headers[key.toLowerCase()] = value;
    }

    /**
     * Appends the values to the existing header.
     * Set-Cookie is kept as an array, other headers are merged into single string.
     */
    addHeader(key: string, value: string | string[]) {
        key = key.toLowerCase();
        const newValues = [...this.getHeaderArray(key), ...(Array.isArray(value) ? value : [value])];
        this.headers[key] = key === 'set-cookie' ? newValues : newValues.join(',');
    }

    setHeaders(headers: ResponseHeaders): void {
        for (const [key, value] of Object.entries(headers)) {
            this.setHeader(key, value);
        }
    }

    getHeader(key: string) {
        return this.headers[key.toLowerCase()]?.toString();
    }

    getHeaderArray(key: string): string[] {
        const value = this.headers[key.toLowerCase()];
        if (value === undefined) return [];
        return Array.isArray(value) ? value : value.split(',');
    }

    deleteHeader(key: string): void {
        delete this.headers[key.toLowerCase()];
    }

    write(chunk: string | Buffer, encoding: BufferEncoding = 'utf-8'): void {
        this.chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk, encoding));
    }

    /**
     * Writes the response to the socket and waits until it's flushed.
     * Rejects when the connection is closed before the response is finished.
     */
    async toNodeResponse(nodeResponse: http.ServerResponse): Promise<void> {
        const body = this.body;
        const headers: ResponseHeaders = { ...this.headers };
        // Responses to HEAD requests and 204/304 statuses have no body
        const bodyless = nodeResponse.req?.method === 'HEAD' || this.statusCode === 204 || this.statusCode === 304;
        if (!bodyless) headers[HEADERS.ContentLength] = body.length.toString();

        nodeResponse.writeHead(this.statusCode, headers);
        nodeResponse.end(bodyless ? undefined : body);
        await finished(nodeResponse);
    }

    static json(data: unknown, options: ResponseOptions = {}): Response {
        return new Response(JSON.stringify(data), {
            ...options,
            headers: { [HEADERS.ContentType]: 'application/json; charset=utf-8', ...options.headers },
        });
    }

    static text(text: string, options: ResponseOptions = {}): Response {
        return new Response(text, {
            ...options,
            headers: { [HEADERS.ContentType]: 'text/plain; charset=utf-8', ...options.headers },
        });
    }

    /**
     * Converts value returned by the handler into a Response.
     * e.g.: undefined => 204, 'hello' => 200 text/plain, { ok: true } => 200 application/json
     */
    static from(result: HandlerResult): Response {
        if (result instanceof Response) return result;
        if (result === undefined || result === null) return new Response(null, { statusCode: STATUS_CODES.StatusNoContent });
        if (typeof result === 'string') return Response.text(result);
        if (Buffer.isBuffer(result)) {
            return new Response(result, { headers: { [HEADERS.ContentType]: 'application/octet-stream' } });
        }
        return Response.json(result);
    }
}
