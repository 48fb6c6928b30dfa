import type { Socket } from 'net';

export type Scheme = 'http' | 'https';

export type HeaderValue = string | readonly string[];
export type Headers = Readonly<Record<string, HeaderValue>>;

/**
 * Transport-level view of the accepted socket.
 */
export interface Connection {
    readonly remoteAddress: string;
    readonly remotePort?: number;
    readonly localAddress?: string;
    readonly localPort?: number;
    readonly encrypted: boolean;
}

export interface RequestContextInit {
    clientAddress: string;
    scheme: Scheme;
    host: string;
    method: string;
    path: string;
    url: string;
    headers: Headers;
    requestId: string;
    connection: Connection;
    body?: Buffer;
}

/**
 * Per-request value handed to the application handler.
 * Holds the client address, scheme and host resolved from the forwarding headers
 * together with the original request line, headers and body.
 */
export class RequestContext {
    readonly clientAddress: string;
    readonly scheme: Scheme;
    readonly host: string;
    readonly method: string;
    readonly path: string;
    readonly url: string;
    readonly headers: Headers;
    readonly requestId: string;
    readonly connection: Connection;
    readonly body: Buffer;

    constructor(init: RequestContextInit) {
        this.clientAddress = init.clientAddress;
        this.scheme = init.scheme;
        this.host = init.host;
        this.method = init.method;
        this.path = init.path;
        this.url = init.url;
        this.headers = init.headers;
        this.requestId = init.requestId;
        this.connection = init.connection;
        this.body = init.body ?? Buffer.alloc(0);
        Object.freeze(this);
    }

    get secure(): boolean {
        return this.scheme === 'https';
    }

    getHeader(key: string): string | undefined {
        return this.headers[key.toLowerCase()]?.toString();
    }

    getHeaderArray(key: string): string[] {
        return (
            this.getHeader(key)
                ?.split(',')
                .map((value) => value.trim()) ?? []
        );
    }

    getQuery(name: string): string | undefined {
        return new URL(this.url).searchParams.get(name) ?? undefined;
    }

    getQueryArray(name: string): string[] {
        return new URL(this.url).searchParams.getAll(name);
    }

    /**
     * Parses the body as JSON. Returns undefined for an empty body.
     */
    json<T = unknown>(): T | undefined {
        if (this.body.length === 0) return undefined;
        return JSON.parse(this.body.toString('utf-8'));
    }

    text(): string {
        return this.body.toString('utf-8');
    }

    toJSON() {
        return {
            requestId: this.requestId,
            clientAddress: this.clientAddress,
            scheme: this.scheme,
            host: this.host,
            method: this.method,
            path: this.path,
            url: this.url,
            headers: this.headers,
            connection: this.connection,
        };
    }
}

/**
 * Reads the transport addresses of the socket.
 * A socket that was already destroyed has no remote address, so the loopback is used.
 */
export function connectionFromSocket(socket: Socket): Connection {
    return Object.freeze({
        remoteAddress: socket.remoteAddress || '127.0.0.1',
        remotePort: socket.remotePort,
        localAddress: socket.localAddress,
        localPort: socket.localPort,
        encrypted: 'encrypted' in socket && socket.encrypted === true,
    });
}
