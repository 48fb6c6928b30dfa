import http from 'http';
import { AddressInfo } from 'net';
import { Duplex } from 'stream';
import { randomUUID } from 'crypto';
import { BindError } from '../../cliError.js';
import { Config, ConfigOptions } from '../../config.js';
import { ENV_VARS, HEADERS, HEALTH_PATH, STATUS_CODES } from '../../constants.js';
import { logger } from '../../logger.js';
import { PayloadTooLargeError } from '../errors/payloadTooLargeError.js';
import { RequestTimeoutError } from '../errors/requestTimeoutError.js';
import { ServerError } from '../errors/serverError.js';
import { connectionFromSocket, RequestContext } from '../router/requestContext.js';
import { HandlerResult, Response } from '../router/response.js';
import { resolve } from '../trust/trustResolver.js';
import { corsHeaders, handlePreflight } from './cors.js';

export const FRONT_END_STATES = {
    Unbound: 'unbound',
    Bound: 'bound',
    Accepting: 'accepting',
    Closed: 'closed',
} as const;
export type FrontEndState = (typeof FRONT_END_STATES)[keyof typeof FRONT_END_STATES];

/**
 * The application layer. It receives the resolved context of every request.
 */
export type RequestHandler = (ctx: RequestContext) => HandlerResult | Promise<HandlerResult>;

/**
 * Listening socket that resolves the forwarding headers of every request
 * before it's passed to the handler.
 *
 * The state only moves forward: unbound → bound → accepting → closed.
 */
export class FrontEnd {
    readonly config: Config;
    readonly handler: RequestHandler;

    protected server: http.Server;
    protected currentState: FrontEndState = FRONT_END_STATES.Unbound;
    protected activeResponses = new Set<http.ServerResponse>();
    protected closePromise?: Promise<boolean>;
    protected forceClosed = false;

    constructor(handler: RequestHandler, config: Config = new Config()) {
        this.handler = handler;
        this.config = config;

        // The built-in timeouts cover receiving of the request.
        // Time spent in the handler is limited by our own per-request timer.
        this.server = http.createServer({
            requestTimeout: config.requestTimeout,
            headersTimeout: Math.min(config.requestTimeout, 60_000),
            connectionsCheckingInterval: Math.min(config.requestTimeout, 30_000),
        });
        this.server.keepAliveTimeout = config.keepAliveTimeout;
        this.server.on('clientError', (error: Error, socket: Duplex) => this.handleClientError(error, socket));
    }

    get state(): FrontEndState {
        return this.currentState;
    }

    get address(): AddressInfo | undefined {
        const address = this.server.address();
        return address && typeof address === 'object' ? address : undefined;
    }

    /**
     * Number of requests that are not yet fully answered.
     */
    get activeRequests(): number {
        return this.activeResponses.size;
    }

    /**
     * Binds the socket and starts accepting connections.
     * Rejects with BindError when the port is in use or cannot be bound.
     */
    async listen(): Promise<AddressInfo> {
        if (this.currentState !== FRONT_END_STATES.Unbound) {
            throw new Error(`Cannot listen when the front end is ${this.currentState}`);
        }

        const { host, port } = this.config;
        try {
            await new Promise<void>((resolve, reject) => {
                const onError = (error: Error) => {
                    this.server.off('listening', onListening);
                    reject(error);
                };
                const onListening = () => {
                    this.server.off('error', onError);
                    resolve();
                };
                this.server.once('error', onError);
                this.server.once('listening', onListening);
                this.server.listen(port, host);
            });
        } catch (error) {
            this.setState(FRONT_END_STATES.Closed);
            throw toBindError(error, host, port);
        }
        this.setState(FRONT_END_STATES.Bound);

        this.server.on('error', (error: Error) => logger.error(`Server error: ${error.message}`));
        this.server.on('request', (nodeRequest: http.IncomingMessage, nodeResponse: http.ServerResponse) => {
            this.handleRequest(nodeRequest, nodeResponse).catch((error: unknown) => {
                logger.error(`Unexpected error while handling the request: ${error instanceof Error ? error.stack : String(error)}`);
                nodeResponse.destroy();
            });
        });
        this.setState(FRONT_END_STATES.Accepting);

        const address = this.address;
        if (!address) throw new BindError(`The server is not listening on ${host}:${port}`);
        return address;
    }

    /**
     * Stops accepting new connections and waits up to the grace period for in-flight requests.
     * Connections that are still open after that are destroyed.
     * Resolves true when all requests finished in time.
     */
    close(gracePeriod: number = this.config.shutdownGracePeriod): Promise<boolean> {
        if (this.closePromise) return this.closePromise;
        const listening = this.server.listening;
        this.setState(FRONT_END_STATES.Closed);

        this.closePromise = listening ? this.drain(gracePeriod) : Promise.resolve(true);
        return this.closePromise;
    }

    /**
     * Destroys all the connections immediately, including the busy ones.
     */
    forceClose(): void {
        this.forceClosed = true;
        this.server.closeAllConnections();
    }

    protected async drain(gracePeriod: number): Promise<boolean> {
        const serverClosed = new Promise<void>((resolve) => this.server.close(() => resolve()));
        this.server.closeIdleConnections();
        if (this.activeRequests > 0) {
            logger.info(`Waiting up to ${gracePeriod}ms for ${this.activeRequests} in-flight request(s) to finish`);
        }

        let timer: NodeJS.Timeout | undefined;
        const gracePeriodElapsed = new Promise<boolean>((resolve) => {
            timer = setTimeout(() => resolve(false), gracePeriod);
        });
        const drained = await Promise.race([serverClosed.then(() => true), gracePeriodElapsed]);
        clearTimeout(timer);

        if (!drained) {
            logger.warn(`Closing ${this.activeRequests} request(s) that did not finish within the ${gracePeriod}ms grace period`);
            this.forceClose();
            await serverClosed;
        }
        return drained && !this.forceClosed;
    }

    protected setState(state: FrontEndState): void {
        logger.debug(`Front end state: ${this.currentState} -> ${state}`);
        this.currentState = state;
    }

    protected async handleRequest(nodeRequest: http.IncomingMessage, nodeResponse: http.ServerResponse): Promise<void> {
        const startTime = Date.now();
        const fallbackRequestId = randomUUID();
        this.activeResponses.add(nodeResponse);
        nodeResponse.once('close', () => {
            this.activeResponses.delete(nodeResponse);
            // Keep-alive sockets that became idle during the shutdown are closed right away
            if (this.currentState === FRONT_END_STATES.Closed) this.server.closeIdleConnections();
        });

        let ctx: RequestContext | undefined;
        let response: Response;
        let timedOut = false;
        const timer = setTimeout(() => {
            timedOut = true;
            this.handleTimeout(nodeRequest, nodeResponse, ctx?.requestId ?? fallbackRequestId);
        }, this.config.requestTimeout);

        try {
            const body = await readBody(nodeRequest, this.config.maxBodySize);
            const context = resolve(connectionFromSocket(nodeRequest.socket), nodeRequest.headers, this.config.trust, {
                method: nodeRequest.method,
                url: nodeRequest.url,
                body,
                requestId: fallbackRequestId,
            });
            ctx = context;
            response = await logger.runWithMetadata({ requestId: context.requestId, clientAddress: context.clientAddress }, () =>
                this.dispatch(context),
            );
        } catch (e) {
            const error = ServerError.fromError(e);
            error.requestId = ctx?.requestId ?? fallbackRequestId;
            logger.error(error.toJSON(true));
            response = error.toResponse(nodeRequest.headers.accept);
        } finally {
            clearTimeout(timer);
        }

        // The timeout has already answered the request or the client went away
        if (timedOut || nodeResponse.headersSent || nodeResponse.destroyed) return;

        response.setHeader(HEADERS.XRequestId, ctx?.requestId ?? fallbackRequestId);
        response.setHeaders(corsHeaders(this.config.corsOrigins, ctx?.getHeader(HEADERS.Origin)) ?? {});
        if (this.currentState === FRONT_END_STATES.Closed || !nodeRequest.complete) {
            response.setHeader(HEADERS.Connection, 'close');
        }

        try {
            await response.toNodeResponse(nodeResponse);
        } catch (e) {
            logger.debug(`Failed to write the response: ${e instanceof Error ? e.message : String(e)}`);
        }

        logger.info(`${nodeRequest.method} ${ctx?.path ?? nodeRequest.url} ${response.statusCode} ${Date.now() - startTime}ms`, {
            requestId: ctx?.requestId ?? fallbackRequestId,
            clientAddress: ctx?.clientAddress ?? nodeRequest.socket.remoteAddress,
        });
    }

    /**
     * Answers the internal endpoints, CORS preflights and passes everything else to the handler.
     */
    protected async dispatch(ctx: RequestContext): Promise<Response> {
        if (ctx.path === HEALTH_PATH && (ctx.method === 'GET' || ctx.method === 'HEAD')) {
            return this.currentState === FRONT_END_STATES.Closed
                ? Response.json({ status: 'shutting-down' }, { statusCode: STATUS_CODES.StatusServiceUnavailable })
                : Response.json({ status: 'ok' });
        }

        const preflight = handlePreflight(this.config.corsOrigins, ctx);
        if (preflight) return preflight;

        return Response.from(await this.handler(ctx));
    }

    protected handleTimeout(nodeRequest: http.IncomingMessage, nodeResponse: http.ServerResponse, requestId: string): void {
        const error = new RequestTimeoutError(`The request did not finish within ${this.config.requestTimeout}ms.`, { requestId });
        logger.warn(error.message, { requestId });

        // Too late to send the error, the handler already started the response
        if (nodeResponse.headersSent) {
            nodeRequest.socket.destroy();
            return;
        }

        const response = error.toResponse(nodeRequest.headers.accept);
        response.setHeader(HEADERS.XRequestId, requestId);
        response.setHeader(HEADERS.Connection, 'close');
        response
            .toNodeResponse(nodeResponse)
            .catch((e: unknown) => logger.debug(`Failed to write the timeout response: ${e instanceof Error ? e.message : String(e)}`))
            .finally(() => nodeRequest.socket.destroy());
    }

    /**
     * Errors on the connection before a request could be parsed.
     * Only the affected socket is closed.
     */
    protected handleClientError(error: Error, socket: Duplex): void {
        const code = errorCode(error);
        logger.debug(`Client connection error: ${error.message}`, { code });

        if (code === 'ECONNRESET' || !socket.writable) {
            socket.destroy();
            return;
        }

        const status =
            code === 'ERR_HTTP_REQUEST_TIMEOUT'
                ? '408 Request Timeout'
                : code === 'HPE_HEADER_OVERFLOW'
                  ? '431 Request Header Fields Too Large'
                  : '400 Bad Request';
        socket.end(`HTTP/1.1 ${status}\r\nConnection: close\r\nContent-Length: 0\r\n\r\n`);
    }
}

/**
 * Creates the front end for the given port, binds it and starts accepting connections.
 */
export async function serve(port: number, handler: RequestHandler, options: ConfigOptions = {}): Promise<FrontEnd> {
    const frontEnd = new FrontEnd(handler, new Config({ ...options, port }).validate());
    await frontEnd.listen();
    return frontEnd;
}

/**
 * Reads the whole request body.
 * Rejects with PayloadTooLargeError as soon as the body exceeds the limit.
 * The rest of the body is drained, so the error response can still be sent.
 */
export function readBody(nodeRequest: http.IncomingMessage, maxBodySize: number): Promise<Buffer> {
    const tooLarge = () => new PayloadTooLargeError(`The request body exceeds the limit of ${maxBodySize} bytes.`);

    const declaredLength = Number(nodeRequest.headers[HEADERS.ContentLength]);
    if (Number.isFinite(declaredLength) && declaredLength > maxBodySize) {
        nodeRequest.resume();
        return Promise.reject(tooLarge());
    }

    return new Promise((resolve, reject) => {
        const chunks: Buffer[] = [];
        let size = 0;

        const onData = (chunk: Buffer) => {
            size += chunk.length;
            if (size > maxBodySize) {
                nodeRequest.off('data', onData);
                nodeRequest.resume();
                reject(tooLarge());
                return;
            }
            chunks.push(chunk);
        };

        nodeRequest.on('data', onData);
        nodeRequest.once('end', () => resolve(Buffer.concat(chunks)));
        nodeRequest.once('error', reject);
    });
}

function toBindError(error: unknown, host: string, port: number): BindError {
    const code = errorCode(error);
    const message = error instanceof Error ? error.message : String(error);
    const changePort = `Stop the process that uses the port or choose another one with the --port option or the ${ENV_VARS.Port} environment variable.`;

    switch (code) {
        case 'EADDRINUSE':
            return new BindError(`Port ${port} is already in use.`, { code, cause: error, instructions: [changePort] });
        case 'EACCES':
            return new BindError(`Permission denied to listen on ${host}:${port}.`, {
                code,
                cause: error,
                instructions: ['Ports below 1024 require elevated privileges. Use a port above 1024, e.g. 3000.'],
            });
        case 'EADDRNOTAVAIL':
            return new BindError(`The address ${host} is not available on this machine.`, {
                code,
                cause: error,
                instructions: [`Use 0.0.0.0 to listen on all interfaces or set the ${ENV_VARS.Host} environment variable.`],
            });
        default:
            return new BindError(`Failed to listen on ${host}:${port}: ${message}`, { code, cause: error });
    }
}

function errorCode(error: unknown): string | undefined {
    if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
    return typeof error.code === 'string' ? error.code : undefined;
}
