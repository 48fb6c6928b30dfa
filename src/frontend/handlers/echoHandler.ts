import { RequestContext } from '../router/requestContext.js';
import { Response } from '../router/response.js';

/**
 * Default handler used when no application entrypoint is given.
 * It answers every request with the context resolved by the front end,
 * which is handy to verify the proxy setup.
 * @example
 * curl -H 'x-forwarded-for: 203.0.113.5' http://127.0.0.1:3000/hello
 * => { "clientAddress": "203.0.113.5", "scheme": "http", "path": "/hello", ... }
 */
export function echoHandler(ctx: RequestContext): Response {
    const { connection, ...context } = ctx.toJSON();
    return Response.json({
        ...context,
        transportAddress: connection.remoteAddress,
    });
}
