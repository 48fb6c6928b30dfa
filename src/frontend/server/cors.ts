import { HEADERS, STATUS_CODES } from '../../constants.js';
import { RequestContext } from '../router/requestContext.js';
import { Response } from '../router/response.js';

const ALLOWED_METHODS = 'GET, POST, PUT, PATCH, DELETE, OPTIONS, HEAD';
const PREFLIGHT_MAX_AGE = '600';

/**
 * Returns the headers for a cross-origin request from an allowed origin.
 * Returns undefined when CORS is disabled, the request has no Origin header
 * or the origin is not in the list.
 */
export function corsHeaders(allowedOrigins: readonly string[], requestOrigin: string | undefined): Record<string, string> | undefined {
    if (!allowedOrigins.length || !requestOrigin) return undefined;
    if (!allowedOrigins.includes('*') && !allowedOrigins.includes(requestOrigin)) return undefined;

    return {
        [HEADERS.AccessControlAllowOrigin]: requestOrigin,
        [HEADERS.AccessControlAllowCredentials]: 'true',
        [HEADERS.Vary]: 'Origin',
    };
}

/**
 * Answers the preflight request, or returns undefined if it's not one.
 * e.g.: OPTIONS /api with Origin and Access-Control-Request-Method headers => 204
 */
export function handlePreflight(allowedOrigins: readonly string[], ctx: RequestContext): Response | undefined {
    if (!allowedOrigins.length || ctx.method !== 'OPTIONS') return undefined;
    const origin = ctx.getHeader(HEADERS.Origin);
    if (!origin || !ctx.getHeader('access-control-request-method')) return undefined;

    const headers = corsHeaders(allowedOrigins, origin);
    if (!headers) {
        return Response.text('Disallowed CORS origin', { statusCode: STATUS_CODES.StatusForbidden });
    }

    return new Response(null, {
        statusCode: STATUS_CODES.StatusNoContent,
        headers: {
            ...headers,
            [HEADERS.AccessControlAllowMethods]: ALLOWED_METHODS,
            [HEADERS.AccessControlAllowHeaders]: ctx.getHeader(HEADERS.AccessControlRequestHeaders) || '*',
            [HEADERS.AccessControlMaxAge]: PREFLIGHT_MAX_AGE,
        },
    });
}
