import { isIP } from 'net';
import { HEADERS } from '../../constants.js';
import { Connection, HeaderValue, Headers, RequestContext, Scheme } from '../router/requestContext.js';
import { createProxyMatcher, TrustConfig } from './trustConfig.js';

export type RawHeaders = Record<string, HeaderValue | undefined>;

export interface RequestLine {
    method?: string;
    url?: string;
    body?: Buffer;
    /**
     * Used when the request doesn't carry its own x-request-id header.
     */
    requestId?: string;
}

const HOST_PATTERN = /^((?:[A-Za-z0-9](?:[A-Za-z0-9_-]{0,61}[A-Za-z0-9])?(?:\.[A-Za-z0-9](?:[A-Za-z0-9_-]{0,61}[A-Za-z0-9])?)*\.?|\[[0-9A-Fa-f:.]+\]))(?::(\d{1,5}))?$/;
const MAX_PORT = 65535;
const REQUEST_ID_PATTERN = /^[\w\-.:]{1,200}$/;

// Matchers are cached per TrustConfig, which is immutable.
const proxyMatchers = new WeakMap<TrustConfig, (address: string) => boolean>();

/**
 * Resolves the effective client address, scheme and host of the request.
 *
 * When trust is disabled or the peer is not a trusted proxy, the values come from the transport.
 * Otherwise the leftmost well-formed entry of the forwarded-for header is the client address,
 * 'https' in the forwarded-proto header marks the request as secure
 * and a valid forwarded-host header replaces the Host header.
 * Malformed headers are ignored and never throw.
 */
export function resolve(connection: Connection, headers: RawHeaders, trustConfig: TrustConfig, requestLine: RequestLine = {}): RequestContext {
    const normalizedHeaders = normalizeHeaders(headers);
    const transportScheme: Scheme = connection.encrypted ? 'https' : 'http';
    const trusted = trustConfig.enabled && isTrustedProxy(trustConfig, connection.remoteAddress);

    let clientAddress = connection.remoteAddress;
    let scheme = transportScheme;
    let host = parseHost(firstValue(normalizedHeaders[HEADERS.Host]));

    if (trusted) {
        clientAddress = resolveForwardedFor(normalizedHeaders[trustConfig.forwardedForHeader]) ?? clientAddress;
        scheme = resolveForwardedProto(normalizedHeaders[trustConfig.forwardedProtoHeader]) ?? scheme;
        host = parseHost(firstValue(normalizedHeaders[trustConfig.forwardedHostHeader])) ?? host;
    }

    const resolvedHost = host ?? 'localhost';
    const method = (requestLine.method || 'GET').toUpperCase();
    const { path, search } = parseTarget(requestLine.url || '/');
    const headerRequestId = firstValue(normalizedHeaders[HEADERS.XRequestId]);

    return new RequestContext({
        clientAddress,
        scheme,
        host: resolvedHost,
        method,
        path,
        url: `${scheme}://${resolvedHost}${path}${search}`,
        headers: normalizedHeaders,
        requestId: headerRequestId && REQUEST_ID_PATTERN.test(headerRequestId) ? headerRequestId : (requestLine.requestId ?? ''),
        connection,
        body: requestLine.body,
    });
}

function isTrustedProxy(trustConfig: TrustConfig, address: string): boolean {
    let matcher = proxyMatchers.get(trustConfig);
    if (!matcher) {
        matcher = createProxyMatcher(trustConfig.trustedProxies);
        proxyMatchers.set(trustConfig, matcher);
    }
    return matcher(address);
}

/**
 * Lower-cases the header names, keeps their order and freezes the result.
 */
export function normalizeHeaders(headers: RawHeaders): Headers {
    const result: Record<string, HeaderValue> = {};
    for (const [key, value] of Object.entries(headers)) {
        if (value === undefined) continue;
        result[key.toLowerCase()] = typeof value === 'string' ? value : Object.freeze([...value]);
    }
    return Object.freeze(result);
}

/**
 * Returns the leftmost entry of the list that is a valid IP address.
 * e.g.: '203.0.113.5, 10.0.0.1' => '203.0.113.5'
 */
export function resolveForwardedFor(value: HeaderValue | undefined): string | undefined {
    if (value === undefined) return undefined;
    const entries = (typeof value === 'string' ? value : value.join(',')).split(',');
    for (const entry of entries) {
        const address = parseAddress(entry);
        if (address) return address;
    }
    return undefined;
}

/**
 * Returns 'https' only when the first entry is 'https'.
 * Any other value leaves the scheme observed on the transport.
 */
export function resolveForwardedProto(value: HeaderValue | undefined): Scheme | undefined {
    const proto = firstValue(value)?.toLowerCase();
    return proto === 'https' ? 'https' : undefined;
}

/**
 * Accepts '203.0.113.5', '203.0.113.5:4711', '2001:db8::1', '[2001:db8::1]' and '[2001:db8::1]:4711'
 * and returns the bare address. Returns undefined for anything else.
 */
export function parseAddress(entry: string): string | undefined {
    const value = entry.trim();
    if (!value) return undefined;
    if (isIP(value)) return value;

    const bracketed = /^\[([^\]]+)\](?::\d{1,5})?$/.exec(value);
    if (bracketed) {
        return isIP(bracketed[1]) === 6 ? bracketed[1] : undefined;
    }

    const withPort = /^(\d{1,3}(?:\.\d{1,3}){3}):\d{1,5}$/.exec(value);
    if (withPort) {
        return isIP(withPort[1]) === 4 ? withPort[1] : undefined;
    }

    return undefined;
}

/**
 * Returns the lower-cased 'hostname[:port]' when it is usable in a URL as it is.
 * Hosts the URL parser rejects or rewrites, such as '[1.2.3.4]' or '10.1', are invalid.
 */
export function parseHost(value: string | undefined): string | undefined {
    const match = value ? HOST_PATTERN.exec(value) : null;
    if (!value || !match) return undefined;

    const [, hostname, port] = match;
    if (port !== undefined && Number(port) > MAX_PORT) return undefined;

    let parsedHostname: string;
    try {
        parsedHostname = new URL(`http://${hostname}`).hostname;
    } catch {
        return undefined;
    }
    return parsedHostname === hostname.toLowerCase() ? value.toLowerCase() : undefined;
}

function firstValue(value: HeaderValue | undefined): string | undefined {
    if (value === undefined) return undefined;
    const first = (typeof value === 'string' ? value : value[0])?.split(',')[0]?.trim();
    return first || undefined;
}

/**
 * Splits the request target into the path and the query string.
 * Absolute-form targets (GET http://example.com/path) keep only their path.
 */
function parseTarget(target: string): { path: string; search: string } {
    try {
        const url = target.startsWith('/') ? new URL(`http://localhost${target}`) : new URL(target);
        return { path: url.pathname, search: url.search };
    } catch {
        const [path = '/', ...query] = target.split('?');
        return { path: path.startsWith('/') ? path : `/${path}`, search: query.length ? `?${query.join('?')}` : '' };
    }
}
