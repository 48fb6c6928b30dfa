import { BlockList, isIP } from 'net';
import { ANY_PROXY, HEADERS } from '../../constants.js';

/**
 * Process-wide proxy trust settings.
 * Created once at startup and read by every request.
 */
export interface TrustConfig {
    /**
     * Whether the forwarding headers are believed at all.
     * @default true
     */
    readonly enabled: boolean;

    /**
     * Header with the chain of client addresses.
     * @default x-forwarded-for
     */
    readonly forwardedForHeader: string;

    /**
     * Header with the protocol the client used to reach the proxy.
     * @default x-forwarded-proto
     */
    readonly forwardedProtoHeader: string;

    /**
     * Header with the host the client requested.
     * @default x-forwarded-host
     */
    readonly forwardedHostHeader: string;

    /**
     * Addresses or CIDR ranges of the proxies whose headers are trusted.
     * The '*' entry trusts any peer.
     * @default ['*']
     */
    readonly trustedProxies: readonly string[];
}

export type TrustConfigOptions = Partial<TrustConfig>;

// RFC 9110 token characters
const HEADER_NAME_PATTERN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

export function createTrustConfig(options: TrustConfigOptions = {}): TrustConfig {
    return Object.freeze({
        enabled: options.enabled ?? true,
        forwardedForHeader: (options.forwardedForHeader ?? HEADERS.XForwardedFor).toLowerCase(),
        forwardedProtoHeader: (options.forwardedProtoHeader ?? HEADERS.XForwardedProto).toLowerCase(),
        forwardedHostHeader: (options.forwardedHostHeader ?? HEADERS.XForwardedHost).toLowerCase(),
        trustedProxies: Object.freeze([...(options.trustedProxies ?? [ANY_PROXY])]),
    });
}

export function isValidHeaderName(name: string): boolean {
    return HEADER_NAME_PATTERN.test(name);
}

/**
 * Parses '10.0.0.1' or '10.0.0.0/8' into the address, family and prefix.
 * Returns undefined for anything else.
 */
export function parseProxyEntry(entry: string): { address: string; family: 'ipv4' | 'ipv6'; prefix?: number } | undefined {
    const [address = '', prefixText, ...rest] = entry.trim().split('/');
    if (rest.length) return undefined;

    const version = isIP(address);
    if (version === 0) return undefined;
    const family = version === 4 ? 'ipv4' : 'ipv6';
    if (prefixText === undefined) return { address, family };

    const maxPrefix = version === 4 ? 32 : 128;
    if (!/^\d{1,3}$/.test(prefixText) || Number(prefixText) > maxPrefix) return undefined;
    return { address, family, prefix: Number(prefixText) };
}

/**
 * Builds a matcher that tells whether the peer address belongs to a trusted proxy.
 */
export function createProxyMatcher(trustedProxies: readonly string[]): (address: string) => boolean {
    if (trustedProxies.includes(ANY_PROXY)) return () => true;

    const blockList = new BlockList();
    for (const entry of trustedProxies) {
        const parsed = parseProxyEntry(entry);
        if (!parsed) continue;
        if (parsed.prefix === undefined) {
            blockList.addAddress(parsed.address, parsed.family);
        } else {
            blockList.addSubnet(parsed.address, parsed.prefix, parsed.family);
        }
    }

    return (address: string) => {
        const normalized = unmapIpv4(address);
        const version = isIP(normalized);
        if (version === 0) return false;
        return blockList.check(normalized, version === 4 ? 'ipv4' : 'ipv6');
    };
}

/**
 * Dual-stack sockets report IPv4 peers as '::ffff:10.0.0.1'.
 */
export function unmapIpv4(address: string): string {
    const mapped = /^::ffff:(\d+\.\d+\.\d+\.\d+)$/i.exec(address);
    return mapped?.[1] ?? address;
}
