export const NAME = 'edgefront';
export const DESCRIPTION = 'Proxy-trust-aware HTTP front end';
export const BRAND = 'Edgefront';
export const VERSION = '0.1.0';

// Default listening contract.
// The container declares port 3000 as exposed, so keep both in sync.
export const HOST = '0.0.0.0';
export const PORT = 3000;

// Default timeouts in milliseconds
export const DEFAULT_REQUEST_TIMEOUT = 30_000;
export const DEFAULT_SHUTDOWN_GRACE_PERIOD = 10_000;
export const DEFAULT_KEEP_ALIVE_TIMEOUT = 5_000;

// Default max size of the request body in bytes (10 MiB)
export const DEFAULT_MAX_BODY_SIZE = 10 * 1024 * 1024;

// This is prefix for all our internal endpoints.
// For example: /__edgefront__/health
export const INTERNAL_PATH_PREFIX = '/__edgefront__';
export const HEALTH_PATH = `${INTERNAL_PATH_PREFIX}/health`;

// Marks "any address" in the list of trusted proxies
export const ANY_PROXY = '*';

export const HEADERS = {
    Host: 'host',
    Origin: 'origin',
    Accept: 'accept',
    Connection: 'connection',
    ContentType: 'content-type',
    ContentLength: 'content-length',
    XForwardedFor: 'x-forwarded-for',
    XForwardedProto: 'x-forwarded-proto',
    XForwardedHost: 'x-forwarded-host',
    XRequestId: 'x-request-id',
    Vary: 'vary',
    AccessControlAllowOrigin: 'access-control-allow-origin',
    AccessControlAllowCredentials: 'access-control-allow-credentials',
    AccessControlAllowMethods: 'access-control-allow-methods',
    AccessControlAllowHeaders: 'access-control-allow-headers',
    AccessControlRequestHeaders: 'access-control-request-headers',
    AccessControlMaxAge: 'access-control-max-age',
} as const;

export const STATUS_CODES = {
    StatusOk: 200,
    StatusNoContent: 204,
    StatusBadRequest: 400,
    StatusForbidden: 403,
    StatusNotFound: 404,
    StatusPayloadTooLarge: 413,
    StatusInternalError: 500,
    StatusServiceUnavailable: 503,
    StatusRequestTimeout: 504,
} as const;

export const EXIT_CODES = {
    Success: 0,
    Failure: 1,
} as const;

// Environment variables read by Config.fromEnv()
export const ENV_VARS = {
    Host: 'HOST',
    Port: 'PORT',
    ProxyHeaders: 'PROXY_HEADERS',
    ForwardedAllowIps: 'FORWARDED_ALLOW_IPS',
    ForwardedForHeader: 'FORWARDED_FOR_HEADER',
    ForwardedProtoHeader: 'FORWARDED_PROTO_HEADER',
    ForwardedHostHeader: 'FORWARDED_HOST_HEADER',
    RequestTimeout: 'REQUEST_TIMEOUT',
    ShutdownGracePeriod: 'SHUTDOWN_GRACE_PERIOD',
    KeepAliveTimeout: 'KEEP_ALIVE_TIMEOUT',
    MaxBodySize: 'MAX_BODY_SIZE',
    CorsOrigins: 'CORS_ORIGINS',
} as const;
