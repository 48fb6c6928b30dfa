export * from './logger.js';
export * from './config.js';
export * from './constants.js';
export * from './cliError.js';
export { resolve, normalizeHeaders, parseAddress } from './frontend/trust/trustResolver.js';
export type { RawHeaders, RequestLine } from './frontend/trust/trustResolver.js';
export { createTrustConfig } from './frontend/trust/trustConfig.js';
export type { TrustConfig, TrustConfigOptions } from './frontend/trust/trustConfig.js';
export { RequestContext } from './frontend/router/requestContext.js';
export type { Connection, Scheme, Headers, HeaderValue } from './frontend/router/requestContext.js';
export { Response } from './frontend/router/response.js';
export type { HandlerResult, ResponseOptions } from './frontend/router/response.js';
export { ServerError } from './frontend/errors/serverError.js';
export { RequestTimeoutError } from './frontend/errors/requestTimeoutError.js';
export { PayloadTooLargeError } from './frontend/errors/payloadTooLargeError.js';
export { FrontEnd, FRONT_END_STATES, serve } from './frontend/server/frontEnd.js';
export type { FrontEndState, RequestHandler } from './frontend/server/frontEnd.js';
export { Lifecycle, run } from './lifecycle/lifecycle.js';
export type { LifecycleOptions, RunOptions } from './lifecycle/lifecycle.js';
