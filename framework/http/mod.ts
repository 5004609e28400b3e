/**
 * Layer 1: HTTP/Server Layer
 *
 * Bridges Node's HTTP server to Fetch API Request/Response objects and
 * wraps them into richer request/response helpers.
 *
 * Responsibilities:
 * - Normalize HTTP variations
 * - Provide consistent developer interface
 * - Map thrown HttpErrors to JSON error bodies
 * - Enable testability (plain Request in, Response out)
 */

export { Server, type ServerOptions, type RequestHandler } from './server.ts';
export { AppRequest, resolveClientIp, parseJsonBody, type RequestContext } from './request.ts';
export { AppResponse, withHeaders, type ResponseOptions } from './response.ts';
export { HttpError, statusForCode, toError, type ErrorCode } from './errors.ts';
export type {
  Handler,
  Context,
  Middleware,
  Next,
  RouteHandler,
  HttpMethod,
  ConnInfo,
} from './types.ts';
