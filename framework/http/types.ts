/**
 * HTTP Type Definitions
 */

import type { AppRequest } from './request.ts';
import type { AppResponse } from './response.ts';

/**
 * Request context for middleware and handlers
 */
export interface Context {
  request: Request;
  url: URL;
  params: Record<string, string>;
  query: URLSearchParams;
  state: Map<string, unknown>;
  /** Client address, resolved through proxy headers */
  ip: string;
  // Convenience methods for compatibility
  header(name: string): string | null;
  method: string;
}

/**
 * Middleware next function (context-based)
 */
export type Next = () => Promise<Response>;

/**
 * HTTP request handler function
 */
export type Handler = (
  req: AppRequest,
  res: AppResponse
) => Promise<Response | void> | Response | void;

/**
 * Route handler using context
 */
export type RouteHandler = (ctx: Context) => Promise<Response> | Response;

/**
 * Middleware function signature (context-based)
 */
export type Middleware = (
  ctx: Context,
  next: Next
) => Promise<Response> | Response;

/**
 * HTTP methods supported by the router
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS' | 'HEAD';

/**
 * Connection details supplied by the server adapter
 */
export interface ConnInfo {
  remoteAddress?: string;
}
