/**
 * Enhanced Request Object
 *
 * Wraps the native Request with additional utilities and properties
 * commonly needed in web applications.
 */

import { HttpError } from './errors.ts';

export interface RequestContext {
  params: Record<string, string>;
  query: URLSearchParams;
  state: Map<string, unknown>;
  remoteAddress?: string;
}

/**
 * Proxy headers consulted for the client address, in priority order
 */
const CLIENT_IP_HEADERS = ['X-Real-IP', 'CF-Connecting-IP', 'True-Client-IP'];

/**
 * Resolve the client IP address (accounting for proxies)
 */
export function resolveClientIp(headers: Headers, remoteAddress?: string): string {
  const forwarded = headers.get('X-Forwarded-For')?.split(',')[0]?.trim();
  if (forwarded) return forwarded;

  for (const name of CLIENT_IP_HEADERS) {
    const value = headers.get(name)?.trim();
    if (value) return value;
  }

  return remoteAddress || 'unknown';
}

/**
 * Parse a JSON request body, rejecting malformed input with a 400
 */
export async function parseJsonBody(request: Request): Promise<unknown> {
  const text = await request.text();
  if (text.trim() === '') {
    throw HttpError.badRequest('Request body is required');
  }

  try {
    return JSON.parse(text);
  } catch {
    throw HttpError.badRequest('Request body must be valid JSON');
  }
}

/**
 * Enhanced Request class
 */
export class AppRequest {
  private _request: Request;
  private _url: URL;
  private _context: RequestContext;

  constructor(request: Request, context?: Partial<RequestContext>) {
    this._request = request;
    this._url = new URL(request.url);
    this._context = {
      params: context?.params ?? {},
      query: this._url.searchParams,
      state: context?.state ?? new Map(),
      remoteAddress: context?.remoteAddress,
    };
  }

  /**
   * The underlying native Request
   */
  get raw(): Request {
    return this._request;
  }

  /**
   * HTTP method (GET, POST, etc.)
   */
  get method(): string {
    return this._request.method;
  }

  /**
   * Full URL
   */
  get url(): string {
    return this._request.url;
  }

  /**
   * URL path (without query string)
   */
  get path(): string {
    return this._url.pathname;
  }

  /**
   * Query parameters as URLSearchParams
   */
  get query(): URLSearchParams {
    return this._context.query;
  }

  /**
   * Route parameters extracted from path
   */
  get params(): Record<string, string> {
    return this._context.params;
  }

  /**
   * Request headers
   */
  get headers(): Headers {
    return this._request.headers;
  }

  /**
   * Get a specific header value
   */
  header(name: string): string | null {
    return this._request.headers.get(name);
  }

  /**
   * Request state for passing data between middleware
   */
  get state(): Map<string, unknown> {
    return this._context.state;
  }

  /**
   * Content-Type header
   */
  get contentType(): string | null {
    return this.header('Content-Type');
  }

  /**
   * Get the client IP address (accounting for proxies)
   */
  get ip(): string {
    return resolveClientIp(this._request.headers, this._context.remoteAddress);
  }

  /**
   * Parse and return the request body as JSON
   */
  json(): Promise<unknown> {
    return parseJsonBody(this._request);
  }
}
