/**
 * CORS Middleware
 *
 * Handles Cross-Origin Resource Sharing (CORS) headers
 * and preflight OPTIONS requests.
 */

import type { Middleware } from '../http/types.ts';
import { withHeaders } from '../http/response.ts';

export interface CorsOptions {
  origin?: string | string[] | ((origin: string) => boolean);
  methods?: string[];
  allowedHeaders?: string[];
  exposedHeaders?: string[];
  credentials?: boolean;
  maxAge?: number;
}

const DEFAULT_OPTIONS: Required<CorsOptions> = {
  origin: '*',
  methods: ['GET', 'HEAD', 'PUT', 'PATCH', 'POST', 'DELETE'],
  allowedHeaders: ['Content-Type', 'Authorization'],
  exposedHeaders: [],
  credentials: false,
  maxAge: 86400, // 24 hours
};

/**
 * Create CORS middleware
 */
export function corsMiddleware(options: CorsOptions = {}): Middleware {
  const opts: Required<CorsOptions> = { ...DEFAULT_OPTIONS, ...options };

  return async (ctx, next) => {
    const origin = ctx.header('Origin');
    const headers = new Headers();

    const allowedOrigin = getOriginHeader(origin, opts.origin, opts.credentials);
    if (allowedOrigin) {
      headers.set('Access-Control-Allow-Origin', allowedOrigin);
      if (allowedOrigin !== '*') {
        headers.set('Vary', 'Origin');
      }
    }

    if (opts.credentials) {
      headers.set('Access-Control-Allow-Credentials', 'true');
    }

    if (opts.exposedHeaders.length > 0) {
      headers.set('Access-Control-Expose-Headers', opts.exposedHeaders.join(', '));
    }

    // Handle preflight requests
    if (ctx.method === 'OPTIONS') {
      headers.set('Access-Control-Allow-Methods', opts.methods.join(', '));
      headers.set(
        'Access-Control-Allow-Headers',
        ctx.header('Access-Control-Request-Headers') ?? opts.allowedHeaders.join(', ')
      );

      if (opts.maxAge) {
        headers.set('Access-Control-Max-Age', opts.maxAge.toString());
      }

      return new Response(null, { status: 204, headers });
    }

    return withHeaders(await next(), headers);
  };
}

/**
 * Determine the Access-Control-Allow-Origin header value
 */
function getOriginHeader(
  origin: string | null,
  allowed: Required<CorsOptions>['origin'],
  credentials: boolean
): string | null {
  if (!origin) return null;

  if (allowed === '*') {
    // Browsers reject a wildcard on credentialed requests
    return credentials ? origin : '*';
  }

  if (typeof allowed === 'string') {
    return origin === allowed ? allowed : null;
  }

  if (Array.isArray(allowed)) {
    if (allowed.includes('*')) return credentials ? origin : '*';
    return allowed.includes(origin) ? origin : null;
  }

  return allowed(origin) ? origin : null;
}
