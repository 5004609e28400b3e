/**
 * Logging Middleware
 *
 * Request/response logging for monitoring and debugging. Every request
 * gets an id, stored in ctx.state and echoed as X-Request-ID.
 */

import { randomUUID } from 'node:crypto';
import type { Middleware } from '../http/types.ts';
import { withHeaders } from '../http/response.ts';
import { toError } from '../http/errors.ts';
import { getLogger, type Logger } from '../telemetry/logger.ts';

export interface LoggingOptions {
  logRequest?: boolean;
  logResponse?: boolean;
  logHeaders?: boolean;
  excludePaths?: string[];
  /** Defaults to the process-wide logger at request time */
  logger?: Logger;
}

const DEFAULT_OPTIONS: Required<Omit<LoggingOptions, 'logger'>> = {
  logRequest: true,
  logResponse: true,
  logHeaders: false,
  excludePaths: ['/health', '/favicon.ico'],
};

export const REQUEST_ID_HEADER = 'X-Request-ID';

/**
 * Create logging middleware
 */
export function loggingMiddleware(options: LoggingOptions = {}): Middleware {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  return async (ctx, next) => {
    const requestId = randomUUID();
    ctx.state.set('requestId', requestId);

    const path = ctx.url.pathname;
    if (opts.excludePaths.some((prefix) => path.startsWith(prefix))) {
      return withHeaders(await next(), { [REQUEST_ID_HEADER]: requestId });
    }

    const logger = (opts.logger ?? getLogger()).child({
      requestId,
      method: ctx.method,
      path,
    });
    const startTime = performance.now();

    if (opts.logRequest) {
      const context: Record<string, unknown> = { ip: ctx.ip };
      if (opts.logHeaders) {
        context.headers = Object.fromEntries(ctx.request.headers.entries());
      }
      logger.info('Request started', context);
    }

    let response: Response;
    try {
      response = await next();
    } catch (error) {
      logger.error('Request failed', toError(error), {
        durationMs: elapsed(startTime),
      });
      throw error;
    }

    if (opts.logResponse) {
      const context = { status: response.status, durationMs: elapsed(startTime) };
      if (response.status >= 500) {
        logger.error('Request completed', undefined, context);
      } else if (response.status >= 400) {
        logger.warn('Request completed', context);
      } else {
        logger.info('Request completed', context);
      }
    }

    return withHeaders(response, { [REQUEST_ID_HEADER]: requestId });
  };
}

function elapsed(startTime: number): number {
  return Math.round((performance.now() - startTime) * 100) / 100;
}
