/**
 * HTTP Server
 *
 * Runs a Fetch-style request handler on Node's HTTP server through
 * the @hono/node-server adapter.
 */

import { IncomingMessage } from 'node:http';
import { serve, type ServerType } from '@hono/node-server';
import { Lifecycle } from '../runtime/lifecycle.ts';
import { getLogger } from '../telemetry/logger.ts';
import { HttpError, toError } from './errors.ts';
import type { ConnInfo } from './types.ts';

export type RequestHandler = (request: Request, info: ConnInfo) => Promise<Response> | Response;

export interface ServerOptions {
  port?: number;
  hostname?: string;
  lifecycle?: Lifecycle;
  onListen?: (addr: { hostname: string; port: number }) => void;
  handler: RequestHandler;
}

/**
 * HTTP Server for the application
 */
export class Server {
  private handler: RequestHandler;
  private lifecycle: Lifecycle;
  private options: ServerOptions;
  private server?: ServerType;

  constructor(options: ServerOptions) {
    this.handler = options.handler;
    this.options = {
      ...options,
      port: options.port ?? 8000,
      hostname: options.hostname ?? '0.0.0.0',
    };
    this.lifecycle = options.lifecycle ?? new Lifecycle();
  }

  /**
   * Get the lifecycle manager
   */
  getLifecycle(): Lifecycle {
    return this.lifecycle;
  }

  /**
   * Start the server; resolves once it is listening
   */
  async serve(): Promise<void> {
    this.lifecycle.handleSignals();

    await new Promise<void>((resolve) => {
      this.server = serve(
        {
          fetch: (request, env) =>
            this.handleRequest(request, { remoteAddress: remoteAddressOf(env) }),
          port: this.options.port,
          hostname: this.options.hostname,
        },
        (info) => {
          this.options.onListen?.({ hostname: info.address, port: info.port });
          resolve();
        }
      );
    });
  }

  /**
   * Handle an incoming request
   */
  private async handleRequest(request: Request, info: ConnInfo): Promise<Response> {
    try {
      return await this.handler(request, info);
    } catch (error) {
      if (error instanceof HttpError) {
        return error.toResponse();
      }

      getLogger().error('Request error', toError(error), { method: request.method, url: request.url });
      return new HttpError('SERVER_ERROR', 'Internal Server Error').toResponse();
    }
  }

  /**
   * Stop accepting connections and wait for the server to close
   */
  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = undefined;

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }
}

/**
 * Extract the socket address from the adapter's bindings
 */
function remoteAddressOf(env: unknown): string | undefined {
  if (
    typeof env === 'object' &&
    env !== null &&
    'incoming' in env &&
    env.incoming instanceof IncomingMessage
  ) {
    return env.incoming.socket.remoteAddress;
  }
  return undefined;
}
