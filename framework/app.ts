/**
 * Application Class
 *
 * The main entry point for building applications on the framework.
 * Orchestrates all framework layers into a cohesive application.
 */

import { Server, type ServerOptions } from './http/server.ts';
import { Router, type RouteOptions } from './router/router.ts';
import { MiddlewarePipeline } from './middleware/pipeline.ts';
import { Config, type ConfigTree } from './config/config.ts';
import { getLogger, type Logger } from './telemetry/logger.ts';
import { recordSpanException, setRouteAttribute } from './telemetry/otel.ts';
import { Lifecycle } from './runtime/lifecycle.ts';
import { AppRequest, resolveClientIp } from './http/request.ts';
import { AppResponse } from './http/response.ts';
import { HttpError, toError } from './http/errors.ts';
import type { ConnInfo, Context, Handler, Middleware, RouteHandler } from './http/types.ts';

export interface ApplicationOptions {
  config?: Config | ConfigTree;
  logger?: Logger;
  lifecycle?: Lifecycle;
}

export type ListenOptions = Partial<Pick<ServerOptions, 'port' | 'hostname' | 'onListen'>>;

/**
 * Main Application class
 */
export class Application {
  private server: Server | null = null;
  private router: Router;
  private middleware: MiddlewarePipeline;
  private config: Config;
  private logger: Logger;
  private lifecycle: Lifecycle;
  private initialized = false;

  constructor(options: ApplicationOptions = {}) {
    this.config = options.config instanceof Config ? options.config : new Config(options.config);
    this.router = new Router();
    this.middleware = new MiddlewarePipeline();
    this.logger = options.logger ?? getLogger();
    this.lifecycle = options.lifecycle ?? new Lifecycle();
  }

  /**
   * Initialize the application
   */
  async init(): Promise<this> {
    if (this.initialized) return this;

    this.initialized = true;
    this.logger.info('Application initialized', {
      name: this.config.getString('name'),
      env: this.config.getString('env'),
      middleware: this.middleware.length,
    });

    return this;
  }

  /**
   * Add global middleware
   */
  use(middleware: Middleware): this {
    this.middleware.use(middleware);
    return this;
  }

  /**
   * Wrap a RouteHandler (context-based) into a Handler (req/res-based)
   */
  private wrapHandler(handler: RouteHandler): Handler {
    return (req: AppRequest): Promise<Response> | Response => {
      const ctx: Context = {
        request: req.raw,
        url: new URL(req.url),
        params: req.params,
        query: req.query,
        state: req.state,
        ip: req.ip,
        header: (name: string) => req.header(name),
        method: req.method,
      };
      return handler(ctx);
    };
  }

  /**
   * Register a GET route
   */
  get(path: string, handler: RouteHandler, options?: RouteOptions): this {
    this.router.get(path, this.wrapHandler(handler), options);
    return this;
  }

  /**
   * Register a POST route
   */
  post(path: string, handler: RouteHandler, options?: RouteOptions): this {
    this.router.post(path, this.wrapHandler(handler), options);
    return this;
  }

  /**
   * Register a PUT route
   */
  put(path: string, handler: RouteHandler, options?: RouteOptions): this {
    this.router.put(path, this.wrapHandler(handler), options);
    return this;
  }

  /**
   * Register a PATCH route
   */
  patch(path: string, handler: RouteHandler, options?: RouteOptions): this {
    this.router.patch(path, this.wrapHandler(handler), options);
    return this;
  }

  /**
   * Register a DELETE route
   */
  delete(path: string, handler: RouteHandler, options?: RouteOptions): this {
    this.router.delete(path, this.wrapHandler(handler), options);
    return this;
  }

  /**
   * Register routes from a router
   */
  routes(router: Router): this {
    this.router.mount('', router);
    return this;
  }

  /**
   * Get configuration
   */
  getConfig(): Config {
    return this.config;
  }

  /**
   * Get logger
   */
  getLogger(): Logger {
    return this.logger;
  }

  /**
   * Get lifecycle manager
   */
  getLifecycle(): Lifecycle {
    return this.lifecycle;
  }

  /**
   * Get the application router
   */
  getRouter(): Router {
    return this.router;
  }

  /**
   * Handle a request end to end: middleware, routing and error mapping
   */
  async handle(request: Request, conn: ConnInfo = {}): Promise<Response> {
    const url = new URL(request.url);
    const context: Context = {
      request,
      url,
      params: {},
      query: url.searchParams,
      state: new Map<string, unknown>(),
      ip: resolveClientIp(request.headers, conn.remoteAddress),
      header: (name: string) => request.headers.get(name),
      method: request.method,
    };

    try {
      return await this.middleware.execute(context, (ctx) => this.dispatch(ctx, conn));
    } catch (error) {
      if (error instanceof HttpError) {
        return error.toResponse();
      }

      const err = toError(error);
      recordSpanException(err);
      this.logger.error('Unhandled request error', err, {
        method: request.method,
        path: url.pathname,
      });
      return new HttpError('SERVER_ERROR', 'Internal Server Error').toResponse();
    }
  }

  /**
   * Route a request that made it through the middleware
   */
  private async dispatch(ctx: Context, conn: ConnInfo): Promise<Response> {
    const path = ctx.url.pathname;
    const match = this.router.match(ctx.method, path);

    if (!match) {
      if (this.router.hasPath(path)) {
        return new HttpError('METHOD_NOT_ALLOWED', `Method ${ctx.method} not allowed for ${path}`).toResponse();
      }
      return HttpError.notFound(`No route for ${ctx.method} ${path}`).toResponse();
    }

    setRouteAttribute(match.route.path, ctx.method);
    ctx.params = match.params;

    const req = new AppRequest(ctx.request, {
      params: match.params,
      state: ctx.state,
      remoteAddress: conn.remoteAddress,
    });
    const res = new AppResponse();

    try {
      const result = await match.handler(req, res);
      return result instanceof Response ? result : res.build();
    } catch (error) {
      if (error instanceof HttpError) {
        return error.toResponse();
      }
      throw error;
    }
  }

  /**
   * Start the server
   */
  async listen(options: ListenOptions = {}): Promise<void> {
    if (!this.initialized) {
      await this.init();
    }

    const port = options.port ?? this.config.getNumber('port', 8000);
    const hostname = options.hostname ?? this.config.getString('host', '0.0.0.0');

    this.server = new Server({
      port,
      hostname,
      lifecycle: this.lifecycle,
      handler: (request, info) => this.handle(request, info),
      onListen: options.onListen ?? (({ hostname, port }) => {
        this.logger.info(`Server listening on http://${hostname}:${port}`);
      }),
    });

    // Register shutdown handler
    this.lifecycle.onShutdown(async () => {
      await this.stop();
    });

    await this.server.serve();
  }

  /**
   * Stop the server
   */
  async stop(): Promise<void> {
    if (this.server) {
      const server = this.server;
      this.server = null;
      await server.close();
    }

    this.logger.info('Application stopped');
  }
}

/**
 * Create a new application instance
 */
export function createApp(options?: ApplicationOptions): Application {
  return new Application(options);
}
