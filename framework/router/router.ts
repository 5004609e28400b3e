/**
 * URL Router
 *
 * Router using URLPattern for matching. Every route also matches its
 * path with a trailing slash.
 */

import { URLPattern } from 'urlpattern-polyfill';
import type { Handler, HttpMethod } from '../http/types.ts';

export interface RouteDefinition {
  method: HttpMethod | HttpMethod[] | '*';
  path: string;
  pattern: URLPattern;
  handler: Handler;
  name?: string;
  meta?: Record<string, unknown>;
}

export interface RouteMatch {
  route: RouteDefinition;
  params: Record<string, string>;
  // Convenience accessor for the handler
  handler: Handler;
}

export interface RouteOptions {
  name?: string;
  meta?: Record<string, unknown>;
}

/**
 * URL Router
 */
export class Router {
  private routes: RouteDefinition[] = [];
  private namedRoutes = new Map<string, RouteDefinition>();
  private prefix: string = '';

  constructor(prefix: string = '') {
    this.prefix = prefix;
  }

  /**
   * Register a GET route
   */
  get(path: string, handler: Handler, options?: RouteOptions): this {
    return this.addRoute('GET', path, handler, options);
  }

  /**
   * Register a POST route
   */
  post(path: string, handler: Handler, options?: RouteOptions): this {
    return this.addRoute('POST', path, handler, options);
  }

  /**
   * Register a PUT route
   */
  put(path: string, handler: Handler, options?: RouteOptions): this {
    return this.addRoute('PUT', path, handler, options);
  }

  /**
   * Register a PATCH route
   */
  patch(path: string, handler: Handler, options?: RouteOptions): this {
    return this.addRoute('PATCH', path, handler, options);
  }

  /**
   * Register a DELETE route
   */
  delete(path: string, handler: Handler, options?: RouteOptions): this {
    return this.addRoute('DELETE', path, handler, options);
  }

  /**
   * Register a route for all methods
   */
  all(path: string, handler: Handler, options?: RouteOptions): this {
    return this.addRoute('*', path, handler, options);
  }

  /**
   * Add a route with explicit method
   */
  addRoute(
    method: HttpMethod | HttpMethod[] | '*',
    path: string,
    handler: Handler,
    options: RouteOptions = {}
  ): this {
    const fullPath = normalizePath(this.prefix + path);

    const route: RouteDefinition = {
      method,
      path: fullPath,
      pattern: compilePattern(fullPath),
      handler,
      name: options.name,
      meta: options.meta,
    };

    this.routes.push(route);

    if (options.name) {
      this.namedRoutes.set(options.name, route);
    }

    return this;
  }

  /**
   * Mount a sub-router with a prefix
   */
  mount(prefix: string, router: Router): this {
    for (const route of router.routes) {
      this.addRoute(route.method, prefix + route.path, route.handler, {
        name: route.name,
        meta: route.meta,
      });
    }

    return this;
  }

  /**
   * Match a request to a route
   */
  match(method: string, path: string): RouteMatch | null {
    for (const route of this.routes) {
      if (!methodMatches(route.method, method)) {
        continue;
      }

      const result = route.pattern.exec({ pathname: path });
      if (result) {
        return {
          route,
          params: toParams(result.pathname.groups),
          handler: route.handler,
        };
      }
    }

    return null;
  }

  /**
   * Whether any route matches the path, regardless of method
   */
  hasPath(path: string): boolean {
    return this.routes.some((route) => route.pattern.test({ pathname: path }));
  }

  /**
   * Generate a URL for a named route
   */
  url(name: string, params: Record<string, string> = {}): string | null {
    const route = this.namedRoutes.get(name);
    if (!route) return null;

    let path = route.path;

    // Replace path parameters
    for (const [key, value] of Object.entries(params)) {
      path = path.replace(`:${key}`, encodeURIComponent(value));
    }

    return path;
  }

  /**
   * Get all registered routes (for debugging/admin)
   */
  getRoutes(): RouteDefinition[] {
    return [...this.routes];
  }
}

/**
 * Collapse duplicate slashes and drop a trailing slash
 */
function normalizePath(path: string): string {
  const collapsed = ('/' + path).replace(/\/{2,}/g, '/');
  return collapsed.length > 1 ? collapsed.replace(/\/$/, '') : collapsed;
}

/**
 * Compile a path into a pattern that tolerates a trailing slash
 */
function compilePattern(path: string): URLPattern {
  return new URLPattern({ pathname: path === '/' ? '/' : `${path}{/}?` });
}

function methodMatches(allowed: RouteDefinition['method'], method: string): boolean {
  if (allowed === '*') return true;
  const methods: string[] = Array.isArray(allowed) ? allowed : [allowed];
  return methods.includes(method);
}

function toParams(groups: Record<string, string | undefined>): Record<string, string> {
  const params: Record<string, string> = {};

  for (const [key, value] of Object.entries(groups)) {
    if (value === undefined) continue;
    try {
      params[key] = decodeURIComponent(value);
    } catch {
      params[key] = value;
    }
  }

  return params;
}
