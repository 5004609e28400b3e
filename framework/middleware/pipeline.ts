/**
 * Middleware Pipeline
 *
 * Manages the execution of middleware in a chain (onion model).
 * Each middleware can:
 * - Inspect/modify request before handler
 * - Short-circuit and return early response
 * - Inspect/modify response after handler
 * - Handle exceptions at any point
 */

import type { Context, Middleware, Next } from '../http/types.ts';

/**
 * Middleware pipeline for request processing
 */
export class MiddlewarePipeline {
  private middleware: Middleware[] = [];

  /**
   * Add middleware to the pipeline
   */
  use(middleware: Middleware): this {
    this.middleware.push(middleware);
    return this;
  }

  /**
   * Get the number of middleware in the pipeline
   */
  get length(): number {
    return this.middleware.length;
  }

  /**
   * Execute the middleware pipeline
   */
  async execute(ctx: Context, finalHandler: Middleware): Promise<Response> {
    const dispatch = async (index: number): Promise<Response> => {
      const middleware = this.middleware[index];
      if (!middleware) {
        // All middleware executed, run final handler
        return await finalHandler(ctx, () => Promise.reject(new Error('next() called after the final handler')));
      }

      let called = false;
      const next: Next = () => {
        if (called) {
          return Promise.reject(new Error('next() called multiple times'));
        }
        called = true;
        return dispatch(index + 1);
      };

      return await middleware(ctx, next);
    };

    return await dispatch(0);
  }
}
