/**
 * Process Lifecycle Management
 *
 * Signal handling and graceful shutdown of resources.
 */

import { getLogger } from '../telemetry/logger.ts';
import { toError } from '../http/errors.ts';

export type LifecycleHook = () => Promise<void> | void;

export interface LifecycleOptions {
  shutdownTimeout?: number;
}

/**
 * Lifecycle manager for the application process
 */
export class Lifecycle {
  private shutdownHooks: LifecycleHook[] = [];

  private abortController: AbortController;
  private isShuttingDown = false;
  private signalsBound = false;
  private shutdownTimeout: number;

  constructor(options: LifecycleOptions = {}) {
    this.abortController = new AbortController();
    this.shutdownTimeout = options.shutdownTimeout ?? 30000; // 30 seconds default
  }

  /**
   * Get the abort signal for graceful shutdown
   */
  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  /**
   * Whether shutdown has begun
   */
  get shuttingDown(): boolean {
    return this.isShuttingDown;
  }

  /**
   * Register a hook to run on graceful shutdown
   */
  onShutdown(hook: LifecycleHook): void {
    this.shutdownHooks.push(hook);
  }

  /**
   * Trigger graceful shutdown
   */
  async shutdown(reason?: string): Promise<void> {
    if (this.isShuttingDown) return;
    this.isShuttingDown = true;

    const logger = getLogger();
    logger.info(`Shutting down${reason ? `: ${reason}` : ''}`);

    this.abortController.abort();

    const forceShutdown = setTimeout(() => {
      logger.error('Shutdown timeout exceeded, forcing exit');
      process.exit(1);
    }, this.shutdownTimeout);
    forceShutdown.unref();

    try {
      // Run shutdown hooks in reverse order (LIFO)
      for (const hook of [...this.shutdownHooks].reverse()) {
        await hook();
      }
      logger.info('Shutdown complete');
    } catch (error) {
      logger.error('Error during shutdown', toError(error));
      process.exitCode = 1;
    } finally {
      clearTimeout(forceShutdown);
    }
  }

  /**
   * Shut down on SIGINT and SIGTERM
   */
  handleSignals(): void {
    if (this.signalsBound) return;
    this.signalsBound = true;

    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
      process.once(signal, () => {
        void this.shutdown(`Received ${signal}`);
      });
    }
  }
}
