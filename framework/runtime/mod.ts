/**
 * Layer 0: Runtime Environment
 *
 * Process lifecycle: signal handling and graceful shutdown.
 */

export {
  Lifecycle,
  type LifecycleHook,
  type LifecycleOptions,
} from './lifecycle.ts';
