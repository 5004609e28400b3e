/**
 * Layer 14: Configuration & Environment Management
 *
 * Manage settings, secrets, and environment-specific configuration.
 *
 * Responsibilities:
 * - Separate configuration from code
 * - Keep secrets out of the source tree
 * - Enable environment-specific behavior
 * - Configure logging and monitoring
 */

export {
  Config,
  loadConfig,
  type ConfigTree,
  type ConfigValue,
  type LoadConfigOptions,
} from './config.ts';
