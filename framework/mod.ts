/**
 * Web framework
 *
 * A layered web framework for Node.js: HTTP adapter, middleware pipeline,
 * URL router, KV-backed ORM, configuration, telemetry and health checks.
 *
 * @module
 */

// Application
export { Application, createApp, type ApplicationOptions, type ListenOptions } from './app.ts';

// Layer 0: Runtime
export { Lifecycle, type LifecycleHook, type LifecycleOptions } from './runtime/mod.ts';

// Layer 1: HTTP/Server
export {
  Server,
  AppRequest,
  AppResponse,
  HttpError,
  parseJsonBody,
  resolveClientIp,
  withHeaders,
  toError,
  type Context,
  type ErrorCode,
  type Middleware,
  type Next,
  type RouteHandler,
  type ServerOptions,
} from './http/mod.ts';

// Layer 2: Middleware
export {
  MiddlewarePipeline,
  corsMiddleware,
  loggingMiddleware,
  REQUEST_ID_HEADER,
  type CorsOptions,
  type LoggingOptions,
} from './middleware/mod.ts';

// Layer 3: Router
export { Router, type RouteDefinition, type RouteMatch, type RouteOptions } from './router/mod.ts';

// Layer 5: ORM/Data
export {
  KVStore,
  KVConflictError,
  Model,
  ModelValidationError,
  Query,
  query,
  getKV,
  setKV,
  retryOnConflict,
  readRecord,
  field,
  validators,
  type KvKey,
  type ModelDefinition,
  type FieldDefinition,
  type QueryResult,
  type Validator,
} from './orm/mod.ts';

// Layer 11: Admin
export { HealthCheck, healthRoutes, type HealthStatus } from './admin/mod.ts';

// Layer 12: Telemetry
export {
  Logger,
  getLogger,
  setLogger,
  isLogLevel,
  withSpan,
  withDbSpan,
  withHttpClientSpan,
  type LogLevel,
  type LogFormat,
} from './telemetry/mod.ts';

// Layer 13: API
export { apiError, HttpStatus, type ApiResponse, type ApiError } from './api/mod.ts';

// Layer 14: Config
export { Config, loadConfig, type ConfigTree } from './config/mod.ts';
