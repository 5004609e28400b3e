/**
 * Layer 2: Middleware Layer
 *
 * Cross-cutting concerns that wrap every request/response cycle.
 * Implements the onion model where each middleware wraps the next.
 *
 * Responsibilities:
 * - Handle cross-cutting concerns without polluting business logic
 * - Enable composition of features
 * - Maintain separation of concerns
 */

export { MiddlewarePipeline } from './pipeline.ts';
export { corsMiddleware, type CorsOptions } from './cors.ts';
export { loggingMiddleware, REQUEST_ID_HEADER, type LoggingOptions } from './logging.ts';
