/**
 * Layer 3: Routing Layer
 *
 * Maps incoming request URLs to application code.
 * Supports pattern matching, path parameters, and method binding.
 *
 * Responsibilities:
 * - Map URLs to handlers efficiently
 * - Extract structured data from URLs
 * - Enable clean, RESTful URL design
 * - Support URL generation/reversing
 */

export { Router, type RouteDefinition, type RouteMatch, type RouteOptions } from './router.ts';
