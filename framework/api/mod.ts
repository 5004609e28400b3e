/**
 * Layer 13: API Layer
 *
 * Standard response envelopes and status codes for JSON APIs.
 */

export { apiError, HttpStatus, type ApiResponse, type ApiError } from './response.ts';
