/**
 * Service Results
 *
 * Application services report expected failures as values. The code
 * decides the HTTP status the presentation layer answers with.
 */

import type { ErrorCode } from '../../../../framework/http/errors.ts';
import { KVConflictError, ModelValidationError } from '../../../../framework/orm/mod.ts';

export interface ServiceFailure {
  success: false;
  code: ErrorCode;
  error: string;
  details?: Record<string, unknown>;
}

export type ServiceResult<T> = ({ success: true } & T) | ServiceFailure;

export function failure(
  code: ErrorCode,
  error: string,
  details?: Record<string, unknown>
): ServiceFailure {
  return { success: false, code, error, details };
}

export function isFailure<T>(result: ServiceResult<T>): result is ServiceFailure {
  return result.success === false;
}

/**
 * Run a use case, turning validation and write conflicts into failures
 */
export async function runUseCase<T>(fn: () => Promise<ServiceResult<T>>): Promise<ServiceResult<T>> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof ModelValidationError) {
      return failure('VALIDATION_ERROR', error.errors.join(', '));
    }
    if (error instanceof KVConflictError) {
      return failure('CONFLICT', 'The sticker was modified concurrently, please retry');
    }
    throw error;
  }
}
