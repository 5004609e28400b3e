/**
 * Field Validators
 *
 * Common validation functions for model fields. A validator returns an
 * error message, or null when the value passes.
 */

export type Validator = (value: unknown, field: string) => string | null;

/**
 * Built-in validators
 */
export const validators = {
  /**
   * Validate minimum length
   */
  minLength(min: number): Validator {
    return (value, field) => {
      if (typeof value === 'string' && value.length < min) {
        return `${field} must be at least ${min} characters`;
      }
      if (Array.isArray(value) && value.length < min) {
        return `${field} must have at least ${min} items`;
      }
      return null;
    };
  },

  /**
   * Validate maximum length
   */
  maxLength(max: number): Validator {
    return (value, field) => {
      if (typeof value === 'string' && value.length > max) {
        return `${field} must be at most ${max} characters`;
      }
      if (Array.isArray(value) && value.length > max) {
        return `${field} must have at most ${max} items`;
      }
      return null;
    };
  },

  /**
   * Validate minimum value
   */
  min(min: number): Validator {
    return (value, field) => {
      if (typeof value === 'number' && value < min) {
        return `${field} must be at least ${min}`;
      }
      return null;
    };
  },

  /**
   * Validate maximum value
   */
  max(max: number): Validator {
    return (value, field) => {
      if (typeof value === 'number' && value > max) {
        return `${field} must be at most ${max}`;
      }
      return null;
    };
  },

  /**
   * Validate a whole number
   */
  integer(): Validator {
    return (value, field) => {
      if (typeof value === 'number' && !Number.isInteger(value)) {
        return `${field} must be an integer`;
      }
      return null;
    };
  },

  /**
   * Validate URL format
   */
  url(): Validator {
    return (value, field) => {
      if (typeof value === 'string') {
        try {
          new URL(value);
        } catch {
          return `${field} must be a valid URL`;
        }
      }
      return null;
    };
  },

  /**
   * Validate against regex pattern
   */
  pattern(regex: RegExp, message?: string): Validator {
    return (value, field) => {
      if (typeof value === 'string' && !regex.test(value)) {
        return message ?? `${field} format is invalid`;
      }
      return null;
    };
  },

  /**
   * Validate value is one of allowed values
   */
  oneOf(allowed: readonly unknown[]): Validator {
    return (value, field) => {
      if (!allowed.includes(value)) {
        return `${field} must be one of: ${allowed.join(', ')}`;
      }
      return null;
    };
  },

  /**
   * Validate every item of an array
   */
  each(validator: Validator): Validator {
    return (value, field) => {
      if (!Array.isArray(value)) return null;
      for (const item of value) {
        const error = validator(item, `${field} item`);
        if (error) return error;
      }
      return null;
    };
  },
};
