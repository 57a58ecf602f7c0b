/**
 * Shared utilities for tool handlers.
 */

/**
 * Field specification for validateInput.
 */
export interface FieldSpec {
  type: 'string' | 'number' | 'boolean';
  required: boolean;
  /** Reject empty/whitespace-only strings. Defaults to true for required strings. */
  nonEmpty?: boolean;
  /** Custom validator returning an error message or null if valid. */
  validate?: (value: unknown) => string | null;
}

/**
 * Validate tool input fields against a specification.
 * Returns an error message if validation fails, or null if input is valid.
 */
export function validateInput(
  input: Record<string, unknown>,
  spec: Record<string, FieldSpec>
): string | null {
  for (const [field, fieldSpec] of Object.entries(spec)) {
    const value = input[field];

    if (value === undefined || value === null) {
      if (fieldSpec.required) {
        return `${field} is required.`;
      }
      continue;
    }

    if (typeof value !== fieldSpec.type) {
      return `${field} must be a ${fieldSpec.type}.`;
    }

    const nonEmpty = fieldSpec.nonEmpty ?? (fieldSpec.required && fieldSpec.type === 'string');
    if (nonEmpty && typeof value === 'string' && !value.trim()) {
      return `${field} must be a non-empty string.`;
    }

    if (fieldSpec.validate) {
      const customError = fieldSpec.validate(value);
      if (customError) {
        return customError;
      }
    }
  }

  return null;
}

export function readString(input: Record<string, unknown>, field: string): string | undefined {
  const value = input[field];
  return typeof value === 'string' ? value : undefined;
}

export function readNumber(input: Record<string, unknown>, field: string): number | undefined {
  const value = input[field];
  return typeof value === 'number' ? value : undefined;
}

/**
 * Validator for an integer within inclusive bounds.
 */
export function integerBetween(field: string, min: number, max: number): (value: unknown) => string | null {
  return (value) =>
    typeof value === 'number' && Number.isInteger(value) && value >= min && value <= max
      ? null
      : `${field} must be a whole number from ${min} to ${max}.`;
}
