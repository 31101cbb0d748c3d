import { Ajv, type ErrorObject, type SchemaObject, type ValidateFunction } from 'ajv';

/**
 * JSON Schema Validator
 *
 * Validates extraction batches and model output against expected schemas
 */

const ajv = new Ajv({
  allErrors: true,
  verbose: true,
  strict: false, // Allow additional properties
});

/**
 * Validation Result
 */
export interface ValidationResult<T> {
  valid: boolean;
  errors?: ErrorObject[];
  data?: T;
}

/**
 * Validator class for JSON schema validation
 */
export class SchemaValidator {
  /**
   * Compile a schema into a type guard for the shape it describes.
   * Compile once at module load; schemas carry no `$id`.
   */
  compileSchema<T>(schema: SchemaObject): ValidateFunction<T> {
    return ajv.compile<T>(schema);
  }

  /**
   * Run a compiled validator; `data` is only set when validation passed
   */
  validate<T>(check: ValidateFunction<T>, data: unknown): ValidationResult<T> {
    if (check(data)) {
      return { valid: true, data };
    }

    return {
      valid: false,
      errors: check.errors || undefined,
    };
  }

  /**
   * Format validation errors as a readable string
   */
  formatErrors(errors?: ErrorObject[]): string {
    if (!errors || errors.length === 0) {
      return 'No errors';
    }

    return errors
      .map((error) => {
        const path = error.instancePath || 'root';
        const message = error.message || 'validation failed';
        const params = JSON.stringify(error.params);
        return `  - ${path}: ${message} ${params}`;
      })
      .join('\n');
  }
}

/**
 * Global validator instance
 */
export const validator = new SchemaValidator();

/**
 * Extract and parse JSON content from model response
 * Handles cases where model returns markdown code blocks
 */
export function extractJsonFromResponse(content: string): unknown {
  const MAX_CONTENT_LENGTH = 100000;
  if (content.length > MAX_CONTENT_LENGTH) {
    throw new Error(
      `Response content too large (${content.length} chars, max ${MAX_CONTENT_LENGTH}). Likely truncated/malformed.`
    );
  }

  try {
    return JSON.parse(content);
  } catch {
    const jsonBlockMatch = content.match(/```(?:json)?\s*([\s\S]*?)\s*```/);
    if (jsonBlockMatch) {
      try {
        return JSON.parse(jsonBlockMatch[1]);
      } catch {
        // fall through to the bare-object attempt
      }
    }

    const jsonMatch = content.match(/\{[\s\S]*\}/);
    if (jsonMatch) {
      try {
        return JSON.parse(jsonMatch[0]);
      } catch {
        // fall through
      }
    }

    throw new Error('Could not extract valid JSON from response content');
  }
}
