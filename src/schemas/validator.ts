/**
 * Schema validation using AJV
 *
 * Validates container attributes against ACDC schemas.
 */

import Ajv from 'ajv';
import type { JSONSchema7 } from 'json-schema';
import type { AcdcSchema, SchemaValidationResult } from './types';
import { verifySchemaSaid } from './said';
import type { Container, Attributes } from '../acdc/types';
import { err } from '../errors';
import { fail, ok, type JsonValue, type Result } from '../types';

/**
 * Create an AJV validator instance configured for ACDC schemas
 */
export function createSchemaValidator(): Ajv {
  return new Ajv({
    strict: false, // 2020-12 keywords such as $defs are passed through
    allErrors: true,
    verbose: true,
    validateSchema: false, // schemas are pinned by SAID rather than the meta-schema
  });
}

export interface ValidateOptions {
  /** Verify the schema's SAID before validating (default true) */
  verifySaid?: boolean;
  /** Provide custom AJV instance */
  ajv?: Ajv;
}

/**
 * Validate data against an ACDC schema
 *
 * @param schema - The schema to validate against
 * @param data - The data to validate
 * @returns Validation result with errors if any
 */
export function validateAgainstSchema(
  schema: AcdcSchema | JSONSchema7,
  data: JsonValue,
  options: ValidateOptions = {}
): SchemaValidationResult {
  const { verifySaid: checkSaid = true, ajv = createSchemaValidator() } = options;

  if (checkSaid && typeof schema.$id === 'string' && schema.$id.length > 0) {
    if (!verifySchemaSaid(schema)) {
      return {
        valid: false,
        errors: [
          {
            path: '$id',
            message: 'Schema $id does not match computed SAID',
            keyword: 'said-verification',
          },
        ],
      };
    }
  }

  const validate = ajv.compile(schema);
  const valid = validate(data);

  if (!valid && validate.errors) {
    return {
      valid: false,
      errors: validate.errors.map((error) => ({
        path: error.instancePath || error.schemaPath || '',
        message: error.message || 'Validation error',
        keyword: error.keyword,
      })),
    };
  }

  return { valid: true };
}

/**
 * Validate a container's inline attribute block against its schema
 *
 * The schema's $id must be the container's schema SAID, and must itself
 * be the schema's SAID.
 */
export function validateAttributes(container: Container, schema: AcdcSchema, options: ValidateOptions = {}): Result<Attributes> {
  if (schema.$id !== container.schema) {
    return fail(err.SchemaConstraintFailed(container.schema, schema.$id));
  }

  const block = container.attributes;
  if (block === undefined) {
    return fail(err.InvalidField('a', 'container has no attributes'));
  }
  if (block.kind === 'compact') {
    return fail(err.CompactOnly('a'));
  }

  const result = validateAgainstSchema(schema, block.data, options);
  if (!result.valid) {
    const reason = (result.errors ?? []).map(e => `${e.path} ${e.message}`).join('; ');
    return fail(err.SchemaInvalid(container.said, reason || 'validation failed'));
  }
  return ok(block.data);
}

/**
 * Validate multiple data items against a schema
 */
export function validateBatch(
  schema: AcdcSchema,
  data: JsonValue[],
  options?: ValidateOptions
): SchemaValidationResult[] {
  const ajv = options?.ajv || createSchemaValidator();
  return data.map((item) => validateAgainstSchema(schema, item, { ...options, ajv }));
}
