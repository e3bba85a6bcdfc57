/**
 * Request validation for AgentChat HTTP boundaries
 *
 * Provides runtime validation of request bodies and query strings using
 * TypeBox schemas.
 */

import { TypeCompiler, type TypeCheck } from '@sinclair/typebox/compiler';
import { Value, type ValueError } from '@sinclair/typebox/value';
import type { TSchema, Static } from '@sinclair/typebox';
import { createValidationError } from './errors.js';

// ============================================================================
// Validation Error Types
// ============================================================================

export interface ValidationIssue {
  /** Field path that failed validation */
  path: string;
  /** Expected type or value */
  expected: string;
  /** Actual value received */
  received: unknown;
  /** Human-readable error message */
  message: string;
}

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: ValidationIssue[] };

export interface ValidateOptions {
  /** Component reported on the thrown error */
  component?: string;
  /**
   * Convert string values to the schema's primitive types before checking.
   * Query strings arrive as strings, so their validators set this.
   */
  convert?: boolean;
}

// ============================================================================
// Compiled Validators
// ============================================================================

/**
 * TypeBox compilers are expensive to create, so they are cached per schema
 */
const compilerCache = new Map<TSchema, unknown>();

function getCompiler<T extends TSchema>(schema: T): TypeCheck<T> {
  const cached = compilerCache.get(schema);
  if (cached) {
    // Entries are only ever written below, keyed by the schema they check
    return cached as TypeCheck<T>;
  }
  const compiler: TypeCheck<T> = TypeCompiler.Compile(schema);
  compilerCache.set(schema, compiler);
  return compiler;
}

function getSchemaTypeName(schema: Record<string, unknown>): string {
  if (schema.$id) return String(schema.$id);
  if (schema.type) return String(schema.type);
  if (schema.anyOf) return 'union';
  if (schema.const !== undefined) return `literal(${JSON.stringify(schema.const)})`;
  return 'unknown';
}

function convertError(error: ValueError): ValidationIssue {
  return {
    path: error.path,
    expected: getSchemaTypeName(error.schema),
    received: error.value,
    message: error.message,
  };
}

// ============================================================================
// Core Validation Functions
// ============================================================================

/**
 * Validate data against a TypeBox schema
 */
export function validate<T extends TSchema>(
  schema: T,
  data: unknown,
  options: Pick<ValidateOptions, 'convert'> = {}
): ValidationResult<Static<T>> {
  const compiler = getCompiler(schema);
  const candidate = options.convert ? Value.Convert(schema, data) : data;

  if (compiler.Check(candidate)) {
    return { success: true, data: candidate };
  }

  return {
    success: false,
    errors: [...compiler.Errors(candidate)].map(convertError),
  };
}

/**
 * Validate data and throw a validation AgentChatError if invalid
 */
export function validateOrThrow<T extends TSchema>(
  schema: T,
  data: unknown,
  options: ValidateOptions = {}
): Static<T> {
  const result = validate(schema, data, options);

  if (!result.success) {
    const summary = result.errors.map((e) => `${e.path || '/'}: ${e.message}`).join('; ');
    throw createValidationError(`Validation failed: ${summary}`, {
      component: options.component ?? 'validation',
      details: { issues: result.errors },
    });
  }

  return result.data;
}

export function isValid<T extends TSchema>(schema: T, data: unknown): data is Static<T> {
  return getCompiler(schema).Check(data);
}
