import { z, type ZodTypeAny } from 'zod';
import type {
  ParameterSchema,
  ParameterSpec,
  ParameterType,
  ToolOperation,
  ToolParams,
} from '../types/index.js';
import { SchemaInferenceError, type FieldIssue } from './errors.js';

/**
 * Whether a parameter must be supplied (required defaults to true)
 */
export function isRequired(spec: ParameterSpec): boolean {
  return spec.required !== false;
}

export function isPlainRecord(
  value: unknown
): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// Derivation
// ============================================================================

/**
 * Strip optional/nullable/default/effects wrappers.
 * A field is optional if any wrapper on the way in makes it so.
 */
function unwrapField(schema: ZodTypeAny): {
  inner: ZodTypeAny;
  optional: boolean;
  description?: string;
} {
  let current = schema;
  let optional = false;
  let description = schema.description;

  for (;;) {
    if (current instanceof z.ZodOptional || current instanceof z.ZodNullable) {
      optional = true;
      current = current.unwrap();
    } else if (current instanceof z.ZodDefault) {
      optional = true;
      current = current.removeDefault();
    } else if (current instanceof z.ZodEffects) {
      current = current.innerType();
    } else {
      break;
    }
    description ??= current.description;
  }

  return { inner: current, optional, description };
}

function mapZodType(schema: ZodTypeAny): ParameterType | null {
  if (
    schema instanceof z.ZodString ||
    schema instanceof z.ZodEnum ||
    schema instanceof z.ZodNativeEnum
  ) {
    return 'string';
  }
  if (schema instanceof z.ZodNumber) {
    return schema.isInt ? 'integer' : 'number';
  }
  if (schema instanceof z.ZodBoolean) {
    return 'boolean';
  }
  if (schema instanceof z.ZodArray || schema instanceof z.ZodTuple) {
    return 'array';
  }
  if (schema instanceof z.ZodObject || schema instanceof z.ZodRecord) {
    return 'object';
  }
  if (schema instanceof z.ZodLiteral) {
    const literal: unknown = schema.value;
    switch (typeof literal) {
      case 'string':
        return 'string';
      case 'number':
        return Number.isInteger(literal) ? 'integer' : 'number';
      case 'boolean':
        return 'boolean';
      default:
        return null;
    }
  }
  return null;
}

/**
 * Derive a parameter schema from an operation's declared parameters.
 *
 * Operations built with `defineOperation` carry a zod object describing
 * their input. An operation with no declared parameters derives an empty
 * schema. Anything else cannot be described and is rejected.
 */
export function deriveParameterSchema(
  toolName: string,
  operation: ToolOperation
): ParameterSchema {
  const input = operation.input;

  if (!input) {
    if (operation.length === 0) {
      return {};
    }
    throw new SchemaInferenceError(
      toolName,
      'the operation declares parameters but carries no input schema; pass a parameter schema or use defineOperation()'
    );
  }

  const schema: ParameterSchema = {};
  for (const [field, fieldSchema] of Object.entries<ZodTypeAny>(input.shape)) {
    const { inner, optional, description } = unwrapField(fieldSchema);
    const type = mapZodType(inner);
    if (!type) {
      throw new SchemaInferenceError(
        toolName,
        `field "${field}" has unsupported type ${inner.constructor.name}`
      );
    }
    schema[field] = {
      type,
      required: !optional,
      ...(description ? { description } : {}),
    };
  }
  return schema;
}

/**
 * Check that a hand-written schema only uses known parameter types
 */
export function assertValidSchema(
  toolName: string,
  schema: ParameterSchema
): void {
  const known: ParameterType[] = [
    'string',
    'number',
    'integer',
    'boolean',
    'array',
    'object',
  ];
  for (const [field, spec] of Object.entries(schema)) {
    if (!isPlainRecord(spec) || !known.includes(spec.type)) {
      throw new SchemaInferenceError(
        toolName,
        `field "${field}" must declare one of: ${known.join(', ')}`
      );
    }
  }
}

// ============================================================================
// Validation
// ============================================================================

type Coerced = { ok: true; value: unknown } | { ok: false; message: string };

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Lenient type check: primitives given in an equivalent textual form are
 * converted (numeric strings, "true"/"false"), everything else must match.
 */
function coerce(value: unknown, type: ParameterType): Coerced {
  switch (type) {
    case 'string':
      if (typeof value === 'string') {
        return { ok: true, value };
      }
      if (
        (typeof value === 'number' && Number.isFinite(value)) ||
        typeof value === 'boolean'
      ) {
        return { ok: true, value: String(value) };
      }
      return { ok: false, message: 'must be a string' };

    case 'number': {
      const num = toNumber(value);
      return num === null
        ? { ok: false, message: 'must be a number' }
        : { ok: true, value: num };
    }

    case 'integer': {
      const num = toNumber(value);
      return num === null || !Number.isInteger(num)
        ? { ok: false, message: 'must be an integer' }
        : { ok: true, value: num };
    }

    case 'boolean':
      if (typeof value === 'boolean') {
        return { ok: true, value };
      }
      if (typeof value === 'string') {
        const lowered = value.trim().toLowerCase();
        if (lowered === 'true' || lowered === 'false') {
          return { ok: true, value: lowered === 'true' };
        }
      }
      return { ok: false, message: 'must be a boolean' };

    case 'array':
      return Array.isArray(value)
        ? { ok: true, value }
        : { ok: false, message: 'must be an array' };

    case 'object':
      return isPlainRecord(value)
        ? { ok: true, value }
        : { ok: false, message: 'must be an object' };
  }
}

export type ValidationOutcome =
  | { ok: true; params: ToolParams }
  | { ok: false; issues: FieldIssue[] };

/**
 * Validate parameters against a schema.
 * Reports every offending field, not just the first.
 */
export function validateParameters(
  schema: ParameterSchema,
  params: ToolParams
): ValidationOutcome {
  const issues: FieldIssue[] = [];
  const validated: ToolParams = {};

  for (const [field, spec] of Object.entries(schema)) {
    const value = Object.prototype.hasOwnProperty.call(params, field)
      ? params[field]
      : undefined;

    if (value === undefined || value === null) {
      if (isRequired(spec)) {
        issues.push({ field, message: 'is required' });
      }
      continue;
    }

    const result = coerce(value, spec.type);
    if (result.ok) {
      validated[field] = result.value;
    } else {
      issues.push({ field, message: result.message });
    }
  }

  for (const field of Object.keys(params)) {
    if (!Object.prototype.hasOwnProperty.call(schema, field)) {
      issues.push({ field, message: 'is not a recognized parameter' });
    }
  }

  return issues.length > 0
    ? { ok: false, issues }
    : { ok: true, params: validated };
}
