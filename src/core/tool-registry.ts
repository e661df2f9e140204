import type { z, ZodObject, ZodRawShape } from 'zod';
import {
  FINISH_ACTION,
  type DispatchOptions,
  type DispatchResult,
  type ParameterSchema,
  type ToolCallContext,
  type ToolCatalogEntry,
  type ToolDefinition,
  type ToolOperation,
  type ToolParams,
} from '../types/index.js';
import {
  DuplicateToolError,
  ToolExecutionError,
  ToolNotFoundError,
  ToolRegistrationError,
  ValidationError,
  errorMessage,
} from './errors.js';
import {
  assertValidSchema,
  deriveParameterSchema,
  isPlainRecord,
  validateParameters,
} from './parameter-schema.js';
import { withTimeout } from './retry.js';

/**
 * Build an operation whose parameter schema can be derived at registration.
 * Parameters are parsed with `input` before `fn` sees them, so zod defaults
 * and refinements apply.
 */
export function defineOperation<T extends ZodRawShape>(
  input: ZodObject<T>,
  fn: (params: z.output<ZodObject<T>>, call: ToolCallContext) => unknown,
  description?: string
): ToolOperation {
  const operation: ToolOperation = (params, call) => {
    // The derived schema lists bare nullable fields as optional, so the
    // registry may drop them; zod still wants the key.
    const filled: Record<string, unknown> = { ...params };
    for (const [field, fieldSchema] of Object.entries(input.shape)) {
      if (
        filled[field] === undefined &&
        fieldSchema.isNullable() &&
        !fieldSchema.isOptional()
      ) {
        filled[field] = null;
      }
    }

    const parsed = input.safeParse(filled);
    if (!parsed.success) {
      throw new Error(
        parsed.error.issues
          .map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`)
          .join('; ')
      );
    }
    return fn(parsed.data, call);
  };
  operation.input = input;
  operation.description = description;
  return operation;
}

function freezeSchema(schema: ParameterSchema): ParameterSchema {
  const frozen: ParameterSchema = {};
  for (const [field, spec] of Object.entries(schema)) {
    frozen[field] = Object.freeze({ ...spec });
  }
  return Object.freeze(frozen);
}

/**
 * Catalog of named tools and the single entry point for invoking them.
 *
 * Usage:
 * ```typescript
 * const registry = new ToolRegistry();
 * registry.register('calculator', calculator, 'Basic arithmetic', {
 *   operation: { type: 'string' },
 *   a: { type: 'number' },
 *   b: { type: 'number' },
 * });
 *
 * const result = await registry.dispatch('calculator', { operation: 'add', a: 5, b: 3 });
 * ```
 *
 * Register every tool before runs start. Lookups and dispatch are safe
 * from concurrent runs; registration is not. Operations that do I/O must
 * themselves be safe to call concurrently.
 */
export class ToolRegistry {
  private tools: Map<string, ToolDefinition> = new Map();

  /**
   * Register a tool.
   *
   * @param parameterSchema - Derived from `operation.input` when omitted
   * @throws DuplicateToolError if the name is taken
   * @throws SchemaInferenceError if no schema is given and none can be derived
   */
  register(
    name: string,
    operation: ToolOperation,
    description?: string,
    parameterSchema?: ParameterSchema
  ): void {
    if (typeof name !== 'string' || name.trim() === '') {
      throw new ToolRegistrationError('Tool name must be a non-empty string');
    }
    if (name === FINISH_ACTION) {
      throw new ToolRegistrationError(
        `"${FINISH_ACTION}" is reserved for ending a run`
      );
    }
    if (typeof operation !== 'function') {
      throw new ToolRegistrationError(
        `Operation for tool "${name}" must be a function`
      );
    }
    if (this.tools.has(name)) {
      throw new DuplicateToolError(name);
    }

    let schema: ParameterSchema;
    if (parameterSchema) {
      assertValidSchema(name, parameterSchema);
      schema = parameterSchema;
    } else {
      schema = deriveParameterSchema(name, operation);
    }

    this.tools.set(
      name,
      Object.freeze({
        name,
        description: description ?? operation.description ?? '',
        parameterSchema: freezeSchema(schema),
        operation,
      })
    );
  }

  /**
   * Get a tool by name, or undefined when it is not registered
   */
  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get size(): number {
    return this.tools.size;
  }

  /**
   * Catalog of registered tools in registration order, without operations
   */
  list(): ToolCatalogEntry[] {
    return [...this.tools.values()].map(
      ({ name, description, parameterSchema }) => ({
        name,
        description,
        parameterSchema,
      })
    );
  }

  /**
   * Validate parameters and invoke a tool.
   * Never rejects: every failure comes back as a typed error.
   */
  async dispatch(
    name: string,
    parameters: ToolParams,
    options: DispatchOptions = {}
  ): Promise<DispatchResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      return { success: false, error: new ToolNotFoundError(name) };
    }

    if (!isPlainRecord(parameters)) {
      return {
        success: false,
        error: new ValidationError(name, [
          { field: '(parameters)', message: 'must be an object' },
        ]),
      };
    }

    const validation = validateParameters(tool.parameterSchema, parameters);
    if (!validation.ok) {
      return {
        success: false,
        error: new ValidationError(name, validation.issues),
      };
    }

    try {
      const value = await withTimeout(
        (signal) =>
          tool.operation(validation.params, {
            toolName: name,
            signal,
            context: options.context ?? {},
          }),
        {
          label: 'Execution',
          timeoutMs: options.timeoutMs,
          signal: options.signal,
          abandonOnAbort: false,
        }
      );
      return { success: true, value };
    } catch (error) {
      return {
        success: false,
        error: new ToolExecutionError(name, errorMessage(error), error),
      };
    }
  }
}
