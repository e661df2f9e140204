/**
 * Error taxonomy for the registry and the agent loop.
 *
 * Registration errors are thrown to the caller of `register`. Dispatch
 * errors are returned inside a DispatchResult and end up as observation
 * text. Oracle errors are retried and then end the run as `failed`.
 */

export class CogwheelError extends Error {
  readonly code: string;

  constructor(code: string, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.code = code;
  }
}

// ----------------------------------------------------------------------------
// Registration
// ----------------------------------------------------------------------------

export class ToolRegistrationError extends CogwheelError {
  constructor(message: string) {
    super('TOOL_REGISTRATION', message);
  }
}

export class DuplicateToolError extends CogwheelError {
  readonly toolName: string;

  constructor(toolName: string) {
    super('DUPLICATE_TOOL', `Tool "${toolName}" is already registered`);
    this.toolName = toolName;
  }
}

export class SchemaInferenceError extends CogwheelError {
  readonly toolName: string;

  constructor(toolName: string, reason: string) {
    super(
      'SCHEMA_INFERENCE',
      `Cannot derive a parameter schema for tool "${toolName}": ${reason}`
    );
    this.toolName = toolName;
  }
}

// ----------------------------------------------------------------------------
// Dispatch
// ----------------------------------------------------------------------------

export class ToolNotFoundError extends CogwheelError {
  readonly toolName: string;

  constructor(toolName: string) {
    super('TOOL_NOT_FOUND', `Tool "${toolName}" not found`);
    this.toolName = toolName;
  }
}

export interface FieldIssue {
  field: string;
  message: string;
}

export class ValidationError extends CogwheelError {
  readonly toolName: string;
  readonly issues: FieldIssue[];

  constructor(toolName: string, issues: FieldIssue[]) {
    super(
      'VALIDATION',
      `Invalid parameters for tool "${toolName}": ${issues
        .map((issue) => `${issue.field} ${issue.message}`)
        .join('; ')}`
    );
    this.toolName = toolName;
    this.issues = issues;
  }

  /** Names of the offending fields */
  get fields(): string[] {
    return this.issues.map((issue) => issue.field);
  }
}

export class ToolExecutionError extends CogwheelError {
  readonly toolName: string;

  constructor(toolName: string, message: string, cause?: unknown) {
    super('TOOL_EXECUTION', `Tool "${toolName}" failed: ${message}`, cause);
    this.toolName = toolName;
  }
}

export type DispatchError =
  | ToolNotFoundError
  | ValidationError
  | ToolExecutionError;

// ----------------------------------------------------------------------------
// Run time
// ----------------------------------------------------------------------------

export class OracleError extends CogwheelError {
  constructor(message: string, cause?: unknown) {
    super('ORACLE', message, cause);
  }
}

export class TimeoutError extends CogwheelError {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super('TIMEOUT', `${label} timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export class CancelledError extends CogwheelError {
  constructor(reason: string) {
    super('CANCELLED', reason);
  }
}

/**
 * The oracle's output could not be read as an action
 */
export class FormatError extends CogwheelError {
  constructor(reason: string) {
    super('FORMAT', reason);
  }
}

export class ConfigError extends CogwheelError {
  constructor(message: string) {
    super('CONFIG', message);
  }
}

/**
 * Extract a readable message from anything that was thrown
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
