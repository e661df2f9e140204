/**
 * Core types for cogwheel - a tool-using Reason-Act-Observe agent
 */

import type { AnyZodObject } from 'zod';
import type { DispatchError } from '../core/errors.js';

// ============================================================================
// Tool Types
// ============================================================================

export type ParameterType =
  | 'string'
  | 'number'
  | 'integer'
  | 'boolean'
  | 'array'
  | 'object';

export interface ParameterSpec {
  type: ParameterType;
  /** Defaults to true when omitted */
  required?: boolean;
  description?: string;
}

export type ParameterSchema = Record<string, ParameterSpec>;

/**
 * Per-call information handed to a tool operation
 */
export interface ToolCallContext {
  toolName: string;
  /** Aborted when the dispatch times out or the caller cancels */
  signal: AbortSignal;
  /** Opaque task context, passed through untouched */
  context: Record<string, unknown>;
}

export type ToolParams = Record<string, unknown>;

/**
 * An invocable tool body. `input` and `description` are optional metadata
 * used to derive the registered schema and description.
 */
export interface ToolOperation {
  (params: ToolParams, call: ToolCallContext): unknown;
  input?: AnyZodObject;
  description?: string;
}

export interface ToolDefinition {
  name: string;
  description: string;
  parameterSchema: ParameterSchema;
  operation: ToolOperation;
}

/**
 * The part of a tool definition that the oracle is shown
 */
export type ToolCatalogEntry = Omit<ToolDefinition, 'operation'>;

export type DispatchResult =
  | { success: true; value: unknown }
  | { success: false; error: DispatchError };

export interface DispatchOptions {
  /** Abort the operation after this many milliseconds */
  timeoutMs?: number;
  /** Forwarded to the operation; dispatch still waits for it to settle */
  signal?: AbortSignal;
  context?: Record<string, unknown>;
}

// ============================================================================
// Agent Types
// ============================================================================

/** Reserved action name that ends a run successfully */
export const FINISH_ACTION = 'finish';

/** Action recorded for a turn whose oracle output could not be parsed */
export const INVALID_ACTION = '';

export interface AgentStep {
  thought: string;
  action: string;
  actionInput: Record<string, unknown>;
  observation: string;
}

export interface AgentTask {
  task: string;
  context: Record<string, unknown>;
  maxIterations: number;
}

export type RunStatus = 'running' | 'completed' | 'failed' | 'exhausted';

export type TerminalStatus = Exclude<RunStatus, 'running'>;

export interface AgentResult {
  runId: string;
  status: TerminalStatus;
  finalOutput: unknown;
  steps: readonly AgentStep[];
  iterations: number;
  startedAt: string;
  completedAt: string;
  durationMs: number;
}

export interface RunOptions {
  /** Cancels the run between iterations */
  signal?: AbortSignal;
}

// ============================================================================
// Oracle Types
// ============================================================================

export interface OracleRequest {
  task: string;
  context: Record<string, unknown>;
  catalog: ToolCatalogEntry[];
  steps: readonly AgentStep[];
}

/**
 * Raw oracle output: free text or an already structured object.
 * It is parsed into a ParsedAction before the runner acts on it.
 */
export type OracleResponse = string | Record<string, unknown>;

/**
 * The reasoning backend that proposes the next step
 */
export interface Oracle {
  propose(request: OracleRequest, signal: AbortSignal): Promise<OracleResponse>;
}

export interface ParsedAction {
  thought: string;
  action: string;
  actionInput: Record<string, unknown>;
}
