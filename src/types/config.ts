import { z } from 'zod';

/**
 * Zod schema for .cogwheel.yaml configuration validation
 */

export const ModelConfigSchema = z.object({
  name: z.string().default('claude-sonnet-4-20250514'),
  maxTokens: z.number().int().positive().default(1024),
  temperature: z.number().min(0).max(1).default(0),
});

export const AgentConfigSchema = z.object({
  maxIterations: z.number().int().nonnegative().default(10),
  oracleTimeoutMs: z.number().int().positive().default(60000),
  toolTimeoutMs: z.number().int().positive().default(30000),
  oracleRetries: z.number().int().nonnegative().default(2),
  retryBackoffMs: z.number().int().nonnegative().default(500),
  maxRunDurationMs: z.number().int().positive().optional(),
});

export const BUILTIN_TOOL_NAMES = [
  'calculator',
  'string_analyzer',
  'list_processor',
  'json_formatter',
] as const;

export const CogwheelConfigSchema = z.object({
  model: ModelConfigSchema.default(() => ({
    name: 'claude-sonnet-4-20250514',
    maxTokens: 1024,
    temperature: 0,
  })),

  agent: AgentConfigSchema.default(() => ({
    maxIterations: 10,
    oracleTimeoutMs: 60000,
    toolTimeoutMs: 30000,
    oracleRetries: 2,
    retryBackoffMs: 500,
    maxRunDurationMs: undefined,
  })),

  tools: z
    .object({
      enabled: z
        .array(z.enum(BUILTIN_TOOL_NAMES))
        .default([...BUILTIN_TOOL_NAMES]),
    })
    .default(() => ({ enabled: [...BUILTIN_TOOL_NAMES] })),
});

export type CogwheelConfigInput = z.input<typeof CogwheelConfigSchema>;
export type CogwheelConfig = z.output<typeof CogwheelConfigSchema>;
export type AgentConfig = z.output<typeof AgentConfigSchema>;
export type AgentConfigInput = z.input<typeof AgentConfigSchema>;
export type BuiltinToolName = (typeof BUILTIN_TOOL_NAMES)[number];

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: CogwheelConfig = CogwheelConfigSchema.parse({});
