export { AgentRunner, type AgentRunnerOptions } from './core/agent-runner.js';
export { ToolRegistry, defineOperation } from './core/tool-registry.js';
export {
  parseAction,
  extractFirstJsonObject,
  type ParseResult,
} from './core/action-parser.js';
export {
  deriveParameterSchema,
  validateParameters,
} from './core/parameter-schema.js';
export * from './core/errors.js';
export { ClaudeOracle, type ClaudeOracleOptions } from './llm/claude-oracle.js';
export { registerBuiltinTools } from './tools/builtin.js';
export * from './types/index.js';
export {
  CogwheelConfigSchema,
  AgentConfigSchema,
  DEFAULT_CONFIG,
  type CogwheelConfig,
  type AgentConfig,
  type AgentConfigInput,
} from './types/config.js';
