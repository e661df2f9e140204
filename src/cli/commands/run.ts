import { Command } from 'commander';
import { promises as fs } from 'fs';
import path from 'path';
import { logger } from '../utils/logger.js';
import { findProjectRoot, loadConfig } from '../utils/config.js';
import { createProgressSpinner } from '../utils/spinner.js';
import { AgentRunner } from '../../core/agent-runner.js';
import { ToolRegistry } from '../../core/tool-registry.js';
import { ConfigError } from '../../core/errors.js';
import { isPlainRecord } from '../../core/parameter-schema.js';
import { renderValue } from '../../core/utils.js';
import { ClaudeOracle } from '../../llm/claude-oracle.js';
import { registerBuiltinTools } from '../../tools/builtin.js';
import type { AgentResult } from '../../types/index.js';

interface RunOptions {
  maxIterations?: number;
  context: string[];
  contextFile?: string;
  json?: boolean;
  output?: string;
  project?: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new ConfigError(`Not an integer: ${value}`);
  }
  return parsed;
}

/**
 * Parse `key=value` pairs into a context mapping.
 * Values that parse as JSON are decoded, the rest stay strings.
 */
export function parseContextPairs(pairs: string[]): Record<string, unknown> {
  const context: Record<string, unknown> = {};

  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    if (separator <= 0) {
      throw new ConfigError(`Context entries must look like key=value: ${pair}`);
    }
    const key = pair.slice(0, separator).trim();
    const raw = pair.slice(separator + 1);
    try {
      context[key] = JSON.parse(raw);
    } catch {
      context[key] = raw;
    }
  }

  return context;
}

async function loadContextFile(filePath: string): Promise<Record<string, unknown>> {
  const content = await fs.readFile(filePath, 'utf-8');
  const parsed: unknown = JSON.parse(content);
  if (!isPlainRecord(parsed)) {
    throw new ConfigError(`Context file must contain a JSON object: ${filePath}`);
  }
  return parsed;
}

export const runCommand = new Command('run')
  .description('Run a task through the agent loop')
  .argument('<task>', 'Task description')
  .option('-m, --max-iterations <number>', 'Override max iterations', parseInteger)
  .option('-c, --context <key=value>', 'Context entry passed to the agent (repeatable)', collect, [])
  .option('--context-file <path>', 'JSON file with the task context')
  .option('--json', 'Print the full result as JSON')
  .option('-o, --output <path>', 'Write the full result as JSON to a file')
  .option(
    '-p, --project <path>',
    'Path to the project directory (defaults to current directory)'
  )
  .action(async (task: string, options: RunOptions) => {
    try {
      const result = await runTask(task, options);
      if (result && result.status !== 'completed') {
        process.exitCode = 1;
      }
    } catch (error) {
      if (error instanceof Error) {
        logger.error(error.message);
      }
      process.exit(1);
    }
  });

async function runTask(
  task: string,
  options: RunOptions
): Promise<AgentResult | null> {
  const projectRoot = options.project
    ? path.resolve(options.project)
    : (findProjectRoot() ?? process.cwd());

  const config = loadConfig(projectRoot);
  const maxIterations = options.maxIterations ?? config.agent.maxIterations;

  const context = {
    ...(options.contextFile ? await loadContextFile(options.contextFile) : {}),
    ...parseContextPairs(options.context),
  };

  if (!process.env.ANTHROPIC_API_KEY) {
    logger.error('ANTHROPIC_API_KEY environment variable is not set.');
    logger.info('Set it with: export ANTHROPIC_API_KEY=your-api-key');
    return null;
  }

  const registry = new ToolRegistry();
  registerBuiltinTools(registry, config.tools.enabled);

  const oracle = new ClaudeOracle({ model: config.model });

  if (!options.json) {
    logger.section('Task');
    logger.keyValue('Description', task);
    logger.keyValue('Model', config.model.name);
    logger.keyValue('Max iterations', maxIterations);
    logger.keyValue('Tools', registry.list().map((tool) => tool.name).join(', '));
    logger.blank();
  }

  const spinner = createProgressSpinner('Thinking...', !options.json);

  const runner = new AgentRunner({
    registry,
    oracle,
    config: config.agent,
    onProgress: (message) => {
      spinner.update(message);
      logger.debug(message);
    },
    onStep: (step, iteration) => {
      if (options.json) {
        return;
      }
      spinner.pause();
      logger.step(step, iteration);
      spinner.resume();
    },
  });

  // Ctrl+C stops the run between iterations
  const controller = new AbortController();
  const onInterrupt = () => controller.abort('interrupted');
  process.once('SIGINT', onInterrupt);

  let result: AgentResult;
  try {
    result = await runner.run(task, context, maxIterations, {
      signal: controller.signal,
    });
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }

  spinner.finish(result.status === 'completed', `Run ${result.status}`);

  if (options.output) {
    await fs.writeFile(options.output, JSON.stringify(result, null, 2), 'utf-8');
  }

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
    return result;
  }

  const usage = oracle.getUsage();

  logger.section('Run Complete');
  const statusLabel =
    result.status === 'completed'
      ? '✓ Completed'
      : result.status === 'exhausted'
        ? '⚠ Exhausted'
        : '✗ Failed';
  logger.keyValue('Status', statusLabel);
  logger.keyValue('Steps', result.steps.length);
  logger.keyValue('Duration', `${(result.durationMs / 1000).toFixed(1)}s`);
  logger.keyValue(
    'Tokens used',
    (usage.inputTokens + usage.outputTokens).toLocaleString()
  );
  logger.keyValue('Cost', `$${oracle.estimateCost().toFixed(4)}`);
  logger.blank();
  logger.info(renderValue(result.finalOutput));

  if (options.output) {
    logger.blank();
    logger.success(`Result written to ${options.output}`);
  }

  return result;
}
