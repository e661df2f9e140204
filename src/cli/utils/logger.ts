import chalk from 'chalk';
import type { AgentStep } from '../../types/index.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

let currentLogLevel: LogLevel = 'info';

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Set the current log level
 */
export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLogLevel;
}

function shouldLog(level: LogLevel): boolean {
  return levelPriority[level] >= levelPriority[currentLogLevel];
}

/**
 * Logger utility for the cogwheel CLI
 */
export const logger = {
  debug(message: string, ...args: unknown[]): void {
    if (shouldLog('debug')) {
      console.log(chalk.gray(`[debug] ${message}`), ...args);
    }
  },

  info(message: string, ...args: unknown[]): void {
    if (shouldLog('info')) {
      console.log(message, ...args);
    }
  },

  success(message: string, ...args: unknown[]): void {
    if (shouldLog('info')) {
      console.log(chalk.green(`✓ ${message}`), ...args);
    }
  },

  warn(message: string, ...args: unknown[]): void {
    if (shouldLog('warn')) {
      console.warn(chalk.yellow(`⚠ ${message}`), ...args);
    }
  },

  error(message: string, ...args: unknown[]): void {
    if (shouldLog('error')) {
      console.error(chalk.red(`✗ ${message}`), ...args);
    }
  },

  /**
   * Log a section header
   */
  section(title: string): void {
    if (shouldLog('info')) {
      console.log();
      console.log(chalk.bold.blue(title));
      console.log(chalk.blue('─'.repeat(title.length)));
    }
  },

  keyValue(key: string, value: string | number): void {
    if (shouldLog('info')) {
      console.log(`  ${chalk.dim(key + ':')} ${value}`);
    }
  },

  listItem(item: string, indent: number = 0): void {
    if (shouldLog('info')) {
      const padding = '  '.repeat(indent);
      console.log(`${padding}• ${item}`);
    }
  },

  /**
   * Log one agent step as Thought / Action / Observation lines
   */
  step(step: AgentStep, iteration: number): void {
    if (!shouldLog('info')) {
      return;
    }
    const failed = step.observation.startsWith('Error:') || step.action === '';
    console.log(chalk.bold(`Step ${iteration}`));
    if (step.thought) {
      console.log(`  ${chalk.dim('Thought:')} ${step.thought}`);
    }
    console.log(
      `  ${chalk.dim('Action:')} ${step.action || chalk.red('(invalid)')} ${chalk.dim(JSON.stringify(step.actionInput))}`
    );
    console.log(
      `  ${chalk.dim('Observation:')} ${failed ? chalk.yellow(step.observation) : step.observation}`
    );
  },

  blank(): void {
    if (shouldLog('info')) {
      console.log();
    }
  },
};
