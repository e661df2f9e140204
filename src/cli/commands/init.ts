import { Command } from 'commander';
import { existsSync, mkdirSync } from 'node:fs';
import { resolve } from 'node:path';
import { logger } from '../utils/logger.js';
import { getConfigPath, saveConfig } from '../utils/config.js';
import { DEFAULT_CONFIG } from '../../types/config.js';

interface InitOptions {
  force?: boolean;
  project?: string;
}

export const initCommand = new Command('init')
  .description('Write a default .cogwheel.yaml')
  .option('-f, --force', 'Overwrite existing configuration')
  .option('-p, --project <path>', 'Path to the project directory (defaults to current directory)')
  .action((options: InitOptions) => {
    try {
      runInit(options);
    } catch (error) {
      if (error instanceof Error) {
        logger.error(error.message);
      }
      process.exit(1);
    }
  });

function runInit(options: InitOptions): void {
  const projectRoot = options.project ? resolve(options.project) : process.cwd();

  if (!existsSync(projectRoot)) {
    mkdirSync(projectRoot, { recursive: true });
    logger.info(`Created project directory: ${projectRoot}`);
  }

  const configPath = getConfigPath(projectRoot);
  if (existsSync(configPath) && !options.force) {
    logger.error(`${configPath} already exists. Use --force to overwrite it.`);
    process.exitCode = 1;
    return;
  }

  saveConfig(projectRoot, DEFAULT_CONFIG);

  logger.success(`Wrote ${configPath}`);
  logger.blank();
  logger.info('Next steps:');
  logger.listItem('export ANTHROPIC_API_KEY=...');
  logger.listItem('cogwheel tools');
  logger.listItem('cogwheel run "What is 12 times 7, plus 3?"');
}
