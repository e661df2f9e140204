import { Command } from 'commander';
import chalk from 'chalk';
import { logger } from '../utils/logger.js';
import { findProjectRoot, loadConfig } from '../utils/config.js';
import { ToolRegistry } from '../../core/tool-registry.js';
import { registerBuiltinTools } from '../../tools/builtin.js';

export const toolsCommand = new Command('tools')
  .description('List the tools the agent can use')
  .option('--json', 'Print the catalog as JSON')
  .action((options: { json?: boolean }) => {
    try {
      const config = loadConfig(findProjectRoot() ?? process.cwd());
      const registry = new ToolRegistry();
      registerBuiltinTools(registry, config.tools.enabled);

      const catalog = registry.list();

      if (options.json) {
        console.log(JSON.stringify(catalog, null, 2));
        return;
      }

      logger.section(`Tools (${catalog.length})`);
      for (const tool of catalog) {
        logger.blank();
        logger.info(`${chalk.bold(tool.name)} ${chalk.dim(tool.description)}`);
        for (const [field, spec] of Object.entries(tool.parameterSchema)) {
          const optional = spec.required === false ? chalk.dim(' (optional)') : '';
          logger.listItem(
            `${field}: ${spec.type}${optional}${spec.description ? ` - ${spec.description}` : ''}`,
            1
          );
        }
      }
    } catch (error) {
      if (error instanceof Error) {
        logger.error(error.message);
      }
      process.exit(1);
    }
  });
