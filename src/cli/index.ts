#!/usr/bin/env node

import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { runCommand } from './commands/run.js';
import { toolsCommand } from './commands/tools.js';
import { setLogLevel } from './utils/logger.js';

const program = new Command();

program
  .name('cogwheel')
  .description('A tool-using agent that reasons, acts and observes until a task is done')
  .version('0.1.0')
  .option('-v, --verbose', 'Enable verbose logging')
  .hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts();
    if (opts.verbose) {
      setLogLevel('debug');
    }
  });

// Register commands
program.addCommand(initCommand);
program.addCommand(runCommand);
program.addCommand(toolsCommand);

// Parse and execute
program.parse();
