#!/usr/bin/env node

import { Command } from 'commander';

import { createReplCommand } from './commands/repl.js';
import { createRunCommand } from './commands/run.js';
import { createStatusCommand } from './commands/status.js';
import { createPathCommand } from './commands/path.js';

// Build the CLI program
const program = new Command()
  .name('jot')
  .description('Lightweight task manager for todos, deadlines and events')
  .version('1.0.0')
  .option('-f, --file <path>', 'Task file to use (default: $JOT_DATA_FILE or the platform data directory)');

// Register commands; no command starts the interactive session
program.addCommand(createReplCommand(), { isDefault: true });
program.addCommand(createRunCommand());
program.addCommand(createStatusCommand());
program.addCommand(createPathCommand());

await program.parseAsync();
