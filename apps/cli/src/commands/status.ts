import { Command } from 'commander';
import chalk from 'chalk';
import type { TaskList } from '@jot/core';
import { TaskKind, loadTasks } from '@jot/core';
import * as out from '../output.js';
import { resolveFile, $try } from '../helpers.js';
import type { GlobalOptions } from '../helpers.js';

export interface TaskStats {
  total: number;
  done: number;
  pending: number;
  todos: number;
  deadlines: number;
  events: number;
}

export function getStats(tasks: TaskList): TaskStats {
  const stats: TaskStats = { total: 0, done: 0, pending: 0, todos: 0, deadlines: 0, events: 0 };
  for (const task of tasks.asSequence()) {
    stats.total++;
    if (task.done) stats.done++;
    else stats.pending++;
    switch (task.kind) {
      case TaskKind.Todo: stats.todos++; break;
      case TaskKind.Deadline: stats.deadlines++; break;
      case TaskKind.Event: stats.events++; break;
    }
  }
  return stats;
}

export function createStatusCommand(): Command {
  return new Command('status')
    .description('Show task counts by kind and completion')
    .action((_opts: unknown, cmd: Command) => $try(() => {
      const path = resolveFile(cmd.optsWithGlobals<GlobalOptions>());
      const { tasks, warnings } = loadTasks(path);
      out.printWarnings(warnings);

      const stats = getStats(tasks);
      if (stats.total === 0) {
        out.info('No tasks saved yet');
        return;
      }

      const doneLabel = stats.done > 0 ? chalk.green(`${stats.done} done`) : chalk.dim('0 done');
      const pendingLabel = stats.pending > 0 ? chalk.gray(`${stats.pending} pending`) : chalk.dim('0 pending');

      console.log(chalk.bold.underline('Tasks'));
      console.log(`  Total: ${chalk.bold(String(stats.total))} (${pendingLabel}, ${doneLabel})`);
      console.log(`  Todos: ${stats.todos}  Deadlines: ${stats.deadlines}  Events: ${stats.events}`);
    }));
}
