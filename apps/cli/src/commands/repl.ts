import { createInterface } from 'node:readline';
import { Command } from 'commander';
import type { SessionState, TaskStore } from '@jot/core';
import { InteractiveSession } from '@jot/core';
import * as out from '../output.js';
import { resolveFile, openStore, $try } from '../helpers.js';
import type { GlobalOptions } from '../helpers.js';

export const GREETING = "Hello! I'm jot. What can I do for you?";

/** Load the store and run the interactive loop over `lines` */
export async function runRepl(store: TaskStore, lines: AsyncIterable<string>): Promise<SessionState> {
  const { tasks, warnings } = store.load();
  out.printWarnings(warnings);
  out.info(GREETING);

  const session = new InteractiveSession(store, tasks);
  const state = await session.run(lines, out.printSessionEvent);
  if (state === 'running') {
    out.warning("Input closed before 'bye'; changes were not saved.");
  }
  return state;
}

export function createReplCommand(): Command {
  return new Command('repl')
    .description('Start an interactive session (the default)')
    .action((_opts: unknown, cmd: Command) => $try(async () => {
      const g = cmd.optsWithGlobals<GlobalOptions>();
      const store = openStore(resolveFile(g));
      const rl = createInterface({ input: process.stdin, crlfDelay: Infinity });
      try {
        await runRepl(store, rl);
      } finally {
        rl.close();
      }
    }));
}
