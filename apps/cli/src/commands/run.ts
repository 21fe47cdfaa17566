import { Command } from 'commander';
import type { TaskStore } from '@jot/core';
import { Responder } from '@jot/core';
import * as out from '../output.js';
import { resolveFile, openStore, $try } from '../helpers.js';
import type { GlobalOptions } from '../helpers.js';

/**
 * Answer each command with the single-shot responder.
 * Returns the responses in order; the list is saved only on `bye`.
 */
export function runCommands(store: TaskStore, commands: readonly string[]): string[] {
  const { responder, warnings } = Responder.open(store);
  out.printWarnings(warnings);

  const responses = commands.map(c => responder.respond(c));
  for (const r of responses) out.info(r);

  if (responder.hasUnsavedChanges()) {
    out.warning("Changes were not saved; end with 'bye' to save them.");
  }
  return responses;
}

export function createRunCommand(): Command {
  return new Command('run')
    .description('Run one or more commands non-interactively')
    .argument('<commands...>', 'Commands to run in order, e.g. "todo buy milk" list bye')
    .action((commands: string[], _opts: unknown, cmd: Command) => $try(() => {
      const g = cmd.optsWithGlobals<GlobalOptions>();
      runCommands(openStore(resolveFile(g)), commands);
    }));
}
