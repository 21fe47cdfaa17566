import { Command } from 'commander';
import * as out from '../output.js';
import { resolveFile, $try } from '../helpers.js';
import type { GlobalOptions } from '../helpers.js';

export function createPathCommand(): Command {
  return new Command('path')
    .description('Print the task file location')
    .action((_opts: unknown, cmd: Command) => $try(() => {
      out.info(resolveFile(cmd.optsWithGlobals<GlobalOptions>()));
    }));
}
