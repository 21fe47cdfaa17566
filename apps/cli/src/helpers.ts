/**
 * CLI helpers: data file resolution, store setup, error handling.
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { TaskStore } from '@jot/core';
import { createFileStore, resolveDataPath } from '@jot/core';
import * as out from './output.js';

export type GlobalOptions = {
  file?: string;
};

/** Resolve the task file from `--file`, JOT_DATA_FILE, or the platform default */
export function resolveFile(opts: GlobalOptions, env: NodeJS.ProcessEnv = process.env): string {
  return resolveDataPath(opts.file, env);
}

/**
 * Open the file store, creating the parent directory so the save on exit
 * has somewhere to write.
 */
export function openStore(path: string): TaskStore {
  mkdirSync(dirname(path), { recursive: true });
  return createFileStore(path);
}

/**
 * Run a command action, printing any error instead of crashing.
 * Sets a non-zero exit code on failure.
 */
export async function $try(fn: () => void | Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err: unknown) {
    out.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}
