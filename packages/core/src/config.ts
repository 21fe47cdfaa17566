import { join } from 'node:path';
import { homedir } from 'node:os';

export const DATA_FILE_ENV = 'JOT_DATA_FILE';
const APP_DIR = 'jot';
const DATA_FILE = 'tasks.txt';

/** Returns the platform-appropriate default task file path */
export function getDefaultDataPath(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
): string {
  let dir: string;

  if (platform === 'darwin') {
    dir = join(homedir(), 'Library', 'Application Support', APP_DIR);
  } else if (platform === 'win32') {
    dir = join(env['APPDATA'] ?? join(homedir(), 'AppData', 'Roaming'), APP_DIR);
  } else {
    // Linux / other
    dir = join(env['XDG_DATA_HOME'] ?? join(homedir(), '.local', 'share'), APP_DIR);
  }

  return join(dir, DATA_FILE);
}

/**
 * Resolve the task file.
 * Priority: explicit path > JOT_DATA_FILE > platform default.
 */
export function resolveDataPath(
  explicitPath: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): string {
  if (explicitPath) return explicitPath;
  const fromEnv = env[DATA_FILE_ENV];
  if (fromEnv) return fromEnv;
  return getDefaultDataPath(process.platform, env);
}
