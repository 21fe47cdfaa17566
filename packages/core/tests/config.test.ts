import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { getDefaultDataPath, resolveDataPath } from '../src/config.js';

describe('getDefaultDataPath', () => {
  it('uses XDG_DATA_HOME on linux when set', () => {
    expect(getDefaultDataPath('linux', { XDG_DATA_HOME: '/data' })).toBe(join('/data', 'jot', 'tasks.txt'));
  });

  it('falls back to ~/.local/share on linux', () => {
    expect(getDefaultDataPath('linux', {})).toBe(join(homedir(), '.local', 'share', 'jot', 'tasks.txt'));
  });

  it('uses Application Support on macOS', () => {
    expect(getDefaultDataPath('darwin', {})).toBe(join(homedir(), 'Library', 'Application Support', 'jot', 'tasks.txt'));
  });
});

describe('resolveDataPath', () => {
  it('prefers an explicit path', () => {
    expect(resolveDataPath('/tmp/mine.txt', { JOT_DATA_FILE: '/env/tasks.txt' })).toBe('/tmp/mine.txt');
  });

  it('falls back to JOT_DATA_FILE', () => {
    expect(resolveDataPath(undefined, { JOT_DATA_FILE: '/env/tasks.txt' })).toBe('/env/tasks.txt');
  });

  it('falls back to the platform default', () => {
    expect(resolveDataPath(undefined, {})).toBe(getDefaultDataPath(process.platform, {}));
  });
});
