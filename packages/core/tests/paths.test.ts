import { describe, it, expect } from 'vitest';
import path from 'node:path';
import os from 'node:os';
import {
  getBrowserProfileDir,
  getConfigPath,
  getCookiePath,
  getDataDir,
  getEventsPath,
  getInstanceLockPath,
} from '../src/index.js';

describe('getDataDir', () => {
  it('honours TUNNELKIT_HOME', () => {
    expect(getDataDir({ TUNNELKIT_HOME: '/srv/tk' }, 'linux')).toBe('/srv/tk');
  });

  it('uses XDG_DATA_HOME on Linux', () => {
    expect(getDataDir({ XDG_DATA_HOME: '/data' }, 'linux')).toBe(path.join('/data', 'tunnelkit'));
    expect(getDataDir({}, 'linux')).toBe(path.join(os.homedir(), '.local', 'share', 'tunnelkit'));
  });

  it('uses Application Support on macOS', () => {
    expect(getDataDir({}, 'darwin')).toBe(path.join(os.homedir(), 'Library', 'Application Support', 'tunnelkit'));
  });

  it('uses APPDATA on Windows', () => {
    expect(getDataDir({ APPDATA: 'C:\\Users\\me\\AppData\\Roaming' }, 'win32')).toBe(
      path.join('C:\\Users\\me\\AppData\\Roaming', 'tunnelkit'),
    );
  });
});

describe('data directory layout', () => {
  it('places every file under the data directory', () => {
    const dir = path.join('/tmp', 'tk');
    expect(getCookiePath(dir)).toBe(path.join(dir, 'session-cookie.json'));
    expect(getInstanceLockPath(dir)).toBe(path.join(dir, 'tunnelkit.lock'));
    expect(getBrowserProfileDir(dir)).toBe(path.join(dir, 'profile'));
    expect(getConfigPath(dir)).toBe(path.join(dir, 'config.yaml'));
    expect(getEventsPath(dir)).toBe(path.join(dir, 'events.jsonl'));
  });
});
