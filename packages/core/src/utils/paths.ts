import os from 'node:os';
import path from 'node:path';

/**
 * Path resolution utilities for the tunnelkit data directory.
 * All paths are resolved relative to a data directory root.
 */

const APP_DIR = 'tunnelkit';

/**
 * Returns the platform data directory, or `TUNNELKIT_HOME` when set.
 *
 * - Linux:   ~/.local/share/tunnelkit
 * - macOS:   ~/Library/Application Support/tunnelkit
 * - Windows: %APPDATA%\tunnelkit
 */
export function getDataDir(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): string {
  const override = env['TUNNELKIT_HOME'];
  if (override) return override;

  const home = os.homedir();
  switch (platform) {
    case 'darwin':
      return path.join(home, 'Library', 'Application Support', APP_DIR);
    case 'win32':
      return path.join(env['APPDATA'] ?? path.join(home, 'AppData', 'Roaming'), APP_DIR);
    default:
      return path.join(env['XDG_DATA_HOME'] ?? path.join(home, '.local', 'share'), APP_DIR);
  }
}

/** @returns Path to the persisted session cookie */
export function getCookiePath(dataDir: string): string {
  return path.join(dataDir, 'session-cookie.json');
}

/** @returns Path to the single-instance lock file */
export function getInstanceLockPath(dataDir: string): string {
  return path.join(dataDir, 'tunnelkit.lock');
}

/** @returns Path to the dedicated browser profile directory */
export function getBrowserProfileDir(dataDir: string): string {
  return path.join(dataDir, 'profile');
}

/** @returns Path to config.yaml */
export function getConfigPath(dataDir: string): string {
  return path.join(dataDir, 'config.yaml');
}

/** @returns Path to the events.jsonl session journal */
export function getEventsPath(dataDir: string): string {
  return path.join(dataDir, 'events.jsonl');
}
