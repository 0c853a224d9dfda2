import { join } from 'node:path';
import { homedir } from 'node:os';

export const STORAGE_FILE_ENV = 'DOLIST_FILE';
const APP_DIR = 'dolist';
const FILE_NAME = 'tasks.json';

/** Returns the platform-appropriate data directory for the tasks file */
export function getDataDir(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
): string {
  if (platform === 'darwin') {
    return join(homedir(), 'Library', 'Application Support', APP_DIR);
  }
  if (platform === 'win32') {
    return join(env['APPDATA'] ?? join(homedir(), 'AppData', 'Roaming'), APP_DIR);
  }
  // Linux / other
  return join(env['XDG_DATA_HOME'] ?? join(homedir(), '.local', 'share'), APP_DIR);
}

/** DOLIST_FILE when set, otherwise tasks.json in the platform data directory */
export function getDefaultStoragePath(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const override = env[STORAGE_FILE_ENV];
  if (override) return override;
  return join(getDataDir(platform, env), FILE_NAME);
}
