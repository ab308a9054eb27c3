/**
 * Configuration file locations
 */

import { join, resolve } from 'node:path';

/** Config file looked up in the working directory */
export const CONFIG_FILE_NAME = '.linegate.yaml';

/** Directory for debug logs and other local state */
export const STATE_DIR_NAME = '.linegate';

export function getDefaultConfigPath(cwd: string): string {
  return join(resolve(cwd), CONFIG_FILE_NAME);
}

export function resolveConfigPath(path: string, cwd: string): string {
  return resolve(cwd, path);
}
