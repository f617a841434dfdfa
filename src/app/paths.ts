/**
 * Configured paths (revocation list, user directories, log file) are relative
 * to the project root, whatever the process's working directory.
 */

import { fileURLToPath } from 'url';
import { dirname, isAbsolute, resolve, sep } from 'path';

const moduleDir = dirname(fileURLToPath(import.meta.url));

// src/app under vitest, dist/src/app once compiled
export const PROJECT_ROOT = moduleDir.split(sep).includes('dist')
  ? resolve(moduleDir, '..', '..', '..')
  : resolve(moduleDir, '..', '..');

export function resolveProjectPath(path: string): string {
  return isAbsolute(path) ? path : resolve(PROJECT_ROOT, path);
}
