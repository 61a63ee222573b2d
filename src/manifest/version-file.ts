// Bundled version data file (<module>/version.json).

import { mkdirSync, writeFileSync } from 'node:fs';
import { join, relative, resolve, isAbsolute } from 'node:path';

import type { PackageMetadata } from '../metadata/index.js';
import { ModulePathInvalidError } from './errors.js';
import type { VersionFile } from './types.js';

export const VERSION_FILE_NAME = 'version.json';

/**
 * Write `{ name, version }` into the module directory and return the file path.
 * The module name comes from the metadata file, so it must be a single
 * directory name that stays inside `root`.
 */
export function writeVersionFile(root: string, metadata: PackageMetadata): string {
  const moduleDir = resolveModuleDir(root, metadata.moduleName);
  mkdirSync(moduleDir, { recursive: true });

  const filePath = join(moduleDir, VERSION_FILE_NAME);
  const content: VersionFile = { name: metadata.name, version: metadata.version };
  writeFileSync(filePath, `${JSON.stringify(content, null, 2)}\n`);
  return filePath;
}

function resolveModuleDir(root: string, moduleName: string): string {
  if (
    moduleName === '' ||
    moduleName === '.' ||
    moduleName.includes('/') ||
    moduleName.includes('\\') ||
    moduleName.includes('..')
  ) {
    throw new ModulePathInvalidError(moduleName);
  }

  const projectRoot = resolve(root);
  const moduleDir = resolve(projectRoot, moduleName);
  const fromRoot = relative(projectRoot, moduleDir);
  if (fromRoot === '' || fromRoot.startsWith('..') || isAbsolute(fromRoot)) {
    throw new ModulePathInvalidError(moduleName);
  }
  return moduleDir;
}
