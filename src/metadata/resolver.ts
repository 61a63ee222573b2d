// Package name and version resolution.
//
// Development mode: the version script exists in the project root. Its output
// is the version and the root directory's base name is the package name.
// Source distribution mode: both values come from the metadata file.

import { existsSync, readFileSync } from 'node:fs';
import { basename, join, resolve } from 'node:path';

import type { Logger } from 'pino';

import { MetadataFieldMissingError, MetadataMissingError, MetadataReadError } from './errors.js';
import { toModuleName } from './module-name.js';
import { parsePkgInfo } from './pkg-info.js';
import type { CommandRunner, PackageMetadata } from './types.js';
import { runVersionScript } from './version-script.js';

export interface ResolveOptions {
  /** Development marker file name (default: version.sh) */
  versionScript?: string;
  /** Metadata file name (default: PKG-INFO) */
  metadataFile?: string;
  /** Substitute for spawning the version script */
  runCommand?: CommandRunner;
  logger?: Logger;
}

export function resolveMetadata(root: string, options: ResolveOptions = {}): PackageMetadata {
  const projectRoot = resolve(root);
  const scriptPath = join(projectRoot, options.versionScript ?? 'version.sh');

  if (existsSync(scriptPath)) {
    const version = runVersionScript(scriptPath, projectRoot, options.runCommand);
    const name = basename(projectRoot);
    options.logger?.debug({ name, version, script: scriptPath }, 'Resolved development metadata');
    return { name, version, moduleName: toModuleName(name), mode: 'development' };
  }

  const metadataPath = join(projectRoot, options.metadataFile ?? 'PKG-INFO');
  if (!existsSync(metadataPath)) {
    throw new MetadataMissingError(metadataPath);
  }

  let content: string;
  try {
    content = readFileSync(metadataPath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown read error';
    throw new MetadataReadError(metadataPath, message);
  }

  const { name, version } = parsePkgInfo(content);
  if (!name) {
    throw new MetadataFieldMissingError(metadataPath, 'Name');
  }
  if (!version) {
    throw new MetadataFieldMissingError(metadataPath, 'Version');
  }

  options.logger?.debug(
    { name, version, file: metadataPath },
    'Resolved source distribution metadata'
  );
  return { name, version, moduleName: toModuleName(name), mode: 'sdist' };
}
