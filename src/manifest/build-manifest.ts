import { existsSync } from 'node:fs';
import { join } from 'node:path';

import type { DistributionConfig } from '../config/index.js';
import type { PackageMetadata } from '../metadata/index.js';
import { ScriptMissingError } from './errors.js';
import { findPackages } from './find-packages.js';
import type { DistributionManifest } from './types.js';

/**
 * Assemble the registration manifest for a resolved package.
 */
export function buildManifest(
  root: string,
  metadata: PackageMetadata,
  distribution: DistributionConfig
): DistributionManifest {
  return {
    name: metadata.name,
    version: metadata.version,
    description: distribution.description,
    url: expandUrl(distribution.urlTemplate, metadata.name),
    author: distribution.author,
    authorEmail: distribution.authorEmail,
    license: distribution.license,
    classifiers: [...distribution.classifiers],
    packages: findPackages(root, {
      marker: distribution.packageMarker,
      exclude: distribution.excludeDirs,
    }),
    installRequires: [...distribution.installRequires],
    packageData: { [metadata.moduleName]: [...distribution.dataFiles] },
    scripts: [...distribution.scripts],
  };
}

export function expandUrl(template: string, packageName: string): string {
  return template.replaceAll('{name}', packageName);
}

/**
 * Throw ScriptMissingError for the first declared script absent from the project.
 */
export function verifyScripts(root: string, manifest: DistributionManifest): void {
  for (const script of manifest.scripts) {
    if (!existsSync(join(root, script))) {
      throw new ScriptMissingError(script);
    }
  }
}
