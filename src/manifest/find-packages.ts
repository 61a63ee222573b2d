// Package discovery.
//
// A directory is a package when it holds the marker file. The walk only
// descends into packages, so a marked directory below an unmarked one is
// not picked up.

import { existsSync, readdirSync } from 'node:fs';
import { join } from 'node:path';

export interface FindPackagesOptions {
  /** File whose presence marks a package directory */
  marker: string;
  /** Directory names never treated as packages */
  exclude?: string[];
}

export function findPackages(root: string, options: FindPackagesOptions): string[] {
  const exclude = new Set(options.exclude ?? []);
  const packages: string[] = [];

  const walk = (dir: string, prefix: string): void => {
    for (const entry of readdirSync(dir, { withFileTypes: true })) {
      if (!entry.isDirectory()) continue;
      if (entry.name.startsWith('.') || exclude.has(entry.name)) continue;

      const path = join(dir, entry.name);
      if (!existsSync(join(path, options.marker))) continue;

      const relative = prefix ? `${prefix}/${entry.name}` : entry.name;
      packages.push(relative);
      walk(path, relative);
    }
  };

  walk(root, '');
  return packages.sort();
}
