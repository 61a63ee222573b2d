// Packaging metadata types.

/** How the metadata was obtained */
export type ResolutionMode = 'development' | 'sdist';

export interface PackageMetadata {
  /** Distribution name, used verbatim in the manifest */
  name: string;
  version: string;
  /** Importable module name: `name` with hyphens replaced by underscores */
  moduleName: string;
  mode: ResolutionMode;
}

/** First `Name:` and `Version:` values found in a metadata file */
export interface PkgInfoIdentity {
  name?: string;
  version?: string;
}

/** Header fields of a metadata file in file order; keys may repeat */
export type PkgInfoFields = Array<[key: string, value: string]>;

/**
 * Runs an external command and returns its standard output.
 * Implementations throw when the command cannot start or exits non-zero.
 */
export type CommandRunner = (file: string, cwd: string) => string;
