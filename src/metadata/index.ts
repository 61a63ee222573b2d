// Metadata module barrel export.

export { resolveMetadata } from './resolver.js';
export type { ResolveOptions } from './resolver.js';
export { parsePkgInfo, readPkgInfoFields, getPkgInfoValues } from './pkg-info.js';
export { runVersionScript, execCommandRunner } from './version-script.js';
export { toModuleName } from './module-name.js';
export {
  MetadataMissingError,
  MetadataFieldMissingError,
  MetadataReadError,
  VersionCommandError,
} from './errors.js';
export type {
  CommandRunner,
  PackageMetadata,
  PkgInfoFields,
  PkgInfoIdentity,
  ResolutionMode,
} from './types.js';
