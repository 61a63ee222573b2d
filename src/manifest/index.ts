// Manifest module barrel export.

export { buildManifest, expandUrl, verifyScripts } from './build-manifest.js';
export { findPackages } from './find-packages.js';
export type { FindPackagesOptions } from './find-packages.js';
export { renderPkgInfo, METADATA_VERSION } from './pkg-info-writer.js';
export { writeVersionFile, VERSION_FILE_NAME } from './version-file.js';
export { ModulePathInvalidError, ScriptMissingError } from './errors.js';
export type { DistributionManifest, VersionFile } from './types.js';
