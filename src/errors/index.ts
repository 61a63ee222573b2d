import createError from '@fastify/error';

// Configuration errors (CONFIG_*)
export const ConfigInvalidError = createError<[string]>(
  'CONFIG_INVALID',
  'Invalid configuration: %s'
);

export const ConfigMissingError = createError<[string]>(
  'CONFIG_MISSING',
  'Missing configuration file: %s'
);

export const ConfigParseError = createError<[string]>(
  'CONFIG_PARSE_ERROR',
  'Failed to parse configuration: %s'
);

// Metadata resolution errors (METADATA_*, VERSION_*) - re-exported from metadata domain
export {
  MetadataMissingError,
  MetadataFieldMissingError,
  MetadataReadError,
  VersionCommandError,
} from '../metadata/errors.js';

// Manifest errors (SCRIPT_*) - re-exported from manifest domain
export { ModulePathInvalidError, ScriptMissingError } from '../manifest/errors.js';

/**
 * Narrow an unknown thrown value to an application error carrying a code.
 */
export function isAppError(error: unknown): error is Error & { code: string } {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}
