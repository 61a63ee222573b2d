import createError from '@fastify/error';

// Metadata resolution errors

/** Neither the development marker nor the metadata file exists */
export const MetadataMissingError = createError<[string]>(
  'METADATA_MISSING',
  'Metadata file not found: %s'
);

/** Metadata file lacks a required "Key:" line */
export const MetadataFieldMissingError = createError<[string, string]>(
  'METADATA_FIELD_MISSING',
  'Metadata file %s has no "%s:" line'
);

/** Version script could not run, exited non-zero, or printed nothing */
export const VersionCommandError = createError<[string, string]>(
  'VERSION_COMMAND_FAILED',
  'Version command %s failed: %s'
);

/** Metadata file exists but cannot be read (a directory, no permission) */
export const MetadataReadError = createError<[string, string]>(
  'METADATA_READ_ERROR',
  'Failed to read metadata file %s: %s'
);
