import createError from '@fastify/error';

/** A declared script entry point does not exist in the project */
export const ScriptMissingError = createError<[string]>(
  'SCRIPT_MISSING',
  'Declared script not found: %s'
);

/** Module name would place files outside the project root */
export const ModulePathInvalidError = createError<[string]>(
  'MODULE_PATH_INVALID',
  'Module name does not name a directory inside the project: %s'
);
