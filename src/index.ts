// distmeta library entry point.

export {
  loadConfig,
  loadProjectConfig,
  parseConfig,
  ConfigSchema,
  DEFAULT_CLASSIFIERS,
} from './config/index.js';
export type { Config, DistributionConfig, LoggingConfig, SourcesConfig } from './config/index.js';
export {
  ConfigInvalidError,
  ConfigMissingError,
  ConfigParseError,
  isAppError,
} from './errors/index.js';
export { createLogger, createSilentLogger } from './logging/logger.js';
export type { Logger } from './logging/logger.js';
export * from './metadata/index.js';
export * from './manifest/index.js';
export { buildProgram, reportFailure, CLI_VERSION, FAILURE_EXIT_CODE } from './cli/program.js';
export type { CliIo } from './cli/program.js';
