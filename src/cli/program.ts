// distmeta command-line program.
//
// Commands share one flow: load config for the project root, resolve the
// package metadata, then print or write the requested artifact.

import { writeFileSync } from 'node:fs';
import { resolve } from 'node:path';

import { Command, Option } from 'commander';

import { loadConfig, loadProjectConfig, parseConfig, type Config } from '../config/index.js';
import { isAppError } from '../errors/index.js';
import { createLogger, type Logger } from '../logging/logger.js';
import {
  buildManifest,
  renderPkgInfo,
  verifyScripts,
  writeVersionFile,
  type DistributionManifest,
} from '../manifest/index.js';
import { resolveMetadata, type CommandRunner, type PackageMetadata } from '../metadata/index.js';

export const CLI_VERSION = '0.1.0';

export const FAILURE_EXIT_CODE = 1;

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export interface CliIo {
  /** Receives everything the CLI prints to standard output */
  stdout: (text: string) => void;
  /** Overrides the logger built from the logging config */
  logger?: Logger;
  runCommand?: CommandRunner;
}

type GlobalOptions = {
  config?: string;
  logLevel?: string;
  pretty?: boolean;
};

interface CommandContext {
  root: string;
  config: Config;
  logger: Logger;
}

export function buildProgram(io: CliIo): Command {
  const program = new Command();

  program
    .name('distmeta')
    .description('Resolve packaging metadata for the Storage API library and command-line tool')
    .version(CLI_VERSION)
    .option('-c, --config <path>', 'configuration file (default: <root>/distmeta.config.json)')
    .addOption(new Option('--log-level <level>', 'log level').choices(LOG_LEVELS))
    .option('--pretty', 'human-readable logs');

  const createContext = (root: string, command: Command): CommandContext => {
    const globals = command.optsWithGlobals<GlobalOptions>();
    const projectRoot = resolve(root);
    const loaded = globals.config ? loadConfig(globals.config) : loadProjectConfig(projectRoot);
    const config = parseConfig({
      ...loaded,
      logging: {
        level: globals.logLevel ?? loaded.logging.level,
        pretty: globals.pretty ?? loaded.logging.pretty,
      },
    });
    return { root: projectRoot, config, logger: io.logger ?? createLogger(config.logging) };
  };

  const resolveFor = (ctx: CommandContext): PackageMetadata =>
    resolveMetadata(ctx.root, {
      versionScript: ctx.config.sources.versionScript,
      metadataFile: ctx.config.sources.metadataFile,
      runCommand: io.runCommand,
      logger: ctx.logger,
    });

  const manifestFor = (ctx: CommandContext): DistributionManifest =>
    buildManifest(ctx.root, resolveFor(ctx), ctx.config.distribution);

  const printJson = (value: unknown): void => {
    io.stdout(`${JSON.stringify(value, null, 2)}\n`);
  };

  program
    .command('resolve')
    .description('print the resolved package name, version and module name')
    .argument('[root]', 'project root', '.')
    .action((root: string, _options: unknown, command: Command) => {
      const ctx = createContext(root, command);
      const metadata = resolveFor(ctx);
      ctx.logger.info({ name: metadata.name, mode: metadata.mode }, 'Metadata resolved');
      printJson(metadata);
    });

  program
    .command('manifest')
    .description('print the distribution manifest')
    .argument('[root]', 'project root', '.')
    .action((root: string, _options: unknown, command: Command) => {
      const ctx = createContext(root, command);
      const manifest = manifestFor(ctx);
      verifyScripts(ctx.root, manifest);
      ctx.logger.info(
        { name: manifest.name, version: manifest.version, packages: manifest.packages.length },
        'Manifest built'
      );
      printJson(manifest);
    });

  program
    .command('write-version')
    .description('write the bundled version.json into the module directory')
    .argument('[root]', 'project root', '.')
    .action((root: string, _options: unknown, command: Command) => {
      const ctx = createContext(root, command);
      const filePath = writeVersionFile(ctx.root, resolveFor(ctx));
      ctx.logger.info({ file: filePath }, 'Version file written');
      io.stdout(`${filePath}\n`);
    });

  program
    .command('pkg-info')
    .description('render the source distribution metadata file')
    .argument('[root]', 'project root', '.')
    .option('-o, --output <file>', 'write to a file instead of stdout')
    .action((root: string, options: { output?: string }, command: Command) => {
      const ctx = createContext(root, command);
      const content = renderPkgInfo(manifestFor(ctx));
      if (options.output) {
        const outputPath = resolve(options.output);
        writeFileSync(outputPath, content);
        ctx.logger.info({ file: outputPath }, 'Metadata file written');
        return;
      }
      io.stdout(content);
    });

  return program;
}

/**
 * Log a failed run and return the process exit code.
 * Application errors are logged by code; anything else with the error itself.
 */
export function reportFailure(error: unknown, logger: Logger): number {
  if (isAppError(error)) {
    logger.error({ code: error.code }, error.message);
  } else {
    logger.error({ err: error }, 'Unexpected failure');
  }
  return FAILURE_EXIT_CODE;
}
