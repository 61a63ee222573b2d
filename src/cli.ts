#!/usr/bin/env node
/**
 * distmeta CLI entry point.
 */

import { buildProgram, reportFailure } from './cli/program.js';
import { createLogger } from './logging/logger.js';

async function main(): Promise<void> {
  const program = buildProgram({ stdout: (text) => process.stdout.write(text) });
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  process.exitCode = reportFailure(error, createLogger({ level: 'error', pretty: false }));
});
