// Development version resolution.
//
// A working copy carries an executable script (version.sh) whose standard
// output is the version string.

import { execFileSync } from 'node:child_process';

import { VersionCommandError } from './errors.js';
import type { CommandRunner } from './types.js';

/** Run the file directly, without a shell, and capture stdout as UTF-8 */
export const execCommandRunner: CommandRunner = (file, cwd) =>
  execFileSync(file, [], { cwd, encoding: 'utf-8', stdio: ['ignore', 'pipe', 'pipe'] });

/**
 * Run the version script and return its trimmed output.
 * Throws VersionCommandError if the script fails or prints nothing.
 */
export function runVersionScript(
  scriptPath: string,
  cwd: string,
  runCommand: CommandRunner = execCommandRunner
): string {
  let output: string;
  try {
    output = runCommand(scriptPath, cwd);
  } catch (error) {
    throw new VersionCommandError(scriptPath, describeFailure(error));
  }

  const version = output.trim();
  if (version === '') {
    throw new VersionCommandError(scriptPath, 'no output');
  }
  return version;
}

function describeFailure(error: unknown): string {
  if (!(error instanceof Error)) return 'unknown error';

  // execFileSync attaches the exit status and captured stderr
  const status = 'status' in error && typeof error.status === 'number' ? error.status : undefined;
  const stderr =
    'stderr' in error && typeof error.stderr === 'string' ? error.stderr.trim() : '';

  if (status !== undefined) {
    return stderr ? `exit status ${status}: ${stderr}` : `exit status ${status}`;
  }
  return error.message;
}
