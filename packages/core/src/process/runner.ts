/**
 * External command runner
 *
 * Every external tool (make, msgfmt, the freezer, zip, makensis) goes through
 * a CommandRunner so stages never touch child_process directly.
 */

import { execFile } from 'node:child_process';
import type { ToolCommand } from '../types.js';

export interface CommandOptions {
  cwd: string;
  env: Readonly<Record<string, string>>;
}

export interface CommandResult {
  /** Printable command line */
  command: string;
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandRunner {
  run(tool: ToolCommand, extraArgs: string[], options: CommandOptions): Promise<CommandResult>;
}

/** Exit code reported when the program could not be started at all */
export const COMMAND_NOT_FOUND_EXIT_CODE = 127;

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

function quoteArg(arg: string): string {
  return /[\s"]/.test(arg) ? `"${arg.replace(/"/g, '\\"')}"` : arg;
}

export function formatCommand(tool: ToolCommand, extraArgs: string[] = []): string {
  return [tool.command, ...tool.args, ...extraArgs].map(quoteArg).join(' ');
}

function exitCodeOf(error: Error & { code?: unknown }): number {
  const code: unknown = error.code;
  if (typeof code === 'number') return code;
  if (code === 'ENOENT' || code === 'EACCES') return COMMAND_NOT_FOUND_EXIT_CODE;
  return 1;
}

/**
 * Runner backed by execFile. Resolves for every exit status; only the
 * caller decides whether a non-zero exit is fatal.
 */
export function createProcessRunner(): CommandRunner {
  return {
    run(tool, extraArgs, options) {
      const args = [...tool.args, ...extraArgs];
      const command = formatCommand(tool, extraArgs);

      return new Promise<CommandResult>((resolve) => {
        execFile(
          tool.command,
          args,
          {
            cwd: options.cwd,
            env: { ...options.env },
            encoding: 'utf8',
            maxBuffer: MAX_OUTPUT_BYTES,
            windowsHide: true,
          },
          (error, stdout, stderr) => {
            if (!error) {
              resolve({ command, exitCode: 0, stdout, stderr });
              return;
            }
            resolve({
              command,
              exitCode: exitCodeOf(error),
              stdout,
              stderr: stderr || error.message,
            });
          }
        );
      });
    },
  };
}
