import { appendFile, rm } from 'node:fs/promises';
import { ErrorCodes, FilesystemError } from '../errors.js';
import type { CommandResult } from './runner.js';

/**
 * Build log in the working directory. Tool output and copy listings are
 * appended here rather than printed.
 */
export class BuildLog {
  constructor(readonly path: string) {}

  async reset(): Promise<void> {
    await rm(this.path, { force: true });
  }

  async append(text: string): Promise<void> {
    const line = text.endsWith('\n') ? text : `${text}\n`;
    try {
      await appendFile(this.path, line, 'utf-8');
    } catch (error) {
      throw new FilesystemError(ErrorCodes.FS_WRITE_FAILED, this.path, `Failed to write build log ${this.path}`, {
        cause: error instanceof Error ? error : new Error(String(error)),
      });
    }
  }

  async record(result: CommandResult): Promise<void> {
    const parts = [`$ ${result.command}`];
    if (result.stdout) parts.push(result.stdout.trimEnd());
    if (result.stderr) parts.push(result.stderr.trimEnd());
    parts.push(`[exit ${result.exitCode}]`);
    await this.append(parts.join('\n'));
  }
}
