import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { ErrorCodes, FilesystemError } from '../errors.js';
import type { StageContext } from './context.js';
import { copyIntoStaging } from './stage-data.js';

/**
 * Copy the GUI toolkit's lib/etc/share trees beside the frozen executable
 * so it runs without the toolkit installed.
 */
export async function copyRuntimeLibraries(ctx: StageContext): Promise<string[]> {
  const { toolkit } = ctx.config.packaging;
  const copied: string[] = [];

  for (const dir of toolkit.libraryDirs) {
    const source = join(toolkit.root, dir);
    if (!existsSync(source)) {
      throw new FilesystemError(
        ErrorCodes.FS_SOURCE_NOT_FOUND,
        source,
        `Toolkit directory not found: ${source}`
      );
    }
    copied.push(await copyIntoStaging(ctx, 'runtime-libs', source));
  }

  return copied;
}
