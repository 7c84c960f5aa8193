/**
 * Data stager - creates the staging directory and copies the static
 * assets (license, schemas, stock configs, compiled locales) into it.
 */

import { cp, mkdir, rm } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { basename, join, relative } from 'node:path';
import { glob } from 'glob';
import { ErrorCodes, FilesystemError } from '../errors.js';
import type { StageContext } from './context.js';

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export async function createStagingDirectory(ctx: StageContext): Promise<void> {
  const { stagingPath, packaging } = ctx.config;

  if (existsSync(stagingPath)) {
    if (!packaging.cleanStaging) {
      throw new FilesystemError(
        ErrorCodes.FS_STAGING_EXISTS,
        stagingPath,
        `Staging directory already exists: ${stagingPath}`
      );
    }
    await ctx.log.append(`removing stale staging directory ${stagingPath}`);
    await rm(stagingPath, { recursive: true, force: true });
  }

  try {
    await mkdir(stagingPath);
  } catch (error) {
    throw new FilesystemError(
      ErrorCodes.FS_STAGING_CREATE_FAILED,
      stagingPath,
      `Failed to create staging directory ${stagingPath}`,
      { cause: toError(error) }
    );
  }
}

/**
 * Copy one file or directory tree into the staging directory, keeping its
 * base name. Shared with the runtime library copier.
 */
export async function copyIntoStaging(
  ctx: StageContext,
  stage: 'stage-data' | 'runtime-libs',
  source: string
): Promise<string> {
  const { projectRoot, stagingPath } = ctx.config;
  const destination = join(stagingPath, basename(source));

  try {
    await cp(source, destination, { recursive: true, force: true });
  } catch (error) {
    throw new FilesystemError(
      ErrorCodes.FS_COPY_FAILED,
      source,
      `Failed to copy ${source} to ${destination}`,
      { cause: toError(error) }
    );
  }

  await ctx.log.append(`'${relative(projectRoot, source)}' -> '${relative(projectRoot, destination)}'`);
  ctx.emit({ type: 'file-copied', stage, from: source, to: destination });
  return destination;
}

export async function stageDataFiles(ctx: StageContext): Promise<string[]> {
  const { projectRoot, packaging } = ctx.config;

  await createStagingDirectory(ctx);

  const staged: string[] = [];
  for (const pattern of packaging.dataFiles) {
    const matches = await glob(pattern, { cwd: projectRoot, absolute: true });
    if (matches.length === 0) {
      throw new FilesystemError(
        ErrorCodes.FS_SOURCE_NOT_FOUND,
        join(projectRoot, pattern),
        `No files match data file pattern '${pattern}'`
      );
    }

    for (const match of matches.sort()) {
      staged.push(await copyIntoStaging(ctx, 'stage-data', match));
    }
  }

  return staged;
}
