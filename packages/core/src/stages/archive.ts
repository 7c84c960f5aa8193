import { mkdir, rm } from 'node:fs/promises';
import { BuildStepError, ErrorCodes } from '../errors.js';
import type { StageContext } from './context.js';
import { runTool } from './context.js';

/** zip arguments; run from inside the staging directory so entries carry no prefix */
export function zipArguments(zipPath: string): string[] {
  return ['-9', '-r', zipPath, '.'];
}

export async function createZipArchive(ctx: StageContext): Promise<string> {
  const { artifacts, outputDir, stagingPath, packaging } = ctx.config;

  await mkdir(outputDir, { recursive: true });
  // zip updates an existing archive in place; start clean
  await rm(artifacts.zip, { force: true });

  const result = await runTool(ctx, 'archive', packaging.tools.zip, zipArguments(artifacts.zip), stagingPath);
  if (result.exitCode !== 0) {
    throw new BuildStepError(
      ErrorCodes.STEP_ARCHIVE_FAILED,
      'archive',
      result.exitCode,
      `zip exited with ${result.exitCode}`
    );
  }

  return artifacts.zip;
}
