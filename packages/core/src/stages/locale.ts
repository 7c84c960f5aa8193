/**
 * Locale builder
 *
 * Runs the project's locale build, then compiles every catalog source to
 * <locale>/<lang>/LC_MESSAGES/<domain>.mo.
 */

import { mkdir } from 'node:fs/promises';
import { basename, dirname, extname, join, resolve } from 'node:path';
import { glob } from 'glob';
import { BuildStepError, ErrorCodes } from '../errors.js';
import type { StageContext } from './context.js';
import { runTool } from './context.js';

export interface CatalogTarget {
  language: string;
  source: string;
  output: string;
}

export async function findCatalogs(
  localeDir: string,
  catalogGlob: string,
  domain: string
): Promise<CatalogTarget[]> {
  const sources = await glob(catalogGlob, { cwd: localeDir, absolute: true, nodir: true });

  return sources.sort().map((source) => {
    const language = basename(source, extname(source));
    return {
      language,
      source,
      output: join(localeDir, language, 'LC_MESSAGES', `${domain}.mo`),
    };
  });
}

export async function buildLocale(ctx: StageContext): Promise<CatalogTarget[]> {
  const { projectRoot, packaging } = ctx.config;

  const build = await runTool(ctx, 'locale', packaging.tools.localeBuild, []);
  if (build.exitCode !== 0) {
    throw new BuildStepError(
      ErrorCodes.STEP_LOCALE_FAILED,
      'locale',
      build.exitCode,
      `Locale build failed (exit ${build.exitCode}): ${build.command}`
    );
  }

  const localeDir = resolve(projectRoot, packaging.locale.dir);
  const catalogs = await findCatalogs(localeDir, packaging.locale.catalogGlob, packaging.locale.domain);

  for (const catalog of catalogs) {
    await mkdir(dirname(catalog.output), { recursive: true });
    const result = await runTool(ctx, 'locale', packaging.tools.catalogCompiler, [
      '-o',
      catalog.output,
      catalog.source,
    ]);
    if (result.exitCode !== 0) {
      throw new BuildStepError(
        ErrorCodes.STEP_LOCALE_FAILED,
        'locale',
        result.exitCode,
        `Catalog compilation failed for '${catalog.language}' (exit ${result.exitCode})`
      );
    }
  }

  return catalogs;
}
