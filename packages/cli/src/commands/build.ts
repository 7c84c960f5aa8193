/**
 * Build command - run the Windows packaging pipeline
 */

import pc from 'picocolors';
import { resolve } from 'node:path';
import {
  ConfigurationError,
  ErrorCodes,
  isPackagingError,
  loadConfig,
  loadConfigFile,
  parseModeFlag,
  resolveBuildConfig,
  resolveProjectRoot,
  runPipeline,
  wrapError,
  type BuildMode,
  type CommandRunner,
  type PipelineEvent,
  type PipelineResult,
  type PipelineStage,
} from '@chirp-build/core';
import { logger } from '../lib/logger.js';

export interface BuildOptions {
  zipOnly?: boolean;
  installerOnly?: boolean;
  project?: string;
  config?: string;
  bestEffort?: boolean;
  verbose?: boolean;
  quiet?: boolean;
  json?: boolean;
}

export interface BuildDeps {
  runner?: CommandRunner;
  baseEnv?: NodeJS.ProcessEnv;
}

const STAGE_LABELS: Record<PipelineStage, string> = {
  locale: 'Building locales',
  'stage-data': 'Staging data files',
  freeze: 'Building Win32 executable',
  'runtime-libs': 'Copying toolkit lib, etc, share',
  archive: 'Making ZIP archive',
  installer: 'Making installer',
};

/** Format duration for human-readable output */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

/**
 * The mode may arrive as -z/-i options or as a positional flag.
 * At most one may be given.
 */
export function resolveMode(modeArg: string | undefined, options: BuildOptions): BuildMode {
  const flags: string[] = [];
  if (options.zipOnly) flags.push('-z');
  if (options.installerOnly) flags.push('-i');
  if (modeArg !== undefined) flags.push(modeArg);

  if (flags.length > 1) {
    throw new ConfigurationError(
      ErrorCodes.CLI_INVALID_MODE,
      `Only one mode may be given, got: ${flags.join(' ')}`
    );
  }
  return parseModeFlag(flags[0]);
}

export function reportProgress(event: PipelineEvent): void {
  switch (event.type) {
    case 'stage-start':
      logger.step(event.index, event.total, `${STAGE_LABELS[event.stage]}...`);
      break;
    case 'stage-complete':
      logger.success(pc.dim(`${event.stage} (${formatDuration(event.durationMs)})`));
      break;
    case 'stage-failed':
      logger.fail(`${event.stage}: ${event.error.message}`);
      if (!event.fatal) {
        logger.warn(`Continuing after ${event.stage} failure (--best-effort)`);
      }
      break;
    case 'stage-skipped':
      logger.debug(`Skipped ${event.stage}: ${event.reason}`);
      break;
    case 'file-copied':
      logger.debug(`Copied ${event.from} -> ${event.to}`);
      break;
    case 'command':
      logger.debug(`Ran ${event.command}`, { exitCode: event.exitCode });
      break;
  }
}

function printSummary(result: PipelineResult, logPath: string, quiet: boolean): void {
  if (logger.isJson) {
    console.log(
      JSON.stringify(
        {
          ok: result.ok,
          artifacts: result.artifacts,
          stages: result.stages.map(({ stage, status, durationMs, error }) => ({
            stage,
            status,
            durationMs,
            ...(error && { error: error.message }),
          })),
          log: logPath,
        },
        null,
        2
      )
    );
    return;
  }

  if (!result.ok) {
    const failed = result.stages.filter((s) => s.status === 'failed').map((s) => s.stage);
    console.error(pc.yellow(`⚠ Completed with failed stages: ${failed.join(', ')}`));
  }
  if (quiet) return;

  console.log('');
  for (const artifact of result.artifacts) {
    console.log(pc.green('✓'), pc.bold(artifact));
  }
  console.log(pc.dim(`Build log: ${logPath}`));
  console.log('');
}

function printError(error: unknown, verbose: boolean): void {
  const packagingError = isPackagingError(error)
    ? error
    : wrapError(error, ErrorCodes.INTERNAL_ERROR);

  if (logger.isJson) {
    console.error(JSON.stringify(packagingError.toJSON(), null, 2));
    return;
  }

  console.error(pc.red(`\n${packagingError.toUserString(verbose)}\n`));

  const remediation = packagingError.getRemediation();
  if (remediation) {
    console.error(pc.yellow('How to fix:'));
    for (const line of remediation.split('\n')) {
      console.error(pc.dim(`  ${line}`));
    }
    console.error('');
  }

  if (packagingError.cause && !verbose) {
    console.error(pc.dim(`Caused by: ${packagingError.cause.message}`));
    console.error('');
  }
}

/**
 * Run the pipeline and return the process exit code
 */
export async function runBuild(
  destination: string | undefined,
  modeArg: string | undefined,
  options: BuildOptions,
  deps: BuildDeps = {}
): Promise<number> {
  logger.configure({
    verbose: options.verbose,
    silent: options.quiet,
    json: options.json,
  });

  try {
    const mode = resolveMode(modeArg, options);
    const projectRoot = resolveProjectRoot(options.project);
    const loaded = options.config
      ? await loadConfigFile(resolve(options.config))
      : await loadConfig(projectRoot);
    const config = options.bestEffort ? { ...loaded, failFast: false } : loaded;

    const buildConfig = await resolveBuildConfig({
      projectRoot,
      destination,
      mode,
      config,
      baseEnv: deps.baseEnv,
    });

    logger.info(`Packaging ${config.productName} ${buildConfig.version} (${mode})`);
    logger.debug('Resolved build configuration', {
      outputDir: buildConfig.outputDir,
      stagingPath: buildConfig.stagingPath,
      logPath: buildConfig.logPath,
      environment: buildConfig.environment,
    });

    const result = await runPipeline(buildConfig, {
      runner: deps.runner,
      onProgress: reportProgress,
    });

    printSummary(result, buildConfig.logPath, options.quiet ?? false);
    return result.ok ? 0 : 1;
  } catch (error) {
    printError(error, options.verbose ?? false);
    return 1;
  }
}

export async function buildCommand(
  destination: string | undefined,
  modeArg: string | undefined,
  options: BuildOptions
): Promise<void> {
  process.exitCode = await runBuild(destination, modeArg, options);
}
