/**
 * Packaging pipeline
 *
 * Stages run strictly in order, one at a time:
 *   locale -> stage-data -> freeze -> runtime-libs -> [archive] -> [installer]
 *
 * The first four always run; the mode decides which of the last two do.
 * A freeze failure always aborts. Other failures abort under failFast and
 * are logged and skipped past otherwise, except that nothing is packaged
 * once staging has failed.
 */

import type {
  BuildConfig,
  BuildMode,
  PipelineProgressCallback,
  PipelineResult,
  PipelineStage,
  StageOutcome,
} from './types.js';
import type { CommandRunner } from './process/runner.js';
import { createProcessRunner } from './process/runner.js';
import { BuildLog } from './process/build-log.js';
import type { StageContext } from './stages/context.js';
import { buildLocale } from './stages/locale.js';
import { stageDataFiles } from './stages/stage-data.js';
import { buildExecutable } from './stages/freeze.js';
import { copyRuntimeLibraries } from './stages/runtime-libs.js';
import { createZipArchive } from './stages/archive.js';
import { generateInstaller } from './stages/installer.js';
import { modeRunsInstaller, modeRunsZip } from './mode.js';

/** Stages that fill the staging directory */
const STAGING_STAGES: ReadonlySet<PipelineStage> = new Set<PipelineStage>(['stage-data', 'runtime-libs']);

/** Stages that package the staging directory */
const PACKAGING_STAGES: ReadonlySet<PipelineStage> = new Set<PipelineStage>(['archive', 'installer']);

export const STAGES: readonly PipelineStage[] = [
  'locale',
  'stage-data',
  'freeze',
  'runtime-libs',
  'archive',
  'installer',
];

export interface PipelineDeps {
  /** Defaults to a child_process runner */
  runner?: CommandRunner;
  onProgress?: PipelineProgressCallback;
  /** Override the bundled installer template */
  templatePath?: string;
}

interface PlannedStage {
  stage: PipelineStage;
  enabled: boolean;
  /** Resolves to the artifact path for packaging stages */
  run(ctx: StageContext): Promise<string | undefined>;
}

export function planStages(mode: BuildMode, templatePath?: string): PlannedStage[] {
  return [
    {
      stage: 'locale',
      enabled: true,
      run: async (ctx) => {
        await buildLocale(ctx);
        return undefined;
      },
    },
    {
      stage: 'stage-data',
      enabled: true,
      run: async (ctx) => {
        await stageDataFiles(ctx);
        return undefined;
      },
    },
    {
      stage: 'freeze',
      enabled: true,
      run: async (ctx) => {
        await buildExecutable(ctx);
        return undefined;
      },
    },
    {
      stage: 'runtime-libs',
      enabled: true,
      run: async (ctx) => {
        await copyRuntimeLibraries(ctx);
        return undefined;
      },
    },
    { stage: 'archive', enabled: modeRunsZip(mode), run: (ctx) => createZipArchive(ctx) },
    {
      stage: 'installer',
      enabled: modeRunsInstaller(mode),
      run: (ctx) => generateInstaller(ctx, templatePath),
    },
  ];
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export async function runPipeline(config: BuildConfig, deps: PipelineDeps = {}): Promise<PipelineResult> {
  const log = new BuildLog(config.logPath);
  const emit: PipelineProgressCallback = (event) => deps.onProgress?.(event);
  const ctx: StageContext = {
    config,
    runner: deps.runner ?? createProcessRunner(),
    log,
    emit,
  };

  await log.reset();
  await log.append(`chirp-build ${config.version} (${config.mode}) -> ${config.outputDir}`);

  const plan = planStages(config.mode, deps.templatePath);
  const stages: StageOutcome[] = [];
  const artifacts: string[] = [];
  let ok = true;
  // Set once a staging stage fails without aborting
  let incompleteStaging: PipelineStage | undefined;

  for (const [index, planned] of plan.entries()) {
    const { stage } = planned;

    if (!planned.enabled) {
      const reason = `not requested in ${config.mode} mode`;
      stages.push({ stage, status: 'skipped', durationMs: 0 });
      emit({ type: 'stage-skipped', stage, reason });
      continue;
    }

    if (incompleteStaging && PACKAGING_STAGES.has(stage)) {
      const reason = `staging incomplete after ${incompleteStaging} failure`;
      stages.push({ stage, status: 'skipped', durationMs: 0 });
      emit({ type: 'stage-skipped', stage, reason });
      await log.append(`${stage} skipped: ${reason}`);
      continue;
    }

    emit({ type: 'stage-start', stage, index: index + 1, total: plan.length });
    const startedAt = Date.now();

    try {
      const artifact = await planned.run(ctx);
      if (artifact) artifacts.push(artifact);

      const durationMs = Date.now() - startedAt;
      stages.push({ stage, status: 'ok', durationMs });
      emit({ type: 'stage-complete', stage, durationMs });
    } catch (caught) {
      const error = toError(caught);
      const fatal = stage === 'freeze' || config.packaging.failFast;
      ok = false;

      stages.push({ stage, status: 'failed', durationMs: Date.now() - startedAt, error });
      emit({ type: 'stage-failed', stage, error, fatal });
      await log.append(`${stage} failed: ${error.message}`);

      if (fatal) {
        for (const remaining of plan.slice(index + 1)) {
          stages.push({ stage: remaining.stage, status: 'skipped', durationMs: 0 });
          emit({ type: 'stage-skipped', stage: remaining.stage, reason: `aborted after ${stage} failure` });
        }
        throw error;
      }
      if (STAGING_STAGES.has(stage)) {
        incompleteStaging = stage;
      }
    }
  }

  return { ok, stages, artifacts };
}
