import type { BuildConfig, PipelineEvent, PipelineStage, ToolCommand } from '../types.js';
import type { CommandResult, CommandRunner } from '../process/runner.js';
import type { BuildLog } from '../process/build-log.js';

/** Everything a stage needs; stages share no other state */
export interface StageContext {
  config: BuildConfig;
  runner: CommandRunner;
  log: BuildLog;
  emit(event: PipelineEvent): void;
}

/**
 * Run an external tool with the build environment, append its output to
 * the build log and report it. The caller inspects the exit code.
 */
export async function runTool(
  ctx: StageContext,
  stage: PipelineStage,
  tool: ToolCommand,
  extraArgs: string[],
  cwd: string = ctx.config.projectRoot
): Promise<CommandResult> {
  const result = await ctx.runner.run(tool, extraArgs, {
    cwd,
    env: ctx.config.environment,
  });
  await ctx.log.record(result);
  ctx.emit({ type: 'command', stage, command: result.command, exitCode: result.exitCode });
  return result;
}
