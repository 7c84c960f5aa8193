import { BuildStepError, ErrorCodes } from '../errors.js';
import type { StageContext } from './context.js';
import { runTool } from './context.js';

/**
 * Turn the application into a self-contained executable tree. A failure
 * here always ends the pipeline.
 */
export async function buildExecutable(ctx: StageContext): Promise<void> {
  const result = await runTool(ctx, 'freeze', ctx.config.packaging.tools.freeze, []);

  if (result.exitCode !== 0) {
    throw new BuildStepError(ErrorCodes.STEP_FREEZE_FAILED, 'freeze', result.exitCode, 'Build failed', {
      details: { command: result.command, exitCode: result.exitCode },
    });
  }
}
