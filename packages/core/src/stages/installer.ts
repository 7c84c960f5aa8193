import { mkdir, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { BuildStepError, ErrorCodes, FilesystemError } from '../errors.js';
import { loadInstallerTemplate, renderInstallerScript, toCrlf } from '../installer-script.js';
import type { StageContext } from './context.js';
import { runTool } from './context.js';

export async function writeInstallerScript(ctx: StageContext, templatePath?: string): Promise<string> {
  const { projectRoot, version, artifacts, packaging } = ctx.config;
  const template = await loadInstallerTemplate(templatePath);

  const script = renderInstallerScript(template, {
    productName: packaging.productName,
    version,
    outFile: artifacts.installer,
    stagingDir: packaging.stagingDir,
    executable: packaging.installer.executable,
    obsoleteShortcuts: packaging.installer.obsoleteShortcuts,
    compressor: packaging.installer.compressor,
  });

  // makensis expects DOS line endings
  const scriptPath = resolve(projectRoot, packaging.installer.scriptFile);
  try {
    await writeFile(scriptPath, toCrlf(script), 'utf-8');
  } catch (error) {
    throw new FilesystemError(ErrorCodes.FS_WRITE_FAILED, scriptPath, `Failed to write ${scriptPath}`, {
      cause: error instanceof Error ? error : new Error(String(error)),
    });
  }

  await ctx.log.append(`wrote installer script ${scriptPath}`);
  return scriptPath;
}

export async function generateInstaller(ctx: StageContext, templatePath?: string): Promise<string> {
  const { outputDir, artifacts, packaging } = ctx.config;

  const scriptPath = await writeInstallerScript(ctx, templatePath);
  await mkdir(outputDir, { recursive: true });

  const result = await runTool(ctx, 'installer', packaging.tools.installerCompiler, [scriptPath]);
  if (result.exitCode !== 0) {
    throw new BuildStepError(
      ErrorCodes.STEP_INSTALLER_FAILED,
      'installer',
      result.exitCode,
      `makensis exited with ${result.exitCode}`
    );
  }

  return artifacts.installer;
}
