/**
 * @chirp-build/core
 *
 * Windows packaging pipeline: locale build, data staging, freezing,
 * toolkit runtime copy, ZIP archive and NSIS installer.
 */

// Types
export * from './types.js';

// Configuration
export {
  loadConfig,
  loadConfigFile,
  mergeConfig,
  readVersion,
  resolveOutputDir,
  resolveProjectRoot,
  resolveBuildConfig,
  DEFAULT_CONFIG,
  CONFIG_FILE_NAMES,
  type ResolveBuildConfigOptions,
} from './config.js';
export { parseModeFlag, modeRunsZip, modeRunsInstaller, MODE_FLAGS } from './mode.js';
export { zipArtifactPath, installerArtifactPath } from './artifacts.js';
export { buildToolEnvironment } from './environment.js';

// Error handling
export {
  PackagingError,
  ConfigurationError,
  BuildStepError,
  FilesystemError,
  ErrorCodes,
  ErrorMessages,
  ErrorRemediation,
  isPackagingError,
  wrapError,
  type ErrorCode,
} from './errors.js';

// External processes
export {
  createProcessRunner,
  formatCommand,
  COMMAND_NOT_FOUND_EXIT_CODE,
  type CommandRunner,
  type CommandResult,
  type CommandOptions,
} from './process/runner.js';
export { BuildLog } from './process/build-log.js';

// Installer script
export {
  renderInstallerScript,
  renderTemplate,
  escapeNsisString,
  toCrlf,
  loadInstallerTemplate,
  DEFAULT_TEMPLATE_PATH,
  type InstallerScriptParams,
} from './installer-script.js';

// Pipeline
export { runPipeline, planStages, STAGES, type PipelineDeps } from './pipeline.js';
export type { StageContext } from './stages/context.js';
export { buildLocale, findCatalogs, type CatalogTarget } from './stages/locale.js';
export { createStagingDirectory, stageDataFiles } from './stages/stage-data.js';
export { buildExecutable } from './stages/freeze.js';
export { copyRuntimeLibraries } from './stages/runtime-libs.js';
export { createZipArchive, zipArguments } from './stages/archive.js';
export { generateInstaller, writeInstallerScript } from './stages/installer.js';
