/**
 * Core types for the Windows packaging pipeline
 */

// ============================================================================
// Configuration
// ============================================================================

/** Which packaging artifacts to produce after staging */
export type BuildMode = 'zip' | 'installer' | 'both';

/** An external program plus the fixed arguments that precede per-call arguments */
export interface ToolCommand {
  command: string;
  args: string[];
}

export interface LocaleConfig {
  /** Directory holding the catalog sources, relative to the project root */
  dir: string;
  /** Glob (relative to `dir`) matching catalog sources */
  catalogGlob: string;
  /** Gettext domain, names the compiled .mo files */
  domain: string;
}

export interface ToolkitConfig {
  /** GUI toolkit installation root */
  root: string;
  /** Subdirectories of `root` copied into the staging directory */
  libraryDirs: string[];
  /** Subdirectory of `root` appended to PATH for every tool invocation */
  binDir: string;
  /** Environment variable pointing tools at the toolkit root */
  basePathVar: string;
}

export interface ToolsConfig {
  localeBuild: ToolCommand;
  catalogCompiler: ToolCommand;
  freeze: ToolCommand;
  zip: ToolCommand;
  installerCompiler: ToolCommand;
}

export interface InstallerConfig {
  /** Generated installer script, relative to the project root */
  scriptFile: string;
  /** Main executable inside the staged tree */
  executable: string;
  /** Start-menu shortcuts left behind by older releases */
  obsoleteShortcuts: string[];
  compressor: string;
}

export interface PackagingConfig {
  productName: string;
  /** Lower-case prefix for artifact file names */
  artifactPrefix: string;
  versionFile: string;
  /**
   * Staging tree, relative to the project root. Must name the directory the
   * freeze tool writes its executable into (py2exe uses `dist`).
   */
  stagingDir: string;
  logFile: string;
  /** Filesystem root that the destination fragment is joined onto */
  outputRoot: string;
  dataFiles: string[];
  locale: LocaleConfig;
  toolkit: ToolkitConfig;
  tools: ToolsConfig;
  installer: InstallerConfig;
  /** Abort on the first failing stage (the freeze stage always aborts) */
  failFast: boolean;
  /** Remove an existing staging directory instead of failing */
  cleanStaging: boolean;
}

/** Partial config as read from a config file */
export type PackagingConfigOverride = Partial<
  Omit<PackagingConfig, 'locale' | 'toolkit' | 'tools' | 'installer'>
> & {
  locale?: Partial<LocaleConfig>;
  toolkit?: Partial<ToolkitConfig>;
  tools?: Partial<ToolsConfig>;
  installer?: Partial<InstallerConfig>;
};

export interface ArtifactPaths {
  zip: string;
  installer: string;
}

/** Resolved once at startup; never modified afterwards */
export interface BuildConfig {
  readonly projectRoot: string;
  readonly outputDir: string;
  readonly version: string;
  readonly mode: BuildMode;
  readonly stagingPath: string;
  readonly logPath: string;
  readonly environment: Readonly<Record<string, string>>;
  readonly artifacts: Readonly<ArtifactPaths>;
  readonly packaging: Readonly<PackagingConfig>;
}

// ============================================================================
// Pipeline
// ============================================================================

export type PipelineStage =
  | 'locale'
  | 'stage-data'
  | 'freeze'
  | 'runtime-libs'
  | 'archive'
  | 'installer';

export type StageStatus = 'ok' | 'failed' | 'skipped';

export interface StageOutcome {
  stage: PipelineStage;
  status: StageStatus;
  durationMs: number;
  error?: Error;
}

export interface PipelineResult {
  ok: boolean;
  stages: StageOutcome[];
  /** Archive and installer files that were produced */
  artifacts: string[];
}

export type PipelineEvent =
  | { type: 'stage-start'; stage: PipelineStage; index: number; total: number }
  | { type: 'stage-complete'; stage: PipelineStage; durationMs: number }
  | { type: 'stage-failed'; stage: PipelineStage; error: Error; fatal: boolean }
  | { type: 'stage-skipped'; stage: PipelineStage; reason: string }
  | { type: 'file-copied'; stage: PipelineStage; from: string; to: string }
  | { type: 'command'; stage: PipelineStage; command: string; exitCode: number };

export type PipelineProgressCallback = (event: PipelineEvent) => void;
