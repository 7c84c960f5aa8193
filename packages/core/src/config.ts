/**
 * Default configuration and config loading for chirp-build
 */

import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { resolve, join } from 'path';
import { parse as parseYaml } from 'yaml';
import type { BuildConfig, BuildMode, PackagingConfig, PackagingConfigOverride } from './types.js';
import { ConfigurationError, ErrorCodes } from './errors.js';
import { buildToolEnvironment } from './environment.js';
import { installerArtifactPath, zipArtifactPath } from './artifacts.js';

export const DEFAULT_CONFIG: PackagingConfig = {
  productName: 'CHIRP',
  artifactPrefix: 'chirp',
  versionFile: 'build/version',
  stagingDir: 'dist',
  logFile: 'chirp_build.log',

  // Destination fragments are taken relative to the cygwin root
  outputRoot: process.platform === 'win32' ? 'C:\\cygwin' : '/',

  // Copied into the staging directory ahead of the frozen build
  dataFiles: ['COPYING', '*.xsd', 'stock_configs', 'locale'],

  locale: {
    dir: 'locale',
    catalogGlob: '*.po',
    domain: 'CHIRP',
  },

  toolkit: {
    root: 'C:\\GTK',
    libraryDirs: ['lib', 'etc', 'share'],
    binDir: 'bin',
    basePathVar: 'GTK_BASEPATH',
  },

  tools: {
    localeBuild: { command: 'make', args: ['-C', 'locale'] },
    catalogCompiler: { command: 'msgfmt', args: [] },
    freeze: { command: 'C:\\Python27\\python.exe', args: ['setup.py', 'py2exe'] },
    zip: { command: 'zip', args: [] },
    installerCompiler: { command: 'C:\\Program Files\\NSIS\\makensis.exe', args: [] },
  },

  installer: {
    scriptFile: 'chirp.nsi',
    executable: 'chirpw.exe',
    obsoleteShortcuts: ['CSV Dump.lnk'],
    compressor: 'lzma',
  },

  failFast: true,
  cleanStaging: true,
};

export const CONFIG_FILE_NAMES = [
  'chirp-build.config.yaml',
  'chirp-build.config.yml',
  'chirp-build.config.json',
  '.chirp-buildrc',
  '.chirp-buildrc.yaml',
  '.chirp-buildrc.yml',
  '.chirp-buildrc.json',
];

export async function loadConfig(projectRoot: string): Promise<PackagingConfig> {
  for (const fileName of CONFIG_FILE_NAMES) {
    const configPath = join(projectRoot, fileName);
    if (existsSync(configPath)) {
      return loadConfigFile(configPath);
    }
  }

  // Build-directory config sits beside the version file
  const buildDirConfig = join(projectRoot, 'build', 'chirp-build.yaml');
  if (existsSync(buildDirConfig)) {
    return loadConfigFile(buildDirConfig);
  }

  return DEFAULT_CONFIG;
}

export async function loadConfigFile(configPath: string): Promise<PackagingConfig> {
  if (!existsSync(configPath)) {
    throw new ConfigurationError(
      ErrorCodes.CONFIG_NOT_FOUND,
      `Configuration file not found: ${configPath}`
    );
  }

  const content = await readFile(configPath, 'utf-8');
  let parsed: PackagingConfigOverride | null | undefined;
  try {
    parsed = configPath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    throw new ConfigurationError(
      ErrorCodes.CONFIG_INVALID,
      `Failed to parse ${configPath}`,
      { cause: error instanceof Error ? error : new Error(String(error)) }
    );
  }

  // An empty YAML document parses to null
  if (parsed === null || parsed === undefined) {
    return DEFAULT_CONFIG;
  }

  validateOverride(parsed, configPath);
  return mergeConfig(DEFAULT_CONFIG, parsed);
}

const STRING_KEYS = [
  'productName',
  'artifactPrefix',
  'versionFile',
  'stagingDir',
  'logFile',
  'outputRoot',
] as const;

const BOOLEAN_KEYS = ['failFast', 'cleanStaging'] as const;
const SECTION_KEYS = ['locale', 'toolkit', 'tools', 'installer'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function invalid(configPath: string, key: string, expected: string): ConfigurationError {
  return new ConfigurationError(
    ErrorCodes.CONFIG_INVALID,
    `Invalid value for '${key}' in ${configPath}: expected ${expected}`,
    { details: { key } }
  );
}

function validateOverride(parsed: unknown, configPath: string): void {
  if (!isRecord(parsed)) {
    throw new ConfigurationError(
      ErrorCodes.CONFIG_INVALID,
      `Configuration in ${configPath} must be a mapping`
    );
  }

  for (const key of STRING_KEYS) {
    if (parsed[key] !== undefined && typeof parsed[key] !== 'string') {
      throw invalid(configPath, key, 'a string');
    }
  }
  for (const key of BOOLEAN_KEYS) {
    if (parsed[key] !== undefined && typeof parsed[key] !== 'boolean') {
      throw invalid(configPath, key, 'true or false');
    }
  }
  if (parsed['dataFiles'] !== undefined && !isStringArray(parsed['dataFiles'])) {
    throw invalid(configPath, 'dataFiles', 'a list of globs');
  }
  for (const key of SECTION_KEYS) {
    if (parsed[key] !== undefined && !isRecord(parsed[key])) {
      throw invalid(configPath, key, 'a mapping');
    }
  }

  const tools = parsed['tools'];
  if (isRecord(tools)) {
    for (const [name, tool] of Object.entries(tools)) {
      if (!isRecord(tool) || typeof tool['command'] !== 'string') {
        throw invalid(configPath, `tools.${name}`, 'a mapping with a command');
      }
      if (tool['args'] !== undefined && !isStringArray(tool['args'])) {
        throw invalid(configPath, `tools.${name}.args`, 'a list of strings');
      }
    }
  }

  const toolkit = parsed['toolkit'];
  if (isRecord(toolkit) && toolkit['libraryDirs'] !== undefined && !isStringArray(toolkit['libraryDirs'])) {
    throw invalid(configPath, 'toolkit.libraryDirs', 'a list of directory names');
  }

  const installer = parsed['installer'];
  if (
    isRecord(installer) &&
    installer['obsoleteShortcuts'] !== undefined &&
    !isStringArray(installer['obsoleteShortcuts'])
  ) {
    throw invalid(configPath, 'installer.obsoleteShortcuts', 'a list of shortcut names');
  }
}

export function mergeConfig(base: PackagingConfig, override: PackagingConfigOverride): PackagingConfig {
  const tools = override.tools ?? {};

  return {
    ...base,
    ...override,
    // Lists replace, they never append
    dataFiles: override.dataFiles ?? base.dataFiles,
    locale: { ...base.locale, ...override.locale },
    toolkit: { ...base.toolkit, ...override.toolkit },
    tools: {
      localeBuild: { ...base.tools.localeBuild, ...tools.localeBuild },
      catalogCompiler: { ...base.tools.catalogCompiler, ...tools.catalogCompiler },
      freeze: { ...base.tools.freeze, ...tools.freeze },
      zip: { ...base.tools.zip, ...tools.zip },
      installerCompiler: { ...base.tools.installerCompiler, ...tools.installerCompiler },
    },
    installer: { ...base.installer, ...override.installer },
  };
}

/**
 * Read the version string. Its contents are opaque and never parsed.
 */
export async function readVersion(projectRoot: string, versionFile: string): Promise<string> {
  const versionPath = resolve(projectRoot, versionFile);

  if (!existsSync(versionPath)) {
    throw new ConfigurationError(
      ErrorCodes.CONFIG_VERSION_MISSING,
      `Version file not found: ${versionPath}`
    );
  }

  const version = (await readFile(versionPath, 'utf-8')).trim();
  if (!version) {
    throw new ConfigurationError(
      ErrorCodes.CONFIG_VERSION_MISSING,
      `Version file is empty: ${versionPath}`
    );
  }

  return version;
}

/**
 * The destination is always taken under the output root, so a cygwin-style
 * `/home/dan/release` lands in `<outputRoot>/home/dan/release`.
 */
export function resolveOutputDir(fragment: string | undefined, outputRoot: string): string {
  if (!fragment || !fragment.trim()) {
    throw new ConfigurationError(ErrorCodes.CLI_MISSING_DESTINATION);
  }
  return resolve(outputRoot, fragment.trim().replace(/^[\\/]+/, ''));
}

export function resolveProjectRoot(input?: string): string {
  if (!input) {
    return process.cwd();
  }
  return resolve(input);
}

export interface ResolveBuildConfigOptions {
  projectRoot: string;
  destination: string | undefined;
  mode: BuildMode;
  config: PackagingConfig;
  /** Environment inherited by external tools (defaults to process.env) */
  baseEnv?: NodeJS.ProcessEnv;
}

export async function resolveBuildConfig(options: ResolveBuildConfigOptions): Promise<BuildConfig> {
  const { projectRoot, config, mode } = options;
  const outputDir = resolveOutputDir(options.destination, config.outputRoot);
  const version = await readVersion(projectRoot, config.versionFile);

  return Object.freeze({
    projectRoot,
    outputDir,
    version,
    mode,
    stagingPath: resolve(projectRoot, config.stagingDir),
    logPath: resolve(projectRoot, config.logFile),
    environment: Object.freeze(buildToolEnvironment(config.toolkit, options.baseEnv ?? process.env)),
    artifacts: Object.freeze({
      zip: zipArtifactPath(outputDir, config.artifactPrefix, version),
      installer: installerArtifactPath(outputDir, config.artifactPrefix, version),
    }),
    packaging: Object.freeze({ ...config }),
  });
}
