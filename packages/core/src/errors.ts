/**
 * Deterministic Error Codes for chirp-build
 *
 * Format: CB_<CATEGORY>_<NUMBER>
 *
 * Categories:
 * - CONFIG: Configuration file errors
 * - CLI: Command line argument errors
 * - STEP: External build tool failures
 * - FS: Staging directory / file copy errors
 * - INTERNAL: Anything unexpected
 */

import type { PipelineStage } from './types.js';

export const ErrorCodes = {
  // CONFIG errors (001-099)
  CONFIG_NOT_FOUND: 'CB_CONFIG_001',
  CONFIG_INVALID: 'CB_CONFIG_002',
  CONFIG_VERSION_MISSING: 'CB_CONFIG_003',
  CONFIG_TEMPLATE_INVALID: 'CB_CONFIG_004',

  // CLI errors (100-199)
  CLI_MISSING_DESTINATION: 'CB_CLI_101',
  CLI_INVALID_MODE: 'CB_CLI_102',

  // STEP errors (200-299)
  STEP_LOCALE_FAILED: 'CB_STEP_201',
  STEP_FREEZE_FAILED: 'CB_STEP_202',
  STEP_ARCHIVE_FAILED: 'CB_STEP_203',
  STEP_INSTALLER_FAILED: 'CB_STEP_204',

  // FS errors (300-399)
  FS_STAGING_EXISTS: 'CB_FS_301',
  FS_STAGING_CREATE_FAILED: 'CB_FS_302',
  FS_COPY_FAILED: 'CB_FS_303',
  FS_SOURCE_NOT_FOUND: 'CB_FS_304',
  FS_WRITE_FAILED: 'CB_FS_305',

  // INTERNAL errors (900-999)
  INTERNAL_ERROR: 'CB_INTERNAL_901',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export const ErrorMessages: Record<ErrorCode, string> = {
  [ErrorCodes.CONFIG_NOT_FOUND]: 'Configuration file not found',
  [ErrorCodes.CONFIG_INVALID]: 'Configuration file is invalid',
  [ErrorCodes.CONFIG_VERSION_MISSING]: 'Version file is missing or empty',
  [ErrorCodes.CONFIG_TEMPLATE_INVALID]: 'Installer template could not be rendered',

  [ErrorCodes.CLI_MISSING_DESTINATION]: 'Output directory is required',
  [ErrorCodes.CLI_INVALID_MODE]: 'Unrecognized packaging mode',

  [ErrorCodes.STEP_LOCALE_FAILED]: 'Locale build failed',
  [ErrorCodes.STEP_FREEZE_FAILED]: 'Build failed',
  [ErrorCodes.STEP_ARCHIVE_FAILED]: 'ZIP archive creation failed',
  [ErrorCodes.STEP_INSTALLER_FAILED]: 'Installer compilation failed',

  [ErrorCodes.FS_STAGING_EXISTS]: 'Staging directory already exists',
  [ErrorCodes.FS_STAGING_CREATE_FAILED]: 'Failed to create staging directory',
  [ErrorCodes.FS_COPY_FAILED]: 'Failed to copy files into staging directory',
  [ErrorCodes.FS_SOURCE_NOT_FOUND]: 'Source path not found',
  [ErrorCodes.FS_WRITE_FAILED]: 'Failed to write file',

  [ErrorCodes.INTERNAL_ERROR]: 'Unexpected failure while packaging',
};

/**
 * Remediation guidance for each error code
 */
export const ErrorRemediation: Record<ErrorCode, string> = {
  [ErrorCodes.CONFIG_NOT_FOUND]: `
The configuration file passed with --config does not exist.

Either fix the path or drop --config to use one of:
  chirp-build.config.yaml
  .chirp-buildrc
  build/chirp-build.yaml
`.trim(),

  [ErrorCodes.CONFIG_INVALID]: `
Check the configuration file for syntax errors.

Common issues:
- Tabs used for YAML indentation
- Trailing commas in a .json config
- A list given where a mapping is expected (tools, toolkit, installer)
`.trim(),

  [ErrorCodes.CONFIG_VERSION_MISSING]: `
The version file must contain a single version string, e.g.:

  echo 0.4.1 > build/version

Set versionFile in the configuration if it lives elsewhere.
`.trim(),

  [ErrorCodes.CONFIG_TEMPLATE_INVALID]: `
The installer template references a placeholder that is not provided,
or a value contains a line break.

Available placeholders: productName, version, outFile, stagingDir,
executable, compressor, obsoleteShortcuts.
`.trim(),

  [ErrorCodes.CLI_MISSING_DESTINATION]: `
Pass the output directory as the first argument:

  chirp-build build/out
  chirp-build build/out -z
`.trim(),

  [ErrorCodes.CLI_INVALID_MODE]: `
Valid modes:
  -z    ZIP archive only
  -i    Installer only
  (none) ZIP archive and installer
`.trim(),

  [ErrorCodes.STEP_LOCALE_FAILED]: `
The locale build or catalog compiler returned a non-zero exit code.

Check that make and msgfmt are on PATH, then inspect the build log.
`.trim(),

  [ErrorCodes.STEP_FREEZE_FAILED]: `
The freezing tool returned a non-zero exit code. No artifacts were produced.

Inspect the build log for the tool's output. Common causes:
- The configured interpreter path does not exist
- A module imported by the application is not installed
`.trim(),

  [ErrorCodes.STEP_ARCHIVE_FAILED]: `
zip returned a non-zero exit code.

Check that zip is installed and the output directory is writable.
`.trim(),

  [ErrorCodes.STEP_INSTALLER_FAILED]: `
The installer compiler returned a non-zero exit code.

Check that NSIS is installed at tools.installerCompiler and inspect
the generated installer script.
`.trim(),

  [ErrorCodes.FS_STAGING_EXISTS]: `
Remove the staging directory or set cleanStaging: true in the configuration.
`.trim(),

  [ErrorCodes.FS_STAGING_CREATE_FAILED]: `
Check that the project directory is writable.
`.trim(),

  [ErrorCodes.FS_COPY_FAILED]: `
A file could not be copied into the staging directory.

Check permissions and free disk space, then retry.
`.trim(),

  [ErrorCodes.FS_SOURCE_NOT_FOUND]: `
A configured data file or toolkit directory does not exist.

Check dataFiles and toolkit.root in the configuration.
`.trim(),

  [ErrorCodes.FS_WRITE_FAILED]: `
Check that the target directory exists and is writable.
`.trim(),

  [ErrorCodes.INTERNAL_ERROR]: `
Re-run with --verbose to see the full stack trace, and check the build log.
`.trim(),
};

interface PackagingErrorOptions {
  details?: unknown;
  cause?: Error;
}

/**
 * Structured error with deterministic error code
 */
export class PackagingError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: unknown;
  public override readonly cause?: Error;

  constructor(code: ErrorCode, message?: string, options?: PackagingErrorOptions) {
    super(message ?? ErrorMessages[code], { cause: options?.cause });

    this.name = 'PackagingError';
    this.code = code;
    this.details = options?.details;
    this.cause = options?.cause;

    Error.captureStackTrace?.(this, new.target);
  }

  getRemediation(): string {
    return ErrorRemediation[this.code];
  }

  /**
   * Format error for user display
   */
  toUserString(verbose = false): string {
    const parts: string[] = [`[${this.code}] ${this.message}`];

    if (verbose && this.details) {
      parts.push(`\nDetails: ${JSON.stringify(this.details, null, 2)}`);
    }

    if (verbose && this.cause) {
      parts.push(`\nCaused by: ${this.cause.message}`);
      if (this.cause.stack) {
        parts.push(`\n${this.cause.stack}`);
      }
    }

    return parts.join('');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      remediation: this.getRemediation(),
      details: this.details,
      cause: this.cause
        ? {
            message: this.cause.message,
            stack: this.cause.stack,
          }
        : undefined,
    };
  }
}

/** Missing or invalid CLI arguments, config files or version file */
export class ConfigurationError extends PackagingError {
  constructor(code: ErrorCode, message?: string, options?: PackagingErrorOptions) {
    super(code, message, options);
    this.name = 'ConfigurationError';
  }
}

/** An external build tool exited with a non-zero status */
export class BuildStepError extends PackagingError {
  public readonly stage: PipelineStage;
  public readonly exitCode: number;

  constructor(
    code: ErrorCode,
    stage: PipelineStage,
    exitCode: number,
    message?: string,
    options?: PackagingErrorOptions
  ) {
    super(code, message, { ...options, details: options?.details ?? { stage, exitCode } });
    this.name = 'BuildStepError';
    this.stage = stage;
    this.exitCode = exitCode;
  }
}

/** Staging directory creation or copy failure */
export class FilesystemError extends PackagingError {
  public readonly path: string;

  constructor(code: ErrorCode, path: string, message?: string, options?: PackagingErrorOptions) {
    super(code, message, { ...options, details: options?.details ?? { path } });
    this.name = 'FilesystemError';
    this.path = path;
  }
}

export function isPackagingError(error: unknown): error is PackagingError {
  return error instanceof PackagingError;
}

/**
 * Wrap an unknown error in a PackagingError
 */
export function wrapError(error: unknown, code: ErrorCode, message?: string): PackagingError {
  if (error instanceof PackagingError) {
    return error;
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  return new PackagingError(code, message ?? cause.message, { cause });
}
