import { ConfigurationError, ErrorCodes } from './errors.js';
import type { BuildMode } from './types.js';

export const MODE_FLAGS: ReadonlyMap<string, BuildMode> = new Map<string, BuildMode>([
  ['-z', 'zip'],
  ['-i', 'installer'],
]);

/**
 * `-z` zip only, `-i` installer only, nothing for both. Anything else is a
 * usage error rather than a silent no-op.
 */
export function parseModeFlag(flag?: string): BuildMode {
  if (flag === undefined || flag === '') {
    return 'both';
  }

  const mode = MODE_FLAGS.get(flag);
  if (!mode) {
    throw new ConfigurationError(
      ErrorCodes.CLI_INVALID_MODE,
      `Unrecognized mode '${flag}'. Expected -z, -i or nothing.`
    );
  }
  return mode;
}

export function modeRunsZip(mode: BuildMode): boolean {
  return mode === 'zip' || mode === 'both';
}

export function modeRunsInstaller(mode: BuildMode): boolean {
  return mode === 'installer' || mode === 'both';
}
