/**
 * Tool environment
 *
 * The toolkit's base path and bin directory are handed to every external
 * invocation through an explicit record; process.env is never modified.
 */

import { delimiter, join } from 'path';
import type { ToolkitConfig } from './types.js';

export function buildToolEnvironment(
  toolkit: Pick<ToolkitConfig, 'root' | 'binDir' | 'basePathVar'>,
  baseEnv: NodeJS.ProcessEnv,
  pathDelimiter: string = delimiter
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(baseEnv)) {
    if (value !== undefined) env[key] = value;
  }

  env[toolkit.basePathVar] = toolkit.root;

  // Windows spells it Path; keep whichever key the parent used
  const pathKey = Object.keys(env).find((key) => key.toUpperCase() === 'PATH') ?? 'PATH';
  const toolkitBin = join(toolkit.root, toolkit.binDir);
  const current = env[pathKey];
  env[pathKey] = current ? `${current}${pathDelimiter}${toolkitBin}` : toolkitBin;

  return env;
}
