/**
 * Installer script rendering
 *
 * The NSIS script comes from templates/installer.nsi. Values are escaped
 * for NSIS quoted strings before substitution, so a version or path can
 * never terminate a string or expand a variable.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { ConfigurationError, ErrorCodes } from './errors.js';

export const DEFAULT_TEMPLATE_PATH = fileURLToPath(new URL('../templates/installer.nsi', import.meta.url));

export interface InstallerScriptParams {
  productName: string;
  version: string;
  /** Absolute path of the setup executable to produce */
  outFile: string;
  /** Staged tree, relative to the script's directory */
  stagingDir: string;
  /** Main executable inside the staged tree */
  executable: string;
  obsoleteShortcuts: string[];
  compressor: string;
}

const PLACEHOLDER = /\{\{\s*([A-Za-z][A-Za-z0-9]*)\s*\}\}/g;

export function escapeNsisString(value: string): string {
  if (/[\r\n]/.test(value)) {
    throw new ConfigurationError(
      ErrorCodes.CONFIG_TEMPLATE_INVALID,
      `Installer value must not contain a line break: ${JSON.stringify(value)}`
    );
  }
  return value.replace(/\$/g, '$$$$').replace(/"/g, '$\\"');
}

/**
 * Substitute {{name}} placeholders. Values are inserted verbatim; every
 * placeholder in the template must have a value.
 */
export function renderTemplate(template: string, values: Readonly<Record<string, string>>): string {
  return template.replace(PLACEHOLDER, (_match, name: string) => {
    const value = values[name];
    if (value === undefined) {
      throw new ConfigurationError(
        ErrorCodes.CONFIG_TEMPLATE_INVALID,
        `Unknown installer template placeholder: ${name}`
      );
    }
    return value;
  });
}

export function toCrlf(text: string): string {
  return text.replace(/\r?\n/g, '\r\n');
}

export function renderInstallerScript(template: string, params: InstallerScriptParams): string {
  const productName = escapeNsisString(params.productName);
  const obsoleteShortcuts = params.obsoleteShortcuts
    .map((shortcut) => `  Delete "$SMPROGRAMS\\${productName}\\${escapeNsisString(shortcut)}"`)
    .join('\n');

  return renderTemplate(template, {
    productName,
    version: escapeNsisString(params.version),
    outFile: escapeNsisString(params.outFile),
    stagingDir: escapeNsisString(params.stagingDir.replace(/\//g, '\\')),
    executable: escapeNsisString(params.executable),
    compressor: escapeNsisString(params.compressor),
    obsoleteShortcuts,
  });
}

export async function loadInstallerTemplate(templatePath: string = DEFAULT_TEMPLATE_PATH): Promise<string> {
  try {
    return await readFile(templatePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(
      ErrorCodes.CONFIG_TEMPLATE_INVALID,
      `Failed to read installer template ${templatePath}`,
      { cause: error instanceof Error ? error : new Error(String(error)) }
    );
  }
}
