#!/usr/bin/env node

/**
 * chirp-build CLI
 *
 * Package CHIRP for Windows: frozen executable, ZIP archive and installer.
 */

import { Command } from 'commander';
import { buildCommand } from './commands/build.js';

// Version injected at build time via tsup define
const version = process.env['CLI_VERSION'] ?? '0.0.0-dev';

const program = new Command();

program
  .name('chirp-build')
  .description('Build the CHIRP Win32 executable, ZIP archive and installer')
  .version(version)
  .argument('<output-dir>', 'Destination directory, taken relative to the output root')
  .argument('[mode]', 'Packaging mode flag (-z or -i); omit to build both')
  .option('-z, --zip-only', 'Only produce the ZIP archive')
  .option('-i, --installer-only', 'Only produce the installer')
  .option('-p, --project <path>', 'Project root (default: current directory)')
  .option('-c, --config <file>', 'Configuration file (default: chirp-build.config.yaml in the project)')
  .option('--best-effort', 'Log failing stages and continue (the freeze stage still aborts)')
  .option('--json', 'Output results as JSON')
  .option('--quiet', 'Suppress output except errors')
  .option('-v, --verbose', 'Enable verbose output')
  .action(buildCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
