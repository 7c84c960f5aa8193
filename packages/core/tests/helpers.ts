/**
 * Fixtures shared by the pipeline tests: a throwaway CHIRP-like project,
 * a fake toolkit install and an in-process stand-in for external tools.
 */

import { mkdirSync, writeFileSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { mergeConfig, DEFAULT_CONFIG } from '../src/config.js';
import { formatCommand } from '../src/process/runner.js';
import type { CommandOptions, CommandResult, CommandRunner } from '../src/process/runner.js';
import { BuildLog } from '../src/process/build-log.js';
import type { StageContext } from '../src/stages/context.js';
import type {
  BuildConfig,
  PackagingConfig,
  PackagingConfigOverride,
  PipelineEvent,
  ToolCommand,
} from '../src/types.js';

export function writeAt(fullPath: string, content: string): void {
  mkdirSync(dirname(fullPath), { recursive: true });
  writeFileSync(fullPath, content);
}

export function createFile(basePath: string, relativePath: string, content: string): void {
  writeAt(join(basePath, relativePath), content);
}

export interface FixtureLayout {
  projectRoot: string;
  toolkitRoot: string;
}

/**
 * project/ holds the sources the stager picks up; gtk/ mimics a toolkit install.
 */
export function createFixture(tempDir: string, version = '1.2.3'): FixtureLayout {
  const projectRoot = join(tempDir, 'project');
  const toolkitRoot = join(tempDir, 'gtk');

  createFile(projectRoot, 'COPYING', 'GNU GENERAL PUBLIC LICENSE\n');
  createFile(projectRoot, 'chirp.xsd', '<xsd:schema/>\n');
  createFile(projectRoot, 'radio.xsd', '<xsd:schema/>\n');
  createFile(projectRoot, 'stock_configs/US FRS.csv', 'Location,Name,Frequency\n');
  createFile(projectRoot, 'locale/de.po', 'msgid ""\nmsgstr ""\n');
  createFile(projectRoot, 'chirpw', '#!/usr/bin/env python\n');
  createFile(projectRoot, 'build/version', `${version}\n`);

  createFile(toolkitRoot, 'lib/libgtk-win32-2.0-0.dll', 'dll');
  createFile(toolkitRoot, 'etc/gtk-2.0/gtkrc', 'gtk-theme-name = "MS-Windows"\n');
  createFile(toolkitRoot, 'share/themes/MS-Windows/gtkrc', 'theme');

  return { projectRoot, toolkitRoot };
}

/** Short tool names so assertions read cleanly */
export const FAKE_TOOLS = {
  localeBuild: { command: 'make', args: ['-C', 'locale'] },
  catalogCompiler: { command: 'msgfmt', args: [] },
  freeze: { command: 'freeze', args: [] },
  zip: { command: 'zip', args: [] },
  installerCompiler: { command: 'makensis', args: [] },
} satisfies PackagingConfig['tools'];

export function makePackagingConfig(
  layout: FixtureLayout,
  outputRoot: string,
  overrides: PackagingConfigOverride = {}
): PackagingConfig {
  return mergeConfig(DEFAULT_CONFIG, {
    outputRoot,
    toolkit: { root: layout.toolkitRoot },
    tools: FAKE_TOOLS,
    ...overrides,
  });
}

export interface RecordedCall {
  command: string;
  args: string[];
  cwd: string;
  env: Record<string, string>;
}

export interface FakeRunner {
  runner: CommandRunner;
  calls: RecordedCall[];
}

/**
 * Stand-in for the external tools. Successful calls leave behind the files
 * the real tool would have produced:
 *   msgfmt -o <mo> <po>   writes <mo>
 *   freeze                writes dist/chirpw.exe under cwd
 *   zip -9 -r <zip> .     writes <zip> listing the entries it was given
 *   makensis <script>     writes the OutFile named in the script
 */
export function createFakeRunner(exitCodes: Record<string, number> = {}): FakeRunner {
  const calls: RecordedCall[] = [];

  async function run(tool: ToolCommand, extraArgs: string[], options: CommandOptions): Promise<CommandResult> {
    const args = [...tool.args, ...extraArgs];
    calls.push({ command: tool.command, args, cwd: options.cwd, env: { ...options.env } });

    const exitCode = exitCodes[tool.command] ?? 0;
    if (exitCode === 0) {
      simulate(tool.command, args, options.cwd);
    }

    return {
      command: formatCommand(tool, extraArgs),
      exitCode,
      stdout: `${tool.command} done\n`,
      stderr: exitCode === 0 ? '' : `${tool.command} failed\n`,
    };
  }

  return { runner: { run }, calls };
}

function simulate(command: string, args: string[], cwd: string): void {
  switch (command) {
    case 'msgfmt': {
      writeAt(args[args.indexOf('-o') + 1] ?? '', 'mo');
      break;
    }
    case 'freeze':
      createFile(cwd, 'dist/chirpw.exe', 'MZ');
      break;
    case 'zip': {
      writeAt(args[2] ?? '', `entries: ${args[3]}\n`);
      break;
    }
    case 'makensis': {
      const script = readFileSync(args[args.length - 1] ?? '', 'utf-8');
      writeAt(/OutFile "([^"]+)"/.exec(script)?.[1] ?? '', 'setup');
      break;
    }
  }
}

export interface TestContext extends StageContext {
  events: PipelineEvent[];
}

export function makeContext(config: BuildConfig, runner: CommandRunner): TestContext {
  const events: PipelineEvent[] = [];
  return {
    config,
    runner,
    log: new BuildLog(config.logPath),
    emit: (event) => events.push(event),
    events,
  };
}
