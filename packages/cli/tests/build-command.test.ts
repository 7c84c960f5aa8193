import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { formatDuration, resolveMode, runBuild, type BuildOptions } from '../src/commands/build.js';
import { createFakeRunner, createFixture, FAKE_TOOLS, type FixtureLayout } from '../../core/tests/helpers.js';

describe('formatDuration', () => {
  it('prints milliseconds under a second', () => {
    expect(formatDuration(250)).toBe('250ms');
  });

  it('prints seconds with two decimals', () => {
    expect(formatDuration(1500)).toBe('1.50s');
  });
});

describe('resolveMode', () => {
  it('accepts the positional flag', () => {
    expect(resolveMode('-z', {})).toBe('zip');
    expect(resolveMode('-i', {})).toBe('installer');
  });

  it('accepts the long options', () => {
    expect(resolveMode(undefined, { zipOnly: true })).toBe('zip');
    expect(resolveMode(undefined, { installerOnly: true })).toBe('installer');
  });

  it('builds both by default', () => {
    expect(resolveMode(undefined, {})).toBe('both');
  });

  it('rejects more than one mode', () => {
    expect(() => resolveMode('-i', { zipOnly: true })).toThrow('Only one mode may be given, got: -z -i');
  });

  it('rejects an unknown flag', () => {
    expect(() => resolveMode('-x', {})).toThrow("Unrecognized mode '-x'");
  });
});

describe('runBuild', () => {
  let tempDir: string;
  let layout: FixtureLayout;
  let configPath: string;
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  function jsonOptions(extra: BuildOptions = {}): BuildOptions {
    return { project: layout.projectRoot, config: configPath, json: true, ...extra };
  }

  function lastJson(spy: ReturnType<typeof vi.spyOn>): unknown {
    const call = spy.mock.calls[spy.mock.calls.length - 1];
    return JSON.parse(String(call?.[0]));
  }

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'chirp-build-cli-'));
    layout = createFixture(tempDir);
    configPath = join(tempDir, 'chirp-build.config.json');
    writeFileSync(
      configPath,
      JSON.stringify({ outputRoot: tempDir, toolkit: { root: layout.toolkitRoot }, tools: FAKE_TOOLS })
    );
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('builds both artifacts and prints a JSON summary', async () => {
    const { runner } = createFakeRunner();

    const exitCode = await runBuild('out', undefined, jsonOptions(), { runner, baseEnv: {} });

    expect(exitCode).toBe(0);
    const zip = join(tempDir, 'out', 'chirp-1.2.3-win32.zip');
    const installer = join(tempDir, 'out', 'chirp-1.2.3-installer.exe');
    expect(lastJson(logSpy)).toMatchObject({
      ok: true,
      artifacts: [zip, installer],
      log: join(layout.projectRoot, 'chirp_build.log'),
    });
    expect(existsSync(zip)).toBe(true);
    expect(existsSync(installer)).toBe(true);
  });

  it('honours the positional zip flag', async () => {
    const { runner, calls } = createFakeRunner();

    const exitCode = await runBuild('out', '-z', jsonOptions(), { runner, baseEnv: {} });

    expect(exitCode).toBe(0);
    expect(lastJson(logSpy)).toMatchObject({ artifacts: [join(tempDir, 'out', 'chirp-1.2.3-win32.zip')] });
    expect(calls.map((c) => c.command)).not.toContain('makensis');
  });

  it('fails without a destination', async () => {
    const { runner, calls } = createFakeRunner();

    const exitCode = await runBuild(undefined, undefined, jsonOptions(), { runner, baseEnv: {} });

    expect(exitCode).toBe(1);
    expect(calls).toHaveLength(0);
    expect(lastJson(errorSpy)).toMatchObject({
      name: 'ConfigurationError',
      code: 'CB_CLI_101',
      message: 'Output directory is required',
    });
  });

  it('reports a freeze failure', async () => {
    const { runner } = createFakeRunner({ freeze: 1 });

    const exitCode = await runBuild('out', undefined, jsonOptions({ bestEffort: true }), { runner, baseEnv: {} });

    expect(exitCode).toBe(1);
    expect(lastJson(errorSpy)).toMatchObject({
      name: 'BuildStepError',
      code: 'CB_STEP_202',
      message: 'Build failed',
    });
    expect(existsSync(join(tempDir, 'out'))).toBe(false);
  });

  it('keeps going with --best-effort and exits non-zero', async () => {
    const { runner } = createFakeRunner({ zip: 12 });

    const exitCode = await runBuild('out', undefined, jsonOptions({ bestEffort: true }), { runner, baseEnv: {} });

    expect(exitCode).toBe(1);
    expect(lastJson(logSpy)).toMatchObject({
      ok: false,
      artifacts: [join(tempDir, 'out', 'chirp-1.2.3-installer.exe')],
    });
  });

  it('reports a missing config file', async () => {
    const exitCode = await runBuild('out', undefined, jsonOptions({ config: join(tempDir, 'nope.yaml') }), {
      runner: createFakeRunner().runner,
      baseEnv: {},
    });

    expect(exitCode).toBe(1);
    expect(lastJson(errorSpy)).toMatchObject({ code: 'CB_CONFIG_001' });
  });

  it('prints artifact paths in human mode', async () => {
    const exitCode = await runBuild('out', '-i', { project: layout.projectRoot, config: configPath }, {
      runner: createFakeRunner().runner,
      baseEnv: {},
    });

    expect(exitCode).toBe(0);
    const installer = join(tempDir, 'out', 'chirp-1.2.3-installer.exe');
    expect(logSpy.mock.calls.some((call) => String(call[1]).includes(installer))).toBe(true);
  });

  it('prints nothing on success with --quiet', async () => {
    const exitCode = await runBuild('out', '-i', { project: layout.projectRoot, config: configPath, quiet: true }, {
      runner: createFakeRunner().runner,
      baseEnv: {},
    });

    expect(exitCode).toBe(0);
    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('still reports failed stages with --quiet', async () => {
    const exitCode = await runBuild(
      'out',
      undefined,
      { project: layout.projectRoot, config: configPath, quiet: true, bestEffort: true },
      { runner: createFakeRunner({ zip: 12 }).runner, baseEnv: {} }
    );

    expect(exitCode).toBe(1);
    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledTimes(2);
    expect(errorSpy.mock.calls[0]?.[1]).toBe('archive: zip exited with 12');
    expect(String(errorSpy.mock.calls[1]?.[0])).toContain('Completed with failed stages: archive');
  });
});
