import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('child_process', () => ({
  spawnSync: vi.fn(),
}));

import { spawnSync } from 'child_process';
import { createCLI, reportFatal } from '../../../src/cli/index.js';
import { exited } from '../../helpers/spawn.js';
import type { PipelineReport, PlannedStep } from '../../../src/pipeline/types.js';

const mockSpawnSync = vi.mocked(spawnSync);

function cargoExits(statuses: Record<string, number>): void {
  mockSpawnSync.mockImplementation((_command, args) => exited(statuses[args?.[0] ?? ''] ?? 0));
}

describe('cargo-ci CLI', () => {
  let stdout: string[];
  let stderr: string[];

  beforeEach(() => {
    mockSpawnSync.mockReset();
    stdout = [];
    stderr = [];
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      stdout.push(args.map(String).join(' '));
    });
    vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
      stderr.push(args.map(String).join(' '));
    });
    vi.stubEnv('PROFILE', '');
    vi.stubEnv('CARGO', '');
    vi.stubEnv('RUST_BACKTRACE', '0');
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    process.exitCode = undefined;
  });

  async function run(...args: string[]): Promise<void> {
    await createCLI().parseAsync(['node', 'cargo-ci', ...args]);
  }

  function jsonOutput<T>(): T {
    return JSON.parse(stdout.join('\n')) as T;
  }

  it('should accept --release as the positional profile', async () => {
    cargoExits({});

    await run('run', '--release', '--no-trace', '--json');

    const report = jsonOutput<PipelineReport>();
    expect(report.profile).toBe('--release');
    expect(report.release).toBe(true);
    expect(mockSpawnSync.mock.calls.map(([, args]) => args)).toEqual([
      ['build', '--examples', '--release'],
      ['test', '--release'],
      ['bench'],
    ]);
    expect(process.exitCode).toBe(0);
  });

  it('should run the default profile with no arguments', async () => {
    cargoExits({});

    await run('run', '--no-trace', '--json');

    expect(mockSpawnSync.mock.calls.map(([, args]) => args)).toEqual([
      ['build', '--examples'],
      ['test'],
    ]);
    expect(process.exitCode).toBe(0);
  });

  it('should export RUST_BACKTRACE=1 to the process environment', async () => {
    cargoExits({});

    await run('run', '--no-trace', '--json');

    expect(process.env.RUST_BACKTRACE).toBe('1');
    expect(mockSpawnSync.mock.calls[0][2]?.env?.RUST_BACKTRACE).toBe('1');
  });

  it('should set the exit code from a failed build', async () => {
    cargoExits({ build: 1 });

    await run('run', '--release', '--no-trace');

    expect(process.exitCode).toBe(1);
    expect(mockSpawnSync).toHaveBeenCalledTimes(1);
    expect(stderr).toHaveLength(1);
    expect(stderr[0]).toMatch(/^❌ \[FAIL\] build — exit 1, \d+ms$/);
  });

  it('should exit 0 when only the tests fail', async () => {
    cargoExits({ test: 101 });

    await run('run', '--no-trace', '--json');

    const report = jsonOutput<PipelineReport>();
    expect(report.steps[1].status).toBe('suppressed');
    expect(process.exitCode).toBe(0);
  });

  it('should fail on test failures with --strict-tests', async () => {
    cargoExits({ test: 101 });

    await run('run', '--strict-tests', '--no-trace', '--json');

    expect(process.exitCode).toBe(101);
  });

  it('should set the exit code from failed benchmarks', async () => {
    cargoExits({ bench: 2 });

    await run('run', '--release', '--no-trace', '--json');

    expect(process.exitCode).toBe(2);
  });

  it('should read the profile from --profile', async () => {
    cargoExits({});

    await run('run', '--profile', '--release', '--no-trace', '--json');

    expect(jsonOutput<PipelineReport>().profile).toBe('--release');
  });

  it('should read the profile from the PROFILE variable', async () => {
    vi.stubEnv('PROFILE', '--release');
    cargoExits({});

    await run('run', '--no-trace', '--json');

    expect(jsonOutput<PipelineReport>().release).toBe(true);
  });

  it('should use the --cargo binary', async () => {
    cargoExits({});

    await run('run', '--cargo', 'cross', '--no-trace', '--json');

    expect(mockSpawnSync.mock.calls.map(([command]) => command)).toEqual(['cross', 'cross']);
  });

  it('should treat a bare profile as a run', async () => {
    cargoExits({});

    await run('--release', '--no-trace', '--json');

    expect(jsonOutput<PipelineReport>().profile).toBe('--release');
    expect(mockSpawnSync).toHaveBeenCalledTimes(3);
  });

  it('should plan without running cargo', async () => {
    await run('plan', '--release', '--json');

    const plan = jsonOutput<PlannedStep[]>();
    expect(plan.map(p => [p.step, p.skipped])).toEqual([
      ['build', false],
      ['test', false],
      ['bench', false],
    ]);
    expect(mockSpawnSync).not.toHaveBeenCalled();
    expect(process.env.RUST_BACKTRACE).toBe('0');
  });

  it('should print a readable plan', async () => {
    await run('plan');

    expect(stdout).toEqual([
      [
        '  run   cargo build --examples',
        '  run   cargo test (failures ignored)',
        '  skip  cargo bench (profile is not --release)',
      ].join('\n'),
    ]);
  });

  describe('reportFatal', () => {
    it('should print the message of an Error', () => {
      reportFatal(new Error('Invalid configuration: trace: Expected boolean, received string'), false);
      expect(stderr).toEqual(['\n❌ Invalid configuration: trace: Expected boolean, received string\n']);
    });

    it('should print values that are not errors', () => {
      reportFatal('cargo-ci: interrupted', false);
      reportFatal(42, false);
      expect(stderr).toEqual(['\n❌ cargo-ci: interrupted\n', '\n❌ 42\n']);
    });

    it('should add the stack in debug mode', () => {
      const error = new Error('boom');
      reportFatal(error, true);
      expect(stderr).toEqual(['\n❌ boom\n', String(error.stack)]);
    });
  });
});
