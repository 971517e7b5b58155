import type { Command } from 'commander';
import { ConfigManager } from '../../core/config.js';
import type { CargoCiConfig, ConfigOverrides } from '../../core/types.js';
import type { PipelineOptions } from '../../pipeline/orchestrator.js';

export interface PipelineCommandOptions {
  profile?: string;
  cwd?: string;
  cargo?: string;
  strictTests?: boolean;
  trace?: boolean;
  json?: boolean;
  config?: string;
  verbose?: boolean;
}

/**
 * Merge the positional profile and command flags over env and config file.
 * A positional profile wins over `--profile`.
 */
export function loadConfig(
  profileArg: string | undefined,
  options: PipelineCommandOptions,
  env: NodeJS.ProcessEnv = process.env,
): CargoCiConfig {
  const overrides: ConfigOverrides = {
    profile: profileArg ?? options.profile,
    cargo: options.cargo,
    workingDir: options.cwd,
    allowTestFailures: options.strictTests ? false : undefined,
    trace: options.trace === false ? false : undefined,
  };

  return new ConfigManager(options.config, env).load(overrides);
}

export function toPipelineOptions(config: CargoCiConfig, env: NodeJS.ProcessEnv = process.env): PipelineOptions {
  return {
    profile: config.profile,
    releaseFlag: config.releaseFlag,
    cargo: config.cargo,
    workingDir: config.workingDir,
    allowTestFailures: config.allowTestFailures,
    trace: config.trace,
    env,
  };
}

export function addPipelineOptions(cmd: Command): void {
  cmd
    .option('-v, --verbose', 'Print logs to the console')
    .option('--profile <profile>', 'Build profile passed to cargo (e.g. --profile=--release)')
    .option('--cwd <dir>', 'Crate directory to run cargo in')
    .option('--cargo <bin>', 'Cargo executable to invoke')
    .option('--strict-tests', 'Fail the run when `cargo test` fails')
    .option('--no-trace', 'Do not echo commands before running them')
    .option('--config <path>', 'YAML configuration file')
    .option('--json', 'Output the report as JSON');
}
