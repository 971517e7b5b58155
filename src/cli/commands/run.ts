/**
 * `cargo-ci run [profile]` — builds examples, runs tests, and benchmarks
 * release profiles. Exit code follows the build and bench steps only.
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { PipelineOrchestrator } from '../../pipeline/orchestrator.js';
import { PipelineReporter } from '../../pipeline/reporter.js';
import type { PipelineReport } from '../../pipeline/types.js';
import { loadConfig, toPipelineOptions, addPipelineOptions, type PipelineCommandOptions } from './options.js';

export function createRunCommand(): Command {
  const cmd = new Command('run');

  cmd
    .description('Build examples, run tests, and run benchmarks for release profiles')
    .argument('[profile]', 'Build profile, e.g. --release')
    .allowUnknownOption();
  addPipelineOptions(cmd);
  cmd.action(async (profile: string | undefined, options: PipelineCommandOptions) => {
    await executeRun(profile, options);
  });

  return cmd;
}

export async function executeRun(
  profile: string | undefined,
  options: PipelineCommandOptions,
  env: NodeJS.ProcessEnv = process.env,
): Promise<PipelineReport> {
  const config = loadConfig(profile, options, env);
  const pipelineOptions = toPipelineOptions(config, env);
  if (config.workingDir) {
    pipelineOptions.workingDir = resolve(config.workingDir);
  }

  const report = await new PipelineOrchestrator(pipelineOptions).run();
  const reporter = new PipelineReporter();

  if (options.json) {
    console.log(reporter.formatJSON(report));
  } else {
    console.log(reporter.formatTable(report));
    const fatal = report.steps.find(step => step.status === 'failed');
    if (fatal) {
      console.error(`❌ ${reporter.formatResult(fatal)}`);
    }
  }

  process.exitCode = report.exitCode;
  return report;
}
