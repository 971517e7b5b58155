/**
 * `cargo-ci plan [profile]` — show which cargo commands a run would execute.
 */

import { Command } from 'commander';
import { planPipeline } from '../../pipeline/orchestrator.js';
import { PipelineReporter } from '../../pipeline/reporter.js';
import type { PlannedStep } from '../../pipeline/types.js';
import { loadConfig, toPipelineOptions, addPipelineOptions, type PipelineCommandOptions } from './options.js';

export function createPlanCommand(): Command {
  const cmd = new Command('plan');

  cmd
    .description('Print the steps a run would execute without running them')
    .argument('[profile]', 'Build profile, e.g. --release')
    .allowUnknownOption();
  addPipelineOptions(cmd);
  cmd.action((profile: string | undefined, options: PipelineCommandOptions) => {
    executePlan(profile, options);
  });

  return cmd;
}

export function executePlan(
  profile: string | undefined,
  options: PipelineCommandOptions,
  env: NodeJS.ProcessEnv = process.env,
): PlannedStep[] {
  const config = loadConfig(profile, options, env);
  // Planning must not touch the caller's environment
  const plan = planPipeline(toPipelineOptions(config, { ...env }));
  const reporter = new PipelineReporter();

  console.log(options.json ? reporter.formatJSON(plan) : reporter.formatPlan(plan));
  return plan;
}
