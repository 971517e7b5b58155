/**
 * Pipeline Orchestrator — runs build, test and (on release profiles) bench
 * one after another and derives the run's exit code from their results.
 */

import { nanoid } from 'nanoid';
import { BuildStep } from './steps/build.js';
import { TestStep } from './steps/test.js';
import { BenchStep } from './steps/bench.js';
import { resolveProfileArgs, isReleaseProfile } from './profile.js';
import type { PipelineStep, StepContext, StepResult, PlannedStep, PipelineReport } from './types.js';
import { RELEASE_FLAG } from '../core/types.js';
import { getLogger } from '../core/logger.js';
import { Timer } from '../utils/timer.js';

export const BACKTRACE_VAR = 'RUST_BACKTRACE';
export const BACKTRACE_VALUE = '1';

export interface PipelineOptions {
  profile: string;
  releaseFlag?: string;
  cargo?: string;
  workingDir?: string;
  allowTestFailures?: boolean;
  trace?: boolean;
  /** Environment handed to every step; mutated in place. Defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
  runId?: string;
}

export interface PipelineSteps {
  build: PipelineStep;
  test: PipelineStep;
  bench: PipelineStep;
}

export function createSteps(allowTestFailures: boolean = true): PipelineSteps {
  return {
    build: new BuildStep(),
    test: new TestStep(allowTestFailures),
    bench: new BenchStep(),
  };
}

interface ScheduledStep {
  step: PipelineStep;
  skipReason?: string;
}

function schedule(steps: PipelineSteps, release: boolean, releaseFlag: string): ScheduledStep[] {
  return [
    { step: steps.build },
    { step: steps.test },
    release
      ? { step: steps.bench }
      : { step: steps.bench, skipReason: `profile is not ${releaseFlag}` },
  ];
}

/**
 * Describe what a run with these options would execute, without running it.
 */
export function planPipeline(options: PipelineOptions, steps?: PipelineSteps): PlannedStep[] {
  const releaseFlag = options.releaseFlag ?? RELEASE_FLAG;
  const release = isReleaseProfile(options.profile, releaseFlag);
  const context = buildContext(options, options.env ?? process.env, options.runId ?? 'plan');

  return schedule(steps ?? createSteps(options.allowTestFailures), release, releaseFlag).map(({ step, skipReason }) => ({
    step: step.name,
    command: context.cargo,
    args: step.args(context),
    policy: step.policy,
    skipped: skipReason !== undefined,
    ...(skipReason !== undefined ? { reason: skipReason } : {}),
  }));
}

function buildContext(options: PipelineOptions, env: NodeJS.ProcessEnv, runId: string): StepContext {
  return {
    runId,
    workingDir: options.workingDir ?? process.cwd(),
    env,
    cargo: options.cargo ?? 'cargo',
    profileArgs: resolveProfileArgs(options.profile),
    trace: options.trace ?? true,
  };
}

export class PipelineOrchestrator {
  private options: PipelineOptions;
  private steps: PipelineSteps;
  private logger = getLogger();

  constructor(options: PipelineOptions, steps?: PipelineSteps) {
    this.options = options;
    this.steps = steps ?? createSteps(options.allowTestFailures);
  }

  async run(): Promise<PipelineReport> {
    const timer = new Timer();
    const runId = this.options.runId ?? nanoid(10);
    const releaseFlag = this.options.releaseFlag ?? RELEASE_FLAG;
    const release = isReleaseProfile(this.options.profile, releaseFlag);

    // Must be in place before the first child is spawned
    const env = this.options.env ?? process.env;
    env[BACKTRACE_VAR] = BACKTRACE_VALUE;

    const context = buildContext(this.options, env, runId);
    this.logger.info({ runId, profile: this.options.profile, release }, 'Starting pipeline');

    const results: StepResult[] = [];
    let exitCode = 0;

    for (const { step, skipReason } of schedule(this.steps, release, releaseFlag)) {
      if (exitCode !== 0 || skipReason !== undefined) {
        this.logger.debug({ runId, step: step.name, reason: skipReason ?? 'earlier step failed' }, 'Skipping step');
        results.push(skippedResult(step, context));
        continue;
      }

      const result = await step.run(context);
      results.push(result);

      if (result.status === 'failed') {
        exitCode = result.exitCode;
        this.logger.error({ runId, step: step.name, exitCode }, 'Pipeline stopped');
      }
    }

    const duration = timer.stop();
    this.logger.info({ runId, exitCode, duration }, 'Pipeline finished');

    return {
      runId,
      profile: this.options.profile,
      release,
      exitCode,
      passed: exitCode === 0,
      steps: results,
      duration,
    };
  }
}

function skippedResult(step: PipelineStep, context: StepContext): StepResult {
  return {
    step: step.name,
    command: context.cargo,
    args: step.args(context),
    status: 'skipped',
    exitCode: 0,
    duration: 0,
  };
}
