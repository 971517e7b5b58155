/**
 * cargo-ci — build, test and benchmark a Rust crate in CI
 * Public SDK exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { PipelineOrchestrator } from 'cargo-ci';
 *
 * const report = await new PipelineOrchestrator({ profile: '--release' }).run();
 * process.exitCode = report.exitCode;
 * ```
 */

// Pipeline
export {
  PipelineOrchestrator,
  planPipeline,
  createSteps,
  BACKTRACE_VAR,
  BACKTRACE_VALUE,
  type PipelineOptions,
  type PipelineSteps,
} from './pipeline/orchestrator.js';
export { PipelineReporter } from './pipeline/reporter.js';
export { resolveProfileArgs, isReleaseProfile } from './pipeline/profile.js';
export { runInherited, formatCommandLine, COMMAND_NOT_FOUND, type ProcessOutcome } from './pipeline/process.js';
export { BaseStep } from './pipeline/steps/base-step.js';
export { BuildStep } from './pipeline/steps/build.js';
export { TestStep } from './pipeline/steps/test.js';
export { BenchStep } from './pipeline/steps/bench.js';
export type {
  StepName,
  FailurePolicy,
  StepStatus,
  PipelineStep,
  StepContext,
  StepResult,
  PlannedStep,
  PipelineReport,
} from './pipeline/types.js';

// Core
export { ConfigManager } from './core/config.js';
export { CargoCiConfigSchema, RELEASE_FLAG, type CargoCiConfig, type ConfigOverrides } from './core/types.js';
export { createLogger, getLogger, setLogger } from './core/logger.js';
export { CargoCiError, ConfigError } from './core/errors.js';

// CLI
export { createCLI, main } from './cli/index.js';

// Utils
export { Timer, formatDuration } from './utils/timer.js';

export { VERSION, NAME } from './version.js';
