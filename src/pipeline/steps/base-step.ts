import type { PipelineStep, StepContext, StepResult, StepName, FailurePolicy } from '../types.js';
import { runInherited, formatCommandLine } from '../process.js';
import { getLogger } from '../../core/logger.js';
import { Timer } from '../../utils/timer.js';

export abstract class BaseStep implements PipelineStep {
  abstract name: StepName;

  policy: FailurePolicy = 'fail-fast';

  protected logger = getLogger();

  /**
   * Arguments passed to cargo, starting with the subcommand.
   */
  abstract args(context: StepContext): string[];

  async run(context: StepContext): Promise<StepResult> {
    const args = this.args(context);
    const timer = new Timer();

    if (context.trace) {
      process.stderr.write(formatCommandLine(context.cargo, args) + '\n');
    }
    this.logger.debug({ runId: context.runId, step: this.name, args }, 'Running pipeline step');

    const outcome = runInherited(context.cargo, args, {
      cwd: context.workingDir,
      env: context.env,
    });
    const duration = timer.stop();

    const failed = outcome.exitCode !== 0;
    const status = !failed ? 'passed' : this.policy === 'suppress' ? 'suppressed' : 'failed';

    if (outcome.error) {
      this.logger.error({ runId: context.runId, step: this.name, error: outcome.error }, 'Step could not start');
    } else if (failed) {
      this.logger.warn(
        { runId: context.runId, step: this.name, exitCode: outcome.exitCode, signal: outcome.signal, status },
        'Step exited with non-zero status',
      );
    } else {
      this.logger.info({ runId: context.runId, step: this.name, duration }, 'Step passed');
    }

    return {
      step: this.name,
      command: context.cargo,
      args,
      status,
      exitCode: outcome.exitCode,
      duration,
      ...(outcome.signal ? { signal: outcome.signal } : {}),
      ...(outcome.error ? { error: outcome.error } : {}),
    };
  }
}
