/**
 * Pipeline Reporter — formats run reports and plans for the terminal,
 * plus JSON export for CI tooling.
 */

import type { PipelineReport, PlannedStep, StepResult, StepStatus } from './types.js';
import { formatDuration } from '../utils/timer.js';

const STATUS_LABELS: Record<StepStatus, string> = {
  passed: 'PASS',
  failed: 'FAIL',
  suppressed: 'IGNORED',
  skipped: 'SKIP',
};

export class PipelineReporter {
  /** Format report as an ASCII table for terminal display */
  formatTable(report: PipelineReport): string {
    const lines: string[] = [];
    const sep = '─'.repeat(60);

    lines.push('');
    lines.push(`  cargo-ci run ${report.runId}`);
    lines.push(`  Profile: ${report.profile === '' ? '(default)' : report.profile}`);
    lines.push(`  ${sep}`);
    lines.push(`  ${'Step'.padEnd(8)} ${'Status'.padEnd(9)} ${'Exit'.padEnd(6)} ${'Time'.padEnd(10)}`);
    lines.push(`  ${sep}`);

    for (const result of report.steps) {
      const exit = result.status === 'skipped' ? '-' : String(result.exitCode);
      lines.push(
        `  ${result.step.padEnd(8)} ${STATUS_LABELS[result.status].padEnd(9)} ${exit.padEnd(6)} ${formatDuration(result.duration).padEnd(10)}`,
      );
    }

    lines.push(`  ${sep}`);
    lines.push(`  Result: ${report.passed ? 'success' : 'failure'} (exit ${report.exitCode}) in ${formatDuration(report.duration)}`);

    const ignored = report.steps.filter(r => r.status === 'suppressed');
    for (const result of ignored) {
      lines.push(`  Warning: ${result.step} step failed with exit ${result.exitCode}; failure ignored`);
    }

    lines.push('');
    return lines.join('\n');
  }

  formatPlan(plan: PlannedStep[]): string {
    return plan
      .map(step => {
        const line = [step.command, ...step.args].join(' ');
        if (step.skipped) {
          return `  skip  ${line}${step.reason ? ` (${step.reason})` : ''}`;
        }
        return `  run   ${line}${step.policy === 'suppress' ? ' (failures ignored)' : ''}`;
      })
      .join('\n');
  }

  formatJSON(value: PipelineReport | PlannedStep[]): string {
    return JSON.stringify(value, null, 2);
  }

  /** Format a single result as a one-liner */
  formatResult(result: StepResult): string {
    const detail = result.error ?? (result.signal ? `killed by ${result.signal}` : `exit ${result.exitCode}`);
    return `[${STATUS_LABELS[result.status]}] ${result.step} — ${detail}, ${formatDuration(result.duration)}`;
  }
}
