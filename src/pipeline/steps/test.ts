/**
 * Test Step — runs `cargo test` for the selected profile.
 * Failures are suppressed unless the pipeline runs with strict tests.
 */

import { BaseStep } from './base-step.js';
import type { StepContext } from '../types.js';

export class TestStep extends BaseStep {
  name = 'test' as const;

  constructor(allowFailures: boolean = true) {
    super();
    this.policy = allowFailures ? 'suppress' : 'fail-fast';
  }

  args(context: StepContext): string[] {
    return ['test', ...context.profileArgs];
  }
}
