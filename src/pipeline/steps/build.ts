/**
 * Build Step — compiles the crate's examples for the selected profile.
 */

import { BaseStep } from './base-step.js';
import type { StepContext } from '../types.js';

export class BuildStep extends BaseStep {
  name = 'build' as const;

  args(context: StepContext): string[] {
    return ['build', '--examples', ...context.profileArgs];
  }
}
