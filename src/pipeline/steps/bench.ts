import { BaseStep } from './base-step.js';

/**
 * Bench Step — `cargo bench`, only reached on release profiles.
 * Takes no profile arguments: benchmarks always build optimized.
 */
export class BenchStep extends BaseStep {
  name = 'bench' as const;

  args(): string[] {
    return ['bench'];
  }
}
