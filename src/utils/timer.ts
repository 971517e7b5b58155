/**
 * Wall-clock timer for step durations
 */
export class Timer {
  private startTime: number;
  private endTime?: number;

  constructor() {
    this.startTime = performance.now();
  }

  /**
   * Stop the timer and return total elapsed time
   */
  stop(): number {
    this.endTime = performance.now();
    return this.elapsed;
  }

  get elapsed(): number {
    const end = this.endTime ?? performance.now();
    return end - this.startTime;
  }

  get formatted(): string {
    return formatDuration(this.elapsed);
  }
}

/**
 * Format a duration in milliseconds to a human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${minutes}m ${seconds}s`;
}
