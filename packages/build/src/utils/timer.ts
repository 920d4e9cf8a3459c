/**
 * Per-stage wall clock timings
 */

export interface StageTiming {
  label: string;
  durationMs: number;
}

/**
 * Format duration in milliseconds to human readable
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) {
    return `${seconds}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  return `${minutes}m ${remainingSeconds}s`;
}

export class StageTimer {
  private readonly timings: StageTiming[] = [];

  constructor(private readonly now: () => number = Date.now) {}

  /**
   * Time one stage; the timing is recorded only if the stage completes
   */
  async time<T>(label: string, stage: () => Promise<T>): Promise<T> {
    const start = this.now();
    const result = await stage();
    this.timings.push({ label, durationMs: this.now() - start });
    return result;
  }

  results(): StageTiming[] {
    return [...this.timings];
  }

  totalMs(): number {
    return this.timings.reduce((sum, timing) => sum + timing.durationMs, 0);
  }

  /**
   * One line per stage followed by the total
   */
  format(): string[] {
    const width = Math.max(5, ...this.timings.map(timing => timing.label.length));
    const lines = this.timings.map(
      timing => `${timing.label.padEnd(width)} : ${formatDuration(timing.durationMs)}`
    );
    lines.push(`${'Total'.padEnd(width)} : ${formatDuration(this.totalMs())}`);
    return lines;
  }
}
