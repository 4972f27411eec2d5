import type { ScreeningRun } from '../types';

export const MAX_KEPT_RUNS = 50;

/** Finished runs, kept in memory for CSV download. Oldest are dropped first. */
export class RunStore {
  private runs = new Map<string, ScreeningRun>();

  constructor(private readonly capacity: number = MAX_KEPT_RUNS) {}

  save(run: ScreeningRun) {
    this.runs.set(run.runId, run);
    while (this.runs.size > this.capacity) {
      const oldest = this.runs.keys().next();
      if (oldest.done) break;
      this.runs.delete(oldest.value);
    }
  }

  get(runId: string): ScreeningRun | undefined {
    return this.runs.get(runId);
  }

  get size(): number {
    return this.runs.size;
  }
}
