/**
 * Quire — Run Statistics
 *
 * Folds per-source outcomes into RunStats. Counter updates commute;
 * the errors list keeps arrival order.
 */

import type { FetchOutcome, RunStats } from '../types';

export class RunStatsAggregator {
  private readonly stats: RunStats;
  private finished = false;

  constructor(totalSources: number) {
    this.stats = {
      totalSources,
      succeeded: 0,
      failed: 0,
      totalItems: 0,
      errors: [],
    };
  }

  record(outcome: FetchOutcome): void {
    if (this.finished) {
      throw new Error('Cannot record outcomes after the run has finished');
    }

    if (outcome.success) {
      this.stats.succeeded++;
      this.stats.totalItems += outcome.items.length;
    } else {
      this.stats.failed++;
      this.stats.errors.push({ sourceName: outcome.sourceName, message: outcome.error });
    }
  }

  /**
   * Close the run and hand the stats over to the caller.
   */
  finish(): Readonly<RunStats> {
    if (!this.finished) {
      this.finished = true;
      this.stats.errors.forEach(entry => Object.freeze(entry));
      Object.freeze(this.stats.errors);
      Object.freeze(this.stats);
    }
    return this.stats;
  }
}

/**
 * Render the end-of-run report: one summary line, then the failed sources.
 */
export function formatRunSummary(stats: RunStats): string[] {
  const lines = [
    `Fetched ${stats.totalItems} items from ${stats.succeeded} of ${stats.totalSources} sources`,
  ];

  if (stats.errors.length > 0) {
    lines.push('', 'Failed sources:');
    for (const { sourceName, message } of stats.errors) {
      lines.push(`  - ${sourceName}: ${message}`);
    }
  }

  return lines;
}
