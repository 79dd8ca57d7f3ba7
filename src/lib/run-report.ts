/**
 * Stats aggregation and report formatting for sync runs.
 */

import type { CategoryState, CategoryStats, RunReport, SyncItem } from './sync-types.js';

/**
 * Mutable counters for the category currently being processed.
 * Only the driver holds one, and only until `complete()` or `cancel()`.
 */
export class CategoryTally {
  private success = 0;
  private failed = 0;
  private closed = false;

  constructor(
    private readonly aggregator: SyncStatsAggregator,
    readonly name: string,
    readonly total: number
  ) {}

  recordSuccess(): void {
    this.assertOpen();
    this.success++;
  }

  recordFailure(): void {
    this.assertOpen();
    this.failed++;
  }

  complete(): CategoryStats {
    return this.close('completed');
  }

  cancel(): CategoryStats {
    return this.close('cancelled');
  }

  private close(state: CategoryState): CategoryStats {
    this.assertOpen();
    this.closed = true;
    return this.aggregator.add({
      name: this.name,
      state,
      total: this.total,
      success: this.success,
      failed: this.failed,
    });
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error(`Category "${this.name}" is already closed`);
    }
  }
}

/**
 * Collects frozen CategoryStats in processing order and derives the RunReport.
 */
export class SyncStatsAggregator {
  private readonly categories: CategoryStats[] = [];

  beginCategory(name: string, total: number): CategoryTally {
    return new CategoryTally(this, name, total);
  }

  recordEnumerationFailure(name: string, reason: string): CategoryStats {
    return this.add({ name, state: 'enumeration-failed', total: 0, success: 0, failed: 0, error: reason });
  }

  recordSkipped(name: string): CategoryStats {
    return this.add({ name, state: 'skipped', total: 0, success: 0, failed: 0 });
  }

  /** @internal used by CategoryTally */
  add(stats: CategoryStats): CategoryStats {
    const frozen = Object.freeze({ ...stats });
    this.categories.push(frozen);
    return frozen;
  }

  toReport(params: { target: string; startedAt: Date; finishedAt: Date; cancelled: boolean }): RunReport {
    return buildRunReport(this.categories, params);
  }
}

export function buildRunReport(
  categories: readonly CategoryStats[],
  params: { target: string; startedAt: Date; finishedAt: Date; cancelled: boolean }
): RunReport {
  let totalItems = 0;
  let totalSuccess = 0;
  let totalFailed = 0;

  for (const stats of categories) {
    totalItems += stats.total;
    totalSuccess += stats.success;
    totalFailed += stats.failed;
  }

  return Object.freeze({
    target: params.target,
    categories: Object.freeze(categories.map(stats => Object.freeze({ ...stats }))),
    totalItems,
    totalSuccess,
    totalFailed,
    successRate: totalItems === 0 ? 0 : totalSuccess / totalItems,
    startedAt: new Date(params.startedAt.getTime()),
    finishedAt: new Date(params.finishedAt.getTime()),
    durationMs: Math.max(0, params.finishedAt.getTime() - params.startedAt.getTime()),
    cancelled: params.cancelled,
  });
}

/**
 * Success rate of a single category. An empty category counts as fully
 * successful.
 */
export function categorySuccessRate(stats: CategoryStats): number {
  return stats.total === 0 ? 1 : stats.success / stats.total;
}

export function formatRate(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}

/**
 * Format a duration as HH:MM:SS (hours are not wrapped at 24).
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(Math.max(0, ms) / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return [hours, minutes, seconds].map(part => String(part).padStart(2, '0')).join(':');
}

/**
 * Process exit code for a finished run: only item failures make it non-zero.
 */
export function exitCodeFor(report: RunReport): number {
  return report.totalFailed === 0 ? 0 : 1;
}

/**
 * Display label for an item: "name (id)", or just the id when they match
 */
export function describeItem(item: SyncItem): string {
  return item.name === item.id ? item.id : `${item.name} (${item.id})`;
}

const NAME_WIDTH = 36;

function categoryRateLabel(stats: CategoryStats): string {
  switch (stats.state) {
    case 'completed':
      return formatRate(categorySuccessRate(stats));
    case 'enumeration-failed':
      return 'error';
    case 'cancelled':
      return 'partial';
    case 'skipped':
      return 'skipped';
  }
}

function tableRow(name: string, total: string, success: string, failed: string, rate: string): string {
  return `${name.padEnd(NAME_WIDTH)}${total.padStart(7)}${success.padStart(9)}${failed.padStart(8)}${rate.padStart(10)}`;
}

/**
 * Plain-text summary table of a run, one string per line.
 */
export function formatRunReport(report: RunReport): string[] {
  const lines: string[] = [];
  const rule = '─'.repeat(NAME_WIDTH + 34);

  lines.push(tableRow('Category', 'Total', 'Success', 'Failed', 'Rate'));
  lines.push(rule);

  for (const stats of report.categories) {
    lines.push(tableRow(
      stats.name,
      String(stats.total),
      String(stats.success),
      String(stats.failed),
      categoryRateLabel(stats)
    ));
  }

  lines.push(rule);
  lines.push(tableRow(
    'Total',
    String(report.totalItems),
    String(report.totalSuccess),
    String(report.totalFailed),
    formatRate(report.successRate)
  ));
  lines.push('');
  lines.push(`Duration: ${formatDuration(report.durationMs)}`);

  const enumerationFailures = report.categories.filter(stats => stats.state === 'enumeration-failed');
  for (const stats of enumerationFailures) {
    lines.push(`Could not list ${stats.name}: ${stats.error ?? 'unknown error'}`);
  }

  if (report.cancelled) {
    lines.push('Run was cancelled before all content was processed.');
  }

  return lines;
}
