/**
 * Console sink for driver events, and the final report printout.
 */

import type { RunReport, SyncEvent, SyncEventListener } from './sync-types.js';
import { categorySuccessRate, describeItem, formatRate, formatRunReport } from './run-report.js';
import { outcomeColors } from './console-colors.js';
import { logger } from './logger.js';

/**
 * Output functions used by the reporter - default to the shared logger
 */
export interface ReporterOutput {
  log: (message: string) => void;
  info: (message: string) => void;
  success: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

const defaultOutput: ReporterOutput = {
  log: message => logger.log(message),
  info: message => logger.info(message),
  success: message => logger.success(message),
  warn: message => logger.warn(message),
  error: message => logger.error(message),
};

export function createConsoleReporter(output: Partial<ReporterOutput> = {}): SyncEventListener {
  const out: ReporterOutput = { ...defaultOutput, ...output };

  return (event: SyncEvent) => {
    switch (event.type) {
      case 'run-started':
        out.info(`\n🚀 Distributing ${event.categories.length} content categories to ${event.target}`);
        break;
      case 'category-started':
        out.log(`\n${outcomeColors.category(`📦 ${event.category}`)}`);
        break;
      case 'category-enumerated':
        out.log(event.total === 0
          ? '   Nothing to distribute'
          : `   ${event.total} item(s) to distribute`);
        break;
      case 'category-failed':
        out.error(`   ✗ Could not list ${event.category}: ${event.reason}`);
        break;
      case 'item-succeeded':
        out.log(`   ${outcomeColors.succeeded('✓')} ${describeItem(event.item)}`);
        break;
      case 'item-failed':
        out.log(`   ${outcomeColors.failed('✗')} ${describeItem(event.item)}: ${outcomeColors.failed(event.reason)}`);
        break;
      case 'category-completed': {
        const { stats } = event;
        if (stats.state === 'completed' && stats.total > 0) {
          const summary = `   ${stats.success}/${stats.total} succeeded (${formatRate(categorySuccessRate(stats))})`;
          out.log(stats.failed === 0 ? outcomeColors.succeeded(summary) : outcomeColors.partial(summary));
        } else if (stats.state === 'cancelled') {
          out.warn(`   Stopped after ${stats.success + stats.failed} of ${stats.total} item(s)`);
        }
        break;
      }
      case 'run-cancelled':
        out.warn('\n⏹️  Cancellation requested - finishing the current item and stopping');
        break;
      case 'run-completed':
        break;
    }
  };
}

/**
 * Print the summary table and the overall verdict
 */
export function printRunReport(report: RunReport, output: Partial<ReporterOutput> = {}): void {
  const out: ReporterOutput = { ...defaultOutput, ...output };

  out.log('');
  for (const line of formatRunReport(report)) {
    out.log(line);
  }
  out.log('');

  if (report.totalFailed === 0 && !report.cancelled) {
    out.success(`✨ Sync complete! ${report.totalSuccess} item(s) distributed to ${report.target}.`);
  } else if (report.totalFailed === 0) {
    out.warn(`⚠️  Sync cancelled: ${report.totalSuccess} item(s) distributed before stopping.`);
  } else {
    out.warn(`⚠️  Sync completed with errors: ${report.totalSuccess} succeeded, ${report.totalFailed} failed.`);
  }
}
