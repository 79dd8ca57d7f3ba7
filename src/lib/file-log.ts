/**
 * Append-only run log.
 *
 * Every line is `<ISO timestamp> [LEVEL] message`. Writes are synchronous so
 * the file keeps the exact order of events even if the process is killed
 * mid-run.
 */

import fs from 'fs';
import path from 'path';
import type { SyncEvent, SyncEventListener } from './sync-types.js';
import { describeItem, formatDuration, formatRate } from './run-report.js';

export type FileLogLevel = 'INFO' | 'SUCCESS' | 'WARN' | 'ERROR';

export interface FileLogger {
  readonly filePath: string;
  write(level: FileLogLevel, message: string): void;
}

export interface FileLoggerOptions {
  now?: () => Date;
}

export function createFileLogger(filePath: string, options: FileLoggerOptions = {}): FileLogger {
  const resolved = path.resolve(filePath);
  const now = options.now ?? (() => new Date());

  fs.mkdirSync(path.dirname(resolved), { recursive: true });

  return {
    filePath: resolved,
    write(level, message) {
      // One record per line, even if a reason carries newlines
      const singleLine = message.replace(/\r?\n/g, ' ');
      fs.appendFileSync(resolved, `${now().toISOString()} [${level}] ${singleLine}\n`, 'utf-8');
    },
  };
}

/**
 * Driver-event sink that records the whole run to the log file
 */
export function createFileLogListener(log: FileLogger): SyncEventListener {
  return (event: SyncEvent) => {
    switch (event.type) {
      case 'run-started':
        log.write('INFO', `Sync started to ${event.target} for ${event.categories.length} categories: ${event.categories.join(', ')}`);
        break;
      case 'category-started':
        log.write('INFO', `[${event.category}] Listing content`);
        break;
      case 'category-enumerated':
        log.write('INFO', `[${event.category}] ${event.total} item(s) to distribute`);
        break;
      case 'category-failed':
        log.write('ERROR', `[${event.category}] Could not list content: ${event.reason}`);
        break;
      case 'item-succeeded':
        log.write('SUCCESS', `[${event.category}] Distributed ${describeItem(event.item)}`);
        break;
      case 'item-failed':
        log.write('ERROR', `[${event.category}] Failed ${describeItem(event.item)}: ${event.reason}`);
        break;
      case 'category-completed': {
        const { stats } = event;
        if (stats.state !== 'enumeration-failed') {
          log.write('INFO', `[${event.category}] ${stats.state}: ${stats.success}/${stats.total} succeeded, ${stats.failed} failed`);
        }
        break;
      }
      case 'run-cancelled':
        log.write('WARN', event.category
          ? `Run cancelled during ${event.category}`
          : 'Run cancelled');
        break;
      case 'run-completed': {
        const { report } = event;
        log.write(report.totalFailed === 0 ? 'SUCCESS' : 'WARN',
          `Sync finished: ${report.totalSuccess}/${report.totalItems} succeeded, ${report.totalFailed} failed, ` +
          `success rate ${formatRate(report.successRate)}, duration ${formatDuration(report.durationMs)}`);
        break;
      }
    }
  };
}
