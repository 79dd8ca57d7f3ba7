// Batch sync driver
export * from './lib/sync-types.js';
export * from './lib/sync-errors.js';
export { runSync, assertRunnable, DEFAULT_ITEM_DELAY_MS } from './lib/batch-sync.js';
export {
  SyncStatsAggregator,
  CategoryTally,
  buildRunReport,
  categorySuccessRate,
  describeItem,
  exitCodeFor,
  formatDuration,
  formatRate,
  formatRunReport,
} from './lib/run-report.js';

// Configuration Manager integration
export * from './lib/admin-service.js';
export * from './lib/content-categories.js';
export * from './lib/config.js';

// Sinks
export { createConsoleReporter, printRunReport } from './lib/console-reporter.js';
export type { ReporterOutput } from './lib/console-reporter.js';
export { createFileLogger, createFileLogListener } from './lib/file-log.js';
export type { FileLogger, FileLogLevel, FileLoggerOptions } from './lib/file-log.js';

// Programmatic entry points for the CLI commands
export { syncContent, planSync } from './scripts/sync-content.js';
export type { SyncContentOptions, SyncContentResult, SyncContentDependencies, CategoryPlan } from './scripts/sync-content.js';
export { listNodes } from './scripts/list-nodes.js';

// dp-content-sync
//
// Copies the content distributed to one distribution point to another:
// - runSync() - the reusable driver: ordered categories of { enumerate, apply }
// - buildContentCategories() - the seven Configuration Manager content categories
// - AdminServiceClient - list distribution points, list and distribute content
//
// CLI:
// - dpsync          - interactive sync
// - dpsync nodes    - list distribution points
// - dpsync init     - write a starter dpsync.config.json
