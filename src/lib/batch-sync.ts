/**
 * Batch sync driver.
 *
 * Runs each registered category in order: enumerate its items, apply the
 * category's action to every item against the target, and tally outcomes.
 * Item failures and enumeration failures are recorded and reported through
 * events; they never stop the run. Execution is strictly sequential.
 */

import { ActionError, ProviderError, SyncPreconditionError, errorMessage } from './sync-errors.js';
import { SyncStatsAggregator } from './run-report.js';
import { logger } from './logger.js';
import type {
  RunReport,
  RunSyncOptions,
  SyncCategory,
  SyncEvent,
  SyncItem,
  SyncOutcome,
} from './sync-types.js';

export const DEFAULT_ITEM_DELAY_MS = 500;

/**
 * Reject inputs the driver cannot start with.
 */
export function assertRunnable(categories: readonly SyncCategory[], target: string): void {
  if (categories.length === 0) {
    throw new SyncPreconditionError('At least one content category is required');
  }

  if (typeof target !== 'string' || target.trim() === '') {
    throw new SyncPreconditionError('A target distribution point is required');
  }

  const seen = new Set<string>();
  for (const category of categories) {
    if (!category.name || category.name.trim() === '') {
      throw new SyncPreconditionError('Content categories must have a name');
    }
    if (seen.has(category.name)) {
      throw new SyncPreconditionError(`Duplicate content category: ${category.name}`);
    }
    seen.add(category.name);
  }
}

/**
 * Resolve after `ms`, or as soon as `signal` aborts.
 */
function pause(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) {
    return Promise.resolve();
  }

  return new Promise(resolve => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

async function applyItem(
  category: SyncCategory,
  item: SyncItem,
  target: string,
  timeoutMs: number
): Promise<void> {
  const controller = new AbortController();

  if (timeoutMs <= 0) {
    await category.apply(item, target, { signal: controller.signal });
    return;
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Settle the race before the provider reacts to the abort
      reject(new ActionError(category.name, item.id, `Timed out after ${timeoutMs}ms`));
      controller.abort();
    }, timeoutMs);
  });

  try {
    await Promise.race([category.apply(item, target, { signal: controller.signal }), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Sync every category to `target` and return the aggregated report.
 *
 * ```ts
 * const report = await runSync(categories, targetNalPath, {
 *   itemDelayMs: 250,
 *   onEvent: event => console.log(event.type),
 * });
 * process.exitCode = exitCodeFor(report);
 * ```
 */
export async function runSync(
  categories: readonly SyncCategory[],
  target: string,
  options: RunSyncOptions = {}
): Promise<RunReport> {
  assertRunnable(categories, target);

  const itemDelayMs = options.itemDelayMs ?? DEFAULT_ITEM_DELAY_MS;
  const itemTimeoutMs = options.itemTimeoutMs ?? 0;
  const now = options.now ?? (() => new Date());
  const signal = options.signal;
  // A sink that throws (full disk, closed stream) loses its own output only
  const emit = (event: SyncEvent): void => {
    try {
      options.onEvent?.(event);
    } catch (error) {
      logger.warn(`⚠️  Event listener failed on ${event.type}: ${errorMessage(error)}`);
    }
  };

  const stats = new SyncStatsAggregator();
  const startedAt = now();
  let cancelNoticeSent = false;

  const noteCancellation = (category?: string) => {
    if (!cancelNoticeSent) {
      cancelNoticeSent = true;
      emit({ type: 'run-cancelled', category });
    }
  };

  emit({ type: 'run-started', target, categories: categories.map(c => c.name), startedAt });

  for (const category of categories) {
    if (signal?.aborted) {
      noteCancellation();
      stats.recordSkipped(category.name);
      continue;
    }

    emit({ type: 'category-started', category: category.name });

    let items: SyncItem[];
    try {
      items = await category.enumerate();
    } catch (error) {
      const providerError = ProviderError.from(category.name, error);
      const failedStats = stats.recordEnumerationFailure(category.name, providerError.message);
      emit({ type: 'category-failed', category: category.name, reason: providerError.message });
      emit({ type: 'category-completed', category: category.name, stats: failedStats });
      continue;
    }

    const tally = stats.beginCategory(category.name, items.length);
    emit({ type: 'category-enumerated', category: category.name, total: items.length });

    let cancelledMidCategory = false;
    for (let index = 0; index < items.length; index++) {
      if (index > 0) {
        await pause(itemDelayMs, signal);
      }

      if (signal?.aborted) {
        cancelledMidCategory = true;
        break;
      }

      const item = items[index];
      let outcome: SyncOutcome;
      try {
        await applyItem(category, item, target, itemTimeoutMs);
        outcome = { status: 'success' };
      } catch (error) {
        outcome = { status: 'failure', reason: ActionError.from(category.name, item.id, error).message };
      }

      if (outcome.status === 'success') {
        tally.recordSuccess();
        emit({ type: 'item-succeeded', category: category.name, item });
      } else {
        tally.recordFailure();
        emit({ type: 'item-failed', category: category.name, item, reason: outcome.reason });
      }
    }

    if (cancelledMidCategory) {
      noteCancellation(category.name);
    }

    const categoryStats = cancelledMidCategory ? tally.cancel() : tally.complete();
    emit({ type: 'category-completed', category: category.name, stats: categoryStats });
  }

  const report = stats.toReport({
    target,
    startedAt,
    finishedAt: now(),
    cancelled: cancelNoticeSent,
  });

  emit({ type: 'run-completed', report });
  return report;
}
