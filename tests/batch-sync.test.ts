/**
 * Tests for the batch sync driver
 */

import { runSync, assertRunnable } from '../src/lib/batch-sync';
import { categorySuccessRate, exitCodeFor, formatRate } from '../src/lib/run-report';
import { SyncPreconditionError } from '../src/lib/sync-errors';
import type { RunReport, SyncItem } from '../src/lib/sync-types';
import { collectEvents, fakeCategory, steppingClock, syncItems } from './test-helpers';

const TARGET = 'dp02-nal';

function withoutTimestamps(report: RunReport) {
  const { startedAt, finishedAt, durationMs, ...rest } = report;
  return rest;
}

describe('runSync', () => {
  describe('preconditions', () => {
    it('rejects an empty category list before emitting anything', async () => {
      const { onEvent, events } = collectEvents();

      await expect(runSync([], TARGET, { onEvent })).rejects.toThrow(SyncPreconditionError);
      await expect(runSync([], TARGET)).rejects.toThrow('At least one content category is required');
      expect(events).toHaveLength(0);
    });

    it('rejects a blank target', () => {
      expect(() => assertRunnable([fakeCategory('A')], '   ')).toThrow('A target distribution point is required');
    });

    it('rejects duplicate and unnamed categories', () => {
      expect(() => assertRunnable([fakeCategory('A'), fakeCategory('A')], TARGET))
        .toThrow('Duplicate content category: A');
      expect(() => assertRunnable([fakeCategory('')], TARGET))
        .toThrow('Content categories must have a name');
    });

    it('does not enumerate anything when preconditions fail', async () => {
      const first = fakeCategory('A', { items: syncItems('a1') });

      await expect(runSync([first, fakeCategory('A')], TARGET)).rejects.toThrow('Duplicate content category: A');
      expect(first.enumerateCalls).toBe(0);
    });
  });

  describe('accounting', () => {
    it('reports the three-category scenario', async () => {
      const categories = [
        fakeCategory('A', { items: syncItems('a1', 'a2', 'a3') }),
        fakeCategory('B', { items: syncItems('b1', 'b2'), failIds: ['b2'] }),
        fakeCategory('C', { items: [] }),
      ];

      const report = await runSync(categories, TARGET, { itemDelayMs: 0 });

      expect(report.categories).toEqual([
        { name: 'A', state: 'completed', total: 3, success: 3, failed: 0 },
        { name: 'B', state: 'completed', total: 2, success: 1, failed: 1 },
        { name: 'C', state: 'completed', total: 0, success: 0, failed: 0 },
      ]);
      expect(report.categories.map(categorySuccessRate)).toEqual([1, 0.5, 1]);
      expect(report.totalItems).toBe(5);
      expect(report.totalSuccess).toBe(4);
      expect(report.totalFailed).toBe(1);
      expect(formatRate(report.successRate)).toBe('80.0%');
      expect(exitCodeFor(report)).toBe(1);
    });

    it('keeps success + failed == total for every completed category', async () => {
      const report = await runSync([
        fakeCategory('A', { items: syncItems('1', '2', '3', '4'), failIds: ['1', '3'] }),
        fakeCategory('B', { items: syncItems('5'), failIds: ['5'] }),
      ], TARGET, { itemDelayMs: 0 });

      for (const stats of report.categories) {
        expect(stats.success + stats.failed).toBe(stats.total);
      }
      expect(report.totalItems).toBe(report.categories.reduce((sum, stats) => sum + stats.total, 0));
      expect(report.totalSuccess).toBe(1);
      expect(report.totalFailed).toBe(4);
    });

    it('applies every item to the target in order', async () => {
      const a = fakeCategory('A', { items: syncItems('a1', 'a2') });
      const b = fakeCategory('B', { items: syncItems('b1') });

      await runSync([a, b], TARGET, { itemDelayMs: 0 });

      expect(a.applied).toEqual(['dp02-nal:a1', 'dp02-nal:a2']);
      expect(b.applied).toEqual(['dp02-nal:b1']);
    });

    it('reports a zero success rate and exit code 0 when nothing was enumerated', async () => {
      const report = await runSync([fakeCategory('A'), fakeCategory('B')], TARGET, { itemDelayMs: 0 });

      expect(report.totalItems).toBe(0);
      expect(report.successRate).toBe(0);
      expect(exitCodeFor(report)).toBe(0);
    });

    it('returns identical reports for identical runs', async () => {
      const build = () => [
        fakeCategory('A', { items: syncItems('a1', 'a2'), failIds: ['a1'] }),
        fakeCategory('B', { enumerateError: new Error('listing failed') }),
      ];

      const first = await runSync(build(), TARGET, { itemDelayMs: 0 });
      const second = await runSync(build(), TARGET, { itemDelayMs: 0 });

      expect(withoutTimestamps(second)).toEqual(withoutTimestamps(first));
    });

    it('returns a frozen report', async () => {
      const report = await runSync([fakeCategory('A', { items: syncItems('a1') })], TARGET, { itemDelayMs: 0 });

      expect(Object.isFrozen(report)).toBe(true);
      expect(Object.isFrozen(report.categories)).toBe(true);
      expect(Object.isFrozen(report.categories[0])).toBe(true);
    });

    it('times the run with the injected clock', async () => {
      const report = await runSync([fakeCategory('A')], TARGET, {
        itemDelayMs: 0,
        now: steppingClock('2024-10-29T12:00:00Z', 1500),
      });

      expect(report.startedAt.toISOString()).toBe('2024-10-29T12:00:00.000Z');
      expect(report.finishedAt.toISOString()).toBe('2024-10-29T12:00:01.500Z');
      expect(report.durationMs).toBe(1500);
    });
  });

  describe('failure isolation', () => {
    it('keeps going after item 2 of 3 fails', async () => {
      const category = fakeCategory('A', { items: syncItems('1', '2', '3'), failIds: ['2'] });
      const { events, onEvent } = collectEvents();

      const report = await runSync([category], TARGET, { itemDelayMs: 0, onEvent });

      expect(category.applied).toEqual(['dp02-nal:1', 'dp02-nal:2', 'dp02-nal:3']);
      expect(report.categories[0]).toEqual({ name: 'A', state: 'completed', total: 3, success: 2, failed: 1 });
      expect(events).toContainEqual({
        type: 'item-failed',
        category: 'A',
        item: { id: '2', name: '2 name' },
        reason: 'Distribution of 2 rejected',
      });
    });

    it('records an enumeration failure and runs the next category', async () => {
      const later = fakeCategory('C', { items: syncItems('c1') });
      const { events, onEvent } = collectEvents();

      const report = await runSync([
        fakeCategory('B', { enumerateError: new Error('AdminService returned 500: boom') }),
        later,
      ], TARGET, { itemDelayMs: 0, onEvent });

      expect(report.categories[0]).toEqual({
        name: 'B',
        state: 'enumeration-failed',
        total: 0,
        success: 0,
        failed: 0,
        error: 'AdminService returned 500: boom',
      });
      expect(report.categories[1]).toEqual({ name: 'C', state: 'completed', total: 1, success: 1, failed: 0 });
      expect(later.applied).toEqual(['dp02-nal:c1']);
      expect(events.slice(1, 3)).toEqual([
        { type: 'category-started', category: 'B' },
        { type: 'category-failed', category: 'B', reason: 'AdminService returned 500: boom' },
      ]);
      expect(exitCodeFor(report)).toBe(0);
    });

    it('uses the thrown value as the reason when it is not an Error', async () => {
      const { events, onEvent } = collectEvents();

      await runSync([
        fakeCategory('A', {
          items: syncItems('a1'),
          apply: () => Promise.reject('package locked'),
        }),
      ], TARGET, { itemDelayMs: 0, onEvent });

      const failure = events.find(event => event.type === 'item-failed');
      expect(failure).toEqual({ type: 'item-failed', category: 'A', item: { id: 'a1', name: 'a1 name' }, reason: 'package locked' });
    });
  });

  describe('failing event listeners', () => {
    const originalEnv = process.env;
    let warnSpy: jest.SpyInstance;

    beforeEach(() => {
      process.env = { ...originalEnv, NO_COLOR: '1' };
      warnSpy = jest.spyOn(console, 'warn').mockImplementation();
    });

    afterEach(() => {
      process.env = originalEnv;
      jest.restoreAllMocks();
    });

    it('does not count a success twice when the listener throws on it', async () => {
      const category = fakeCategory('A', { items: syncItems('a1', 'a2') });

      const report = await runSync([category], TARGET, {
        itemDelayMs: 0,
        onEvent: event => {
          if (event.type === 'item-succeeded') throw new Error('ENOSPC: no space left on device');
        },
      });

      expect(category.applied).toEqual(['dp02-nal:a1', 'dp02-nal:a2']);
      expect(report.categories[0]).toEqual({ name: 'A', state: 'completed', total: 2, success: 2, failed: 0 });
      expect(report.totalFailed).toBe(0);
      expect(exitCodeFor(report)).toBe(0);
      expect(warnSpy).toHaveBeenCalledTimes(2);
      expect(warnSpy).toHaveBeenCalledWith('⚠️  Event listener failed on item-succeeded: ENOSPC: no space left on device');
    });

    it('still returns the report when the listener throws on a failure', async () => {
      const report = await runSync([
        fakeCategory('A', { items: syncItems('a1', 'a2'), failIds: ['a1'] }),
        fakeCategory('B', { items: syncItems('b1') }),
      ], TARGET, {
        itemDelayMs: 0,
        onEvent: event => {
          if (event.type === 'item-failed') throw new Error('ENOSPC: no space left on device');
        },
      });

      expect(report.categories).toEqual([
        { name: 'A', state: 'completed', total: 2, success: 1, failed: 1 },
        { name: 'B', state: 'completed', total: 1, success: 1, failed: 0 },
      ]);
      expect(exitCodeFor(report)).toBe(1);
      expect(warnSpy).toHaveBeenCalledWith('⚠️  Event listener failed on item-failed: ENOSPC: no space left on device');
    });

    it('runs to completion when every event throws', async () => {
      const report = await runSync([fakeCategory('A', { items: syncItems('a1') })], TARGET, {
        itemDelayMs: 0,
        onEvent: () => {
          throw new Error('EACCES: permission denied');
        },
      });

      expect(report.totalItems).toBe(1);
      expect(report.totalSuccess).toBe(1);
      // run-started, category-started, category-enumerated, item-succeeded, category-completed, run-completed
      expect(warnSpy).toHaveBeenCalledTimes(6);
    });
  });

  describe('events', () => {
    it('emits events in processing order', async () => {
      const { onEvent, types } = collectEvents();

      await runSync([
        fakeCategory('A', { items: syncItems('a1', 'a2'), failIds: ['a2'] }),
        fakeCategory('B', { items: [] }),
      ], TARGET, { itemDelayMs: 0, onEvent });

      expect(types()).toEqual([
        'run-started',
        'category-started',
        'category-enumerated',
        'item-succeeded',
        'item-failed',
        'category-completed',
        'category-started',
        'category-enumerated',
        'category-completed',
        'run-completed',
      ]);
    });

    it('announces the target and category names and ends with the returned report', async () => {
      const { events, onEvent } = collectEvents();
      const now = steppingClock('2024-10-29T12:00:00Z', 1000);

      const report = await runSync([fakeCategory('A'), fakeCategory('B')], TARGET, { itemDelayMs: 0, onEvent, now });

      expect(events[0]).toEqual({
        type: 'run-started',
        target: TARGET,
        categories: ['A', 'B'],
        startedAt: new Date('2024-10-29T12:00:00Z'),
      });
      expect(events[events.length - 1]).toEqual({ type: 'run-completed', report });
    });
  });

  describe('per-item timeout', () => {
    it('fails an item that outlives the timeout, aborts it, and moves on', async () => {
      let abortedBySignal = false;
      const hangUntilAborted = (item: SyncItem, _target: string, context: { signal: AbortSignal }) => {
        if (item.id !== 'slow') {
          return Promise.resolve();
        }
        return new Promise<void>(resolve => {
          context.signal.addEventListener('abort', () => {
            abortedBySignal = true;
            resolve();
          });
        });
      };
      const { events, onEvent } = collectEvents();

      const report = await runSync([
        fakeCategory('A', { items: syncItems('slow', 'fast'), apply: hangUntilAborted }),
      ], TARGET, { itemDelayMs: 0, itemTimeoutMs: 20, onEvent });

      expect(report.categories[0]).toEqual({ name: 'A', state: 'completed', total: 2, success: 1, failed: 1 });
      expect(events).toContainEqual({
        type: 'item-failed',
        category: 'A',
        item: { id: 'slow', name: 'slow name' },
        reason: 'Timed out after 20ms',
      });
      expect(abortedBySignal).toBe(true);
    });
  });

  describe('pacing', () => {
    it('pauses between items but not before the first', async () => {
      const started = Date.now();

      await runSync([fakeCategory('A', { items: syncItems('1', '2', '3') })], TARGET, { itemDelayMs: 30 });

      expect(Date.now() - started).toBeGreaterThanOrEqual(50);
    });
  });

  describe('cancellation', () => {
    it('stops between items and marks the rest of the run as skipped', async () => {
      const controller = new AbortController();
      const a = fakeCategory('A', {
        items: syncItems('a1', 'a2', 'a3'),
        apply: async item => {
          if (item.id === 'a2') controller.abort();
        },
      });
      const b = fakeCategory('B', { items: syncItems('b1') });
      const { events, onEvent, types } = collectEvents();

      const report = await runSync([a, b], TARGET, { itemDelayMs: 0, signal: controller.signal, onEvent });

      expect(a.applied).toEqual(['dp02-nal:a1', 'dp02-nal:a2']);
      expect(b.enumerateCalls).toBe(0);
      expect(report.cancelled).toBe(true);
      expect(report.categories).toEqual([
        { name: 'A', state: 'cancelled', total: 3, success: 2, failed: 0 },
        { name: 'B', state: 'skipped', total: 0, success: 0, failed: 0 },
      ]);
      expect(report.totalItems).toBe(3);
      expect(exitCodeFor(report)).toBe(0);
      expect(events.filter(event => event.type === 'run-cancelled')).toEqual([{ type: 'run-cancelled', category: 'A' }]);
      expect(types().slice(-3)).toEqual(['run-cancelled', 'category-completed', 'run-completed']);
    });

    it('skips every category when already cancelled', async () => {
      const controller = new AbortController();
      controller.abort();
      const a = fakeCategory('A', { items: syncItems('a1') });
      const { onEvent, types } = collectEvents();

      const report = await runSync([a], TARGET, { signal: controller.signal, onEvent });

      expect(a.enumerateCalls).toBe(0);
      expect(report.categories).toEqual([{ name: 'A', state: 'skipped', total: 0, success: 0, failed: 0 }]);
      expect(types()).toEqual(['run-started', 'run-cancelled', 'run-completed']);
    });

    it('wakes from the inter-item pause when cancelled', async () => {
      const controller = new AbortController();
      const a = fakeCategory('A', {
        items: syncItems('a1', 'a2'),
        apply: async () => {
          setTimeout(() => controller.abort(), 5);
        },
      });

      const report = await runSync([a], TARGET, { itemDelayMs: 60_000, signal: controller.signal });

      expect(a.applied).toEqual(['dp02-nal:a1']);
      expect(report.categories[0]).toEqual({ name: 'A', state: 'cancelled', total: 2, success: 1, failed: 0 });
    });

    it('does not mark the run cancelled when the abort comes after the last item', async () => {
      const controller = new AbortController();
      const a = fakeCategory('A', {
        items: syncItems('a1'),
        apply: async () => {
          controller.abort();
        },
      });

      const report = await runSync([a], TARGET, { itemDelayMs: 0, signal: controller.signal });

      expect(report.cancelled).toBe(false);
      expect(report.categories[0].state).toBe('completed');
    });
  });
});
