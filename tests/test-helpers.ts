/**
 * Shared test utilities and fakes for dpsync tests.
 *
 * Provides:
 *  - syncItems / fakeCategory — in-memory categories for the driver
 *  - steppingClock — deterministic `now` for reports and log lines
 *  - collectEvents — record driver events in order
 *  - createOutputSpy — ReporterOutput that captures every line
 *  - makeDistributionPoint — DistributionPoint factory
 */

import type { DistributionPoint } from '../src/lib/admin-service';
import type { ReporterOutput } from '../src/lib/console-reporter';
import type { ApplyContext, SyncCategory, SyncEvent, SyncItem } from '../src/lib/sync-types';

export function syncItems(...ids: string[]): SyncItem[] {
  return ids.map(id => ({ id, name: `${id} name` }));
}

export interface FakeCategoryOptions {
  items?: SyncItem[];
  /** Rejection value for enumerate() */
  enumerateError?: unknown;
  /** Item ids whose apply() rejects */
  failIds?: string[];
  /** Replaces the default apply behaviour */
  apply?: (item: SyncItem, target: string, context: ApplyContext) => Promise<void>;
}

export interface FakeCategory extends SyncCategory {
  /** `${target}:${id}` for every apply() call, in order */
  readonly applied: string[];
  enumerateCalls: number;
}

export function fakeCategory(name: string, options: FakeCategoryOptions = {}): FakeCategory {
  const applied: string[] = [];
  const failIds = new Set(options.failIds ?? []);

  const category: FakeCategory = {
    name,
    applied,
    enumerateCalls: 0,
    async enumerate() {
      category.enumerateCalls++;
      if (options.enumerateError !== undefined) {
        throw options.enumerateError;
      }
      return [...(options.items ?? [])];
    },
    async apply(item, target, context) {
      applied.push(`${target}:${item.id}`);
      if (options.apply) {
        return options.apply(item, target, context);
      }
      if (failIds.has(item.id)) {
        throw new Error(`Distribution of ${item.id} rejected`);
      }
    },
  };
  return category;
}

/**
 * Clock that starts at `start` and advances `stepMs` on every call
 */
export function steppingClock(start: string, stepMs: number): () => Date {
  let current = new Date(start).getTime();
  return () => {
    const value = new Date(current);
    current += stepMs;
    return value;
  };
}

export function collectEvents(): { events: SyncEvent[]; onEvent: (event: SyncEvent) => void; types: () => string[] } {
  const events: SyncEvent[] = [];
  return {
    events,
    onEvent: event => {
      events.push(event);
    },
    types: () => events.map(event => event.type),
  };
}

export function createOutputSpy(): ReporterOutput & { lines: string[] } {
  const lines: string[] = [];
  const record = (level: string) => (message: string) => {
    lines.push(`${level}: ${message}`);
  };
  return {
    lines,
    log: record('log'),
    info: record('info'),
    success: record('success'),
    warn: record('warn'),
    error: record('error'),
  };
}

export function makeDistributionPoint(serverName: string, overrides: Partial<DistributionPoint> = {}): DistributionPoint {
  return {
    serverName,
    nalPath: `["Display=\\\\${serverName}\\"]MSWNET:["SMS_SITE=P01"]\\\\${serverName}\\`,
    siteCode: 'P01',
    isPullDistributionPoint: false,
    ...overrides,
  };
}
