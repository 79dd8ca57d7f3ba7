/**
 * Types shared by the batch sync driver, its sinks and the content
 * categories that plug into it.
 */

/**
 * A single unit of content inside a category.
 * `id` is what the action operates on; `name` is only shown to the operator.
 */
export interface SyncItem {
  id: string;
  name: string;
}

/**
 * Per-item context handed to `apply`. The signal aborts when the per-item
 * timeout expires so the provider can drop its in-flight request.
 */
export interface ApplyContext {
  signal: AbortSignal;
}

/**
 * One class of syncable content with its enumerate/apply capability pair.
 */
export interface SyncCategory {
  readonly name: string;
  enumerate(): Promise<SyncItem[]>;
  apply(item: SyncItem, target: string, context: ApplyContext): Promise<void>;
}

export type SyncOutcome =
  | { status: 'success' }
  | { status: 'failure'; reason: string };

/**
 * How far a category got:
 * - completed: every enumerated item was attempted
 * - enumeration-failed: the item list could not be retrieved
 * - cancelled: the run was cancelled while this category was in progress
 * - skipped: the run was cancelled before this category started
 */
export type CategoryState = 'completed' | 'enumeration-failed' | 'cancelled' | 'skipped';

export interface CategoryStats {
  readonly name: string;
  readonly state: CategoryState;
  readonly total: number;
  readonly success: number;
  readonly failed: number;
  /** Enumeration failure reason, set only for `enumeration-failed` */
  readonly error?: string;
}

export interface RunReport {
  readonly target: string;
  readonly categories: readonly CategoryStats[];
  readonly totalItems: number;
  readonly totalSuccess: number;
  readonly totalFailed: number;
  /** totalSuccess / totalItems, 0 when nothing was enumerated */
  readonly successRate: number;
  readonly startedAt: Date;
  readonly finishedAt: Date;
  readonly durationMs: number;
  readonly cancelled: boolean;
}

export type SyncEvent =
  | { type: 'run-started'; target: string; categories: string[]; startedAt: Date }
  | { type: 'category-started'; category: string }
  | { type: 'category-enumerated'; category: string; total: number }
  | { type: 'category-failed'; category: string; reason: string }
  | { type: 'item-succeeded'; category: string; item: SyncItem }
  | { type: 'item-failed'; category: string; item: SyncItem; reason: string }
  | { type: 'category-completed'; category: string; stats: CategoryStats }
  | { type: 'run-cancelled'; category?: string }
  | { type: 'run-completed'; report: RunReport };

export type SyncEventListener = (event: SyncEvent) => void;

export interface RunSyncOptions {
  /** Pause between consecutive items of a category */
  itemDelayMs?: number;
  /** Per-item timeout, 0 disables it */
  itemTimeoutMs?: number;
  /** Checked before each category and each item, never mid-item */
  signal?: AbortSignal;
  onEvent?: SyncEventListener;
  now?: () => Date;
}
