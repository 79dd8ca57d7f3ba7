/**
 * Error kinds raised around a sync run.
 *
 * ProviderError and ActionError never escape `runSync`; they are recorded
 * against the category or item and surfaced as events. SyncPreconditionError
 * is thrown before any work starts.
 */

/**
 * Best-effort message extraction for values caught from provider callbacks.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}

export class ProviderError extends Error {
  readonly category: string;

  constructor(category: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProviderError';
    this.category = category;
  }

  static from(category: string, error: unknown): ProviderError {
    if (error instanceof ProviderError) return error;
    return new ProviderError(category, errorMessage(error), { cause: error });
  }
}

export class ActionError extends Error {
  readonly category: string;
  readonly itemId: string;

  constructor(category: string, itemId: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ActionError';
    this.category = category;
    this.itemId = itemId;
  }

  static from(category: string, itemId: string, error: unknown): ActionError {
    if (error instanceof ActionError) return error;
    return new ActionError(category, itemId, errorMessage(error), { cause: error });
  }
}

export class SyncPreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SyncPreconditionError';
  }
}
