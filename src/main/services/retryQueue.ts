/**
 * Retry Queue
 *
 * Bounded state machine for files whose catalog requests failed with a
 * rate-limit or transient error:
 *
 *   pending → in_flight → done
 *                       → queued_for_retry → in_flight → ... (at most maxRounds more)
 *
 * The main pass attempts every item once. Each retry round r waits
 * backoffMs × r and then replays every queued item; round r+1 never starts
 * before round r has finished. Items still queued after the last round are
 * finalized through onExhausted, never dropped.
 *
 * Non-retryable errors finalize the item immediately through onFailure.
 * FatalError is rethrown and ends the run.
 */

import { MAX_RETRY_ROUNDS } from '../../shared/types';
import { PipelineError, isFatalError, isRetryableError, wrapError } from './errors';

// ─── Interfaces ──────────────────────────────────────────────────────────────

export type RetryState = 'pending' | 'in_flight' | 'done' | 'queued_for_retry';

/** Per-item bookkeeping */
export interface RetryItem<T> {
  readonly key: string;
  readonly payload: T;
  state: RetryState;
  /** Number of times the item has been attempted */
  attempts: number;
  lastError: PipelineError | null;
}

/** Callbacks driven by the queue */
export interface RetryHandlers<T> {
  /** Processes one item. Resolving means the item is done */
  attempt(payload: T, round: number): Promise<void>;
  /** Called once for an item that failed with a non-retryable error */
  onFailure(payload: T, error: PipelineError): Promise<void> | void;
  /** Called once for an item still failing after the last retry round */
  onExhausted(payload: T, error: PipelineError, attempts: number): Promise<void> | void;
}

export interface RetryQueueOptions {
  /** Base backoff before round r is backoffMs × r */
  backoffMs: number;
  /** Retry rounds after the main pass. Defaults to MAX_RETRY_ROUNDS (3) */
  maxRounds?: number;
  /** Custom sleep (for testing) */
  sleep?: (ms: number) => Promise<void>;
  /** Called before each retry round, after the backoff */
  onRoundStart?: (round: number, queued: number) => void;
}

/** Outcome counts for a completed run */
export interface RetryRunSummary {
  succeeded: number;
  failed: number;
  exhausted: number;
  /** Retry rounds actually executed */
  roundsRun: number;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

// ─── RetryQueue Class ────────────────────────────────────────────────────────

export class RetryQueue<T> {
  private readonly items: RetryItem<T>[] = [];
  private readonly backoffMs: number;
  private readonly maxRounds: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly onRoundStart?: (round: number, queued: number) => void;

  constructor(options: RetryQueueOptions) {
    this.backoffMs = Math.max(0, options.backoffMs);
    this.maxRounds = Math.max(0, options.maxRounds ?? MAX_RETRY_ROUNDS);
    this.sleep = options.sleep ?? defaultSleep;
    this.onRoundStart = options.onRoundStart;
  }

  /** Adds an item in the pending state. Keys must be unique */
  enqueue(key: string, payload: T): void {
    if (this.items.some((item) => item.key === key)) {
      throw new Error(`Duplicate retry queue key: ${key}`);
    }
    this.items.push({ key, payload, state: 'pending', attempts: 0, lastError: null });
  }

  /** Backoff applied before the given retry round */
  backoffFor(round: number): number {
    return this.backoffMs * round;
  }

  getItem(key: string): Readonly<RetryItem<T>> | undefined {
    return this.items.find((item) => item.key === key);
  }

  /** Items currently waiting for a retry round */
  get queuedCount(): number {
    return this.items.filter((item) => item.state === 'queued_for_retry').length;
  }

  get size(): number {
    return this.items.length;
  }

  /**
   * Runs the main pass and up to maxRounds retry rounds.
   */
  async run(handlers: RetryHandlers<T>): Promise<RetryRunSummary> {
    const summary: RetryRunSummary = { succeeded: 0, failed: 0, exhausted: 0, roundsRun: 0 };

    for (const item of this.items) {
      if (item.state === 'pending') {
        await this.attemptItem(item, 0, handlers, summary);
      }
    }

    for (let round = 1; round <= this.maxRounds; round++) {
      const queued = this.items.filter((item) => item.state === 'queued_for_retry');
      if (queued.length === 0) break;

      await this.sleep(this.backoffFor(round));
      this.onRoundStart?.(round, queued.length);
      summary.roundsRun = round;

      for (const item of queued) {
        await this.attemptItem(item, round, handlers, summary);
      }
    }

    for (const item of this.items) {
      if (item.state !== 'queued_for_retry') continue;
      item.state = 'done';
      summary.exhausted++;
      const error = item.lastError ?? wrapError('Retry limit reached', 'TransientError', { filePath: item.key });
      await handlers.onExhausted(item.payload, error, item.attempts);
    }

    return summary;
  }

  private async attemptItem(
    item: RetryItem<T>,
    round: number,
    handlers: RetryHandlers<T>,
    summary: RetryRunSummary,
  ): Promise<void> {
    item.state = 'in_flight';
    item.attempts++;

    try {
      await handlers.attempt(item.payload, round);
      item.state = 'done';
      item.lastError = null;
      summary.succeeded++;
    } catch (error: unknown) {
      if (isFatalError(error)) {
        item.state = 'done';
        throw error;
      }

      const wrapped = wrapError(error, 'APIError', { filePath: item.key });
      item.lastError = wrapped;

      if (isRetryableError(wrapped)) {
        item.state = 'queued_for_retry';
        return;
      }

      item.state = 'done';
      summary.failed++;
      await handlers.onFailure(item.payload, wrapped);
    }
  }
}
