/**
 * Job Queue
 *
 * FIFO work queue over lists in the shared KeyValueStore. Producers push onto
 * the head of `queue:<name>`. A consumer claims from the tail, which moves the
 * job into `queue:<name>:processing` in the same step, so a crashed consumer
 * leaves its job visible instead of losing it. Completing removes the job;
 * failing moves it to `queue:<name>:failed` together with the error.
 *
 * Store failures propagate as StoreUnavailableError.
 *
 * @example
 * ```typescript
 * const syncQueue = new JobQueue(store, QueueNames.SYNC_TASKS, syncTaskSchema);
 * await syncQueue.push({ task: 'sync_garmin', date: '2026-01-26' });
 *
 * const job = await syncQueue.pop({ timeoutMs: 5000 });
 * if (job) {
 *   try {
 *     await runTask(job.data);
 *     await syncQueue.complete(job);
 *   } catch (error) {
 *     await syncQueue.fail(job, error);
 *   }
 * }
 * ```
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import { delay, throwIfAborted } from '../infra/abort.js';
import { ConfigurationError, toError } from '../infra/errors.js';
import type { KeyValueStore } from './store.js';

export type JobSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Schema for free-form object payloads
 */
export const jobPayloadSchema: JobSchema<Record<string, unknown>> = z.record(z.unknown());

export interface Job<T> {
  id: string;
  data: T;
  enqueuedAt: number;
}

export interface ClaimedJob<T> extends Job<T> {
  /** Serialized form held in the processing list */
  raw: string;
}

export interface FailedJob<T> {
  /** Decoded job, or null when the stored entry could not be decoded */
  job: Job<T> | null;
  raw: string;
  error: string;
  failedAt: number;
}

export interface JobQueueOptions {
  /** Key prefix for queue lists (default: 'queue') */
  prefix?: string;
  /** Interval between claim attempts while pop waits (default: 250) */
  pollIntervalMs?: number;
}

export interface PopOptions {
  /** How long to wait for a job; 0 returns at once (default: 0) */
  timeoutMs?: number;
  signal?: AbortSignal;
}

const jobEnvelopeSchema = z.object({
  id: z.string().min(1),
  data: z.unknown(),
  enqueuedAt: z.number(),
});

const failedEntrySchema = z.object({
  raw: z.string(),
  error: z.string(),
  failedAt: z.number(),
});

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

export class JobQueue<T> {
  readonly name: string;
  readonly key: string;
  readonly processingKey: string;
  readonly failedKey: string;

  private store: KeyValueStore;
  private schema: JobSchema<T>;
  private pollIntervalMs: number;

  constructor(store: KeyValueStore, name: string, schema: JobSchema<T>, options: JobQueueOptions = {}) {
    if (!name) {
      throw new ConfigurationError('Queue name must not be empty');
    }
    this.store = store;
    this.name = name;
    this.schema = schema;
    this.pollIntervalMs = options.pollIntervalMs ?? 250;

    const prefix = options.prefix ?? 'queue';
    this.key = `${prefix}:${name}`;
    this.processingKey = `${this.key}:processing`;
    this.failedKey = `${this.key}:failed`;
  }

  private decode(raw: string): Job<T> | null {
    const envelope = jobEnvelopeSchema.safeParse(parseJson(raw));
    if (!envelope.success) return null;

    const data = this.schema.safeParse(envelope.data.data);
    if (!data.success) return null;

    return { id: envelope.data.id, data: data.data, enqueuedAt: envelope.data.enqueuedAt };
  }

  /**
   * Add a job to the queue
   */
  async push(data: T): Promise<Job<T>> {
    const job: Job<T> = { id: randomUUID(), data, enqueuedAt: Date.now() };
    await this.store.listPush(this.key, JSON.stringify(job));
    console.log(`[Queue] ${this.name}: pushed job ${job.id}`);
    return job;
  }

  /**
   * Claim the oldest job, waiting up to timeoutMs for one to arrive
   *
   * Entries that cannot be decoded are moved to the failed list and skipped.
   *
   * @returns The claimed job, or null when the queue stayed empty
   * @throws CancelledError when the signal fires
   */
  async pop(options: PopOptions = {}): Promise<ClaimedJob<T> | null> {
    const { timeoutMs = 0, signal } = options;
    const deadline = Date.now() + Math.max(0, timeoutMs);

    for (;;) {
      throwIfAborted(signal);

      const raw = await this.store.listMove(this.key, this.processingKey);
      if (raw !== null) {
        const job = this.decode(raw);
        if (job) {
          return { ...job, raw };
        }
        console.warn(`[Queue] ${this.name}: undecodable job moved to failed list`);
        await this.moveToFailed(raw, 'Undecodable job entry');
        continue;
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        return null;
      }
      await delay(Math.min(this.pollIntervalMs, remaining), signal);
    }
  }

  /**
   * Remove a finished job from the processing list
   *
   * @returns false when the job was not being processed
   */
  async complete(job: ClaimedJob<T>): Promise<boolean> {
    const removed = await this.store.listRemove(this.processingKey, job.raw, 1);
    return removed > 0;
  }

  /**
   * Move a job from the processing list to the failed list
   *
   * @returns false when the job was not being processed (it is recorded as failed anyway)
   */
  async fail(job: ClaimedJob<T>, error: unknown): Promise<boolean> {
    const message = toError(error).message;
    console.warn(`[Queue] ${this.name}: job ${job.id} failed: ${message}`);
    return this.moveToFailed(job.raw, message);
  }

  private async moveToFailed(raw: string, error: string): Promise<boolean> {
    const removed = await this.store.listRemove(this.processingKey, raw, 1);
    await this.store.listPush(this.failedKey, JSON.stringify({ raw, error, failedAt: Date.now() }));
    return removed > 0;
  }

  /**
   * Jobs waiting to be claimed
   */
  async size(): Promise<number> {
    return this.store.listLength(this.key);
  }

  /**
   * Jobs claimed but not yet completed or failed
   */
  async processingCount(): Promise<number> {
    return this.store.listLength(this.processingKey);
  }

  async failedCount(): Promise<number> {
    return this.store.listLength(this.failedKey);
  }

  /**
   * Most recent failures first
   */
  async failed(limit: number = 50): Promise<FailedJob<T>[]> {
    if (limit <= 0) return [];
    const entries = await this.store.listRange(this.failedKey, 0, limit - 1);

    return entries.flatMap(entry => {
      const parsed = failedEntrySchema.safeParse(parseJson(entry));
      if (!parsed.success) return [];
      const { raw, error, failedAt } = parsed.data;
      return [{ job: this.decode(raw), raw, error, failedAt }];
    });
  }
}
