/**
 * JobCoordinator: registry and state machine for recognition jobs.
 *
 *   PENDING ──start──▶ RUNNING ──complete──▶ COMPLETED
 *      │                  │
 *      ├──cancel──▶ CANCELLED ◀──finishStopped (user cancel)
 *      │                  │
 *      └──fail──▶ FAILED ◀┴──fail / timeout
 *
 * One instance is constructed by the composition root and handed to request
 * handlers. create() hands back a JobHandle; the worker running that job is the
 * only caller of start/reportProgress/complete/finishStopped and addresses the
 * job through the handle, never by request id. create/cancel/getProgress/peek
 * are the external API and work by request id.
 */

import { EventEmitter } from "node:events";
import type { RankedMatch, SearchFilters } from "../../domain/catalog";
import {
  DuplicateJobError,
  InvalidTransitionError,
  NotFoundError,
  TimeoutError,
  toErrorPayload,
} from "../../domain/errors";
import {
  isTerminal,
  type JobFailure,
  type JobHandle,
  type JobProgress,
  type RecognitionJob,
  type RecognitionMethod,
  type RecognitionMode,
  type RequestId,
} from "../../domain/job";

export interface JobCoordinatorOptions {
  ttlMs: number;
  maxDurationMs: number;
  now?: () => number;
}

export interface SweepResult {
  purged: number;
  timedOut: number;
}

type StopReason = "cancelled" | "timeout";

interface JobSlot {
  job: RecognitionJob;
  stopReason: StopReason | null;
}

export class JobCoordinator extends EventEmitter {
  private readonly jobs = new Map<RequestId, JobSlot>();
  // Slots stay reachable from their handle after purge or replacement
  private readonly slots = new WeakMap<JobHandle, JobSlot>();
  private generation = 0;
  private readonly ttlMs: number;
  private readonly maxDurationMs: number;
  private readonly now: () => number;

  constructor(options: JobCoordinatorOptions) {
    super();
    this.ttlMs = options.ttlMs;
    this.maxDurationMs = options.maxDurationMs;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.jobs.size;
  }

  create(requestId: RequestId, mode: RecognitionMode, filters: SearchFilters = {}): JobHandle {
    const existing = this.jobs.get(requestId);
    if (existing && !this.expireIfStale(requestId, existing) && !isTerminal(existing.job.status)) {
      throw new DuplicateJobError(requestId);
    }

    const now = this.now();
    const job: RecognitionJob = {
      requestId,
      status: "PENDING",
      mode,
      methodUsed: null,
      filters: { ...filters },
      processed: 0,
      total: 0,
      created_at: now,
      started_at: null,
      last_activity_at: now,
      results: [],
      warnings: [],
      error: null,
    };
    const slot: JobSlot = { job, stopReason: null };
    const handle: JobHandle = Object.freeze({ requestId, generation: ++this.generation });
    this.jobs.set(requestId, slot);
    this.slots.set(handle, slot);
    this.emit("job:created", copyOf(job));
    return handle;
  }

  start(handle: JobHandle): RecognitionJob {
    const slot = this.current(handle, "start");
    if (slot.job.status !== "PENDING") {
      throw new InvalidTransitionError(`Cannot start job ${handle.requestId} from ${slot.job.status}`);
    }
    const now = this.now();
    slot.job.status = "RUNNING";
    slot.job.started_at = now;
    slot.job.last_activity_at = now;
    return this.updated(slot);
  }

  setMethod(handle: JobHandle, method: RecognitionMethod): void {
    const slot = this.current(handle, "record method for");
    this.assertRunning(slot, "record method for");
    slot.job.methodUsed = method;
    this.touch(slot);
  }

  addWarning(handle: JobHandle, warning: JobFailure): void {
    const slot = this.current(handle, "add warning to");
    this.assertRunning(slot, "add warning to");
    slot.job.warnings.push(warning);
    this.touch(slot);
  }

  reportProgress(handle: JobHandle, processed: number, total: number): void {
    const slot = this.current(handle, "report progress for");
    this.assertRunning(slot, "report progress for");
    if (processed < slot.job.processed) {
      throw new InvalidTransitionError(
        `Progress for job ${handle.requestId} went backwards (${slot.job.processed} → ${processed})`
      );
    }
    slot.job.processed = processed;
    slot.job.total = total;
    this.touch(slot);
    this.emit("job:progress", { requestId: handle.requestId, processed, total });
  }

  /**
   * Cooperative stop check for the worker. Also enforces the wall-clock ceiling,
   * so a long scan is stopped even between sweeps. A handle whose job was
   * purged or replaced always reads as stopped.
   */
  shouldStop(handle: JobHandle): boolean {
    const slot = this.slots.get(handle);
    if (!slot || !this.isRegistered(slot)) return true;
    if (slot.job.status === "RUNNING" && this.isOverdue(slot.job)) {
      this.timeOut(slot);
    }
    return slot.stopReason !== null || isTerminal(slot.job.status);
  }

  /**
   * Request cancellation. Pending jobs end immediately; running jobs stop at
   * the next batch boundary. Terminal or unknown jobs are left alone.
   */
  cancel(requestId: RequestId): { acknowledged: boolean } {
    const slot = this.jobs.get(requestId);
    if (!slot || isTerminal(slot.job.status)) {
      return { acknowledged: false };
    }

    slot.stopReason ??= "cancelled";
    if (slot.job.status === "PENDING") {
      slot.job.status = "CANCELLED";
      slot.job.results = [];
      this.updated(slot);
    } else {
      this.touch(slot);
    }
    return { acknowledged: true };
  }

  complete(handle: JobHandle, results: readonly RankedMatch[]): RecognitionJob {
    const slot = this.current(handle, "complete");
    if (slot.job.status !== "RUNNING") {
      throw new InvalidTransitionError(`Cannot complete job ${handle.requestId} from ${slot.job.status}`);
    }
    slot.job.status = "COMPLETED";
    slot.job.results = results.map((result) => ({ ...result }));
    if (slot.job.total > 0) {
      slot.job.processed = Math.max(slot.job.processed, slot.job.total);
    }
    return this.updated(slot);
  }

  /**
   * Settle a job whose worker observed the stop flag. User cancels (and
   * purges) end in CANCELLED with no results; timeouts end in FAILED with
   * TimeoutError.
   */
  finishStopped(handle: JobHandle): RecognitionJob {
    const slot = this.own(handle);
    if (isTerminal(slot.job.status)) {
      return copyOf(slot.job);
    }
    if (!slot.stopReason && this.isRegistered(slot)) {
      throw new InvalidTransitionError(`Job ${handle.requestId} was not asked to stop`);
    }

    slot.job.results = [];
    if (slot.stopReason === "timeout") {
      slot.job.status = "FAILED";
      slot.job.error = toErrorPayload(new TimeoutError(this.maxDurationMs));
    } else {
      slot.job.status = "CANCELLED";
    }
    return this.updated(slot);
  }

  fail(handle: JobHandle, error: unknown): RecognitionJob {
    const slot = this.own(handle);
    if (isTerminal(slot.job.status)) {
      return copyOf(slot.job);
    }
    slot.job.status = "FAILED";
    slot.job.results = [];
    slot.job.error = toErrorPayload(error);
    return this.updated(slot);
  }

  /** The handle's own job, even after it has been purged or its id reused. */
  snapshot(handle: JobHandle): RecognitionJob {
    return copyOf(this.own(handle).job);
  }

  /**
   * Purge jobs idle past the TTL and fail running jobs past the maximum
   * duration.
   */
  sweep(): SweepResult {
    const result: SweepResult = { purged: 0, timedOut: 0 };
    for (const [requestId, slot] of [...this.jobs]) {
      if (slot.job.status === "RUNNING" && this.isOverdue(slot.job)) {
        this.timeOut(slot);
        result.timedOut++;
        continue;
      }
      if (this.expireIfStale(requestId, slot)) {
        result.purged++;
      }
    }
    return result;
  }

  getProgress(requestId: RequestId): JobProgress {
    const slot = this.jobs.get(requestId);
    if (!slot || this.expireIfStale(requestId, slot)) {
      throw new NotFoundError(requestId);
    }
    const { status, processed, total, methodUsed, error } = slot.job;
    return {
      status,
      processed,
      total,
      percent: percentOf(slot.job),
      methodUsed,
      ...(error && { error }),
    };
  }

  /** Read-only copy of the job registered under an id, or null when unknown/expired. */
  peek(requestId: RequestId): RecognitionJob | null {
    const slot = this.jobs.get(requestId);
    if (!slot || this.expireIfStale(requestId, slot)) {
      return null;
    }
    return copyOf(slot.job);
  }

  private own(handle: JobHandle): JobSlot {
    const slot = this.slots.get(handle);
    if (!slot) {
      throw new InvalidTransitionError(`Unknown handle for job ${handle.requestId}`);
    }
    return slot;
  }

  /** The handle's slot, provided it is still the one registered under its id. */
  private current(handle: JobHandle, action: string): JobSlot {
    const slot = this.own(handle);
    if (!this.isRegistered(slot)) {
      throw new InvalidTransitionError(
        `Cannot ${action} job ${handle.requestId}: generation ${handle.generation} is no longer registered`
      );
    }
    return slot;
  }

  private isRegistered(slot: JobSlot): boolean {
    return this.jobs.get(slot.job.requestId) === slot;
  }

  private assertRunning(slot: JobSlot, action: string): void {
    if (slot.job.status !== "RUNNING") {
      throw new InvalidTransitionError(`Cannot ${action} job ${slot.job.requestId} in ${slot.job.status}`);
    }
  }

  private isOverdue(job: RecognitionJob): boolean {
    return job.started_at !== null && this.now() - job.started_at > this.maxDurationMs;
  }

  private timeOut(slot: JobSlot): void {
    slot.stopReason = "timeout";
    slot.job.status = "FAILED";
    slot.job.results = [];
    slot.job.error = toErrorPayload(new TimeoutError(this.maxDurationMs));
    this.updated(slot);
  }

  private expireIfStale(requestId: RequestId, slot: JobSlot): boolean {
    if (this.now() - slot.job.last_activity_at <= this.ttlMs) {
      return false;
    }
    if (!isTerminal(slot.job.status)) {
      slot.stopReason ??= "cancelled";
      if (slot.job.status === "PENDING") {
        slot.job.status = "CANCELLED";
      }
    }
    this.jobs.delete(requestId);
    this.emit("job:purged", { requestId, status: slot.job.status });
    return true;
  }

  private touch(slot: JobSlot): void {
    slot.job.last_activity_at = this.now();
  }

  private updated(slot: JobSlot): RecognitionJob {
    this.touch(slot);
    const snapshot = copyOf(slot.job);
    if (this.isRegistered(slot)) {
      this.emit("job:updated", snapshot);
    }
    return snapshot;
  }
}

const copyOf = (job: RecognitionJob): RecognitionJob => ({
  ...job,
  filters: { ...job.filters },
  results: job.results.map((result) => ({ ...result })),
  warnings: [...job.warnings],
});

const percentOf = (job: RecognitionJob): number => {
  if (job.total > 0) {
    return Math.min(100, Math.round((job.processed / job.total) * 100));
  }
  return job.status === "COMPLETED" ? 100 : 0;
};
