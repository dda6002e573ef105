/**
 * Housekeeping Job
 * Background timer that sweeps the job registry and, when configured,
 * periodically rebuilds the catalog snapshot.
 *
 * - Jobs idle past the TTL are purged; running jobs past the maximum duration
 *   are failed with TimeoutError
 * - Catalog refresh failures keep the previous snapshot (CatalogCache.refresh)
 */

import type { Logger } from "pino";
import type { CatalogCache } from "./recognition/catalogCache";
import type { JobCoordinator } from "./recognition/jobCoordinator";

const DEFAULT_INTERVAL_MS = 60 * 1000;

export interface HousekeepingResult {
  purged: number;
  timedOut: number;
  catalogRefreshed: boolean | null;
  skipped: boolean;
}

export interface HousekeepingOptions {
  intervalMs?: number;
  /** 0 disables periodic catalog refresh. */
  catalogRefreshMs?: number;
  now?: () => number;
}

export class HousekeepingJob {
  private intervalHandle: ReturnType<typeof setInterval> | null = null;
  private isRunning = false;
  private lastCatalogRefresh: number;
  private readonly intervalMs: number;
  private readonly catalogRefreshMs: number;
  private readonly now: () => number;

  constructor(
    private readonly coordinator: Pick<JobCoordinator, "sweep">,
    private readonly catalog: Pick<CatalogCache, "refresh">,
    private readonly logger: Logger,
    options: HousekeepingOptions = {}
  ) {
    this.intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.catalogRefreshMs = options.catalogRefreshMs ?? 0;
    this.now = options.now ?? Date.now;
    this.lastCatalogRefresh = this.now();
  }

  start(): void {
    if (this.intervalHandle) {
      this.logger.warn("Housekeeping job already running");
      return;
    }

    this.logger.info(
      { intervalMs: this.intervalMs, catalogRefreshMs: this.catalogRefreshMs },
      "Starting housekeeping job"
    );

    this.intervalHandle = setInterval(() => {
      void this.runOnce();
    }, this.intervalMs);
    this.intervalHandle.unref();
  }

  stop(): void {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = null;
      this.logger.info("Housekeeping job stopped");
    }
  }

  async runOnce(): Promise<HousekeepingResult> {
    if (this.isRunning) {
      this.logger.debug("Housekeeping already running, skipping");
      return { purged: 0, timedOut: 0, catalogRefreshed: null, skipped: true };
    }

    this.isRunning = true;
    const result: HousekeepingResult = { purged: 0, timedOut: 0, catalogRefreshed: null, skipped: false };

    try {
      const swept = this.coordinator.sweep();
      result.purged = swept.purged;
      result.timedOut = swept.timedOut;

      if (this.catalogRefreshMs > 0 && this.now() - this.lastCatalogRefresh >= this.catalogRefreshMs) {
        this.lastCatalogRefresh = this.now();
        result.catalogRefreshed = await this.catalog.refresh();
      }

      if (result.purged > 0 || result.timedOut > 0) {
        this.logger.info({ purged: result.purged, timedOut: result.timedOut }, "Housekeeping iteration complete");
      } else {
        this.logger.debug("No stale recognition jobs found");
      }
    } catch (error) {
      this.logger.error({ err: error }, "Housekeeping iteration failed");
    } finally {
      this.isRunning = false;
    }

    return result;
  }
}
