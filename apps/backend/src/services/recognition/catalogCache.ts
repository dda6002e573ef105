/**
 * CatalogCache: in-memory reference descriptors with atomic snapshot swaps.
 *
 * Snapshots are frozen once published. A refresh builds the replacement off to
 * the side and publishes it with a single reference assignment, so a search that
 * already holds a snapshot keeps reading a consistent catalog.
 */

import type { Logger } from "pino";
import {
  FEATURE_DIMENSION,
  type CatalogEntry,
  type CatalogRow,
  type CatalogSnapshot,
  type CatalogSource,
} from "../../domain/catalog";
import { CatalogUnavailableError, EmptyCatalogError } from "../../domain/errors";

export class CatalogCache {
  private snapshot: CatalogSnapshot | null = null;
  private inflight: Promise<CatalogSnapshot> | null = null;
  private version = 0;
  private readonly logger: Logger;

  constructor(
    private readonly source: CatalogSource,
    logger: Logger,
    private readonly dimension: number = FEATURE_DIMENSION,
    private readonly now: () => number = Date.now
  ) {
    this.logger = logger.child({ component: "catalog-cache" });
  }

  /**
   * Load the catalog and publish it. Errors from the store propagate: at startup
   * an unreachable catalog should fail loudly.
   */
  async build(): Promise<CatalogSnapshot> {
    if (this.inflight) {
      return this.inflight;
    }

    this.inflight = this.load();
    try {
      const next = await this.inflight;
      this.snapshot = next;
      this.logger.info(
        { version: next.version, entries: next.entries.length, dimension: next.dimension },
        "Catalog snapshot published"
      );
      return next;
    } finally {
      this.inflight = null;
    }
  }

  /**
   * Rebuild and swap. On failure the previous snapshot stays authoritative and
   * the failure is logged; resolves false in that case.
   */
  async refresh(): Promise<boolean> {
    try {
      await this.build();
      return true;
    } catch (error) {
      this.logger.error(
        { err: error, currentVersion: this.snapshot?.version ?? null },
        "Catalog refresh failed; keeping previous snapshot"
      );
      return false;
    }
  }

  current(): CatalogSnapshot {
    if (!this.snapshot) {
      throw new CatalogUnavailableError();
    }
    return this.snapshot;
  }

  requireEntries(): CatalogSnapshot {
    const snapshot = this.current();
    if (snapshot.entries.length === 0) {
      throw new EmptyCatalogError();
    }
    return snapshot;
  }

  isLoaded(): boolean {
    return this.snapshot !== null;
  }

  private async load(): Promise<CatalogSnapshot> {
    const rows = await this.source.getCatalogSnapshot();
    const entries: CatalogEntry[] = [];
    let skipped = 0;

    for (const row of rows) {
      const entry = this.toEntry(row);
      if (entry) {
        entries.push(entry);
      } else {
        skipped++;
      }
    }

    if (skipped > 0) {
      this.logger.warn({ skipped, expectedDimension: this.dimension }, "Dropped catalog rows with unusable feature vectors");
    }

    this.version += 1;
    return Object.freeze({
      version: this.version,
      builtAt: this.now(),
      dimension: this.dimension,
      entries: Object.freeze(entries),
    });
  }

  private toEntry(row: CatalogRow): CatalogEntry | null {
    const vector = row.feature_vector;
    if (vector.length !== this.dimension || vector.some((value) => !Number.isFinite(value) || value < 0)) {
      return null;
    }
    return Object.freeze({
      drugId: row.drug_id,
      imageId: row.image_id,
      vector: Object.freeze([...vector]),
      shape: row.shape,
      color: row.color,
    });
  }
}
