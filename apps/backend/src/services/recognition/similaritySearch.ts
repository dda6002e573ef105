/**
 * Similarity search over a catalog snapshot.
 *
 * Exact linear scan with a bounded top-k heap. The scan yields to the event loop
 * only at batch boundaries, which is where progress is reported and the
 * cooperative cancel check is evaluated. With `distinctDrugs` each drug keeps only
 * its best image while scanning, so top-k counts drugs rather than images.
 */

import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import type {
  CatalogEntry,
  CatalogSnapshot,
  FeatureVector,
  SearchFilters,
  SimilarityResult,
} from "../../domain/catalog";
import { DimensionMismatchError } from "../../domain/errors";
import { BoundedHeap } from "./boundedHeap";

export const DEFAULT_BATCH_SIZE = 200;

export type ProgressSink = (processed: number, total: number) => void;
export type CancelCheck = () => boolean;

export interface SearchRequest {
  filters?: SearchFilters;
  topK: number;
  distinctDrugs?: boolean;
  onProgress?: ProgressSink;
  shouldCancel?: CancelCheck;
}

export interface SearchOutcome {
  results: SimilarityResult[];
  cancelled: boolean;
  processed: number;
  total: number;
}

interface ScoredEntry {
  drugId: number;
  imageId: number;
  score: number;
}

const clamp01 = (value: number): number => (value < 0 ? 0 : value > 1 ? 1 : value);

/** Cosine similarity clamped to [0, 1]; a zero-norm operand scores 0. */
export function similarity(a: FeatureVector, b: FeatureVector): number {
  if (a.length !== b.length) {
    throw new DimensionMismatchError(a.length, b.length);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return clamp01(dot / (Math.sqrt(normA) * Math.sqrt(normB)));
}

export const isRankedAhead = (a: ScoredEntry, b: ScoredEntry): boolean => {
  if (a.score !== b.score) return a.score > b.score;
  if (a.drugId !== b.drugId) return a.drugId < b.drugId;
  return a.imageId < b.imageId;
};

export function matchesFilters(entry: CatalogEntry, filters: SearchFilters = {}): boolean {
  if (filters.shape && entry.shape !== filters.shape) return false;
  if (filters.color && entry.color !== filters.color) return false;
  return true;
}

export class SimilaritySearchEngine {
  constructor(private readonly batchSize: number = DEFAULT_BATCH_SIZE) {}

  async search(query: FeatureVector, snapshot: CatalogSnapshot, request: SearchRequest): Promise<SearchOutcome> {
    if (query.length !== snapshot.dimension) {
      throw new DimensionMismatchError(snapshot.dimension, query.length);
    }

    const { filters, topK, distinctDrugs, onProgress, shouldCancel } = request;
    const candidates = filters?.shape || filters?.color
      ? snapshot.entries.filter((entry) => matchesFilters(entry, filters))
      : snapshot.entries;
    const total = candidates.length;
    const ranking = new Ranking(topK, distinctDrugs ?? false);

    if (shouldCancel?.()) {
      return { results: [], cancelled: true, processed: 0, total };
    }
    onProgress?.(0, total);

    let processed = 0;
    for (const entry of candidates) {
      ranking.offer({ drugId: entry.drugId, imageId: entry.imageId, score: similarity(query, entry.vector) });
      processed++;

      if (processed % this.batchSize === 0 && processed < total) {
        if (shouldCancel?.()) {
          return { results: ranking.results(), cancelled: true, processed, total };
        }
        onProgress?.(processed, total);
        await yieldToEventLoop();
      }
    }

    if (total > this.batchSize && shouldCancel?.()) {
      return { results: ranking.results(), cancelled: true, processed, total };
    }
    onProgress?.(processed, total);
    return { results: ranking.results(), cancelled: false, processed, total };
  }
}

class Ranking {
  private readonly heap: BoundedHeap<ScoredEntry>;
  private readonly bestByDrug: Map<number, ScoredEntry> | null;

  constructor(
    private readonly topK: number,
    distinctDrugs: boolean
  ) {
    this.heap = new BoundedHeap<ScoredEntry>(topK, isRankedAhead);
    this.bestByDrug = distinctDrugs ? new Map<number, ScoredEntry>() : null;
  }

  offer(item: ScoredEntry): void {
    if (!this.bestByDrug) {
      this.heap.offer(item);
      return;
    }
    const held = this.bestByDrug.get(item.drugId);
    if (!held || isRankedAhead(item, held)) {
      this.bestByDrug.set(item.drugId, item);
    }
  }

  results(): SimilarityResult[] {
    if (!this.bestByDrug) return toResults(this.heap);

    const heap = new BoundedHeap<ScoredEntry>(this.topK, isRankedAhead);
    for (const item of this.bestByDrug.values()) {
      heap.offer(item);
    }
    return toResults(heap);
  }
}

const toResults = (heap: BoundedHeap<ScoredEntry>): SimilarityResult[] =>
  heap.sorted().map((item, index) => ({ ...item, rank: index + 1 }));
