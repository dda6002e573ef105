/**
 * RecognitionService: request-level facade over the recognition pipeline.
 *
 * Owns the bounded worker pool. Each request gets a job in the coordinator,
 * waits for a pool slot, runs one of the recognition paths and comes back as a
 * RecognizeResponse. Job-level failures are reported in the response; only
 * duplicate request ids and coordinator misuse escape as exceptions.
 */

import { randomUUID } from "node:crypto";
import pLimit, { type LimitFunction } from "p-limit";
import type { Logger } from "pino";
import type { CatalogSource, RankedMatch, SearchFilters } from "../../domain/catalog";
import {
  InvalidRequestError,
  InvalidTransitionError,
  OCRUnavailableError,
  toErrorPayload,
} from "../../domain/errors";
import type {
  JobHandle,
  JobProgress,
  RecognitionJob,
  RecognitionMethod,
  RecognitionMode,
  RecognizeResponse,
  RecognizedDrug,
  RequestId,
} from "../../domain/job";
import { fuzzyMatch } from "../ocr/nameMatcher";
import type { RecognizedText, TextRecognizer } from "../ocr/textRecognizer";
import type { CatalogCache } from "./catalogCache";
import type { FeatureExtractor } from "./featureExtractor";
import type { JobCoordinator } from "./jobCoordinator";
import type { ModeSelector } from "./modeSelector";
import type { SimilaritySearchEngine } from "./similaritySearch";

export const PRESCRIPTION_MATCHES_PER_LINE = 3;

export interface RecognizeRequest {
  image: Buffer;
  mode?: RecognitionMode;
  topK?: number;
  filters?: SearchFilters;
  requestId?: RequestId;
}

export interface RecognitionServiceOptions {
  poolSize: number;
  defaultTopK: number;
  maxTopK: number;
  ocrConfidenceThreshold: number;
}

export interface RecognitionServiceDeps {
  coordinator: JobCoordinator;
  catalog: Pick<CatalogCache, "current">;
  source: Pick<CatalogSource, "getDrugById" | "listDrugNames">;
  extractor: Pick<FeatureExtractor, "extract">;
  search: Pick<SimilaritySearchEngine, "search">;
  modeSelector: Pick<ModeSelector, "select">;
  textRecognizer: TextRecognizer | null;
  logger: Logger;
}

interface ExecutionPlan {
  handle: JobHandle;
  requestId: RequestId;
  image: Buffer;
  mode: RecognitionMode;
  topK: number;
  filters: SearchFilters;
}

export class RecognitionService {
  private readonly limit: LimitFunction;
  private readonly logger: Logger;

  constructor(
    private readonly deps: RecognitionServiceDeps,
    private readonly options: RecognitionServiceOptions
  ) {
    this.limit = pLimit(Math.max(1, options.poolSize));
    this.logger = deps.logger.child({ component: "recognition" });
  }

  get poolStats(): { active: number; pending: number; size: number } {
    return {
      active: this.limit.activeCount,
      pending: this.limit.pendingCount,
      size: this.limit.concurrency,
    };
  }

  async recognize(request: RecognizeRequest): Promise<RecognizeResponse> {
    const requestId = request.requestId ?? randomUUID();
    const mode = request.mode ?? "auto";
    const topK = this.resolveTopK(request.topK);
    const filters: SearchFilters = { ...request.filters };

    // Throws DuplicateJobError before any work is queued
    const handle = this.deps.coordinator.create(requestId, mode, filters);
    const plan: ExecutionPlan = { handle, requestId, image: request.image, mode, topK, filters };

    const job = await this.limit(() => this.run(plan));
    return this.respond(job);
  }

  getProgress(requestId: RequestId): JobProgress {
    return this.deps.coordinator.getProgress(requestId);
  }

  cancel(requestId: RequestId): { acknowledged: boolean } {
    const outcome = this.deps.coordinator.cancel(requestId);
    this.logger.info({ requestId, ...outcome }, "Cancel requested");
    return outcome;
  }

  private resolveTopK(topK: number | undefined): number {
    if (topK === undefined) return this.options.defaultTopK;
    if (!Number.isInteger(topK) || topK < 1) {
      throw new InvalidRequestError(`top_k must be a positive integer, got ${topK}`);
    }
    return Math.min(topK, this.options.maxTopK);
  }

  private async run(plan: ExecutionPlan): Promise<RecognitionJob> {
    const { coordinator } = this.deps;
    const { handle, requestId } = plan;

    const queued = coordinator.snapshot(handle);
    if (queued.status !== "PENDING") {
      // Cancelled or purged while waiting for a slot
      return queued;
    }

    coordinator.start(handle);
    const startTime = Date.now();
    try {
      const matches = await this.execute(plan);
      const job = matches === null ? coordinator.finishStopped(handle) : coordinator.complete(handle, matches);
      this.logger.info(
        {
          requestId,
          generation: handle.generation,
          status: job.status,
          method: job.methodUsed,
          results: job.results.length,
          durationMs: Date.now() - startTime,
        },
        "Recognition finished"
      );
      return job;
    } catch (error) {
      if (error instanceof InvalidTransitionError) {
        throw error;
      }
      this.logger.warn({ requestId, err: error, durationMs: Date.now() - startTime }, "Recognition failed");
      return coordinator.fail(handle, error);
    }
  }

  /** Resolves null when the job was asked to stop. */
  private async execute(plan: ExecutionPlan): Promise<RankedMatch[] | null> {
    const { coordinator, modeSelector } = this.deps;
    const { handle, requestId, mode } = plan;

    if (mode === "feature") {
      return this.runFeature(plan);
    }
    if (mode === "ocr" || mode === "prescription") {
      return this.runText(plan, mode);
    }

    const path = await modeSelector.select(plan.image);
    if (coordinator.shouldStop(handle)) return null;
    this.logger.debug({ requestId, path }, "Auto mode selected path");

    if (path === "ocr") {
      try {
        return await this.runText(plan, "ocr");
      } catch (error) {
        if (!(error instanceof OCRUnavailableError)) throw error;
        if (coordinator.shouldStop(handle)) return null;
        coordinator.addWarning(handle, toErrorPayload(error));
        this.logger.warn({ requestId, err: error }, "Text recognition unavailable; falling back to feature matching");
      }
    }
    return this.runFeature(plan);
  }

  private async runFeature(plan: ExecutionPlan): Promise<RankedMatch[] | null> {
    const { coordinator, catalog, extractor, search } = this.deps;
    const { handle } = plan;
    coordinator.setMethod(handle, "feature");

    const query = await extractor.extract(plan.image);
    if (coordinator.shouldStop(handle)) return null;

    const outcome = await search.search(query, catalog.current(), {
      filters: plan.filters,
      topK: plan.topK,
      distinctDrugs: true,
      onProgress: (processed, total) => coordinator.reportProgress(handle, processed, total),
      shouldCancel: () => coordinator.shouldStop(handle),
    });
    return outcome.cancelled ? null : outcome.results;
  }

  private async runText(plan: ExecutionPlan, method: Exclude<RecognitionMethod, "feature">): Promise<RankedMatch[] | null> {
    const { coordinator, source, textRecognizer } = this.deps;
    const { handle } = plan;
    if (!textRecognizer || !textRecognizer.isAvailable()) {
      throw new OCRUnavailableError();
    }

    let lines: RecognizedText[];
    try {
      lines = await textRecognizer.recognizeText(plan.image);
    } catch (error) {
      if (error instanceof OCRUnavailableError) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new OCRUnavailableError(`Text recognition failed: ${reason}`, { cause: error });
    }
    if (coordinator.shouldStop(handle)) return null;
    coordinator.setMethod(handle, method);

    const confident = lines.filter((line) => line.confidence >= this.options.ocrConfidenceThreshold);
    coordinator.reportProgress(handle, 0, confident.length);
    const nameIndex = await source.listDrugNames();
    if (coordinator.shouldStop(handle)) return null;

    const matches = fuzzyMatch(confident, nameIndex, {
      perLine: method === "prescription" ? PRESCRIPTION_MATCHES_PER_LINE : undefined,
    });
    const kept = method === "ocr" ? matches.slice(0, plan.topK) : matches;
    return kept.map((match, index) => ({ drugId: match.drugId, score: match.confidence, rank: index + 1 }));
  }

  private async respond(job: RecognitionJob): Promise<RecognizeResponse> {
    const completed = job.status === "COMPLETED";
    return {
      success: completed,
      requestId: job.requestId,
      status: job.status,
      methodUsed: job.methodUsed,
      results: completed ? await this.hydrate(job.results) : [],
      warnings: job.warnings,
      ...(job.error && { error: job.error }),
    };
  }

  private async hydrate(matches: readonly RankedMatch[]): Promise<RecognizedDrug[]> {
    const hydrated: RecognizedDrug[] = [];
    for (const match of matches) {
      const drug = await this.deps.source.getDrugById(match.drugId);
      if (!drug) {
        this.logger.warn({ drugId: match.drugId }, "Matched drug missing from catalog store");
        continue;
      }
      hydrated.push({ drugId: match.drugId, similarity: match.score, rank: hydrated.length + 1, drug });
    }
    return hydrated;
  }
}
