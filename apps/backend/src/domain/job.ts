import type { DrugRecord, RankedMatch, SearchFilters } from "./catalog";
import type { ErrorKind } from "./errors";

export type RequestId = string;

export type JobStatus = "PENDING" | "RUNNING" | "CANCELLED" | "COMPLETED" | "FAILED";

export const RECOGNITION_MODES = ["auto", "feature", "ocr", "prescription"] as const;

export type RecognitionMode = (typeof RECOGNITION_MODES)[number];

/** Path actually taken; "auto" resolves to one of these before any work starts. */
export type RecognitionMethod = "feature" | "ocr" | "prescription";

export const TERMINAL_STATES: readonly JobStatus[] = ["CANCELLED", "COMPLETED", "FAILED"];

export const isTerminal = (status: JobStatus): boolean => TERMINAL_STATES.includes(status);

/**
 * Identifies one job instance. A request id can be reused once its job has
 * ended, so workers hold the handle rather than the id.
 */
export interface JobHandle {
  readonly requestId: RequestId;
  readonly generation: number;
}

export interface JobFailure {
  kind: ErrorKind;
  message: string;
}

export interface RecognitionJob {
  requestId: RequestId;
  status: JobStatus;
  mode: RecognitionMode;
  methodUsed: RecognitionMethod | null;
  filters: SearchFilters;
  processed: number;
  total: number;
  created_at: number;
  started_at: number | null;
  last_activity_at: number;
  results: RankedMatch[];
  warnings: JobFailure[];
  error: JobFailure | null;
}

export interface JobProgress {
  status: JobStatus;
  processed: number;
  total: number;
  percent: number;
  methodUsed: RecognitionMethod | null;
  error?: JobFailure;
}

export interface RecognizedDrug {
  drugId: number;
  similarity: number;
  rank: number;
  drug: DrugRecord;
}

export interface RecognizeResponse {
  success: boolean;
  requestId: RequestId;
  status: JobStatus;
  methodUsed: RecognitionMethod | null;
  results: RecognizedDrug[];
  warnings: JobFailure[];
  error?: JobFailure;
}
