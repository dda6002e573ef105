import { config as loadEnv } from "dotenv";
import { z } from "zod";
import os from "node:os";
import path from "path";
import { fileURLToPath } from "url";

const boolFromEnv = (defaultValue: boolean) =>
  z.preprocess((value) => {
    if (typeof value === "boolean") return value;
    if (typeof value === "number") return value !== 0;
    if (typeof value === "string") {
      const normalized = value.trim().toLowerCase();
      if (normalized === "") return undefined;
      if (["true", "1", "yes", "y", "on"].includes(normalized)) return true;
      if (["false", "0", "no", "n", "off"].includes(normalized)) return false;
    }
    return value;
  }, z.boolean().default(defaultValue));

// Load .env from apps/backend directory, regardless of process.cwd()
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const envPath = path.resolve(__dirname, "../.env");
loadEnv({ path: envPath });

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  SQLITE_DB: z.string().default("data/drug_recognition.db"),
  PHOTO_DIR: z.string().default("data/medicine_photos"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace"]).default("info"),
  // Search
  DEFAULT_TOP_K: z.coerce.number().int().positive().default(5),
  MAX_TOP_K: z.coerce.number().int().positive().default(50),
  SEARCH_BATCH_SIZE: z.coerce.number().int().positive().default(200),
  // 0 ⇒ one slot per available CPU core
  WORKER_POOL_SIZE: z.coerce.number().int().nonnegative().default(0),
  // Job lifecycle
  JOB_TTL_MS: z.coerce.number().int().positive().default(10 * 60_000),
  JOB_MAX_DURATION_MS: z.coerce.number().int().positive().default(2 * 60_000),
  JOB_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
  // 0 ⇒ catalog is only rebuilt at startup and through POST /api/catalog/refresh
  CATALOG_REFRESH_INTERVAL_MS: z.coerce.number().int().nonnegative().default(0),
  // Mode selector thresholds (T1..T4), calibrated per deployment
  MODE_TEXT_DENSITY: z.coerce.number().min(0).max(1).default(0.6),
  MODE_TEXT_SMALL_CONTOURS: z.coerce.number().int().nonnegative().default(50),
  MODE_OBJECT_MAX_CONTOURS: z.coerce.number().int().nonnegative().default(10),
  MODE_OBJECT_EDGE_DENSITY: z.coerce.number().min(0).max(1).default(0.1),
  MODE_SMALL_CONTOUR_AREA: z.coerce.number().positive().default(500),
  // Text recognition
  OCR_ENABLED: boolFromEnv(true),
  OCR_LANGS: z.string().default("eng+chi_tra"),
  // Language data from @tesseract.js-data/* is staged here before the worker starts
  OCR_LANG_DIR: z.string().default(path.join(os.tmpdir(), "pillscan-tessdata")),
  OCR_CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),
  // HTTP
  UPLOAD_MAX_BYTES: z.coerce.number().int().positive().default(16 * 1024 * 1024),
  GRACEFUL_SHUTDOWN_MS: z.coerce.number().int().positive().default(10_000),
});

export type RuntimeConfig = ReturnType<typeof toRuntimeConfig>;

function toRuntimeConfig(parsed: z.infer<typeof envSchema>) {
  return {
    port: parsed.PORT,
    sqlitePath: parsed.SQLITE_DB,
    photoDir: parsed.PHOTO_DIR,
    logLevel: parsed.LOG_LEVEL,
    defaultTopK: parsed.DEFAULT_TOP_K,
    maxTopK: parsed.MAX_TOP_K,
    searchBatchSize: parsed.SEARCH_BATCH_SIZE,
    workerPoolSize: parsed.WORKER_POOL_SIZE > 0 ? parsed.WORKER_POOL_SIZE : os.availableParallelism(),
    jobTtlMs: parsed.JOB_TTL_MS,
    jobMaxDurationMs: parsed.JOB_MAX_DURATION_MS,
    jobSweepIntervalMs: parsed.JOB_SWEEP_INTERVAL_MS,
    catalogRefreshIntervalMs: parsed.CATALOG_REFRESH_INTERVAL_MS,
    modeThresholds: {
      textDensity: parsed.MODE_TEXT_DENSITY,
      textSmallContours: parsed.MODE_TEXT_SMALL_CONTOURS,
      objectMaxContours: parsed.MODE_OBJECT_MAX_CONTOURS,
      objectEdgeDensity: parsed.MODE_OBJECT_EDGE_DENSITY,
    },
    smallContourMaxArea: parsed.MODE_SMALL_CONTOUR_AREA,
    ocrEnabled: parsed.OCR_ENABLED,
    ocrLangs: parsed.OCR_LANGS,
    ocrLangDir: parsed.OCR_LANG_DIR,
    ocrConfidenceThreshold: parsed.OCR_CONFIDENCE_THRESHOLD,
    uploadMaxBytes: parsed.UPLOAD_MAX_BYTES,
    gracefulShutdownMs: parsed.GRACEFUL_SHUTDOWN_MS,
  };
}

/**
 * Parse an environment map into runtime settings. Throws a ZodError listing
 * every invalid variable.
 */
export function parseRuntimeConfig(env: NodeJS.ProcessEnv): RuntimeConfig {
  return toRuntimeConfig(envSchema.parse(env));
}

export const runtimeConfig = parseRuntimeConfig(process.env);
