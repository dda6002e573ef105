/**
 * AppContext: composition root for the recognition backend.
 *
 * Wires configuration, persistence, the catalog cache, the recognition pipeline
 * and background jobs. server.ts stays a thin HTTP adapter on top of this.
 */

import pino, { type Logger } from "pino";
import type { Database } from "better-sqlite3";

import { runtimeConfig, type RuntimeConfig } from "../config";
import { openDatabase } from "../db/connection";
import { runMigrations } from "../db/migrate";
import { EmptyCatalogError } from "../domain/errors";
import { CatalogRepository } from "../repositories/catalogRepository";
import { HousekeepingJob } from "../services/housekeepingJob";
import { TesseractTextRecognizer, type TextRecognizer } from "../services/ocr/textRecognizer";
import { CatalogCache } from "../services/recognition/catalogCache";
import { FeatureExtractor } from "../services/recognition/featureExtractor";
import { JobCoordinator } from "../services/recognition/jobCoordinator";
import { ModeSelector } from "../services/recognition/modeSelector";
import { RecognitionService } from "../services/recognition/recognitionService";
import { SimilaritySearchEngine } from "../services/recognition/similaritySearch";

export { runtimeConfig };

export interface AppContext {
  config: RuntimeConfig;
  logger: Logger;
  db: Database;
  catalogRepo: CatalogRepository;
  catalog: CatalogCache;
  coordinator: JobCoordinator;
  textRecognizer: TextRecognizer | null;
  recognition: RecognitionService;
  housekeeping: HousekeepingJob;

  // Shutdown state and helpers
  isShuttingDown: () => boolean;
  setShuttingDown: (value: boolean) => void;
}

// -----------------------------------------------------------------------------
// Logger factory
// -----------------------------------------------------------------------------

export function createLogger(level: string = runtimeConfig.logLevel): Logger {
  const destination = pino.destination({ sync: process.env.NODE_ENV !== "production" });
  destination.on("error", (err: NodeJS.ErrnoException) => {
    if (err?.code === "EINTR") return;
    console.error("pino destination error", err);
  });
  return pino({ level }, destination);
}

// -----------------------------------------------------------------------------
// Catalog bootstrap
// -----------------------------------------------------------------------------

/**
 * Load the first catalog snapshot. An empty catalog is allowed (every search
 * then comes back with no matches) but is logged loudly.
 */
export async function loadCatalog(catalog: CatalogCache, logger: Logger): Promise<void> {
  await catalog.build();
  try {
    catalog.requireEntries();
  } catch (error) {
    if (!(error instanceof EmptyCatalogError)) throw error;
    logger.warn("Catalog has no drug images with feature vectors; run backfill:features to populate it");
  }
}

export async function createContext(
  config: RuntimeConfig = runtimeConfig,
  logger: Logger = createLogger(config.logLevel)
): Promise<AppContext> {
  const db = openDatabase(config.sqlitePath);
  logger.info({ sqlitePath: config.sqlitePath }, "Database opened");
  runMigrations(db, logger);

  // Persistence and catalog snapshot
  const catalogRepo = new CatalogRepository(db, logger);
  const catalog = new CatalogCache(catalogRepo, logger);
  await loadCatalog(catalog, logger);

  // Recognition pipeline
  const coordinator = new JobCoordinator({ ttlMs: config.jobTtlMs, maxDurationMs: config.jobMaxDurationMs });
  coordinator.on("job:purged", (event: { requestId: string; status: string }) => {
    logger.debug(event, "Recognition job purged");
  });

  const textRecognizer = config.ocrEnabled
    ? new TesseractTextRecognizer({ langs: config.ocrLangs, langDir: config.ocrLangDir }, logger)
    : null;
  const recognition = new RecognitionService(
    {
      coordinator,
      catalog,
      source: catalogRepo,
      extractor: new FeatureExtractor(),
      search: new SimilaritySearchEngine(config.searchBatchSize),
      modeSelector: new ModeSelector(config.modeThresholds, config.smallContourMaxArea),
      textRecognizer,
      logger,
    },
    {
      poolSize: config.workerPoolSize,
      defaultTopK: config.defaultTopK,
      maxTopK: config.maxTopK,
      ocrConfidenceThreshold: config.ocrConfidenceThreshold,
    }
  );
  logger.info(
    { poolSize: config.workerPoolSize, ocrEnabled: config.ocrEnabled, batchSize: config.searchBatchSize },
    "Recognition service ready"
  );

  const housekeeping = new HousekeepingJob(coordinator, catalog, logger, {
    intervalMs: config.jobSweepIntervalMs,
    catalogRefreshMs: config.catalogRefreshIntervalMs,
  });

  let shuttingDown = false;

  return {
    config,
    logger,
    db,
    catalogRepo,
    catalog,
    coordinator,
    textRecognizer,
    recognition,
    housekeeping,
    isShuttingDown: () => shuttingDown,
    setShuttingDown: (value: boolean) => {
      shuttingDown = value;
    },
  };
}
