#!/usr/bin/env tsx

/**
 * Compute LBP descriptors for drug images that have none.
 *
 * Usage: npm run backfill:features -- [--limit N] [--concurrency N]
 */

import { pino } from "pino";
import { parseArgs } from "node:util";
import { z } from "zod";
import { runtimeConfig } from "../src/config";
import { openDatabase } from "../src/db/connection";
import { runMigrations } from "../src/db/migrate";
import { CatalogRepository } from "../src/repositories/catalogRepository";
import { backfillFeatures } from "../src/services/featureBackfill";
import { FeatureExtractor } from "../src/services/recognition/featureExtractor";

const logger = pino({
  level: runtimeConfig.logLevel,
});

const argsSchema = z.object({
  limit: z.coerce.number().int().positive().optional(),
  concurrency: z.coerce.number().int().positive().default(runtimeConfig.workerPoolSize),
});

const { values } = parseArgs({
  options: {
    limit: { type: "string" },
    concurrency: { type: "string" },
  },
});
const args = argsSchema.parse(values);

const db = openDatabase(runtimeConfig.sqlitePath);
try {
  runMigrations(db, logger);
  const result = await backfillFeatures(new CatalogRepository(db, logger), new FeatureExtractor(), logger, {
    photoDir: runtimeConfig.photoDir,
    concurrency: args.concurrency,
    limit: args.limit,
  });
  process.exitCode = result.failed > 0 ? 1 : 0;
} finally {
  db.close();
}
