import fs from "node:fs/promises";
import path from "node:path";
import pLimit from "p-limit";
import type { Logger } from "pino";
import type { CatalogRepository } from "../repositories/catalogRepository";
import type { FeatureExtractor } from "./recognition/featureExtractor";

export interface BackfillOptions {
  photoDir: string;
  concurrency?: number;
  /** Stop after this many images; all pending images when omitted. */
  limit?: number;
}

export interface BackfillResult {
  pending: number;
  updated: number;
  failed: number;
}

/**
 * Compute and store descriptors for every drug image that has none yet.
 * Relative image paths resolve against photoDir. Images that cannot be read
 * or decoded are logged and left without a descriptor.
 */
export async function backfillFeatures(
  repo: Pick<CatalogRepository, "listImagesMissingFeatures" | "updateImageFeatures">,
  extractor: Pick<FeatureExtractor, "extract">,
  logger: Logger,
  options: BackfillOptions
): Promise<BackfillResult> {
  const pending = repo.listImagesMissingFeatures();
  const batch = options.limit === undefined ? pending : pending.slice(0, options.limit);
  const limit = pLimit(Math.max(1, options.concurrency ?? 4));
  const result: BackfillResult = { pending: pending.length, updated: 0, failed: 0 };

  logger.info({ pending: pending.length, processing: batch.length }, "Backfilling feature vectors");

  await Promise.all(
    batch.map((image) =>
      limit(async () => {
        const imagePath = path.resolve(options.photoDir, image.image_path);
        try {
          const vector = await extractor.extract(await fs.readFile(imagePath));
          if (repo.updateImageFeatures(image.id, vector)) {
            result.updated++;
          }
        } catch (error) {
          result.failed++;
          logger.warn({ err: error, imageId: image.id, imagePath }, "Could not compute feature vector");
        }
      })
    )
  );

  logger.info(result, "Feature backfill complete");
  return result;
}
