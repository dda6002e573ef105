/**
 * Shared test fixtures: silent logger, synthetic images and catalog builders.
 */

import pino, { type Logger } from "pino";
import sharp from "sharp";
import { FEATURE_DIMENSION, type CatalogEntry, type CatalogSnapshot, type FeatureVector } from "../domain/catalog";

export const silentLogger = (): Logger => pino({ level: "silent" });

/** Encode a single-channel raster as PNG; pixel(x, y) returns 0..255. */
export async function grayPng(width: number, height: number, pixel: (x: number, y: number) => number): Promise<Buffer> {
  const raw = Buffer.alloc(width * height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      raw[y * width + x] = pixel(x, y);
    }
  }
  return sharp(raw, { raw: { width, height, channels: 1 } }).png().toBuffer();
}

export const uniformPng = (width: number, height: number, value = 128): Promise<Buffer> =>
  grayPng(width, height, () => value);

/** Unit vector along one histogram bin. */
export function oneHot(bin: number, dimension = FEATURE_DIMENSION): FeatureVector {
  const vector = new Array<number>(dimension).fill(0);
  vector[bin] = 1;
  return vector;
}

/**
 * Two-bin vector whose cosine similarity with oneHot(0) is exactly `score`:
 * [score, sqrt(1 - score²), 0, ...].
 */
export function vectorScoring(score: number, dimension = FEATURE_DIMENSION): FeatureVector {
  const vector = new Array<number>(dimension).fill(0);
  vector[0] = score;
  vector[1] = Math.sqrt(1 - score * score);
  return vector;
}

export function entry(
  drugId: number,
  imageId: number,
  vector: FeatureVector,
  meta: { shape?: string; color?: string } = {}
): CatalogEntry {
  return { drugId, imageId, vector, shape: meta.shape ?? null, color: meta.color ?? null };
}

export function snapshotOf(entries: CatalogEntry[], dimension = FEATURE_DIMENSION): CatalogSnapshot {
  return { version: 1, builtAt: 0, dimension, entries };
}
