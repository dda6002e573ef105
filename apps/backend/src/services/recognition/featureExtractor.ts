/**
 * Feature extraction: image bytes → normalized LBP texture descriptor.
 *
 * Pipeline: decode → grayscale → 128×128 → 3×3 Gaussian → LBP(8, r=1) → 256-bin
 * histogram normalized to sum 1. No randomness and no shared state, so identical
 * bytes always produce an identical vector.
 */

import { FEATURE_DIMENSION, type FeatureVector } from "../../domain/catalog";
import { EmptyImageError } from "../../domain/errors";
import { gaussianBlur3x3, SharpImageDecoder, type GrayImage, type ImageDecoder } from "../imaging/grayscale";
import { lbpCounts, normalizeHistogram } from "../imaging/lbp";

export const DESCRIPTOR_SIZE = 128;

export class FeatureExtractor {
  readonly dimension = FEATURE_DIMENSION;

  constructor(private readonly decoder: ImageDecoder = new SharpImageDecoder()) {}

  async extract(imageBytes: Buffer): Promise<FeatureVector> {
    const gray = await this.decoder.decodeGray(imageBytes, {
      kind: "exact",
      width: DESCRIPTOR_SIZE,
      height: DESCRIPTOR_SIZE,
    });
    return this.extractFromGray(gray);
  }

  extractFromGray(gray: GrayImage): FeatureVector {
    if (gray.width < 3 || gray.height < 3) {
      throw new EmptyImageError(gray.width, gray.height);
    }
    const smoothed = gaussianBlur3x3(gray);
    return Object.freeze(normalizeHistogram(lbpCounts(smoothed, gray.width, gray.height)));
  }
}
