/**
 * Mode selection for "auto" requests.
 *
 * Decides between appearance matching and text recognition from two cheap edge
 * statistics. Stateless; thresholds come from configuration.
 */

import { DEFAULT_EDGE_OPTIONS, computeEdgeStats, type EdgeStats } from "../imaging/edges";
import { SharpImageDecoder, type ImageDecoder } from "../imaging/grayscale";

export type SelectedPath = "feature" | "ocr";

export interface ModeThresholds {
  /** T1: fraction of contours that are small */
  textDensity: number;
  /** T2: minimum small-contour count for text */
  textSmallContours: number;
  /** T3: maximum contour count for a single object */
  objectMaxContours: number;
  /** T4: maximum edge density for a single object */
  objectEdgeDensity: number;
}

export interface ModeDecision {
  path: SelectedPath;
  rule: "text" | "object" | "default";
  stats: EdgeStats;
}

export const ANALYSIS_MAX_EDGE = 512;

export function decide(stats: EdgeStats, thresholds: ModeThresholds): ModeDecision {
  if (stats.textDensity > thresholds.textDensity && stats.smallContourCount > thresholds.textSmallContours) {
    return { path: "ocr", rule: "text", stats };
  }
  if (stats.contourCount <= thresholds.objectMaxContours && stats.edgeDensity < thresholds.objectEdgeDensity) {
    return { path: "feature", rule: "object", stats };
  }
  return { path: "feature", rule: "default", stats };
}

export class ModeSelector {
  constructor(
    private readonly thresholds: ModeThresholds,
    private readonly smallContourMaxArea: number = DEFAULT_EDGE_OPTIONS.smallContourMaxArea,
    private readonly decoder: ImageDecoder = new SharpImageDecoder()
  ) {}

  async analyze(imageBytes: Buffer): Promise<ModeDecision> {
    const gray = await this.decoder.decodeGray(imageBytes, { kind: "bounded", maxEdge: ANALYSIS_MAX_EDGE });
    const stats = computeEdgeStats(gray, { ...DEFAULT_EDGE_OPTIONS, smallContourMaxArea: this.smallContourMaxArea });
    return decide(stats, this.thresholds);
  }

  async select(imageBytes: Buffer): Promise<SelectedPath> {
    return (await this.analyze(imageBytes)).path;
  }
}
