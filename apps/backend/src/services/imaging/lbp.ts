import { FEATURE_DIMENSION } from "../../domain/catalog";

// Clockwise from the top-left neighbour; index = bit position in the code.
const NEIGHBOURS: ReadonlyArray<readonly [dx: number, dy: number]> = [
  [-1, -1],
  [0, -1],
  [1, -1],
  [1, 0],
  [1, 1],
  [0, 1],
  [-1, 1],
  [-1, 0],
];

/**
 * Classic radius-1, 8-point Local Binary Pattern histogram over interior pixels.
 * Bit i of a pixel's code is set when neighbour i is ≥ the centre value.
 * Returns raw counts; rasters smaller than 3×3 have no interior and yield zeros.
 */
export function lbpCounts(pixels: ArrayLike<number>, width: number, height: number): number[] {
  const counts = new Array<number>(FEATURE_DIMENSION).fill(0);
  for (let y = 1; y < height - 1; y++) {
    for (let x = 1; x < width - 1; x++) {
      const centre = pixels[y * width + x];
      let code = 0;
      for (let bit = 0; bit < NEIGHBOURS.length; bit++) {
        const [dx, dy] = NEIGHBOURS[bit];
        if (pixels[(y + dy) * width + (x + dx)] >= centre) {
          code |= 1 << bit;
        }
      }
      counts[code]++;
    }
  }
  return counts;
}

export function normalizeHistogram(counts: readonly number[]): number[] {
  const total = counts.reduce((sum, value) => sum + value, 0);
  if (total === 0) return counts.map(() => 0);
  return counts.map((value) => value / total);
}
