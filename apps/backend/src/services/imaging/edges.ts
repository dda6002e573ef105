/**
 * Edge statistics for the mode selector.
 *
 * Sobel (L1 magnitude) + hysteresis thresholding stands in for a Canny pass;
 * contours are 8-connected components of edge pixels measured by bounding box.
 */

import type { GrayImage } from "./grayscale";

export interface EdgeOptions {
  lowThreshold: number;
  highThreshold: number;
  smallContourMaxArea: number;
}

export interface EdgeStats {
  edgeDensity: number;
  contourCount: number;
  smallContourCount: number;
  textDensity: number;
}

export const DEFAULT_EDGE_OPTIONS: EdgeOptions = {
  lowThreshold: 50,
  highThreshold: 150,
  smallContourMaxArea: 500,
};

export function sobelMagnitude(image: GrayImage): Float64Array {
  const { data, width, height } = image;
  const out = new Float64Array(width * height);
  for (let y = 1; y < height - 1; y++) {
    for (let x = 1; x < width - 1; x++) {
      const i = y * width + x;
      const tl = data[i - width - 1];
      const tc = data[i - width];
      const tr = data[i - width + 1];
      const ml = data[i - 1];
      const mr = data[i + 1];
      const bl = data[i + width - 1];
      const bc = data[i + width];
      const br = data[i + width + 1];
      const gx = tr + 2 * mr + br - (tl + 2 * ml + bl);
      const gy = bl + 2 * bc + br - (tl + 2 * tc + tr);
      out[i] = Math.abs(gx) + Math.abs(gy);
    }
  }
  return out;
}

/** Strong pixels seed edges; weak pixels survive only when 8-connected to a seed. */
export function hysteresis(magnitude: Float64Array, width: number, height: number, low: number, high: number): Uint8Array {
  const edges = new Uint8Array(width * height);
  const stack: number[] = [];

  for (let i = 0; i < magnitude.length; i++) {
    if (magnitude[i] >= high && edges[i] === 0) {
      edges[i] = 1;
      stack.push(i);
      while (stack.length > 0) {
        const current = stack.pop() ?? 0;
        forEachNeighbour(current, width, height, (n) => {
          if (edges[n] === 0 && magnitude[n] >= low) {
            edges[n] = 1;
            stack.push(n);
          }
        });
      }
    }
  }
  return edges;
}

/** Bounding-box areas of the 8-connected edge components, in scan order. */
export function contourAreas(edges: Uint8Array, width: number, height: number): number[] {
  const visited = new Uint8Array(edges.length);
  const areas: number[] = [];
  const stack: number[] = [];

  for (let i = 0; i < edges.length; i++) {
    if (edges[i] === 0 || visited[i] === 1) continue;

    let minX = width;
    let minY = height;
    let maxX = -1;
    let maxY = -1;
    visited[i] = 1;
    stack.push(i);
    while (stack.length > 0) {
      const current = stack.pop() ?? 0;
      const x = current % width;
      const y = (current - x) / width;
      if (x < minX) minX = x;
      if (x > maxX) maxX = x;
      if (y < minY) minY = y;
      if (y > maxY) maxY = y;
      forEachNeighbour(current, width, height, (n) => {
        if (edges[n] === 1 && visited[n] === 0) {
          visited[n] = 1;
          stack.push(n);
        }
      });
    }
    areas.push((maxX - minX + 1) * (maxY - minY + 1));
  }
  return areas;
}

export function computeEdgeStats(image: GrayImage, options: EdgeOptions = DEFAULT_EDGE_OPTIONS): EdgeStats {
  const { width, height } = image;
  const pixelCount = width * height;
  if (pixelCount === 0) {
    return { edgeDensity: 0, contourCount: 0, smallContourCount: 0, textDensity: 0 };
  }

  const magnitude = sobelMagnitude(image);
  const edges = hysteresis(magnitude, width, height, options.lowThreshold, options.highThreshold);

  let edgePixels = 0;
  for (let i = 0; i < edges.length; i++) {
    edgePixels += edges[i];
  }

  const areas = contourAreas(edges, width, height);
  const smallContourCount = areas.filter((area) => area < options.smallContourMaxArea).length;

  return {
    edgeDensity: edgePixels / pixelCount,
    contourCount: areas.length,
    smallContourCount,
    textDensity: areas.length === 0 ? 0 : smallContourCount / areas.length,
  };
}

function forEachNeighbour(index: number, width: number, height: number, visit: (neighbour: number) => void): void {
  const x = index % width;
  const y = (index - x) / width;
  for (let dy = -1; dy <= 1; dy++) {
    const ny = y + dy;
    if (ny < 0 || ny >= height) continue;
    for (let dx = -1; dx <= 1; dx++) {
      if (dx === 0 && dy === 0) continue;
      const nx = x + dx;
      if (nx < 0 || nx >= width) continue;
      visit(ny * width + nx);
    }
  }
}
