/**
 * Sharp-based grayscale decoding.
 *
 * Every recognition path works on single-channel 8-bit rasters; this adapter is
 * the only place that touches libvips.
 */

import sharp from "sharp";
import { EmptyImageError, InvalidImageError } from "../../domain/errors";

export interface GrayImage {
  data: Uint8Array;
  width: number;
  height: number;
}

export type ResizeSpec =
  | { kind: "exact"; width: number; height: number }
  | { kind: "bounded"; maxEdge: number };

export interface ImageDecoder {
  decodeGray(bytes: Buffer, resize?: ResizeSpec): Promise<GrayImage>;
}

export class SharpImageDecoder implements ImageDecoder {
  private readonly maxInputPixels = 8192 * 8192; // Safety limit for memory usage

  async decodeGray(bytes: Buffer, resize?: ResizeSpec): Promise<GrayImage> {
    if (bytes.length === 0) {
      throw new InvalidImageError("Image payload is empty");
    }

    let width: number | undefined;
    let height: number | undefined;
    try {
      const metadata = await sharp(bytes, { limitInputPixels: this.maxInputPixels }).metadata();
      width = metadata.width;
      height = metadata.height;
    } catch (error) {
      throw new InvalidImageError(`Failed to decode image: ${describe(error)}`, { cause: error });
    }

    if (!width || !height) {
      throw new EmptyImageError(width ?? 0, height ?? 0);
    }

    let pipeline = sharp(bytes, { limitInputPixels: this.maxInputPixels })
      .rotate() // honour EXIF orientation
      .removeAlpha()
      .greyscale()
      .toColourspace("b-w");

    if (resize?.kind === "exact") {
      pipeline = pipeline.resize(resize.width, resize.height, { fit: "fill" });
    } else if (resize?.kind === "bounded") {
      pipeline = pipeline.resize(resize.maxEdge, resize.maxEdge, { fit: "inside", withoutEnlargement: true });
    }

    try {
      const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
      return {
        data: info.channels === 1 ? new Uint8Array(data) : firstChannel(data, info.channels),
        width: info.width,
        height: info.height,
      };
    } catch (error) {
      throw new InvalidImageError(`Failed to decode image: ${describe(error)}`, { cause: error });
    }
  }
}

const firstChannel = (data: Buffer, channels: number): Uint8Array => {
  const out = new Uint8Array(data.length / channels);
  for (let i = 0; i < out.length; i++) {
    out[i] = data[i * channels];
  }
  return out;
};

const describe = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/** 3×3 Gaussian ([1 2 1] ⊗ [1 2 1] / 16) with replicated borders. */
export function gaussianBlur3x3(image: GrayImage): Float64Array {
  const { data, width, height } = image;
  const out = new Float64Array(width * height);
  const at = (x: number, y: number): number => {
    const cx = x < 0 ? 0 : x >= width ? width - 1 : x;
    const cy = y < 0 ? 0 : y >= height ? height - 1 : y;
    return data[cy * width + cx];
  };

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const sum =
        at(x - 1, y - 1) + 2 * at(x, y - 1) + at(x + 1, y - 1) +
        2 * at(x - 1, y) + 4 * at(x, y) + 2 * at(x + 1, y) +
        at(x - 1, y + 1) + 2 * at(x, y + 1) + at(x + 1, y + 1);
      out[y * width + x] = sum / 16;
    }
  }
  return out;
}
