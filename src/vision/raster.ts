/**
 * Grayscale raster helpers shared by the segmenter, modal crop and fingerprinting.
 *
 * Pixels are one byte each, row-major. Decoding goes through sharp; everything
 * after decoding is plain arithmetic over the buffer.
 */

import sharp from "sharp";

export type GrayImage = {
  width: number;
  height: number;
  /** width * height bytes, row-major */
  data: Uint8Array;
};

export type Rect = { left: number; top: number; width: number; height: number };

export async function decodeGray(input: Buffer | string): Promise<GrayImage> {
  const { data, info } = await sharp(input).grayscale().raw().toBuffer({ resolveWithObject: true });
  // grayscale() can still leave an alpha channel; keep the first channel only
  if (info.channels === 1) {
    return { width: info.width, height: info.height, data: new Uint8Array(data) };
  }
  const out = new Uint8Array(info.width * info.height);
  for (let i = 0; i < out.length; i++) out[i] = data[i * info.channels];
  return { width: info.width, height: info.height, data: out };
}

export function cropGray(image: GrayImage, rect: Rect): GrayImage {
  const left = Math.max(0, Math.min(rect.left, image.width));
  const top = Math.max(0, Math.min(rect.top, image.height));
  const width = Math.max(0, Math.min(rect.width, image.width - left));
  const height = Math.max(0, Math.min(rect.height, image.height - top));
  const data = new Uint8Array(width * height);
  for (let y = 0; y < height; y++) {
    const src = (top + y) * image.width + left;
    data.set(image.data.subarray(src, src + width), y * width);
  }
  return { width, height, data };
}

export type RowStats = { mean: number; std: number };

export function rowStats(image: GrayImage, y: number): RowStats {
  const { width, data } = image;
  if (width === 0) return { mean: 0, std: 0 };
  const offset = y * width;
  let sum = 0;
  let sumSq = 0;
  for (let x = 0; x < width; x++) {
    const v = data[offset + x];
    sum += v;
    sumSq += v * v;
  }
  const mean = sum / width;
  const variance = Math.max(0, sumSq / width - mean * mean);
  return { mean, std: Math.sqrt(variance) };
}

export function columnMeans(image: GrayImage, rowStart: number, rowEnd: number): number[] {
  const means = new Array<number>(image.width).fill(0);
  const rows = rowEnd - rowStart;
  if (rows <= 0) return means;
  for (let y = rowStart; y < rowEnd; y++) {
    const offset = y * image.width;
    for (let x = 0; x < image.width; x++) means[x] += image.data[offset + x];
  }
  return means.map((s) => s / rows);
}
