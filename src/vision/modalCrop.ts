/**
 * Locates the bright, centred preview dialog in a viewport capture and crops it.
 */

import sharp from "sharp";
import { columnMeans, decodeGray, type GrayImage, type Rect } from "./raster.js";

const BRIGHT = 200;
const MIN_ROWS = 50;
const MIN_COLUMNS = 100;
const PADDING = 5;

function stripRowMean(image: GrayImage, y: number, from: number, to: number): number {
  let sum = 0;
  const offset = y * image.width;
  for (let x = from; x < to; x++) sum += image.data[offset + x];
  return sum / Math.max(1, to - from);
}

export function findModalRect(image: GrayImage): Rect | undefined {
  const from = Math.floor(image.width / 3);
  const to = Math.floor((2 * image.width) / 3);

  const rows: number[] = [];
  for (let y = 0; y < image.height; y++) {
    if (stripRowMean(image, y, from, to) > BRIGHT) rows.push(y);
  }
  if (rows.length <= MIN_ROWS) return undefined;
  const y1 = rows[0];
  const y2 = rows[rows.length - 1];

  const columns = columnMeans(image, y1, y2)
    .map((mean, x) => (mean > BRIGHT ? x : -1))
    .filter((x) => x >= 0);
  if (columns.length <= MIN_COLUMNS) return undefined;
  const x1 = columns[0];
  const x2 = columns[columns.length - 1];

  const left = Math.max(0, x1 - PADDING);
  const top = Math.max(0, y1 - PADDING);
  const right = Math.min(image.width, x2 + PADDING);
  const bottom = Math.min(image.height, y2 + PADDING);
  return { left, top, width: right - left, height: bottom - top };
}

/** Writes <name>_modal.png beside the capture; undefined when no dialog is found */
export async function cropModal(imagePath: string): Promise<string | undefined> {
  const rect = findModalRect(await decodeGray(imagePath));
  if (!rect) return undefined;
  const outPath = imagePath.replace(/\.png$/i, "") + "_modal.png";
  await sharp(imagePath).extract(rect).png().toFile(outPath);
  return outPath;
}
