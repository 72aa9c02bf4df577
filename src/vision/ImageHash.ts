/**
 * Perceptual fingerprints for card images.
 *
 * Average hash: shrink to 8x8 grayscale, one bit per pixel set when brighter
 * than the mean, packed row-major into 16 hex characters.
 */

import sharp from "sharp";

const HASH_SIZE = 8;

export async function averageHash(input: Buffer | string): Promise<string> {
  const { data } = await sharp(input)
    .grayscale()
    .resize(HASH_SIZE, HASH_SIZE, { fit: "fill" })
    .raw()
    .toBuffer({ resolveWithObject: true });

  const pixels = HASH_SIZE * HASH_SIZE;
  const channels = data.length / pixels;
  let sum = 0;
  for (let i = 0; i < pixels; i++) sum += data[i * channels];
  const mean = sum / pixels;

  let hex = "";
  for (let nibble = 0; nibble < pixels / 4; nibble++) {
    let value = 0;
    for (let b = 0; b < 4; b++) {
      value = (value << 1) | (data[(nibble * 4 + b) * channels] > mean ? 1 : 0);
    }
    hex += value.toString(16);
  }
  return hex;
}

/** Differing bits between two hex hashes; Infinity when they are not comparable */
export function hammingDistance(a: string, b: string): number {
  if (a.length !== b.length) return Infinity;
  let distance = 0;
  for (let i = 0; i < a.length; i++) {
    const x = Number.parseInt(a[i], 16);
    const y = Number.parseInt(b[i], 16);
    if (Number.isNaN(x) || Number.isNaN(y)) return Infinity;
    let diff = x ^ y;
    while (diff) {
      distance += diff & 1;
      diff >>= 1;
    }
  }
  return distance;
}

/**
 * Closest entry within threshold; the first one wins a tie.
 * A threshold of 0 disables matching.
 */
export function closestFingerprint<T>(
  hash: string,
  entries: Iterable<readonly [string, T]>,
  threshold: number,
): { value: T; distance: number } | undefined {
  if (threshold <= 0) return undefined;
  let best: { value: T; distance: number } | undefined;
  for (const [candidate, value] of entries) {
    const distance = hammingDistance(hash, candidate);
    if (distance <= threshold && (!best || distance < best.distance)) best = { value, distance };
  }
  return best;
}
