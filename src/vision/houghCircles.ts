/**
 * Circle detection over a grayscale raster, used to find avatar discs when a
 * page render has no usable separator strips.
 *
 * Gradient-direction Hough: every Sobel edge point votes for centres along
 * its gradient at each candidate radius, peaks are checked against the edge
 * map by sampling the circle, then thinned by a minimum centre distance.
 */

import type { GrayImage } from "./raster.js";

export type Circle = { x: number; y: number; r: number };

export type HoughOptions = {
  minRadius: number;
  maxRadius: number;
  /** Minimum distance between accepted centres */
  minDistance: number;
  /** Sobel magnitude above which a pixel counts as an edge */
  edgeThreshold: number;
  /** Votes (3x3 neighbourhood sum) a centre needs to become a candidate */
  minVotes: number;
  /** Share of sampled circumference that must land on edges, 0..1 */
  minCoverage: number;
  maxCandidates: number;
};

export const DEFAULT_HOUGH_OPTIONS: HoughOptions = {
  minRadius: 20,
  maxRadius: 50,
  minDistance: 100,
  edgeThreshold: 100,
  minVotes: 40,
  minCoverage: 0.6,
  maxCandidates: 500,
};

const SAMPLE_ANGLES = 64;

type EdgeMap = { width: number; height: number; edges: Uint8Array; gx: Float32Array; gy: Float32Array; mag: Float32Array };

function sobel(image: GrayImage, threshold: number): EdgeMap {
  const { width, height, data } = image;
  const size = width * height;
  const edges = new Uint8Array(size);
  const gx = new Float32Array(size);
  const gy = new Float32Array(size);
  const mag = new Float32Array(size);

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

      const dx = tr + 2 * mr + br - tl - 2 * ml - bl;
      const dy = bl + 2 * bc + br - tl - 2 * tc - tr;
      const m = Math.sqrt(dx * dx + dy * dy);
      gx[i] = dx;
      gy[i] = dy;
      mag[i] = m;
      if (m > threshold) edges[i] = 1;
    }
  }
  return { width, height, edges, gx, gy, mag };
}

function accumulate(map: EdgeMap, opts: HoughOptions): Uint32Array {
  const { width, height, edges, gx, gy, mag } = map;
  const acc = new Uint32Array(width * height);

  for (let i = 0; i < edges.length; i++) {
    if (!edges[i]) continue;
    const x = i % width;
    const y = (i - x) / width;
    const ux = gx[i] / mag[i];
    const uy = gy[i] / mag[i];
    for (let r = opts.minRadius; r <= opts.maxRadius; r++) {
      for (const sign of [-1, 1]) {
        const cx = Math.round(x + sign * r * ux);
        const cy = Math.round(y + sign * r * uy);
        if (cx < 0 || cy < 0 || cx >= width || cy >= height) continue;
        acc[cy * width + cx] += 1;
      }
    }
  }
  return acc;
}

function boxSum(acc: Uint32Array, width: number, height: number): Uint32Array {
  const out = new Uint32Array(acc.length);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let sum = 0;
      for (let dy = -1; dy <= 1; dy++) {
        const yy = y + dy;
        if (yy < 0 || yy >= height) continue;
        for (let dx = -1; dx <= 1; dx++) {
          const xx = x + dx;
          if (xx < 0 || xx >= width) continue;
          sum += acc[yy * width + xx];
        }
      }
      out[y * width + x] = sum;
    }
  }
  return out;
}

type Candidate = { x: number; y: number; score: number };

function localMaxima(score: Uint32Array, width: number, height: number, opts: HoughOptions): Candidate[] {
  const out: Candidate[] = [];
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const s = score[y * width + x];
      if (s < opts.minVotes) continue;
      let isMax = true;
      for (let dy = -2; dy <= 2 && isMax; dy++) {
        const yy = y + dy;
        if (yy < 0 || yy >= height) continue;
        for (let dx = -2; dx <= 2; dx++) {
          const xx = x + dx;
          if (xx < 0 || xx >= width || (dx === 0 && dy === 0)) continue;
          if (score[yy * width + xx] > s) {
            isMax = false;
            break;
          }
        }
      }
      if (isMax) out.push({ x, y, score: s });
    }
  }
  out.sort((a, b) => b.score - a.score);
  return out.slice(0, opts.maxCandidates);
}

function nearEdge(map: EdgeMap, x: number, y: number): boolean {
  for (let dy = -1; dy <= 1; dy++) {
    const yy = y + dy;
    if (yy < 0 || yy >= map.height) continue;
    for (let dx = -1; dx <= 1; dx++) {
      const xx = x + dx;
      if (xx < 0 || xx >= map.width) continue;
      if (map.edges[yy * map.width + xx]) return true;
    }
  }
  return false;
}

/** Best radius for a centre, or undefined when no radius reaches minCoverage */
function verify(map: EdgeMap, c: Candidate, opts: HoughOptions): number | undefined {
  let bestR: number | undefined;
  let bestCoverage = 0;
  for (let r = opts.minRadius; r <= opts.maxRadius; r++) {
    let hits = 0;
    for (let k = 0; k < SAMPLE_ANGLES; k++) {
      const theta = (2 * Math.PI * k) / SAMPLE_ANGLES;
      const sx = Math.round(c.x + r * Math.cos(theta));
      const sy = Math.round(c.y + r * Math.sin(theta));
      if (nearEdge(map, sx, sy)) hits++;
    }
    const coverage = hits / SAMPLE_ANGLES;
    if (coverage >= opts.minCoverage && coverage > bestCoverage) {
      bestCoverage = coverage;
      bestR = r;
    }
  }
  return bestR;
}

/** Detected circles, ordered top to bottom */
export function detectCircles(image: GrayImage, options: Partial<HoughOptions> = {}): Circle[] {
  const opts = { ...DEFAULT_HOUGH_OPTIONS, ...options };
  if (image.width < 3 || image.height < 3) return [];

  const map = sobel(image, opts.edgeThreshold);
  const score = boxSum(accumulate(map, opts), image.width, image.height);
  const candidates = localMaxima(score, image.width, image.height, opts);

  const kept: Circle[] = [];
  for (const c of candidates) {
    const tooClose = kept.some((k) => Math.hypot(k.x - c.x, k.y - c.y) < opts.minDistance);
    if (tooClose) continue;
    const r = verify(map, c, opts);
    if (r !== undefined) kept.push({ x: c.x, y: c.y, r });
  }
  return kept.sort((a, b) => a.y - b.y || a.x - b.x);
}
