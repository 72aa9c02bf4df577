/**
 * CardSegmenter: splits a full-page render of the requests queue into cards.
 *
 * Primary heuristic: near-uniform light-gray row strips between cards.
 * Fallbacks, in order: avatar circles, then equal-height bands.
 * Everything up to the span list is pure (segmentGray); segment() adds
 * decoding and writes one PNG per card.
 */

import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import sharp from "sharp";
import { createLogger } from "../logging/logger.js";
import { detectCircles, type HoughOptions } from "./houghCircles.js";
import { cropGray, decodeGray, rowStats, type GrayImage } from "./raster.js";

const log = createLogger("CardSegmenter");

export type SegmenterOptions = {
  /** Fixed left navigation column */
  sidebarWidth: number;
  /** Page header plus filter bar */
  headerHeight: number;
  minCardHeight: number;
  maxCardHeight: number;
  separatorMaxStd: number;
  separatorMinMean: number;
  separatorMaxMean: number;
  /** Separator rows at most this far apart merge into one region */
  mergeGap: number;
  minSeparatorThickness: number;
  /** Card top sits this far above its avatar centre */
  avatarTopMargin: number;
  fallbackBands: number;
  /** A content region whose row means all lie within this spread, with flat rows, is empty */
  uniformMeanSpread: number;
  hough: Partial<HoughOptions>;
};

export const DEFAULT_SEGMENTER_OPTIONS: SegmenterOptions = {
  sidebarWidth: 360,
  headerHeight: 56 + 220,
  minCardHeight: 100,
  maxCardHeight: 500,
  separatorMaxStd: 15,
  separatorMinMean: 200,
  separatorMaxMean: 245,
  mergeGap: 10,
  minSeparatorThickness: 5,
  avatarTopMargin: 50,
  fallbackBands: 5,
  uniformMeanSpread: 4,
  hough: {},
};

/** Inclusive row range */
export type SeparatorRegion = { start: number; end: number };

/** Half-open row range [start, end) in content-region rows */
export type Span = { start: number; end: number };

export type SegmentationMethod = "separators" | "avatars" | "bands" | "empty";

export type Segmentation = {
  method: SegmentationMethod;
  /** Page-space row ranges, top to bottom */
  spans: Span[];
};

export type Card = {
  index: number;
  /** Page-space rows [top, bottom) */
  top: number;
  bottom: number;
  /** Page-space column of the card's left edge */
  left: number;
  width: number;
  height: number;
  imagePath: string;
};

export function findSeparators(content: GrayImage, opts: SegmenterOptions): SeparatorRegion[] {
  const regions: SeparatorRegion[] = [];
  let current: SeparatorRegion | undefined;

  for (let y = 0; y < content.height; y++) {
    const { mean, std } = rowStats(content, y);
    const isSeparator = std < opts.separatorMaxStd && mean > opts.separatorMinMean && mean < opts.separatorMaxMean;
    if (!isSeparator) continue;

    if (current && y - current.end <= opts.mergeGap) {
      current.end = y;
    } else {
      if (current) regions.push(current);
      current = { start: y, end: y };
    }
  }
  if (current) regions.push(current);

  return regions.filter((r) => r.end - r.start >= opts.minSeparatorThickness);
}

function spansBetweenSeparators(separators: SeparatorRegion[], height: number, minHeight: number): Span[] {
  const spans: Span[] = [];
  const first = separators[0];
  const last = separators[separators.length - 1];

  if (first.start > minHeight) spans.push({ start: 0, end: first.start });

  for (let i = 0; i < separators.length - 1; i++) {
    const start = separators[i].end + 1;
    const end = separators[i + 1].start;
    if (end - start >= minHeight) spans.push({ start, end });
  }

  if (height - last.end > minHeight) spans.push({ start: last.end + 1, end: height });
  return spans;
}

function spansFromAvatars(content: GrayImage, opts: SegmenterOptions): Span[] {
  const circles = detectCircles(content, opts.hough);
  const starts = circles.map((c) => Math.max(0, c.y - opts.avatarTopMargin));
  const spans: Span[] = [];
  for (let i = 0; i < starts.length; i++) {
    const start = starts[i];
    const end = i + 1 < starts.length ? starts[i + 1] : Math.min(start + opts.maxCardHeight, content.height);
    if (end - start >= opts.minCardHeight) spans.push({ start, end });
  }
  return spans;
}

function equalBands(height: number, opts: SegmenterOptions): Span[] {
  const band = Math.floor(height / opts.fallbackBands);
  const spans: Span[] = [];
  for (let i = 0; i < opts.fallbackBands; i++) {
    const start = i * band;
    const end = i === opts.fallbackBands - 1 ? height : start + band;
    if (end - start >= opts.minCardHeight) spans.push({ start, end });
  }
  return spans;
}

function isUniform(content: GrayImage, opts: SegmenterOptions): boolean {
  let min = Infinity;
  let max = -Infinity;
  for (let y = 0; y < content.height; y++) {
    const { mean, std } = rowStats(content, y);
    if (std >= opts.separatorMaxStd) return false;
    if (mean < min) min = mean;
    if (mean > max) max = mean;
  }
  return max - min <= opts.uniformMeanSpread;
}

/** Pure segmentation of a decoded full-page render */
export function segmentGray(page: GrayImage, options: Partial<SegmenterOptions> = {}): Segmentation {
  const opts = { ...DEFAULT_SEGMENTER_OPTIONS, ...options };
  const content = cropGray(page, {
    left: opts.sidebarWidth,
    top: opts.headerHeight,
    width: page.width - opts.sidebarWidth,
    height: page.height - opts.headerHeight,
  });

  const toPage = (spans: Span[]): Span[] =>
    spans.map((s) => ({ start: s.start + opts.headerHeight, end: s.end + opts.headerHeight }));

  if (content.width === 0 || content.height === 0 || isUniform(content, opts)) {
    return { method: "empty", spans: [] };
  }

  const separators = findSeparators(content, opts);
  if (separators.length >= 2) {
    return { method: "separators", spans: toPage(spansBetweenSeparators(separators, content.height, opts.minCardHeight)) };
  }

  log.warn("separator heuristic found too few regions, trying avatars", { separators: separators.length });
  const avatarSpans = spansFromAvatars(content, opts);
  if (avatarSpans.length > 0) return { method: "avatars", spans: toPage(avatarSpans) };

  log.warn("no avatars detected, dividing into equal bands", { bands: opts.fallbackBands });
  return { method: "bands", spans: toPage(equalBands(content.height, opts)) };
}

export class CardSegmenter {
  private readonly options: SegmenterOptions;

  constructor(options: Partial<SegmenterOptions> = {}) {
    this.options = { ...DEFAULT_SEGMENTER_OPTIONS, ...options };
  }

  /** Segment a PNG render and write each card to outDir as card_<i>.png */
  async segment(png: Buffer, outDir: string): Promise<Card[]> {
    const gray = await decodeGray(png);
    const { method, spans } = segmentGray(gray, this.options);
    const width = gray.width - this.options.sidebarWidth;
    if (spans.length === 0 || width <= 0) {
      log.info("no cards in render", { method });
      return [];
    }

    await mkdir(outDir, { recursive: true });
    const cards: Card[] = [];
    for (const [index, span] of spans.entries()) {
      const height = span.end - span.start;
      const imagePath = join(outDir, `card_${index}.png`);
      await sharp(png)
        .extract({ left: this.options.sidebarWidth, top: span.start, width, height })
        .png()
        .toFile(imagePath);
      cards.push({ index, top: span.start, bottom: span.end, left: this.options.sidebarWidth, width, height, imagePath });
    }

    log.info("segmented render", { method, cards: cards.length });
    return cards;
  }
}
