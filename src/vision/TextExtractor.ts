/**
 * TextExtractor: identity, extra info, action buttons and flags from the
 * OCR spans of one card.
 *
 * The heuristics (analyzeSpans) are pure. TextExtractor wraps them around an
 * OcrEngine and adds the crop-to-text helper used for notification images.
 */

import sharp from "sharp";
import { boxCenter, cardPoint, type BoundingBox, type CardPoint } from "./geometry.js";
import type { OcrEngine, TextSpan } from "./types.js";

export type ActionKind = "approve" | "decline";

export type ActionButtons = Partial<Record<ActionKind, CardPoint>>;

export type ExtractorLabels = {
  approve: string[];
  decline: string[];
  /** Captions that never belong in operator-facing text */
  uiNoise: string[];
  /** Phrases shown when the applicant skipped the membership questions */
  unanswered: string[];
  preview: string[];
};

export const DEFAULT_LABELS: ExtractorLabels = {
  approve: ["approva", "approve"],
  decline: ["rifiuta", "decline"],
  uiNoise: ["approva", "rifiuta", "invia messaggio", "richiesta"],
  unanswered: ["non ha ancora risposto", "in attesa della risposta"],
  preview: ["anteprima"],
};

/** The link is the tail of a sentence; click this far left of its right edge */
const PREVIEW_RIGHT_INSET = 35;
/** Extra characters a span may carry and still count as the bare preview label */
const PREVIEW_EXACT_SLACK = 3;

export type CardExtraction = {
  identity?: string;
  extraInfo: string;
  buttons: ActionButtons;
  unanswered: boolean;
  preview?: CardPoint;
  /** Spans in reading order */
  spans: TextSpan[];
};

function centerY(span: TextSpan): number {
  return (span.box.y1 + span.box.y2) / 2;
}

export function readingOrder(spans: TextSpan[]): TextSpan[] {
  return [...spans].sort((a, b) => centerY(a) - centerY(b) || a.box.x1 - b.box.x1);
}

const lower = (span: TextSpan): string => span.text.toLowerCase();

const containsAny = (text: string, needles: string[]): boolean => needles.some((n) => text.includes(n));

function findButton(spans: TextSpan[], labels: string[]): CardPoint | undefined {
  const hit = spans.find((s) => containsAny(lower(s), labels));
  return hit ? boxCenter(hit.box) : undefined;
}

function findPreview(spans: TextSpan[], labels: string[]): CardPoint | undefined {
  const standalone = spans.find((s) => {
    const text = lower(s).trim();
    return labels.some((l) => text.includes(l) && text.length <= l.length + PREVIEW_EXACT_SLACK);
  });
  const hit = standalone ?? spans.find((s) => containsAny(lower(s), labels));
  if (!hit) return undefined;
  const x = Math.max(hit.box.x1, hit.box.x2 - PREVIEW_RIGHT_INSET);
  return cardPoint(x, Math.trunc((hit.box.y1 + hit.box.y2) / 2));
}

export function analyzeSpans(raw: TextSpan[], labels: ExtractorLabels = DEFAULT_LABELS): CardExtraction {
  const spans = readingOrder(raw);
  const substantial = spans.filter((s) => s.text.trim().length >= 2);
  const identitySpan = substantial[0];

  const extraInfo = substantial
    .filter((s) => s !== identitySpan && !containsAny(lower(s), labels.uiNoise))
    .map((s) => s.text.trim())
    .join("\n");

  const buttons: ActionButtons = {};
  const approve = findButton(spans, labels.approve);
  const decline = findButton(spans, labels.decline);
  if (approve) buttons.approve = approve;
  if (decline) buttons.decline = decline;

  return {
    identity: identitySpan?.text.trim(),
    extraInfo,
    buttons,
    unanswered: spans.some((s) => containsAny(lower(s), labels.unanswered)),
    preview: findPreview(spans, labels.preview),
    spans,
  };
}

/** Union of the text boxes, button captions excluded */
export function textBounds(spans: TextSpan[], labels: ExtractorLabels = DEFAULT_LABELS): BoundingBox | undefined {
  const buttonLabels = [...labels.approve, ...labels.decline];
  const boxes = spans.filter((s) => !containsAny(lower(s), buttonLabels)).map((s) => s.box);
  if (boxes.length === 0) return undefined;
  return {
    x1: Math.min(...boxes.map((b) => b.x1)),
    y1: Math.min(...boxes.map((b) => b.y1)),
    x2: Math.max(...boxes.map((b) => b.x2)),
    y2: Math.max(...boxes.map((b) => b.y2)),
  };
}

export class TextExtractor {
  private readonly ocr: OcrEngine;
  private readonly labels: ExtractorLabels;

  constructor(ocr: OcrEngine, labels: Partial<ExtractorLabels> = {}) {
    this.ocr = ocr;
    this.labels = { ...DEFAULT_LABELS, ...labels };
  }

  async extract(imagePath: string): Promise<CardExtraction> {
    return analyzeSpans(await this.ocr.recognize(imagePath), this.labels);
  }

  /** First span on this pass whose text carries the action's label */
  locateAction(spans: TextSpan[], action: ActionKind): CardPoint | undefined {
    return findButton(spans, this.labels[action]);
  }

  /**
   * Crop a card image to its text plus padding and write it to outPath.
   * Returns the source path unchanged when there is no text to crop to.
   */
  async cropToText(imagePath: string, spans: TextSpan[], outPath: string, padding = 20): Promise<string> {
    const bounds = textBounds(spans, this.labels);
    if (!bounds) return imagePath;

    const meta = await sharp(imagePath).metadata();
    const width = meta.width ?? 0;
    const height = meta.height ?? 0;
    const left = Math.max(0, bounds.x1 - padding);
    const top = Math.max(0, bounds.y1 - padding);
    const right = Math.min(width, bounds.x2 + padding);
    const bottom = Math.min(height, bounds.y2 + padding);
    if (right <= left || bottom <= top) return imagePath;

    await sharp(imagePath)
      .extract({ left, top, width: right - left, height: bottom - top })
      .png()
      .toFile(outPath);
    return outPath;
  }
}
