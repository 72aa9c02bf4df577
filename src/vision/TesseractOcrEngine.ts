/**
 * OcrEngine over tesseract.js.
 *
 * Tesseract reports whole lines, but a card's action buttons sit side by side
 * on one line. Lines are therefore split into phrases wherever the gap between
 * two words is wide compared to the line height.
 *
 * Traineddata comes from the @tesseract.js-data/<lang> npm packages. The
 * gzipped models are staged into one local directory, because the worker
 * reads every language from a single langPath.
 */

import { copyFile, mkdir, stat } from "node:fs/promises";
import { createRequire } from "node:module";
import { dirname, join } from "node:path";
import { createWorker, OEM, type Worker } from "tesseract.js";
import { createLogger } from "../logging/logger.js";
import type { BoundingBox } from "./geometry.js";
import type { OcrEngine, TextSpan } from "./types.js";

const log = createLogger("Ocr");

/** Word gap, in line heights, that starts a new phrase */
const PHRASE_GAP = 1;

/** Model build tesseract.js 5 loads for the LSTM engine */
const MODEL_VERSION = "4.0.0_best_int";

const require = createRequire(import.meta.url);

export type PackageDirResolver = (lang: string) => string;

export function installedLanguageDir(lang: string): string {
  try {
    return dirname(require.resolve(`@tesseract.js-data/${lang}/package.json`));
  } catch (err) {
    throw new Error(`OCR language "${lang}" is not installed; add @tesseract.js-data/${lang} to dependencies`, {
      cause: err,
    });
  }
}

/** Copy <lang>.traineddata.gz of every language into dir, skipping files already there */
export async function stageLanguageData(
  langs: string,
  dir: string,
  resolveDir: PackageDirResolver = installedLanguageDir,
): Promise<string[]> {
  await mkdir(dir, { recursive: true });
  const staged: string[] = [];
  for (const lang of langs.split("+").filter((l) => l !== "")) {
    const file = `${lang}.traineddata.gz`;
    const target = join(dir, file);
    const present = await stat(target).then(
      (s) => s.size > 0,
      () => false,
    );
    if (!present) {
      await copyFile(join(resolveDir(lang), MODEL_VERSION, file), target);
      staged.push(lang);
    }
  }
  return staged;
}

export type OcrWord = { text: string; confidence: number; bbox: { x0: number; y0: number; x1: number; y1: number } };

function toBox(b: OcrWord["bbox"]): BoundingBox {
  return { x1: b.x0, y1: b.y0, x2: b.x1, y2: b.y1 };
}

function merge(words: OcrWord[]): TextSpan {
  const box = words.map((w) => toBox(w.bbox)).reduce((acc, b) => ({
    x1: Math.min(acc.x1, b.x1),
    y1: Math.min(acc.y1, b.y1),
    x2: Math.max(acc.x2, b.x2),
    y2: Math.max(acc.y2, b.y2),
  }));
  const confidence = words.reduce((sum, w) => sum + w.confidence, 0) / words.length;
  return { text: words.map((w) => w.text).join(" "), box, confidence };
}

/** Split one OCR line into phrases at wide horizontal gaps */
export function groupWords(words: OcrWord[]): TextSpan[] {
  const sorted = words.filter((w) => w.text.trim() !== "").sort((a, b) => a.bbox.x0 - b.bbox.x0);
  if (sorted.length === 0) return [];

  const lineHeight = Math.max(...sorted.map((w) => w.bbox.y1 - w.bbox.y0), 1);
  const phrases: OcrWord[][] = [[sorted[0]]];
  for (const word of sorted.slice(1)) {
    const current = phrases[phrases.length - 1];
    const prev = current[current.length - 1];
    if (word.bbox.x0 - prev.bbox.x1 > PHRASE_GAP * lineHeight) phrases.push([word]);
    else current.push(word);
  }
  return phrases.map(merge);
}

export type TesseractOptions = {
  /** Tesseract language spec, e.g. "ita+eng" */
  langs: string;
  /** Where the traineddata files are staged */
  dataDir: string;
};

export class TesseractOcrEngine implements OcrEngine {
  private readonly langs: string;
  private readonly dataDir: string;
  private worker?: Promise<Worker>;

  constructor(options: TesseractOptions) {
    this.langs = options.langs;
    this.dataDir = options.dataDir;
  }

  private getWorker(): Promise<Worker> {
    if (!this.worker) {
      this.worker = this.startWorker();
    }
    return this.worker;
  }

  private async startWorker(): Promise<Worker> {
    const staged = await stageLanguageData(this.langs, this.dataDir);
    log.info("starting worker", { langs: this.langs, dataDir: this.dataDir, staged: staged.join(",") || "none" });
    return createWorker(this.langs, OEM.LSTM_ONLY, {
      langPath: this.dataDir,
      cacheMethod: "none",
      gzip: true,
    });
  }

  async recognize(image: Buffer | string): Promise<TextSpan[]> {
    const worker = await this.getWorker();
    const { data } = await worker.recognize(image);
    return data.lines.flatMap((line) => groupWords(line.words));
  }

  async close(): Promise<void> {
    const pending = this.worker;
    this.worker = undefined;
    if (pending) await (await pending).terminate();
  }
}
