import type { BoundingBox } from "./geometry.js";

/** One recognized text run, card-local pixels */
export type TextSpan = {
  text: string;
  box: BoundingBox;
  confidence: number;
};

export interface OcrEngine {
  recognize(image: Buffer | string): Promise<TextSpan[]>;
  close(): Promise<void>;
}
