/**
 * Builds a ScanOrchestrator from configuration: segmenter, OCR-backed
 * extractor, average-hash fingerprints, preview capture and, when enabled,
 * the click overlay with optional model validation.
 */

import type { PageRenderer, Pointer } from "../browser/index.js";
import type { DecisionCache } from "../cache/DecisionCache.js";
import type { ModeratorConfig } from "../config/config.js";
import { ClickOverlay } from "../debug/ClickOverlay.js";
import { ClickValidator } from "../debug/ClickValidator.js";
import { OpenRouterClient } from "../llm/index.js";
import { createLogger } from "../logging/logger.js";
import { CardSegmenter } from "../vision/CardSegmenter.js";
import { averageHash } from "../vision/ImageHash.js";
import { TextExtractor } from "../vision/TextExtractor.js";
import type { OcrEngine } from "../vision/types.js";
import { PreviewCapturer } from "./PreviewCapturer.js";
import { ScanOrchestrator } from "./ScanOrchestrator.js";
import type { OperatorChannel } from "./types.js";

const log = createLogger("Pipeline");

export type PipelineDeps = {
  config: ModeratorConfig;
  renderer: PageRenderer;
  pointer: Pointer;
  cache: DecisionCache;
  channel: OperatorChannel;
  ocr: OcrEngine;
  /** Open answer previews for new requests (default true) */
  previews?: boolean;
};

function createValidator(config: ModeratorConfig): ClickValidator | undefined {
  const { aiValidation, openRouterApiKey, openRouterModel, openRouterBaseUrl } = config.debug;
  if (!aiValidation) return undefined;
  if (!openRouterApiKey) {
    log.warn("DEBUG_AI_VALIDATION is on but OPENROUTER_API_KEY is missing, validation disabled");
    return undefined;
  }
  return new ClickValidator(
    new OpenRouterClient({ apiKey: openRouterApiKey, model: openRouterModel, baseUrl: openRouterBaseUrl }),
  );
}

export function createScanOrchestrator(deps: PipelineDeps): ScanOrchestrator {
  const { config, renderer, pointer, cache, channel, ocr } = deps;
  const screenshotsDir = config.paths.screenshotsDir;

  const observer = config.debug.clickOverlay
    ? new ClickOverlay({ renderer, outDir: screenshotsDir, validator: createValidator(config) })
    : undefined;
  const previews =
    deps.previews === false ? undefined : new PreviewCapturer({ renderer, pointer, screenshotsDir, observer });

  return new ScanOrchestrator({
    renderer,
    pointer,
    segmenter: new CardSegmenter(),
    extractor: new TextExtractor(ocr),
    fingerprint: averageHash,
    cache,
    channel,
    screenshotsDir,
    previews,
    observer,
  });
}
