/**
 * Asks a vision model whether a click marker sits on the intended element.
 * Diagnostic only: the answer is logged and returned, never acted on.
 */

import { readFile } from "node:fs/promises";
import type { OpenRouterClient } from "../llm/OpenRouterClient.js";
import { createLogger } from "../logging/logger.js";

const log = createLogger("ClickValidator");

export type Verdict = "yes" | "no" | "unclear";

export type Validation = { verdict: Verdict; explanation: string };

export function parseVerdict(answer: string): Validation {
  const text = answer.trim();
  const verdict: Verdict = /^yes\b/i.test(text) ? "yes" : /^no\b/i.test(text) ? "no" : "unclear";
  return { verdict, explanation: text };
}

export class ClickValidator {
  private readonly client: OpenRouterClient;

  constructor(client: OpenRouterClient) {
    this.client = client;
  }

  async validate(overlayPath: string, target: string): Promise<Validation> {
    const image = (await readFile(overlayPath)).toString("base64");
    const response = await this.client.complete({
      messages: [
        {
          role: "system",
          content: "You check screenshots of a web page before an automated click. Answer YES or NO first, then one short sentence.",
        },
        {
          role: "user",
          content: [
            {
              type: "text",
              text: `A red cross inside a red circle marks where the click will land. Is the marker on the "${target}" element?`,
            },
            { type: "image_url", image_url: { url: `data:image/png;base64,${image}` } },
          ],
        },
      ],
      maxTokens: 120,
    });

    const result = parseVerdict(response.text);
    const fields = { target, verdict: result.verdict, model: response.model, answer: result.explanation };
    if (result.verdict === "yes") log.info("click target confirmed", fields);
    else log.warn("click target not confirmed", fields);
    return result;
  }
}
