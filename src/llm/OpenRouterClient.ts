import type { ChatRequest, ChatResponse } from "./types.js";

const DEFAULT_BASE_URL = "https://openrouter.ai/api/v1";

export class LLMHttpError extends Error {
  readonly status: number;

  constructor(status: number, body: string) {
    super(`OpenRouter error ${status}: ${body}`);
    this.name = "LLMHttpError";
    this.status = status;
  }
}

export type OpenRouterOptions = {
  apiKey: string;
  model: string;
  baseUrl?: string;
  fetch?: typeof fetch;
};

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function firstChoiceText(data: unknown): string {
  if (!isRecord(data) || !Array.isArray(data.choices)) return "";
  const choice: unknown = data.choices[0];
  if (!isRecord(choice) || !isRecord(choice.message)) return "";
  return typeof choice.message.content === "string" ? choice.message.content : "";
}

function usageOf(data: unknown): ChatResponse["usage"] {
  if (!isRecord(data) || !isRecord(data.usage)) return undefined;
  const { prompt_tokens, completion_tokens } = data.usage;
  if (typeof prompt_tokens !== "number" || typeof completion_tokens !== "number") return undefined;
  return { inputTokens: prompt_tokens, outputTokens: completion_tokens };
}

export class OpenRouterClient {
  private readonly options: OpenRouterOptions;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OpenRouterOptions) {
    this.options = options;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  get model(): string {
    return this.options.model;
  }

  async complete(request: ChatRequest): Promise<ChatResponse> {
    const { apiKey, model } = this.options;
    const body = {
      model,
      messages: request.messages,
      max_tokens: request.maxTokens ?? 300,
      temperature: request.temperature ?? 0.1,
    };

    const res = await this.fetchImpl(`${this.options.baseUrl ?? DEFAULT_BASE_URL}/chat/completions`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${apiKey}`,
      },
      body: JSON.stringify(body),
    });

    if (!res.ok) {
      const errorText = await res.text().catch(() => res.statusText);
      throw new LLMHttpError(res.status, errorText);
    }

    const data: unknown = await res.json();
    return { text: firstChoiceText(data), model, usage: usageOf(data) };
  }
}
