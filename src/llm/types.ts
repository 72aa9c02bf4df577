/**
 * Chat-completion types for OpenAI-compatible endpoints (OpenRouter).
 * Keys come from .env and are never logged.
 */

export type ChatRole = "system" | "user" | "assistant";

export type ChatContentPart = { type: "text"; text: string } | { type: "image_url"; image_url: { url: string } };

export type ChatMessage = {
  role: ChatRole;
  content: string | ChatContentPart[];
};

export type ChatRequest = {
  messages: ChatMessage[];
  /** Max tokens for the response */
  maxTokens?: number;
  /** Temperature (0-1); default 0.1 */
  temperature?: number;
};

export type ChatResponse = {
  text: string;
  model: string;
  /** Approximate token counts */
  usage?: { inputTokens: number; outputTokens: number };
};
