export { LLMHttpError, OpenRouterClient } from "./OpenRouterClient.js";
export type { OpenRouterOptions } from "./OpenRouterClient.js";
export type { ChatContentPart, ChatMessage, ChatRequest, ChatResponse, ChatRole } from "./types.js";
