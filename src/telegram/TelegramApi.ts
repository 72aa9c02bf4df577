/**
 * Minimal Telegram Bot API client over global fetch.
 *
 * Every call is a POST to https://api.telegram.org/bot<token>/<method>.
 * JSON bodies for plain calls, multipart (FormData + Blob) when a local
 * photo is uploaded. Failures throw TelegramApiError carrying the HTTP status.
 */

import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import type { InlineKeyboard, ParseMode, TgCallbackQuery, TgMessage, TgUpdate, TgUser } from "./types.js";

const DEFAULT_BASE_URL = "https://api.telegram.org";

export class TelegramApiError extends Error {
  readonly status: number;
  readonly method: string;

  constructor(method: string, status: number, description: string) {
    super(`Telegram ${method} error ${status}: ${description}`);
    this.name = "TelegramApiError";
    this.method = method;
    this.status = status;
  }
}

export type TelegramApiOptions = {
  token: string;
  baseUrl?: string;
  fetch?: typeof fetch;
};

export type SendOptions = {
  parseMode?: ParseMode;
  replyMarkup?: InlineKeyboard;
};

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseUser(value: unknown): TgUser | undefined {
  if (!isRecord(value) || typeof value.id !== "number") return undefined;
  return {
    id: value.id,
    username: typeof value.username === "string" ? value.username : undefined,
    firstName: typeof value.first_name === "string" ? value.first_name : undefined,
  };
}

export function parseMessage(value: unknown): TgMessage | undefined {
  if (!isRecord(value) || typeof value.message_id !== "number") return undefined;
  const chat = value.chat;
  if (!isRecord(chat) || typeof chat.id !== "number") return undefined;
  return {
    messageId: value.message_id,
    chatId: chat.id,
    from: parseUser(value.from),
    text: typeof value.text === "string" ? value.text : undefined,
    caption: typeof value.caption === "string" ? value.caption : undefined,
    hasPhoto: Array.isArray(value.photo) && value.photo.length > 0,
  };
}

function parseCallbackQuery(value: unknown): TgCallbackQuery | undefined {
  if (!isRecord(value) || typeof value.id !== "string") return undefined;
  const from = parseUser(value.from);
  if (!from) return undefined;
  return {
    id: value.id,
    from,
    data: typeof value.data === "string" ? value.data : undefined,
    message: parseMessage(value.message),
  };
}

export function parseUpdates(result: unknown): TgUpdate[] {
  if (!Array.isArray(result)) return [];
  const updates: TgUpdate[] = [];
  for (const item of result) {
    if (!isRecord(item) || typeof item.update_id !== "number") continue;
    updates.push({
      updateId: item.update_id,
      message: parseMessage(item.message),
      callbackQuery: parseCallbackQuery(item.callback_query),
    });
  }
  return updates;
}

async function pngBlob(path: string): Promise<Blob> {
  return new Blob([new Uint8Array(await readFile(path))], { type: "image/png" });
}

export class TelegramApi {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: TelegramApiOptions) {
    this.token = options.token;
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  /** Long poll; resolves with an empty list when the timeout passes quietly */
  async getUpdates(offset: number, timeoutSeconds: number, signal?: AbortSignal): Promise<TgUpdate[]> {
    const result = await this.call(
      "getUpdates",
      { offset, timeout: timeoutSeconds, allowed_updates: ["message", "callback_query"] },
      signal,
    );
    return parseUpdates(result);
  }

  async sendMessage(chatId: number, text: string, options: SendOptions = {}): Promise<number> {
    const result = await this.call("sendMessage", {
      chat_id: chatId,
      text,
      parse_mode: options.parseMode,
      reply_markup: options.replyMarkup,
    });
    return this.messageIdOf("sendMessage", result);
  }

  async sendPhoto(chatId: number, photoPath: string, caption: string, options: SendOptions = {}): Promise<number> {
    const form = new FormData();
    form.append("chat_id", String(chatId));
    form.append("caption", caption);
    if (options.parseMode) form.append("parse_mode", options.parseMode);
    if (options.replyMarkup) form.append("reply_markup", JSON.stringify(options.replyMarkup));
    form.append("photo", await pngBlob(photoPath), basename(photoPath));
    return this.messageIdOf("sendPhoto", await this.call("sendPhoto", form));
  }

  /** Album of local photos, each with its own short caption */
  async sendMediaGroup(chatId: number, photos: Array<{ path: string; caption?: string }>): Promise<void> {
    const form = new FormData();
    form.append("chat_id", String(chatId));
    const media = photos.map((photo, i) => ({ type: "photo", media: `attach://photo${i}`, caption: photo.caption }));
    form.append("media", JSON.stringify(media));
    for (const [i, photo] of photos.entries()) {
      form.append(`photo${i}`, await pngBlob(photo.path), basename(photo.path));
    }
    await this.call("sendMediaGroup", form);
  }

  async answerCallbackQuery(callbackQueryId: string, text?: string): Promise<void> {
    await this.call("answerCallbackQuery", { callback_query_id: callbackQueryId, text });
  }

  async editMessageText(chatId: number, messageId: number, text: string, options: SendOptions = {}): Promise<void> {
    await this.call("editMessageText", {
      chat_id: chatId,
      message_id: messageId,
      text,
      parse_mode: options.parseMode,
      reply_markup: options.replyMarkup,
    });
  }

  async editMessageCaption(chatId: number, messageId: number, caption: string, options: SendOptions = {}): Promise<void> {
    await this.call("editMessageCaption", {
      chat_id: chatId,
      message_id: messageId,
      caption,
      parse_mode: options.parseMode,
      reply_markup: options.replyMarkup,
    });
  }

  private messageIdOf(method: string, result: unknown): number {
    const message = parseMessage(result);
    if (!message) throw new TelegramApiError(method, 200, "response carried no message");
    return message.messageId;
  }

  private async call(method: string, body: Json | FormData, signal?: AbortSignal): Promise<unknown> {
    const init: RequestInit =
      body instanceof FormData
        ? { method: "POST", body, signal }
        : { method: "POST", headers: { "Content-Type": "application/json" }, body: JSON.stringify(body), signal };

    const res = await this.fetchImpl(`${this.baseUrl}/bot${this.token}/${method}`, init);
    const payload: unknown = await res.json().catch(() => undefined);

    if (!res.ok || !isRecord(payload) || payload.ok !== true) {
      const description =
        isRecord(payload) && typeof payload.description === "string" ? payload.description : res.statusText;
      throw new TelegramApiError(method, res.status, description);
    }
    return payload.result;
  }
}
