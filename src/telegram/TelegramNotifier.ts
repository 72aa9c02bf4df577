/**
 * TelegramNotifier: the operator channel.
 *
 * Outbound: new-request notifications with Approve / Decline buttons and
 * plain status texts, sent to every admin chat.
 * Inbound: a long-polling loop (getUpdates) handling admin commands and
 * decision button presses. Decisions go straight into the DecisionCache;
 * the scan loop picks them up on its next pass.
 */

import { setTimeout as delay } from "node:timers/promises";
import type { DecisionCache, PendingRequest } from "../cache/DecisionCache.js";
import { createLogger } from "../logging/logger.js";
import type { RunnerState } from "../moderation/RunnerState.js";
import type { OperatorChannel, RequestNotice } from "../moderation/types.js";
import {
  decisionKeyboard,
  decisionRecorded,
  escapeHtml,
  parseCallbackData,
  requestCaption,
  requestIdFor,
} from "./format.js";
import type { TelegramApi } from "./TelegramApi.js";
import type { TgCallbackQuery, TgMessage, TgUpdate } from "./types.js";

const log = createLogger("TelegramNotifier");

const POLL_TIMEOUT_SECONDS = 25;
const POLL_RETRY_MS = 5_000;

export const HELP_TEXT = [
  "📖 <b>Commands</b>",
  "",
  "/status - moderator state",
  "/pause - pause moderation",
  "/resume - resume moderation",
  "/help - this message",
].join("\n");

export type TelegramNotifierDeps = {
  api: TelegramApi;
  adminIds: number[];
  cache: DecisionCache;
  state: RunnerState;
};

export class TelegramNotifier implements OperatorChannel {
  private readonly deps: TelegramNotifierDeps;
  private readonly admins: Set<number>;
  private offset = 0;
  private abort?: AbortController;
  private loop?: Promise<void>;

  constructor(deps: TelegramNotifierDeps) {
    this.deps = deps;
    this.admins = new Set(deps.adminIds);
  }

  get isPolling(): boolean {
    return this.loop !== undefined;
  }

  /** Start the inbound polling loop */
  start(): void {
    if (this.loop) return;
    this.abort = new AbortController();
    this.loop = this.pollLoop(this.abort.signal);
  }

  async stop(): Promise<void> {
    this.abort?.abort();
    await this.loop;
    this.loop = undefined;
    this.abort = undefined;
  }

  async notifyRequest(notice: RequestNotice): Promise<void> {
    const caption = requestCaption(notice);
    const keyboard = decisionKeyboard(requestIdFor(notice.name));
    const { api } = this.deps;

    await this.toEachAdmin(async (chatId) => {
      try {
        if (notice.previewPath) {
          await api.sendMediaGroup(chatId, [
            { path: notice.imagePath, caption: "👤 Request card" },
            { path: notice.previewPath, caption: "📄 Answers preview" },
          ]);
          await api.sendMessage(chatId, caption, { parseMode: "HTML", replyMarkup: keyboard });
        } else {
          await api.sendPhoto(chatId, notice.imagePath, caption, { parseMode: "HTML", replyMarkup: keyboard });
        }
      } catch (err) {
        log.warn("photo send failed, falling back to text", { chatId, name: notice.name, error: err });
        await api.sendMessage(chatId, caption, { parseMode: "HTML", replyMarkup: keyboard });
      }
    });
    log.info("notification sent", { name: notice.name, preview: notice.previewPath !== undefined });
  }

  async sendText(text: string): Promise<void> {
    await this.toEachAdmin((chatId) => this.deps.api.sendMessage(chatId, text).then(() => undefined));
  }

  /** Handle one update. Exposed for the polling loop and tests */
  async handleUpdate(update: TgUpdate): Promise<void> {
    if (update.callbackQuery) {
      await this.handleCallback(update.callbackQuery);
    } else if (update.message?.text?.startsWith("/")) {
      await this.handleCommand(update.message);
    }
  }

  statusText(): string {
    const { cache, state } = this.deps;
    const status = state.paused ? "⏸️ Paused" : state.nightMode ? "🌙 Night pause" : "▶️ Running";
    const lines = [
      "📊 <b>Moderator status</b>",
      "",
      `State: ${status}`,
      `Decisions awaiting execution: ${cache.listPending().length}`,
      `Cached requests: ${cache.size}`,
    ];
    const last = state.lastPass;
    if (last) {
      const clicked = last.clicked.length > 0 ? escapeHtml(last.clicked.join(", ")) : "none";
      lines.push(
        `Last pass: ${last.startedAt}, ${last.cards} cards, ${last.notified} notified, clicked: ${clicked}`,
      );
    }
    return lines.join("\n");
  }

  private async pollLoop(signal: AbortSignal): Promise<void> {
    log.info("polling started");
    while (!signal.aborted) {
      let updates: TgUpdate[];
      try {
        updates = await this.deps.api.getUpdates(this.offset, POLL_TIMEOUT_SECONDS, signal);
      } catch (err) {
        if (signal.aborted) break;
        log.warn("getUpdates failed", { error: err });
        await delay(POLL_RETRY_MS, undefined, { signal }).catch(() => undefined);
        continue;
      }

      for (const update of updates) {
        this.offset = Math.max(this.offset, update.updateId + 1);
        try {
          await this.handleUpdate(update);
        } catch (err) {
          log.error("update handling failed", { updateId: update.updateId, error: err });
        }
      }
    }
    log.info("polling stopped");
  }

  private async handleCommand(message: TgMessage): Promise<void> {
    const { api, state } = this.deps;
    const reply = (text: string) => api.sendMessage(message.chatId, text, { parseMode: "HTML" });

    if (!message.from || !this.admins.has(message.from.id)) {
      log.warn("command from non-admin", { userId: message.from?.id });
      await reply("⛔ Not authorized");
      return;
    }

    const command = (message.text ?? "").split(/\s+/)[0].split("@")[0].toLowerCase();
    switch (command) {
      case "/start":
        await reply(`🤖 <b>Group moderator</b>\n\nUse /help to list the commands.`);
        return;
      case "/help":
        await reply(HELP_TEXT);
        return;
      case "/status":
        await reply(this.statusText());
        return;
      case "/pause":
        await reply(state.pause() ? "⏸️ Moderation paused" : "Already paused");
        log.info("paused by admin", { userId: message.from.id });
        return;
      case "/resume":
        await reply(state.resume() ? "▶️ Moderation resumed" : "Not paused");
        log.info("resumed by admin", { userId: message.from.id });
        return;
      default:
        await reply(`Unknown command ${escapeHtml(command)}\n\n${HELP_TEXT}`);
    }
  }

  private async handleCallback(query: TgCallbackQuery): Promise<void> {
    const { api, cache } = this.deps;

    if (!this.admins.has(query.from.id)) {
      log.warn("callback from non-admin", { userId: query.from.id });
      await api.answerCallbackQuery(query.id, "⛔ Not authorized");
      return;
    }

    const parsed = query.data ? parseCallbackData(query.data) : undefined;
    if (!parsed) {
      await api.answerCallbackQuery(query.id, "Unknown action");
      return;
    }
    await api.answerCallbackQuery(query.id);

    const request = this.findRequest(parsed.requestId);
    const recorded = request ? cache.setDecision(request.name, parsed.action) : false;
    const message = query.message;

    if (!request || !recorded) {
      log.warn("decision for a request no longer cached", { requestId: parsed.requestId });
      if (message) await this.editMessage(message, "⚠️ Request not found.\n\nIt may already have been handled.");
      return;
    }

    log.info("decision recorded", { name: request.name, action: parsed.action, by: query.from.id });
    if (message) await this.editMessage(message, decisionRecorded(request.name, parsed.action));
  }

  private findRequest(requestId: string): PendingRequest | undefined {
    const direct = this.deps.cache.get(requestId);
    if (direct) return direct;
    const hit = this.deps.cache.entries().find(([key]) => requestIdFor(key) === requestId);
    return hit?.[1];
  }

  private async editMessage(message: TgMessage, text: string): Promise<void> {
    const { api } = this.deps;
    if (message.hasPhoto) {
      await api.editMessageCaption(message.chatId, message.messageId, text, { parseMode: "HTML" });
    } else {
      await api.editMessageText(message.chatId, message.messageId, text, { parseMode: "HTML" });
    }
  }

  /** Runs send for every admin chat; throws only when no admin was reached */
  private async toEachAdmin(send: (chatId: number) => Promise<void>): Promise<void> {
    let delivered = 0;
    let lastError: unknown;
    for (const chatId of this.admins) {
      try {
        await send(chatId);
        delivered++;
      } catch (err) {
        lastError = err;
        log.error("send to admin failed", { chatId, error: err });
      }
    }
    if (delivered === 0 && this.admins.size > 0) throw lastError;
  }
}
