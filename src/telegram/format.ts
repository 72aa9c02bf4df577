import type { RequestNotice } from "../moderation/types.js";
import { identityKey } from "../cache/DecisionCache.js";
import type { ActionKind } from "../vision/TextExtractor.js";
import type { InlineKeyboard } from "./types.js";

/** Bot API limit on callback_data, in bytes */
const CALLBACK_DATA_LIMIT = 64;
const CALLBACK_PREFIX_BYTES = "decline:".length;
/** Photo captions are capped at 1024 characters */
const MAX_EXTRA_INFO = 600;

export function escapeHtml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

/** Identity key cut to whole characters so the callback data stays within the limit */
export function requestIdFor(name: string): string {
  const budget = CALLBACK_DATA_LIMIT - CALLBACK_PREFIX_BYTES;
  let id = "";
  for (const char of identityKey(name)) {
    if (Buffer.byteLength(id + char, "utf8") > budget) break;
    id += char;
  }
  return id;
}

export function parseCallbackData(data: string): { action: ActionKind; requestId: string } | undefined {
  const separator = data.indexOf(":");
  if (separator < 0) return undefined;
  const action = data.slice(0, separator);
  const requestId = data.slice(separator + 1);
  if ((action !== "approve" && action !== "decline") || !requestId) return undefined;
  return { action, requestId };
}

export function decisionKeyboard(requestId: string): InlineKeyboard {
  return {
    inline_keyboard: [
      [
        { text: "✅ Approve", callback_data: `approve:${requestId}` },
        { text: "❌ Decline", callback_data: `decline:${requestId}` },
      ],
    ],
  };
}

export function requestCaption(notice: RequestNotice): string {
  const lines = ["<b>📥 New membership request</b>", "", `<b>Name:</b> ${escapeHtml(notice.name)}`];
  const info = notice.extraInfo.trim();
  if (info) {
    const clipped = info.length > MAX_EXTRA_INFO ? `${info.slice(0, MAX_EXTRA_INFO)}…` : info;
    lines.push(`<b>Info:</b> ${escapeHtml(clipped)}`);
  }
  if (notice.unanswered) lines.push("", "⚠️ <i>Has not answered the membership questions</i>");
  return lines.join("\n");
}

export function decisionRecorded(name: string, action: ActionKind): string {
  const head = action === "approve" ? `✅ <b>${escapeHtml(name)}</b>: approval queued` : `❌ <b>${escapeHtml(name)}</b>: decline queued`;
  return `${head}\n\n<i>It will be carried out on the next pass.</i>`;
}
