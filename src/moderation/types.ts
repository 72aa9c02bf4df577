import type { PendingRequest } from "../cache/DecisionCache.js";
import type { ViewportPoint } from "../vision/geometry.js";
import type { ActionButtons, ActionKind } from "../vision/TextExtractor.js";

/** Everything the operator sees about a newly found request, built once per card */
export type NewRequestPayload = {
  kind: "new";
  name: string;
  cardIndex: number;
  /** Card image cropped to its text, or the full card */
  imagePath: string;
  extraInfo: string;
  previewPath?: string;
  fingerprint?: string;
  buttons: ActionButtons;
  unanswered: boolean;
};

/** A card recognized by fingerprint as a request the operator already has */
export type KnownRequestPayload = {
  kind: "known";
  name: string;
  cardIndex: number;
  request: PendingRequest;
};

export type NotificationPayload = NewRequestPayload | KnownRequestPayload;

export type SkipReason = "no-identity" | "duplicate-in-pass";

export type FailureReason =
  | "fingerprint-error"
  | "ocr-error"
  | "click-target-not-found"
  | "target-outside-viewport"
  | "click-error";

export type CardOutcome =
  | { kind: "clicked"; cardIndex: number; name: string; action: ActionKind; via: "fingerprint" | "ocr"; point: ViewportPoint }
  | { kind: "queued"; cardIndex: number; payload: NotificationPayload }
  | { kind: "skipped"; cardIndex: number; reason: SkipReason; name?: string }
  | { kind: "failed"; cardIndex: number; reason: FailureReason; name?: string; error?: string };

export type EmitSummary = { sent: number; suppressed: number; failed: number };

export type PassResult = {
  cards: number;
  /** Names of requests whose decision was clicked this pass (zero or one) */
  clicked: string[];
  outcomes: CardOutcome[];
  notifications: NotificationPayload[];
  emitted: EmitSummary;
  startedAt: string;
  durationMs: number;
};

/** What the operator receives for one request */
export type RequestNotice = {
  name: string;
  imagePath: string;
  previewPath?: string;
  extraInfo: string;
  unanswered: boolean;
};

/** Outbound side of the operator channel */
export interface OperatorChannel {
  notifyRequest(notice: RequestNotice): Promise<void>;
  sendText(text: string): Promise<void>;
}

/** Diagnostic hook run right before every click */
export interface ClickObserver {
  beforeClick(point: ViewportPoint, target: string, cardIndex: number): Promise<void>;
}
