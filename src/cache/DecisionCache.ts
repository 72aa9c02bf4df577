/**
 * DecisionCache: durable record of every request the operator has been told about.
 *
 * Keyed by normalized identity (trimmed, lower-cased). Every mutation is
 * written to disk before the call returns, via tmp file + rename, so the
 * scan loop and the Telegram handlers can both use one instance without
 * holding anything across calls.
 *
 * Layout on disk: { "pending": { "<key>": PendingRequest } }
 */

import fs from "node:fs";
import path from "node:path";
import { createLogger } from "../logging/logger.js";
import { cardPoint, type CardPoint } from "../vision/geometry.js";
import { closestFingerprint } from "../vision/ImageHash.js";
import type { ActionButtons } from "../vision/TextExtractor.js";

const log = createLogger("DecisionCache");

export type Decision = "approve" | "decline";

export type PendingRequest = {
  name: string;
  /** ISO timestamp of the first notification */
  notifiedAt: string;
  decision?: Decision;
  decidedAt?: string;
  executed: boolean;
  extraInfo?: string;
  fingerprint?: string;
  previewPath?: string;
  /** Card-local button centres */
  buttons?: ActionButtons;
  cardImagePath?: string;
  unanswered: boolean;
};

export type RequestArtifacts = Partial<
  Pick<PendingRequest, "extraInfo" | "fingerprint" | "previewPath" | "buttons" | "cardImagePath" | "unanswered">
>;

export type FingerprintMatch = { key: string; request: PendingRequest; distance: number };

export type CacheOptions = {
  /** Hamming distance for fingerprint matches; 0 disables them */
  fingerprintThreshold?: number;
  now?: () => Date;
};

export type CleanupResult = { undecided: string[]; stale: string[] };

const HOUR_MS = 60 * 60 * 1000;

export function identityKey(name: string): string {
  return name.trim().toLowerCase();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const optionalString = (value: unknown): string | undefined => (typeof value === "string" ? value : undefined);

function parsePoint(value: unknown): CardPoint | undefined {
  if (!isRecord(value) || typeof value.x !== "number" || typeof value.y !== "number") return undefined;
  return cardPoint(value.x, value.y);
}

function parseButtons(value: unknown): ActionButtons | undefined {
  if (!isRecord(value)) return undefined;
  const buttons: ActionButtons = {};
  const approve = parsePoint(value.approve);
  const decline = parsePoint(value.decline);
  if (approve) buttons.approve = approve;
  if (decline) buttons.decline = decline;
  return approve || decline ? buttons : undefined;
}

/** Known fields only; anything else in the file is dropped on the next save */
function parseRequest(value: unknown): PendingRequest | undefined {
  if (!isRecord(value) || typeof value.name !== "string" || typeof value.notifiedAt !== "string") return undefined;
  const decision = value.decision === "approve" || value.decision === "decline" ? value.decision : undefined;
  return {
    name: value.name,
    notifiedAt: value.notifiedAt,
    decision,
    decidedAt: optionalString(value.decidedAt),
    executed: value.executed === true,
    extraInfo: optionalString(value.extraInfo),
    fingerprint: optionalString(value.fingerprint),
    previewPath: optionalString(value.previewPath),
    buttons: parseButtons(value.buttons),
    cardImagePath: optionalString(value.cardImagePath),
    unanswered: value.unanswered === true,
  };
}

function copyOf(request: PendingRequest): PendingRequest {
  return { ...request, buttons: request.buttons && { ...request.buttons } };
}

export class DecisionCache {
  private readonly filePath: string;
  private readonly threshold: number;
  private readonly now: () => Date;
  private records = new Map<string, PendingRequest>();

  constructor(filePath: string, options: CacheOptions = {}) {
    this.filePath = filePath;
    this.threshold = options.fingerprintThreshold ?? 3;
    this.now = options.now ?? (() => new Date());
    this.load();
  }

  get size(): number {
    return this.records.size;
  }

  private load(): void {
    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, "utf-8");
    } catch {
      log.info("no cache file, starting empty", { path: this.filePath });
      return;
    }

    try {
      const parsed: unknown = JSON.parse(raw);
      const pending = isRecord(parsed) && isRecord(parsed.pending) ? parsed.pending : {};
      for (const [key, value] of Object.entries(pending)) {
        const request = parseRequest(value);
        if (!request) {
          log.warn("dropping unreadable record", { key });
          continue;
        }
        this.records.set(key, request);
      }
      log.info("loaded", { records: this.records.size });
    } catch (err) {
      log.error("cache file is corrupt, starting empty", { path: this.filePath, error: err });
      this.records.clear();
    }
  }

  private save(): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.tmp`;
    const data = { pending: Object.fromEntries(this.records) };
    fs.writeFileSync(tmp, JSON.stringify(data, null, 2), "utf-8");
    fs.renameSync(tmp, this.filePath);
  }

  /** Insert if absent. false means the identity was already known and nothing changed */
  addNotification(name: string, artifacts: RequestArtifacts = {}): boolean {
    const key = identityKey(name);
    if (!key) return false;
    if (this.records.has(key)) {
      log.debug("already notified", { key });
      return false;
    }

    const request: PendingRequest = {
      name: name.trim(),
      notifiedAt: this.now().toISOString(),
      executed: false,
      unanswered: artifacts.unanswered ?? false,
      extraInfo: artifacts.extraInfo,
      fingerprint: artifacts.fingerprint,
      previewPath: artifacts.previewPath,
      buttons: artifacts.buttons,
      cardImagePath: artifacts.cardImagePath,
    };
    this.records.set(key, request);
    this.save();
    log.info("notification recorded", { name: request.name });
    return true;
  }

  /** Overwrites any earlier decision. false for an unknown identity */
  setDecision(name: string, decision: Decision): boolean {
    const key = identityKey(name);
    const request = this.records.get(key);
    if (!request) {
      log.warn("decision for unknown request", { key, decision });
      return false;
    }
    request.decision = decision;
    request.decidedAt = this.now().toISOString();
    this.save();
    log.info("decision recorded", { name: request.name, decision });
    return true;
  }

  /** Fill in artifacts the record does not have yet */
  attachArtifacts(name: string, artifacts: RequestArtifacts): boolean {
    const key = identityKey(name);
    const request = this.records.get(key);
    if (!request) return false;

    let changed = false;
    if (!request.fingerprint && artifacts.fingerprint) {
      request.fingerprint = artifacts.fingerprint;
      changed = true;
    }
    if (!request.buttons && artifacts.buttons && (artifacts.buttons.approve || artifacts.buttons.decline)) {
      request.buttons = artifacts.buttons;
      changed = true;
    }
    if (!request.extraInfo && artifacts.extraInfo) {
      request.extraInfo = artifacts.extraInfo;
      changed = true;
    }
    if (!request.cardImagePath && artifacts.cardImagePath) {
      request.cardImagePath = artifacts.cardImagePath;
      changed = true;
    }
    if (!request.previewPath && artifacts.previewPath) {
      request.previewPath = artifacts.previewPath;
      changed = true;
    }
    if (changed) this.save();
    return changed;
  }

  /** Decided and not yet executed, in notification order */
  listPending(): PendingRequest[] {
    return [...this.records.values()].filter((r) => r.decision !== undefined && !r.executed).map(copyOf);
  }

  /** Marks the record executed and deletes it. false when it is already gone */
  markExecuted(name: string): boolean {
    const key = identityKey(name);
    const request = this.records.get(key);
    if (!request) {
      log.warn("executed request was not cached", { key });
      return false;
    }
    request.executed = true;
    this.records.delete(key);
    this.save();
    log.info("executed and removed", { name: request.name, decision: request.decision });
    return true;
  }

  /** Copies; changes go through the mutators so they reach the file */
  get(name: string): PendingRequest | undefined {
    const request = this.records.get(identityKey(name));
    return request && copyOf(request);
  }

  has(name: string): boolean {
    return this.records.has(identityKey(name));
  }

  entries(): Array<[string, PendingRequest]> {
    return [...this.records.entries()].map(([key, request]): [string, PendingRequest] => [key, copyOf(request)]);
  }

  /** Every fingerprinted record takes part; ties go to the earliest notified */
  findByFingerprint(hash: string): FingerprintMatch | undefined {
    const candidates = [...this.records].flatMap(([key, request]) =>
      request.fingerprint ? [[request.fingerprint, key] as const] : [],
    );
    const best = closestFingerprint(hash, candidates, this.threshold);
    if (!best) return undefined;
    const request = this.records.get(best.value);
    return request ? { key: best.value, request: copyOf(request), distance: best.distance } : undefined;
  }

  /**
   * Drop undecided records older than undecidedMaxAgeHours (from notification)
   * and unexecuted decisions older than staleMaxAgeHours (from the decision).
   */
  cleanup(undecidedMaxAgeHours: number, staleMaxAgeHours: number): CleanupResult {
    const now = this.now().getTime();
    const result: CleanupResult = { undecided: [], stale: [] };

    for (const [key, request] of this.records) {
      if (request.executed) continue;
      if (request.decision === undefined) {
        if (now - Date.parse(request.notifiedAt) > undecidedMaxAgeHours * HOUR_MS) result.undecided.push(key);
      } else {
        const since = Date.parse(request.decidedAt ?? request.notifiedAt);
        if (now - since > staleMaxAgeHours * HOUR_MS) result.stale.push(key);
      }
    }

    for (const key of [...result.undecided, ...result.stale]) this.records.delete(key);
    if (result.undecided.length > 0 || result.stale.length > 0) {
      this.save();
      log.info("cleanup removed records", { undecided: result.undecided.length, stale: result.stale.length });
    }
    return result;
  }
}
