/**
 * ModeratorConfig: everything the process needs, read from environment variables.
 *
 * Required: GROUP_ID, TELEGRAM_BOT_TOKEN, TELEGRAM_ADMIN_IDS.
 * Everything else has a default. Problems are collected and reported together
 * in a single ConfigError so a misconfigured deploy fails once, not N times.
 */

import { join, resolve } from "node:path";
import { isLogLevel, type LogLevel } from "../logging/logger.js";

export type ActiveHours = { startHour: number; endHour: number };

export type ModeratorConfig = {
  groupId: string;
  requestsUrl: string;

  telegram: {
    botToken: string;
    adminIds: number[];
  };

  paths: {
    dataDir: string;
    screenshotsDir: string;
    sessionsDir: string;
    cacheFile: string;
    /** Staged OCR traineddata */
    ocrDataDir: string;
  };

  browser: {
    headless: boolean;
    slowMoMs: number;
    proxyServer?: string;
    viewport: { width: number; height: number };
    locale: string;
  };

  polling: {
    intervalSeconds: number;
    jitter: number;
    activeHours: ActiveHours;
  };

  /** Hamming distance for fingerprint matches; 0 disables matching */
  cardHashThreshold: number;

  retention: {
    undecidedMaxAgeHours: number;
    staleDecisionMaxAgeHours: number;
    screenshotMaxAgeHours: number;
  };

  debug: {
    clickOverlay: boolean;
    aiValidation: boolean;
    openRouterApiKey?: string;
    openRouterModel: string;
    openRouterBaseUrl: string;
  };

  ocrLangs: string;
  statusPort?: number;
  logLevel: LogLevel;
};

export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration:\n  - ${problems.join("\n  - ")}`);
    this.name = "ConfigError";
    this.problems = problems;
  }
}

type Env = Record<string, string | undefined>;

export function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((v) => v.trim())
    .filter(Boolean);
}

function parseBool(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === "") return fallback;
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

export function parseActiveHours(value: string): ActiveHours | undefined {
  const match = value.trim().match(/^(\d{1,2})\s*-\s*(\d{1,2})$/);
  if (!match) return undefined;
  const startHour = Number(match[1]);
  const endHour = Number(match[2]);
  if (startHour > 23 || endHour > 24 || startHour >= endHour) return undefined;
  return { startHour, endHour };
}

function parseViewport(value: string): { width: number; height: number } | undefined {
  const match = value.trim().match(/^(\d+)x(\d+)$/i);
  if (!match) return undefined;
  return { width: Number(match[1]), height: Number(match[2]) };
}

export function loadConfig(env: Env = process.env): ModeratorConfig {
  const problems: string[] = [];

  const required = (name: string): string => {
    const value = env[name]?.trim();
    if (!value) {
      problems.push(`${name} is required`);
      return "";
    }
    return value;
  };

  const number = (name: string, fallback: number, opts: { min?: number; integer?: boolean } = {}): number => {
    const raw = env[name]?.trim();
    if (!raw) return fallback;
    const parsed = Number(raw);
    if (
      !Number.isFinite(parsed) ||
      (opts.integer && !Number.isInteger(parsed)) ||
      (opts.min !== undefined && parsed < opts.min)
    ) {
      problems.push(`${name} must be a${opts.integer ? "n integer" : " number"}${opts.min !== undefined ? ` >= ${opts.min}` : ""} (got "${raw}")`);
      return fallback;
    }
    return parsed;
  };

  const groupId = required("GROUP_ID");
  const botToken = required("TELEGRAM_BOT_TOKEN");

  const adminRaw = parseList(env.TELEGRAM_ADMIN_IDS);
  const adminIds = adminRaw.map(Number).filter((n) => Number.isInteger(n));
  if (adminRaw.length === 0) {
    problems.push("TELEGRAM_ADMIN_IDS is required");
  } else if (adminIds.length !== adminRaw.length) {
    problems.push(`TELEGRAM_ADMIN_IDS must be a comma list of numeric ids (got "${env.TELEGRAM_ADMIN_IDS ?? ""}")`);
  }

  const dataDir = resolve(env.DATA_DIR?.trim() || "./data");

  const activeHoursRaw = env.ACTIVE_HOURS?.trim() || "6-22";
  const activeHours = parseActiveHours(activeHoursRaw);
  if (!activeHours) problems.push(`ACTIVE_HOURS must look like "6-22" (got "${activeHoursRaw}")`);

  const viewportRaw = env.VIEWPORT?.trim() || "1536x864";
  const viewport = parseViewport(viewportRaw);
  if (!viewport) problems.push(`VIEWPORT must look like "1536x864" (got "${viewportRaw}")`);

  const logLevelRaw = (env.LOG_LEVEL?.trim() || "info").toLowerCase();
  if (!isLogLevel(logLevelRaw)) problems.push(`LOG_LEVEL must be one of debug, info, warn, error (got "${logLevelRaw}")`);

  const statusPortRaw = env.STATUS_PORT?.trim();
  const statusPort = statusPortRaw ? number("STATUS_PORT", 0, { min: 1, integer: true }) : undefined;

  const config: ModeratorConfig = {
    groupId,
    requestsUrl: `https://www.facebook.com/groups/${groupId}/participant_requests?orderby=chronological`,
    telegram: { botToken, adminIds },
    paths: {
      dataDir,
      screenshotsDir: resolve(env.SCREENSHOTS_DIR?.trim() || join(dataDir, "screenshots")),
      sessionsDir: resolve(env.SESSIONS_DIR?.trim() || join(dataDir, "sessions")),
      cacheFile: join(dataDir, "decisions_cache.json"),
      ocrDataDir: join(dataDir, "tessdata"),
    },
    browser: {
      headless: parseBool(env.HEADLESS, true),
      slowMoMs: number("SLOW_MO_MS", 100, { min: 0, integer: true }),
      proxyServer: env.PROXY_SERVER?.trim() || undefined,
      viewport: viewport ?? { width: 1536, height: 864 },
      locale: env.LOCALE?.trim() || "it-IT",
    },
    polling: {
      intervalSeconds: number("POLL_INTERVAL_SECONDS", 3600, { min: 1 }),
      jitter: number("POLL_JITTER", 0.3, { min: 0 }),
      activeHours: activeHours ?? { startHour: 6, endHour: 22 },
    },
    cardHashThreshold: number("CARD_HASH_THRESHOLD", 3, { min: 0, integer: true }),
    retention: {
      undecidedMaxAgeHours: number("UNDECIDED_MAX_AGE_HOURS", 360, { min: 0 }),
      staleDecisionMaxAgeHours: number("STALE_DECISION_MAX_AGE_HOURS", 360, { min: 0 }),
      screenshotMaxAgeHours: number("SCREENSHOT_MAX_AGE_HOURS", 360, { min: 0 }),
    },
    debug: {
      clickOverlay: parseBool(env.DEBUG_CLICK_OVERLAY, true),
      aiValidation: parseBool(env.DEBUG_AI_VALIDATION, false),
      openRouterApiKey: env.OPENROUTER_API_KEY?.trim() || undefined,
      openRouterModel: env.OPENROUTER_MODEL?.trim() || "google/gemini-2.5-pro",
      openRouterBaseUrl: env.OPENROUTER_BASE_URL?.trim() || "https://openrouter.ai/api/v1",
    },
    ocrLangs: env.OCR_LANGS?.trim() || "ita+eng",
    statusPort,
    logLevel: isLogLevel(logLevelRaw) ? logLevelRaw : "info",
  };

  if (problems.length > 0) throw new ConfigError(problems);
  return config;
}
