/**
 * Deletes screenshots older than the retention window, then any pass
 * directory left empty. Per-file failures are logged and skipped.
 */

import type { Dirent } from "node:fs";
import { readdir, rmdir, stat, unlink } from "node:fs/promises";
import { join } from "node:path";
import { createLogger } from "../logging/logger.js";

const log = createLogger("ScreenshotJanitor");

const HOUR_MS = 60 * 60 * 1000;

async function listDir(dir: string): Promise<Dirent[]> {
  try {
    return await readdir(dir, { withFileTypes: true });
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
    throw err;
  }
}

async function sweep(dir: string, cutoffMs: number, isRoot: boolean): Promise<number> {
  let deleted = 0;
  for (const entry of await listDir(dir)) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      deleted += await sweep(path, cutoffMs, false);
      continue;
    }
    if (!entry.isFile() || !entry.name.toLowerCase().endsWith(".png")) continue;
    try {
      if ((await stat(path)).mtimeMs < cutoffMs) {
        await unlink(path);
        deleted++;
      }
    } catch (err) {
      log.warn("could not delete screenshot", { path, error: err });
    }
  }

  if (!isRoot && (await listDir(dir)).length === 0) {
    await rmdir(dir).catch((err: unknown) => log.warn("could not remove empty directory", { dir, error: err }));
  }
  return deleted;
}

/** Returns the number of files deleted */
export async function cleanupScreenshots(dir: string, maxAgeHours: number, now: Date = new Date()): Promise<number> {
  const deleted = await sweep(dir, now.getTime() - maxAgeHours * HOUR_MS, true);
  if (deleted > 0) log.info("old screenshots deleted", { count: deleted, maxAgeHours });
  return deleted;
}
