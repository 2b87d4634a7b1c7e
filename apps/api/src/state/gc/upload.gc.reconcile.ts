// src/state/gc/upload.gc.reconcile.ts

import fs from "fs/promises";
import path from "path";

import type { UploadLogger } from "../../types/upload.js";
import { describeError } from "../../services/upload/upload.errors.js";

const IDENTITY_DIR = /^[0-9a-f]{64}$/;

/**
 * The index lives in memory, so every chunk directory found at startup
 * belongs to a previous process and can never be assembled.
 */
export async function reconcileOrphanChunks(tmpDir: string, log: UploadLogger): Promise<number> {
  let entries: string[];
  try {
    entries = await fs.readdir(tmpDir);
  } catch (err) {
    log.warn({ tmpDir, err: describeError(err) }, "Chunk directory unreadable; skipping reconcile");
    return 0;
  }

  let removed = 0;
  for (const entry of entries) {
    if (!IDENTITY_DIR.test(entry)) continue;

    const fullPath = path.join(tmpDir, entry);
    try {
      const stat = await fs.lstat(fullPath);
      if (!stat.isDirectory()) continue;

      await fs.rm(fullPath, { recursive: true, force: true });
      removed++;
    } catch (err) {
      log.warn({ dir: fullPath, err: describeError(err) }, "Failed to remove orphan chunks");
    }
  }

  if (removed > 0) {
    log.warn({ removed }, "Removed orphan chunk directories from a previous run");
  }
  return removed;
}
