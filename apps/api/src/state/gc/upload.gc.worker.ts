// src/state/gc/upload.gc.worker.ts

import type { UploadLogger } from "../../types/upload.js";
import type { UploadLifecycle } from "../../services/upload/upload.lifecycle.js";

/**
 * Abandons accumulating uploads that received no chunk for `idleMs`.
 * Assembling and assembled entries are never touched.
 */
export async function runUploadGc(
  uploader: UploadLifecycle,
  idleMs: number,
  log: UploadLogger,
  now: number = Date.now()
): Promise<string[]> {
  const cutoff = now - idleMs;
  const idle = uploader.index.idleSince(cutoff);
  if (idle.length === 0) return [];

  const removed: string[] = [];
  for (const identity of idle) {
    // Idleness is re-checked at removal; earlier sweeps yield to requests.
    if (await uploader.cleanupIfIdle(identity, cutoff)) {
      log.warn({ identity, idleMs }, "GC abandoned idle upload");
      removed.push(identity);
    } else {
      log.debug({ identity }, "GC skipped upload");
    }

    await new Promise((r) => setImmediate(r));
  }

  return removed;
}
