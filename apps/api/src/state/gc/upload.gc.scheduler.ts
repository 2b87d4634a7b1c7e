// src/state/gc/upload.gc.scheduler.ts

import type { GcConfig } from "../../config/uploads.config.js";
import type { UploadLogger } from "../../types/upload.js";
import type { UploadLifecycle } from "../../services/upload/upload.lifecycle.js";
import { runUploadGc } from "./upload.gc.worker.js";

let timer: NodeJS.Timeout | null = null;
let running: Promise<void> | null = null;

export function startUploadGc(uploader: UploadLifecycle, config: GcConfig, log: UploadLogger) {
  if (timer) return;

  if (config.idleTtlMs <= 0) {
    log.info("Upload GC disabled");
    return;
  }

  log.info({ idleTtlMs: config.idleTtlMs }, "Upload GC started");

  timer = setInterval(() => {
    if (running) return; // prevent overlap

    running = runUploadGc(uploader, config.idleTtlMs, log)
      .then(() => undefined)
      .catch((err: unknown) => {
        log.error({ err }, "Upload GC failed");
      })
      .finally(() => {
        running = null;
      });
  }, config.gcInterval);

  timer.unref();
}

export async function stopUploadGc(): Promise<void> {
  if (timer) {
    clearInterval(timer);
    timer = null;
  }

  if (running) {
    await running;
    running = null;
  }
}
