// src/routes/health.ts

import fs from "fs/promises";
import { constants } from "fs";
import type { FastifyInstance } from "fastify";

import type { UploadConfig } from "../config/uploads.config.js";
import type { UploadIndex } from "../state/upload.index.js";

export type HealthRouteOptions = {
  config: Pick<UploadConfig, "tmpDir" | "uploadDir">;
  index: UploadIndex;
};

async function isWritable(dir: string): Promise<boolean> {
  try {
    await fs.access(dir, constants.W_OK);
    return true;
  } catch {
    return false;
  }
}

export default async function healthRoute(app: FastifyInstance, opts: HealthRouteOptions) {
  app.get("/health", async (req, reply) => {
    const timestamp = new Date().toISOString();

    const [tmpDirOk, uploadDirOk] = await Promise.all([
      isWritable(opts.config.tmpDir),
      isWritable(opts.config.uploadDir),
    ]);
    const ok = tmpDirOk && uploadDirOk;

    if (!ok) {
      req.log.error({ tmpDirOk, uploadDirOk }, "Storage Health Check Failed");
    }

    return reply.status(ok ? 200 : 503).send({
      status: ok ? "UP" : "DOWN",
      service: "chunk-stitch-api-v1",
      ready: ok,
      timestamp,
      activeUploads: opts.index.size,
      checks: {
        tmpDir: { ok: tmpDirOk },
        uploadDir: { ok: uploadDirOk },
      },
    });
  });
}
