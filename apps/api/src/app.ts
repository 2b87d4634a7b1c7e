// src/app.ts

import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import multipart from "@fastify/multipart";

import uploadRoutes from "./routes/uploads.routes.js";
import healthRoute from "./routes/health.js";
import type { UploadConfig } from "./config/uploads.config.js";
import { UploadIndex } from "./state/upload.index.js";
import { DiskChunkStore } from "./store/index.js";
import { ChunkAssembler } from "./services/upload/upload.assembler.js";
import { createAssemblyQueue } from "./services/upload/assembly.limiter.js";
import { UploadLifecycle } from "./services/upload/upload.lifecycle.js";

export interface BuiltApp {
  app: FastifyInstance;
  uploader: UploadLifecycle;
}

export function createUploader(config: UploadConfig, log: FastifyInstance["log"]): UploadLifecycle {
  const index = new UploadIndex();
  const store = new DiskChunkStore({
    tmpDir: config.tmpDir,
    maxChunkBytes: config.maxMemoryBytes,
    log,
  });
  const assembler = new ChunkAssembler({
    uploadDir: config.uploadDir,
    store,
    queue: createAssemblyQueue(config.assemblyConcurrency),
    log,
  });

  return new UploadLifecycle({
    index,
    store,
    assembler,
    autoCleanup: config.autoCleanup,
    log,
  });
}

export async function buildApp(
  config: UploadConfig,
  options: { logger?: FastifyServerOptions["logger"] } = {}
): Promise<BuiltApp> {
  const app = Fastify({
    logger: options.logger ?? {
      level: process.env.NODE_ENV === "production" ? "info" : "debug",
      redact: {
        paths: ["req.headers.authorization"],
        remove: true,
      },
    },
    // Requests are chunk-sized (multipart) or small queries.
    bodyLimit: config.maxMemoryBytes + 1024 * 1024,
  });

  await app.register(multipart, {
    attachFieldsToBody: false,
    // Oversized parts are truncated one byte past the limit and rejected
    // by the chunk store with CHUNK_TOO_LARGE.
    throwFileSizeLimit: false,
    limits: {
      // One chunk per request.
      fileSize: config.maxMemoryBytes + 1,
      files: 1,
    },
  });

  app.addHook("onRequest", async (req, reply) => {
    reply.header("Access-Control-Allow-Origin", "*");
    reply.header("Access-Control-Allow-Methods", "POST, GET, DELETE, OPTIONS");
    reply.header("Access-Control-Allow-Headers", "Content-Type");
  });

  app.options("*", async (req, reply) => reply.code(204).send());

  const uploader = createUploader(config, app.log);

  await app.register(uploadRoutes, { uploader });
  await app.register(healthRoute, { config, index: uploader.index });

  app.setErrorHandler((err, req, reply) => {
    const statusCode =
      err.statusCode !== undefined && Number.isInteger(err.statusCode)
        ? err.statusCode
        : 500;

    req.log.error(
      { err, url: req.url, method: req.method, requestId: req.id },
      "Request error"
    );

    return reply.code(statusCode).send({
      error: {
        code: statusCode < 500 ? "REQUEST_ERROR" : "INTERNAL_ERROR",
        message: statusCode < 500 ? err.message : "Unexpected server error",
        retryable: false,
      },
    });
  });

  return { app, uploader };
}
