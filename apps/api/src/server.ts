// src/server.ts

import fs from "fs/promises";
import os from "os";
import path from "path";

import { buildApp } from "./app.js";
import { loadConfig } from "./config/uploads.config.js";
import { startUploadGc, stopUploadGc } from "./state/gc/upload.gc.scheduler.js";
import { reconcileOrphanChunks } from "./state/gc/upload.gc.reconcile.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled promise rejection:", reason);
});

process.on("uncaughtException", (err) => {
  console.error("Uncaught exception:", err);
  process.exit(1);
});

const config = loadConfig();
const { app, uploader } = await buildApp(config.upload);

async function validateDir(name: string, dir: string) {
  const home = os.homedir();

  if (dir === "/" || dir === "/home" || dir === home) {
    throw new Error(`${name} is unsafe: ${dir}`);
  }

  await fs.mkdir(dir, { recursive: true });

  // Verify we can write to the directory. This prevents starting with a
  // misconfigured path that will later fail during uploads or assembly.
  const probe = path.join(dir, `.stitch_write_test_${process.pid}_${Date.now()}`);
  await fs.writeFile(probe, "ok");
  await fs.unlink(probe);
}

try {
  await validateDir("UPLOAD_TMP_DIR", config.upload.tmpDir);
  await validateDir("UPLOAD_DIR", config.upload.uploadDir);
  app.log.info(
    { tmpDir: config.upload.tmpDir, uploadDir: config.upload.uploadDir },
    "Storage directories ready"
  );
} catch (err) {
  app.log.error(err, "Failed to initialize storage directories");
  process.exit(1);
}

await reconcileOrphanChunks(config.upload.tmpDir, app.log);
startUploadGc(uploader, config.gc, app.log);

try {
  await app.listen({
    port: config.port,
    host: "0.0.0.0",
  });

  app.log.info(
    {
      port: config.port,
      env: process.env.NODE_ENV ?? "development",
      autoCleanup: config.upload.autoCleanup,
    },
    "API server started"
  );
} catch (err) {
  app.log.error(err, "Failed to start server");
  process.exit(1);
}

async function shutdown(signal: string) {
  app.log.info({ signal }, "Shutting down server");

  try {
    await stopUploadGc();
    await app.close();
    process.exit(0);
  } catch (err) {
    app.log.error(err, "Shutdown failed");
    process.exit(1);
  }
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));
