// src/config/uploads.config.ts

import path from "path";

export interface UploadConfig {
  tmpDir: string;
  uploadDir: string;
  // Upper bound for one multipart chunk (and the request body).
  maxMemoryBytes: number;
  autoCleanup: boolean;
  assemblyConcurrency: number;
}

export interface GcConfig {
  // 0 disables the idle-upload sweep.
  idleTtlMs: number;
  gcInterval: number;
}

export interface ServerConfig {
  port: number;
  upload: UploadConfig;
  gc: GcConfig;
}

type Env = Record<string, string | undefined>;

export const UploadDefaults = {
  tmpDir: "./temp_chunks",
  uploadDir: "./uploads",
  maxMemoryBytes: 32 * 1024 * 1024, // 32 MB
  autoCleanup: true,
  assemblyConcurrency: 2,
  idleTtlMs: 0,
  gcInterval: 5 * 60 * 1000, // 5 minutes
  port: 3000,
};

function parseIntEnv(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min) {
    throw new Error(`${name} must be an integer >= ${min}`);
  }
  return n;
}

function parseBoolEnv(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === "") return fallback;
  if (raw === "1" || raw === "true" || raw === "yes") return true;
  if (raw === "0" || raw === "false" || raw === "no") return false;
  throw new Error(`${name} must be a boolean (true/false)`);
}

function parseDirEnv(env: Env, name: string, fallback: string): string {
  const raw = env[name]?.trim();
  return path.resolve(raw ? raw : fallback);
}

export function loadConfig(env: Env = process.env): ServerConfig {
  const upload: UploadConfig = {
    tmpDir: parseDirEnv(env, "UPLOAD_TMP_DIR", UploadDefaults.tmpDir),
    uploadDir: parseDirEnv(env, "UPLOAD_DIR", UploadDefaults.uploadDir),
    maxMemoryBytes: parseIntEnv(
      env,
      "UPLOAD_MAX_MEMORY_BYTES",
      UploadDefaults.maxMemoryBytes,
      1
    ),
    autoCleanup: parseBoolEnv(env, "UPLOAD_AUTO_CLEANUP", UploadDefaults.autoCleanup),
    assemblyConcurrency: parseIntEnv(
      env,
      "UPLOAD_ASSEMBLY_CONCURRENCY",
      UploadDefaults.assemblyConcurrency,
      1
    ),
  };

  if (upload.tmpDir === upload.uploadDir) {
    throw new Error("UPLOAD_TMP_DIR and UPLOAD_DIR must be different directories");
  }

  return {
    port: parseIntEnv(env, "PORT", UploadDefaults.port, 0),
    upload,
    gc: {
      idleTtlMs: parseIntEnv(env, "UPLOAD_IDLE_TTL_MS", UploadDefaults.idleTtlMs, 0),
      gcInterval: parseIntEnv(env, "UPLOAD_GC_INTERVAL_MS", UploadDefaults.gcInterval, 1000),
    },
  };
}
