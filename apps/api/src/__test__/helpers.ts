import fs from "fs/promises";
import os from "os";
import path from "path";
import { Readable } from "stream";
import { vi } from "vitest";

import { UploadIndex } from "../state/upload.index.js";
import { DiskChunkStore } from "../store/disk.chunk.store.js";
import { ChunkAssembler } from "../services/upload/upload.assembler.js";
import { createAssemblyQueue } from "../services/upload/assembly.limiter.js";
import { UploadLifecycle } from "../services/upload/upload.lifecycle.js";

export function createTestLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export function makeTempDir(prefix = "stitch-test-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): Promise<void> {
  return fs.rm(dir, { recursive: true, force: true });
}

export function streamOf(data: string | Buffer): Readable {
  return Readable.from([Buffer.from(data)]);
}

export async function listFiles(dir: string): Promise<string[]> {
  try {
    return (await fs.readdir(dir)).sort();
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
    throw err;
  }
}

export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected function to throw");
}

export function createTestUploader(
  root: string,
  opts: { autoCleanup?: boolean; maxChunkBytes?: number; now?: () => number } = {}
) {
  const tmpDir = path.join(root, "chunks");
  const uploadDir = path.join(root, "uploads");
  const log = createTestLogger();
  const index = new UploadIndex(opts.now);
  const store = new DiskChunkStore({
    tmpDir,
    maxChunkBytes: opts.maxChunkBytes ?? 1024 * 1024,
    log,
  });
  const assembler = new ChunkAssembler({
    uploadDir,
    store,
    queue: createAssemblyQueue(2),
    log,
  });
  const uploader = new UploadLifecycle({
    index,
    store,
    assembler,
    autoCleanup: opts.autoCleanup ?? true,
    log,
  });

  return { uploader, index, store, assembler, log, tmpDir, uploadDir };
}

type FormPart =
  | { name: string; value: string }
  | { name: string; filename: string; data: string | Buffer };

export function multipartBody(parts: FormPart[]) {
  const boundary = "----stitch-test-boundary";
  const buffers: Buffer[] = [];

  for (const part of parts) {
    if ("filename" in part) {
      buffers.push(
        Buffer.from(
          `--${boundary}\r\n` +
            `Content-Disposition: form-data; name="${part.name}"; filename="${part.filename}"\r\n` +
            "Content-Type: application/octet-stream\r\n\r\n"
        ),
        Buffer.from(part.data),
        Buffer.from("\r\n")
      );
    } else {
      buffers.push(
        Buffer.from(
          `--${boundary}\r\n` +
            `Content-Disposition: form-data; name="${part.name}"\r\n\r\n` +
            `${part.value}\r\n`
        )
      );
    }
  }
  buffers.push(Buffer.from(`--${boundary}--\r\n`));

  return {
    payload: Buffer.concat(buffers),
    headers: { "content-type": `multipart/form-data; boundary=${boundary}` },
  };
}
