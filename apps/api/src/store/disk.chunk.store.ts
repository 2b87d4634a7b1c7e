// src/store/disk.chunk.store.ts

import fs from "fs/promises";
import path from "path";
import crypto from "crypto";
import { pipeline } from "stream/promises";
import { Transform } from "stream";
import type { Readable } from "stream";

import type { ChunkStore } from "./chunk.store.js";
import type { ChunkLocation, UploadLogger } from "../types/upload.js";
import { UploadError, describeError, errorCode } from "../services/upload/upload.errors.js";

function createLimitStream(maxBytes: number) {
  let written = 0;

  return new Transform({
    transform(chunk: Buffer, _enc, cb) {
      written += chunk.length;

      if (written > maxBytes) {
        cb(
          UploadError.validation(
            "CHUNK_TOO_LARGE",
            `Chunk exceeds the ${maxBytes} byte limit`,
            { maxBytes }
          )
        );
        return;
      }

      cb(null, chunk);
    },
  });
}

/**
 * Identity strings are caller-supplied, so each one maps to a directory
 * named after its SHA-256 digest.
 */
export function identityDirName(identity: string): string {
  return crypto.createHash("sha256").update(identity).digest("hex");
}

export class DiskChunkStore implements ChunkStore {
  private readonly tmpDir: string;
  private readonly maxChunkBytes: number;
  private readonly log: UploadLogger;

  constructor(opts: { tmpDir: string; maxChunkBytes: number; log: UploadLogger }) {
    this.tmpDir = opts.tmpDir;
    this.maxChunkBytes = opts.maxChunkBytes;
    this.log = opts.log;
  }

  private dir(identity: string) {
    return path.join(this.tmpDir, identityDirName(identity));
  }

  // Every write gets its own file, so a superseded or rejected write
  // never clobbers a location the index already holds.
  private chunkPath(identity: string, index: number) {
    return path.join(this.dir(identity), `${index}.${crypto.randomUUID()}`);
  }

  async save(identity: string, index: number, stream: Readable): Promise<ChunkLocation> {
    const finalPath = this.chunkPath(identity, index);
    const tempPath = `${finalPath}.tmp`;

    try {
      await fs.mkdir(this.dir(identity), { recursive: true });
      const handle = await fs.open(tempPath, "wx");
      await pipeline(stream, createLimitStream(this.maxChunkBytes), handle.createWriteStream());
      await fs.rename(tempPath, finalPath);
    } catch (err) {
      await fs.rm(tempPath, { force: true }).catch((rmErr: unknown) => {
        this.log.warn({ err: rmErr, tempPath }, "Failed to remove partial chunk");
      });
      stream.destroy();

      if (err instanceof UploadError) throw err;
      throw UploadError.io("CHUNK_WRITE_FAILED", `Failed to save chunk ${index}`, err);
    }

    return finalPath;
  }

  async open(location: ChunkLocation): Promise<Readable> {
    try {
      const handle = await fs.open(location, "r");
      return handle.createReadStream();
    } catch (err) {
      if (errorCode(err) === "ENOENT") {
        throw new UploadError("CHUNK_NOT_FOUND", "io", `Chunk not found: ${location}`, {
          cause: err,
          retryable: false,
        });
      }
      throw UploadError.io("CHUNK_NOT_FOUND", `Failed to open chunk ${location}`, err);
    }
  }

  async delete(location: ChunkLocation): Promise<void> {
    try {
      await fs.rm(location, { force: true });
    } catch (err) {
      this.log.warn({ location, err: describeError(err) }, "Failed to delete chunk");
    }
  }

  async cleanup(identity: string): Promise<void> {
    const dir = this.dir(identity);
    try {
      await fs.rmdir(dir);
    } catch (err) {
      const code = errorCode(err);
      if (code === "ENOENT") return;
      if (code === "ENOTEMPTY" || code === "EEXIST") {
        // A save for a fresh upload under the same identity is in flight.
        this.log.debug({ identity, dir }, "Chunk directory still in use");
        return;
      }
      this.log.warn({ identity, err: describeError(err) }, "Failed to remove chunk directory");
    }
  }
}
