// src/services/upload/upload.assembler.ts

import fs from "fs/promises";
import path from "path";
import crypto from "crypto";
import { pipeline } from "stream/promises";
import type PQueue from "p-queue";

import type { ChunkStore } from "../../store/chunk.store.js";
import type { ArtifactMetadata, ChunkLocation, UploadLogger } from "../../types/upload.js";
import { inferContentType } from "./content.type.js";
import { UploadError } from "./upload.errors.js";

const SAFE_EXTENSION = /^\.[A-Za-z0-9]{1,16}$/;

export interface AssembleInput {
  identity: string;
  originalName: string;
  locations: ReadonlyArray<ChunkLocation | null>;
  expectedSize: number;
}

/**
 * Stored names are generated; the caller's name is kept only as metadata
 * and as the source of the extension.
 */
export function storedNameFor(originalName: string): string {
  const ext = path.extname(path.basename(originalName));
  return `${crypto.randomUUID()}${SAFE_EXTENSION.test(ext) ? ext.toLowerCase() : ""}`;
}

export class ChunkAssembler {
  private readonly uploadDir: string;
  private readonly store: ChunkStore;
  private readonly queue: PQueue;
  private readonly log: UploadLogger;

  constructor(opts: {
    uploadDir: string;
    store: ChunkStore;
    queue: PQueue;
    log: UploadLogger;
  }) {
    this.uploadDir = opts.uploadDir;
    this.store = opts.store;
    this.queue = opts.queue;
    this.log = opts.log;
  }

  assemble(input: AssembleInput): Promise<ArtifactMetadata> {
    return this.queue.add(() => this.assembleNow(input), { throwOnTimeout: true });
  }

  private async assembleNow(input: AssembleInput): Promise<ArtifactMetadata> {
    const storedName = storedNameFor(input.originalName);
    const outPath = path.join(this.uploadDir, storedName);
    const store = this.store;
    let written = 0;

    try {
      await fs.mkdir(this.uploadDir, { recursive: true });
      // Created up front so a failed copy always leaves a file to discard.
      const handle = await fs.open(outPath, "wx");

      await pipeline(async function* () {
        for (let i = 0; i < input.locations.length; i++) {
          const location = input.locations[i];
          if (location === null) {
            throw new UploadError(
              "MISSING_CHUNK",
              "missing_chunk",
              `Missing chunk ${i} for ${input.identity}`,
              { details: { chunkIndex: i } }
            );
          }

          const rs = await store.open(location);
          for await (const data of rs) {
            const buf = Buffer.isBuffer(data) ? data : Buffer.from(data);
            written += buf.length;
            yield buf;
          }
        }
      }, handle.createWriteStream());
    } catch (err) {
      await this.discard(outPath);
      if (err instanceof UploadError) throw err;
      throw UploadError.io("ASSEMBLY_FAILED", `Failed to assemble ${input.identity}`, err);
    }

    if (written !== input.expectedSize) {
      await this.discard(outPath);
      throw new UploadError(
        "SIZE_MISMATCH",
        "integrity",
        `File size mismatch: expected ${input.expectedSize}, got ${written}`,
        { details: { expected: input.expectedSize, actual: written } }
      );
    }

    this.log.info(
      { identity: input.identity, storedName, sizeBytes: written },
      "Upload assembled"
    );

    return {
      storedName,
      originalName: input.originalName,
      fileSize: written,
      mimeType: inferContentType(input.originalName),
      path: outPath,
    };
  }

  private async discard(outPath: string) {
    await fs.rm(outPath, { force: true }).catch((err: unknown) => {
      this.log.warn({ err, outPath }, "Failed to remove partial artifact");
    });
  }
}
