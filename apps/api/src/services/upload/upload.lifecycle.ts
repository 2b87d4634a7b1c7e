// src/services/upload/upload.lifecycle.ts

import type { Readable } from "stream";

import type { ChunkStore } from "../../store/chunk.store.js";
import type { UploadIndex } from "../../state/upload.index.js";
import type {
  ArtifactMetadata,
  ChunkLocation,
  ChunkSubmission,
  SubmitOutcome,
  UploadDeclaration,
  UploadLogger,
  UploadStatus,
} from "../../types/upload.js";
import type { ChunkAssembler } from "./upload.assembler.js";
import { UploadError } from "./upload.errors.js";

export function identityOf(submission: Pick<ChunkSubmission, "fileName" | "uploadId">): string {
  return submission.uploadId ? submission.uploadId : submission.fileName;
}

function assertSubmission(s: ChunkSubmission) {
  if (typeof s.fileName !== "string" || s.fileName.length === 0) {
    throw UploadError.validation("INVALID_CHUNK", "fileName is required");
  }
  if (!Number.isInteger(s.totalChunks) || s.totalChunks < 1) {
    throw UploadError.validation("INVALID_CHUNK", "totalChunks must be a positive integer");
  }
  if (!Number.isInteger(s.chunkIndex) || s.chunkIndex < 0) {
    throw UploadError.validation("INVALID_CHUNK", "chunkIndex must be a non-negative integer");
  }
  if (!Number.isSafeInteger(s.fileSize) || s.fileSize < 0) {
    throw UploadError.validation("INVALID_CHUNK", "fileSize must be a non-negative integer");
  }
}

/**
 * Drives one upload identity from its first chunk to the assembled file:
 * persist, record, check completeness, assemble, clean up.
 */
export class UploadLifecycle {
  readonly index: UploadIndex;
  private readonly store: ChunkStore;
  private readonly assembler: ChunkAssembler;
  private readonly autoCleanup: boolean;
  private readonly log: UploadLogger;

  constructor(deps: {
    index: UploadIndex;
    store: ChunkStore;
    assembler: ChunkAssembler;
    autoCleanup: boolean;
    log: UploadLogger;
  }) {
    this.index = deps.index;
    this.store = deps.store;
    this.assembler = deps.assembler;
    this.autoCleanup = deps.autoCleanup;
    this.log = deps.log;
  }

  async submitChunk(submission: ChunkSubmission, payload: Readable): Promise<SubmitOutcome> {
    assertSubmission(submission);

    const identity = identityOf(submission);
    const { chunkIndex } = submission;
    const declaration: UploadDeclaration = {
      fileName: submission.fileName,
      totalChunks: submission.totalChunks,
      fileSize: submission.fileSize,
    };

    // Reject before touching the disk; re-checked by insert below.
    this.index.assertAccepts(identity, declaration, chunkIndex);

    const location = await this.store.save(identity, chunkIndex, payload);

    let previous: ChunkLocation | null;
    try {
      previous = this.index.insert(identity, declaration, chunkIndex, location);
    } catch (err) {
      await this.store.delete(location);
      throw err;
    }

    const claimed = this.index.isComplete(identity) && this.index.claimAssembly(identity);

    if (previous !== null) {
      this.log.debug({ identity, chunkIndex }, "Chunk overwritten");
      await this.store.delete(previous);
    }

    if (!claimed) {
      const receivedChunks = this.index.receivedCount(identity);
      this.log.debug(
        { identity, chunkIndex, receivedChunks, totalChunks: submission.totalChunks },
        "Chunk received"
      );

      return {
        status: "chunk_received",
        identity,
        fileName: submission.fileName,
        chunkIndex,
        totalChunks: submission.totalChunks,
        receivedChunks,
      };
    }

    const entry = this.index.get(identity);
    const locations = this.index.locations(identity);

    let metadata: ArtifactMetadata;
    try {
      metadata = await this.assembler.assemble({
        identity,
        originalName: entry ? entry.fileName : submission.fileName,
        locations,
        expectedSize: entry ? entry.fileSize : submission.fileSize,
      });
    } catch (err) {
      this.index.releaseAssembly(identity);
      this.log.error({ identity, err }, "Upload assembly failed");
      throw err;
    }

    if (this.autoCleanup) {
      await this.purge(identity, locations);
    } else {
      this.index.markAssembled(identity);
    }

    return {
      status: "complete",
      identity,
      fileName: submission.fileName,
      metadata,
    };
  }

  status(identity: string): UploadStatus {
    const entry = this.index.get(identity);
    if (!entry) {
      return { exists: false, complete: false, receivedCount: 0, totalChunks: 0 };
    }

    return {
      exists: true,
      complete: entry.receivedChunks === entry.totalChunks,
      receivedCount: entry.receivedChunks,
      totalChunks: entry.totalChunks,
    };
  }

  /**
   * Abandons (or finishes deferred cleanup of) an upload. Unknown
   * identities are a no-op.
   */
  async cleanup(identity: string): Promise<void> {
    const entry = this.index.get(identity);
    if (entry?.state === "assembling") {
      throw new UploadError("UPLOAD_ASSEMBLING", "conflict", "Upload is currently being assembled", {
        retryable: true,
      });
    }

    await this.purge(identity, this.index.locations(identity));
  }

  /**
   * GC entry point: abandons the upload only if it is still accumulating
   * and untouched since `cutoff`. The check and the index removal happen
   * in the same tick, so a chunk recorded after a GC scan keeps its upload.
   */
  async cleanupIfIdle(identity: string, cutoff: number): Promise<boolean> {
    const entry = this.index.get(identity);
    if (!entry || entry.state !== "accumulating" || entry.updatedAt >= cutoff) {
      return false;
    }

    await this.purge(identity, this.index.locations(identity));
    return true;
  }

  private async purge(identity: string, locations: Array<ChunkLocation | null>) {
    this.index.remove(identity);

    for (const location of locations) {
      if (location !== null) {
        await this.store.delete(location);
      }
    }
    await this.store.cleanup(identity);

    this.log.info({ identity }, "Upload chunks cleaned up");
  }
}
