// src/state/upload.index.ts

import type {
  ChunkLocation,
  UploadDeclaration,
  UploadEntryState,
  UploadEntryView,
} from "../types/upload.js";
import { UploadError } from "../services/upload/upload.errors.js";

interface UploadEntry extends UploadDeclaration {
  slots: Array<ChunkLocation | null>;
  state: UploadEntryState;
  createdAt: number;
  updatedAt: number;
}

/**
 * In-process registry of uploads in progress: identity -> fixed-length
 * slot array of chunk locations.
 *
 * Every method is synchronous and touches memory only. Node runs them to
 * completion one at a time, which gives the same exclusion a lock around
 * the map would; callers must not put an `await` between `insert`,
 * `isComplete` and `claimAssembly` if they rely on that.
 */
export class UploadIndex {
  private readonly entries = new Map<string, UploadEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  get size(): number {
    return this.entries.size;
  }

  /**
   * Throws if a chunk with this declaration cannot be recorded for
   * `identity` right now. Does not mutate.
   */
  assertAccepts(identity: string, declaration: UploadDeclaration, index: number): void {
    const entry = this.entries.get(identity);
    const totalChunks = entry ? entry.totalChunks : declaration.totalChunks;

    if (!Number.isInteger(index) || index < 0 || index >= totalChunks) {
      throw UploadError.validation(
        "CHUNK_OUT_OF_RANGE",
        `chunkIndex ${index} is outside 0..${totalChunks - 1}`,
        { chunkIndex: index, totalChunks }
      );
    }

    if (!entry) return;

    if (entry.state === "assembling") {
      throw new UploadError("UPLOAD_ASSEMBLING", "conflict", "Upload is currently being assembled", {
        retryable: true,
      });
    }

    if (entry.state === "assembled") {
      throw new UploadError(
        "UPLOAD_ALREADY_COMPLETED",
        "conflict",
        "Upload is already assembled; clean it up before reusing the identity"
      );
    }

    if (declaration.totalChunks !== entry.totalChunks) {
      throw new UploadError(
        "TOTAL_CHUNKS_MISMATCH",
        "conflict",
        `totalChunks ${declaration.totalChunks} differs from ${entry.totalChunks} declared by the first chunk`,
        { details: { expected: entry.totalChunks, actual: declaration.totalChunks } }
      );
    }

    if (declaration.fileSize !== entry.fileSize) {
      throw new UploadError(
        "FILE_SIZE_MISMATCH",
        "conflict",
        `fileSize ${declaration.fileSize} differs from ${entry.fileSize} declared by the first chunk`,
        { details: { expected: entry.fileSize, actual: declaration.fileSize } }
      );
    }
  }

  /**
   * Records `location` in slot `index`, allocating the entry on first
   * sight. Returns the location previously held by that slot, if any.
   */
  insert(
    identity: string,
    declaration: UploadDeclaration,
    index: number,
    location: ChunkLocation
  ): ChunkLocation | null {
    this.assertAccepts(identity, declaration, index);

    const now = this.now();
    let entry = this.entries.get(identity);
    if (!entry) {
      entry = {
        fileName: declaration.fileName,
        totalChunks: declaration.totalChunks,
        fileSize: declaration.fileSize,
        slots: new Array<ChunkLocation | null>(declaration.totalChunks).fill(null),
        state: "accumulating",
        createdAt: now,
        updatedAt: now,
      };
      this.entries.set(identity, entry);
    }

    const previous = entry.slots[index] ?? null;
    entry.slots[index] = location;
    entry.updatedAt = now;
    return previous;
  }

  isComplete(identity: string): boolean {
    const entry = this.entries.get(identity);
    if (!entry) return false;
    return entry.slots.every((slot) => slot !== null);
  }

  // Snapshot copy; later inserts do not show through.
  locations(identity: string): Array<ChunkLocation | null> {
    const entry = this.entries.get(identity);
    return entry ? [...entry.slots] : [];
  }

  receivedCount(identity: string): number {
    const entry = this.entries.get(identity);
    if (!entry) return 0;
    return entry.slots.filter((slot) => slot !== null).length;
  }

  get(identity: string): UploadEntryView | null {
    const entry = this.entries.get(identity);
    if (!entry) return null;

    return {
      identity,
      fileName: entry.fileName,
      totalChunks: entry.totalChunks,
      fileSize: entry.fileSize,
      state: entry.state,
      receivedChunks: this.receivedCount(identity),
      createdAt: entry.createdAt,
      updatedAt: entry.updatedAt,
    };
  }

  /**
   * Moves a complete, accumulating entry to "assembling". Only the first
   * caller after the set completes gets `true`.
   */
  claimAssembly(identity: string): boolean {
    const entry = this.entries.get(identity);
    if (!entry || entry.state !== "accumulating" || !this.isComplete(identity)) {
      return false;
    }
    entry.state = "assembling";
    entry.updatedAt = this.now();
    return true;
  }

  releaseAssembly(identity: string): void {
    const entry = this.entries.get(identity);
    if (entry?.state === "assembling") {
      entry.state = "accumulating";
      entry.updatedAt = this.now();
    }
  }

  markAssembled(identity: string): void {
    const entry = this.entries.get(identity);
    if (entry) {
      entry.state = "assembled";
      entry.updatedAt = this.now();
    }
  }

  remove(identity: string): void {
    this.entries.delete(identity);
  }

  // Accumulating entries untouched since `cutoff`.
  idleSince(cutoff: number): string[] {
    const idle: string[] = [];
    for (const [identity, entry] of this.entries) {
      if (entry.state === "accumulating" && entry.updatedAt < cutoff) {
        idle.push(identity);
      }
    }
    return idle;
  }
}
