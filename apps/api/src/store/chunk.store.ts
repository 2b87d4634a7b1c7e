// src/store/chunk.store.ts

import type { Readable } from "stream";
import type { ChunkLocation } from "../types/upload.js";

export interface ChunkStore {
  save(identity: string, index: number, stream: Readable): Promise<ChunkLocation>;

  open(location: ChunkLocation): Promise<Readable>;

  // Best-effort: failures are logged, never thrown.
  delete(location: ChunkLocation): Promise<void>;

  // Removes the identity's directory once its chunks are deleted.
  // Best-effort, like delete.
  cleanup(identity: string): Promise<void>;
}
