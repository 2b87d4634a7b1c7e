// src/types/upload.ts

import type { FastifyBaseLogger } from "fastify";

// Opaque handle to a persisted chunk payload.
export type ChunkLocation = string;

export type UploadEntryState = "accumulating" | "assembling" | "assembled";

/**
 * What a caller declares with every chunk. `totalChunks` and `fileSize`
 * are fixed by the first chunk seen for an identity.
 */
export interface UploadDeclaration {
  fileName: string;
  totalChunks: number;
  fileSize: number;
}

export interface ChunkSubmission extends UploadDeclaration {
  chunkIndex: number;
  // Opaque session token; when present it replaces fileName as the identity.
  uploadId?: string;
}

export interface UploadEntryView extends UploadDeclaration {
  identity: string;
  state: UploadEntryState;
  receivedChunks: number;
  createdAt: number;
  updatedAt: number;
}

export interface ArtifactMetadata {
  storedName: string;
  originalName: string;
  fileSize: number;
  mimeType: string;
  path: string;
}

export type SubmitOutcome =
  | {
      status: "chunk_received";
      identity: string;
      fileName: string;
      chunkIndex: number;
      totalChunks: number;
      receivedChunks: number;
    }
  | {
      status: "complete";
      identity: string;
      fileName: string;
      metadata: ArtifactMetadata;
    };

export interface UploadStatus {
  exists: boolean;
  complete: boolean;
  receivedCount: number;
  totalChunks: number;
}

export type UploadLogger = Pick<FastifyBaseLogger, "debug" | "info" | "warn" | "error">;
