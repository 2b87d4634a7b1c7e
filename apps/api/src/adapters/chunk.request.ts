// src/adapters/chunk.request.ts

import type { Readable } from "stream";

import type { ChunkSubmission } from "../types/upload.js";
import { UploadError } from "../services/upload/upload.errors.js";

export const ChunkFields = {
  fileName: "fileName",
  chunkIndex: "chunkIndex",
  totalChunks: "totalChunks",
  fileSize: "fileSize",
  uploadId: "uploadId",
  additionalParams: "additionalParams",
  file: "chunk",
} as const;

export const REQUIRED_FIELDS = [
  ChunkFields.fileName,
  ChunkFields.chunkIndex,
  ChunkFields.totalChunks,
  ChunkFields.fileSize,
] as const;

export type RawFields = Record<string, string | undefined>;

export interface ExtractedChunk<T> {
  submission: ChunkSubmission;
  additionalParams: Record<string, unknown>;
  result: T;
}

/**
 * One implementation per hosting framework: pull the declared chunk
 * fields and the payload stream out of an inbound request and hand them
 * to `submit` exactly once.
 */
export type ChunkRequestExtractor<Req> = <T>(
  req: Req,
  submit: (submission: ChunkSubmission, payload: Readable) => Promise<T>
) => Promise<ExtractedChunk<T>>;

export function hasRequiredFields(raw: RawFields): boolean {
  return REQUIRED_FIELDS.every((name) => raw[name] !== undefined);
}

function parseInteger(raw: RawFields, name: string, min: number): number {
  const value = raw[name]?.trim();
  if (!value || !/^-?\d+$/.test(value)) {
    throw UploadError.validation("INVALID_CHUNK", `invalid ${name}`);
  }

  const n = Number(value);
  if (!Number.isSafeInteger(n) || n < min) {
    throw UploadError.validation("INVALID_CHUNK", `invalid ${name}`);
  }
  return n;
}

export function parseChunkFields(raw: RawFields): ChunkSubmission {
  const fileName = raw[ChunkFields.fileName];
  if (!fileName) {
    throw UploadError.validation("INVALID_CHUNK", "fileName is required");
  }

  const uploadId = raw[ChunkFields.uploadId]?.trim();

  return {
    fileName,
    chunkIndex: parseInteger(raw, ChunkFields.chunkIndex, 0),
    totalChunks: parseInteger(raw, ChunkFields.totalChunks, 1),
    fileSize: parseInteger(raw, ChunkFields.fileSize, 0),
    ...(uploadId ? { uploadId } : {}),
  };
}

// Malformed or non-object JSON yields an empty map.
export function parseAdditionalParams(raw: string | undefined): Record<string, unknown> {
  if (!raw) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return {};
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return {};
  }
  return { ...parsed };
}
