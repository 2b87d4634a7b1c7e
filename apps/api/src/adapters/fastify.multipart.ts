// src/adapters/fastify.multipart.ts

import { Readable } from "stream";
import type { FastifyRequest } from "fastify";
import type { MultipartFile } from "@fastify/multipart";

import type { ChunkSubmission } from "../types/upload.js";
import { UploadError } from "../services/upload/upload.errors.js";
import {
  ChunkFields,
  hasRequiredFields,
  parseAdditionalParams,
  parseChunkFields,
  type ChunkRequestExtractor,
  type ExtractedChunk,
  type RawFields,
} from "./chunk.request.js";

function drain(part: MultipartFile) {
  part.file.resume();
}

/**
 * Reads a multipart chunk upload. When the declared fields precede the
 * `chunk` file part (the usual client order) the file streams straight into
 * `submit`; a file part that arrives first is buffered, bounded by the
 * multipart file size limit, and submitted after the fields.
 */
export const extractMultipartChunk: ChunkRequestExtractor<FastifyRequest> = async <T>(
  req: FastifyRequest,
  submit: (submission: ChunkSubmission, payload: Readable) => Promise<T>
): Promise<ExtractedChunk<T>> => {
  const raw: RawFields = {};
  let submitted: { submission: ChunkSubmission; result: T } | null = null;
  let buffered: Buffer | null = null;

  for await (const part of req.parts()) {
    if (part.type === "field") {
      if (typeof part.value === "string") {
        raw[part.fieldname] = part.value;
      }
      continue;
    }

    if (part.fieldname !== ChunkFields.file || submitted || buffered) {
      drain(part);
      continue;
    }

    if (!hasRequiredFields(raw)) {
      buffered = await part.toBuffer();
      continue;
    }

    let submission: ChunkSubmission;
    try {
      submission = parseChunkFields(raw);
    } catch (err) {
      drain(part);
      throw err;
    }

    try {
      submitted = { submission, result: await submit(submission, part.file) };
    } catch (err) {
      if (!part.file.destroyed) drain(part);
      throw err;
    }
  }

  if (!submitted) {
    if (!buffered) {
      throw UploadError.validation("INVALID_CHUNK", "Multipart file field 'chunk' is required");
    }

    const submission = parseChunkFields(raw);
    submitted = { submission, result: await submit(submission, Readable.from([buffered])) };
  }

  return {
    submission: submitted.submission,
    additionalParams: parseAdditionalParams(raw[ChunkFields.additionalParams]),
    result: submitted.result,
  };
};
