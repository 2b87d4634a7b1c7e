// src/routes/uploads.routes.ts

import type { FastifyInstance, FastifyReply, FastifyBaseLogger } from "fastify";

import { sendApiError } from "../utils/apiError.js";
import { extractMultipartChunk } from "../adapters/fastify.multipart.js";
import { UploadError } from "../services/upload/upload.errors.js";
import { identityOf, type UploadLifecycle } from "../services/upload/upload.lifecycle.js";

export type UploadRoutesOptions = {
  uploader: UploadLifecycle;
};

interface IdentityQuery {
  fileName?: string;
  uploadId?: string;
}

const COMPLETE_MESSAGE = "File uploaded and stitched successfully";

function sendUploadError(reply: FastifyReply, log: FastifyBaseLogger, err: UploadError) {
  if (err.kind === "io" || err.kind === "missing_chunk") {
    log.warn({ err, code: err.code }, "Chunk upload failed");
  } else {
    log.info({ code: err.code, message: err.message }, "Chunk upload rejected");
  }

  return sendApiError(reply, err.statusCode, err.code, err.message, {
    retryable: err.retryable,
    details: err.details,
  });
}

function resolveIdentity(query: IdentityQuery): string | null {
  const fileName = query.fileName?.trim();
  const uploadId = query.uploadId?.trim();
  if (!fileName && !uploadId) return null;
  return identityOf({ fileName: fileName ?? "", uploadId });
}

export default async function uploadRoutes(
  app: FastifyInstance,
  opts: UploadRoutesOptions
) {
  const { uploader } = opts;

  app.post("/v1/uploads/chunk", async (req, reply) => {
    if (!req.isMultipart()) {
      return sendApiError(
        reply,
        400,
        "INVALID_REQUEST_BODY",
        "Request must be multipart/form-data"
      );
    }

    try {
      const { submission, additionalParams, result } = await extractMultipartChunk(
        req,
        (s, payload) => uploader.submitChunk(s, payload)
      );

      if (result.status === "chunk_received") {
        return {
          status: result.status,
          fileName: submission.fileName,
          chunkIndex: result.chunkIndex,
          totalChunks: result.totalChunks,
          receivedChunks: result.receivedChunks,
          additionalParams,
        };
      }

      req.log.info(
        { identity: result.identity, storedName: result.metadata.storedName },
        "Upload complete"
      );

      return {
        status: result.status,
        fileName: submission.fileName,
        message: COMPLETE_MESSAGE,
        metadata: result.metadata,
        additionalParams,
      };
    } catch (err) {
      if (err instanceof UploadError) {
        return sendUploadError(reply, req.log, err);
      }
      throw err;
    }
  });

  app.get<{ Querystring: IdentityQuery }>("/v1/uploads/status", async (req, reply) => {
    const identity = resolveIdentity(req.query);
    if (!identity) {
      return sendApiError(reply, 400, "INVALID_QUERY", "fileName or uploadId is required");
    }

    const status = uploader.status(identity);

    return {
      fileName: req.query.fileName ?? identity,
      isComplete: status.complete,
      receivedChunks: status.receivedCount,
      totalChunks: status.totalChunks,
    };
  });

  // Abandons an upload (or releases chunks kept by deferred cleanup).
  // Idempotent: unknown identities also return 200.
  app.delete<{ Querystring: IdentityQuery }>("/v1/uploads", async (req, reply) => {
    const identity = resolveIdentity(req.query);
    if (!identity) {
      return sendApiError(reply, 400, "INVALID_QUERY", "fileName or uploadId is required");
    }

    try {
      await uploader.cleanup(identity);
    } catch (err) {
      if (err instanceof UploadError) {
        return sendUploadError(reply, req.log, err);
      }
      throw err;
    }

    req.log.info({ identity }, "Upload cleaned up");
    return reply.code(200).send({ ok: true, identity });
  });
}
