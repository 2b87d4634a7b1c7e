// src/utils/apiError.ts

import type { FastifyReply } from "fastify";

/**
 * Canonical API error codes.
 * MUST stay in sync with routes and services.
 */
export type ApiErrorCode =
  | "INVALID_REQUEST_BODY"
  | "INVALID_QUERY"
  | "INVALID_CHUNK"
  | "CHUNK_TOO_LARGE"
  | "CHUNK_OUT_OF_RANGE"
  | "TOTAL_CHUNKS_MISMATCH"
  | "FILE_SIZE_MISMATCH"
  | "UPLOAD_ASSEMBLING"
  | "UPLOAD_ALREADY_COMPLETED"
  | "CHUNK_WRITE_FAILED"
  | "CHUNK_NOT_FOUND"
  | "MISSING_CHUNK"
  | "SIZE_MISMATCH"
  | "ASSEMBLY_FAILED"
  | "REQUEST_ERROR"
  | "INTERNAL_ERROR";

export interface ApiErrorResponse {
  error: {
    code: ApiErrorCode;
    message: string;
    retryable: boolean;
    details?: Record<string, unknown>;
  };
}

export function sendApiError(
  reply: FastifyReply,
  statusCode: number,
  code: ApiErrorCode,
  message: string,
  options?: {
    retryable?: boolean;
    details?: Record<string, unknown>;
  }
) {
  const safeStatus =
    Number.isInteger(statusCode) &&
    statusCode >= 400 &&
    statusCode <= 599
      ? statusCode
      : 500;

  const response: ApiErrorResponse = {
    error: {
      code,
      message,
      retryable: options?.retryable ?? false,
      ...(options?.details && { details: options.details }),
    },
  };

  return reply.code(safeStatus).send(response);
}
