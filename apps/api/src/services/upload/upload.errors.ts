// src/services/upload/upload.errors.ts

import type { ApiErrorCode } from "../../utils/apiError.js";

/**
 * validation: caller must fix the request.
 * conflict: the request disagrees with recorded upload state.
 * io: disk failure, retryable.
 * integrity: assembled bytes disagree with the declaration.
 * missing_chunk: assembler reached an empty slot.
 */
export type UploadErrorKind =
  | "validation"
  | "conflict"
  | "io"
  | "integrity"
  | "missing_chunk";

const STATUS_BY_KIND: Record<UploadErrorKind, number> = {
  validation: 400,
  conflict: 409,
  integrity: 422,
  io: 500,
  missing_chunk: 500,
};

export class UploadError extends Error {
  readonly code: ApiErrorCode;
  readonly kind: UploadErrorKind;
  readonly details?: Record<string, unknown>;
  readonly retryable: boolean;

  constructor(
    code: ApiErrorCode,
    kind: UploadErrorKind,
    message: string,
    options?: {
      details?: Record<string, unknown>;
      retryable?: boolean;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = "UploadError";
    this.code = code;
    this.kind = kind;
    this.details = options?.details;
    this.retryable = options?.retryable ?? kind === "io";
  }

  get statusCode(): number {
    return STATUS_BY_KIND[this.kind];
  }

  static validation(code: ApiErrorCode, message: string, details?: Record<string, unknown>) {
    return new UploadError(code, "validation", message, { details });
  }

  static io(code: ApiErrorCode, message: string, cause: unknown) {
    return new UploadError(code, "io", `${message}: ${describeError(cause)}`, { cause });
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}
