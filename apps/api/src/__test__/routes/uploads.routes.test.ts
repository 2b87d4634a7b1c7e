import fs from "fs/promises";
import path from "path";
import type { FastifyInstance } from "fastify";
import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { buildApp } from "../../app.js";
import type { UploadConfig } from "../../config/uploads.config.js";
import { listFiles, makeTempDir, multipartBody, removeDir } from "../helpers.js";

function chunkForm(
  fields: Record<string, string>,
  data: string,
  opts: { fileFirst?: boolean } = {}
) {
  const fieldParts = Object.entries(fields).map(([name, value]) => ({ name, value }));
  const filePart = { name: "chunk", filename: "blob", data };
  return multipartBody(opts.fileFirst ? [filePart, ...fieldParts] : [...fieldParts, filePart]);
}

describe("upload routes", () => {
  let root: string;
  let config: UploadConfig;
  let app: FastifyInstance;

  beforeEach(async () => {
    root = await makeTempDir();
    config = {
      tmpDir: path.join(root, "chunks"),
      uploadDir: path.join(root, "uploads"),
      maxMemoryBytes: 64,
      autoCleanup: true,
      assemblyConcurrency: 1,
    };
    ({ app } = await buildApp(config, { logger: false }));
  });

  afterEach(async () => {
    await app.close();
    await removeDir(root);
  });

  async function postChunk(form: ReturnType<typeof multipartBody>) {
    return app.inject({
      method: "POST",
      url: "/v1/uploads/chunk",
      headers: form.headers,
      payload: form.payload,
    });
  }

  it("completes a single-chunk upload", async () => {
    const res = await postChunk(
      chunkForm(
        { fileName: "hello.txt", chunkIndex: "0", totalChunks: "1", fileSize: "13", additionalParams: "" },
        "Hello, World!"
      )
    );

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body).toMatchObject({
      status: "complete",
      fileName: "hello.txt",
      message: "File uploaded and stitched successfully",
      additionalParams: {},
      metadata: {
        originalName: "hello.txt",
        fileSize: 13,
        mimeType: "text/plain; charset=utf-8",
      },
    });
    expect(body.metadata.path).toBe(path.join(config.uploadDir, body.metadata.storedName));
    expect(await fs.readFile(body.metadata.path, "utf8")).toBe("Hello, World!");
  });

  it("acknowledges a partial upload and echoes caller metadata", async () => {
    const res = await postChunk(
      chunkForm(
        {
          fileName: "big.bin",
          chunkIndex: "0",
          totalChunks: "2",
          fileSize: "13",
          additionalParams: '{"sessionId":"abc123"}',
        },
        "Hello, "
      )
    );

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      status: "chunk_received",
      fileName: "big.bin",
      chunkIndex: 0,
      totalChunks: 2,
      receivedChunks: 1,
      additionalParams: { sessionId: "abc123" },
    });

    const status = await app.inject({ method: "GET", url: "/v1/uploads/status?fileName=big.bin" });
    expect(status.json()).toEqual({
      fileName: "big.bin",
      isComplete: false,
      receivedChunks: 1,
      totalChunks: 2,
    });
  });

  it("accepts a file part sent before the fields", async () => {
    await postChunk(
      chunkForm({ fileName: "order.txt", chunkIndex: "1", totalChunks: "2", fileSize: "13" }, "World!", {
        fileFirst: true,
      })
    );
    const res = await postChunk(
      chunkForm({ fileName: "order.txt", chunkIndex: "0", totalChunks: "2", fileSize: "13" }, "Hello, ")
    );

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.status).toBe("complete");
    expect(await fs.readFile(body.metadata.path, "utf8")).toBe("Hello, World!");
  });

  it("tolerates malformed additionalParams", async () => {
    const res = await postChunk(
      chunkForm(
        { fileName: "x.bin", chunkIndex: "0", totalChunks: "2", fileSize: "2", additionalParams: "{invalid json" },
        "x"
      )
    );

    expect(res.statusCode).toBe(200);
    expect(res.json().additionalParams).toEqual({});
  });

  it("rejects an unparseable field with 400", async () => {
    const res = await postChunk(
      chunkForm({ fileName: "x.bin", chunkIndex: "invalid", totalChunks: "1", fileSize: "1" }, "x")
    );

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: { code: "INVALID_CHUNK", message: "invalid chunkIndex", retryable: false },
    });
  });

  it("rejects a request without the chunk file", async () => {
    const res = await postChunk(
      multipartBody([
        { name: "fileName", value: "x.bin" },
        { name: "chunkIndex", value: "0" },
        { name: "totalChunks", value: "1" },
        { name: "fileSize", value: "1" },
      ])
    );

    expect(res.statusCode).toBe(400);
    expect(res.json().error.message).toBe("Multipart file field 'chunk' is required");
  });

  it("rejects a non-multipart body", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/v1/uploads/chunk",
      payload: { fileName: "x" },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().error.code).toBe("INVALID_REQUEST_BODY");
  });

  it("rejects a chunk above the memory limit", async () => {
    const res = await postChunk(
      chunkForm({ fileName: "big.bin", chunkIndex: "0", totalChunks: "1", fileSize: "100" }, "z".repeat(100))
    );

    expect(res.statusCode).toBe(400);
    expect(res.json().error.code).toBe("CHUNK_TOO_LARGE");
  });

  it("maps a size mismatch to 422 and keeps no artifact", async () => {
    const res = await postChunk(
      chunkForm({ fileName: "short.txt", chunkIndex: "0", totalChunks: "1", fileSize: "50" }, "tiny")
    );

    expect(res.statusCode).toBe(422);
    expect(res.json()).toEqual({
      error: {
        code: "SIZE_MISMATCH",
        message: "File size mismatch: expected 50, got 4",
        retryable: false,
        details: { expected: 50, actual: 4 },
      },
    });
    expect(await listFiles(config.uploadDir)).toEqual([]);
  });

  it("maps a conflicting totalChunks to 409", async () => {
    await postChunk(chunkForm({ fileName: "c.bin", chunkIndex: "0", totalChunks: "3", fileSize: "3" }, "a"));
    const res = await postChunk(
      chunkForm({ fileName: "c.bin", chunkIndex: "1", totalChunks: "2", fileSize: "3" }, "b")
    );

    expect(res.statusCode).toBe(409);
    expect(res.json().error.code).toBe("TOTAL_CHUNKS_MISMATCH");
  });

  it("reports unknown uploads and requires an identity", async () => {
    const unknown = await app.inject({ method: "GET", url: "/v1/uploads/status?fileName=nope" });
    expect(unknown.json()).toEqual({
      fileName: "nope",
      isComplete: false,
      receivedChunks: 0,
      totalChunks: 0,
    });

    const missing = await app.inject({ method: "GET", url: "/v1/uploads/status" });
    expect(missing.statusCode).toBe(400);
    expect(missing.json().error.code).toBe("INVALID_QUERY");
  });

  it("cleans up an upload on DELETE", async () => {
    await postChunk(chunkForm({ fileName: "d.bin", chunkIndex: "0", totalChunks: "2", fileSize: "2" }, "a"));

    const res = await app.inject({ method: "DELETE", url: "/v1/uploads?fileName=d.bin" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true, identity: "d.bin" });
    expect(await listFiles(config.tmpDir)).toEqual([]);

    const status = await app.inject({ method: "GET", url: "/v1/uploads/status?fileName=d.bin" });
    expect(status.json().receivedChunks).toBe(0);
  });

  it("sets CORS headers and answers preflight", async () => {
    const res = await app.inject({ method: "OPTIONS", url: "/v1/uploads/chunk" });

    expect(res.statusCode).toBe(204);
    expect(res.headers["access-control-allow-origin"]).toBe("*");
    expect(res.headers["access-control-allow-methods"]).toBe("POST, GET, DELETE, OPTIONS");
  });

  it("reports healthy storage", async () => {
    await fs.mkdir(config.tmpDir, { recursive: true });
    await fs.mkdir(config.uploadDir, { recursive: true });

    const res = await app.inject({ method: "GET", url: "/health" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      status: "UP",
      ready: true,
      activeUploads: 0,
      checks: { tmpDir: { ok: true }, uploadDir: { ok: true } },
    });
  });
});
