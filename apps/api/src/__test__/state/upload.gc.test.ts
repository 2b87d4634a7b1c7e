import fs from "fs/promises";
import path from "path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { runUploadGc } from "../../state/gc/upload.gc.worker.js";
import { reconcileOrphanChunks } from "../../state/gc/upload.gc.reconcile.js";
import { identityDirName } from "../../store/disk.chunk.store.js";
import { createTestLogger, createTestUploader, listFiles, makeTempDir, removeDir, streamOf } from "../helpers.js";

describe("runUploadGc", () => {
  let root: string;
  let clock: number;
  let ctx: ReturnType<typeof createTestUploader>;

  beforeEach(async () => {
    root = await makeTempDir();
    clock = 10_000;
    ctx = createTestUploader(root, { now: () => clock });
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it("abandons only uploads idle for longer than the TTL", async () => {
    await ctx.uploader.submitChunk(
      { fileName: "stale.bin", chunkIndex: 0, totalChunks: 2, fileSize: 2 },
      streamOf("a")
    );
    clock = 50_000;
    await ctx.uploader.submitChunk(
      { fileName: "active.bin", chunkIndex: 0, totalChunks: 2, fileSize: 2 },
      streamOf("b")
    );

    const removed = await runUploadGc(ctx.uploader, 30_000, ctx.log, 55_000);

    expect(removed).toEqual(["stale.bin"]);
    expect(ctx.uploader.status("stale.bin").exists).toBe(false);
    expect(ctx.uploader.status("active.bin").receivedCount).toBe(1);
    expect(await listFiles(ctx.tmpDir)).toEqual([identityDirName("active.bin")]);
  });

  it("keeps an upload that receives a chunk after the idle scan", async () => {
    const declaration = { fileName: "b.bin", totalChunks: 2, fileSize: 2 };
    await ctx.uploader.submitChunk(
      { fileName: "a.bin", chunkIndex: 0, totalChunks: 2, fileSize: 2 },
      streamOf("a")
    );
    await ctx.uploader.submitChunk({ ...declaration, chunkIndex: 0 }, streamOf("b"));
    const late = await ctx.store.save("b.bin", 1, streamOf("c"));

    clock = 100_000;
    const sweep = runUploadGc(ctx.uploader, 30_000, ctx.log, 100_000);
    ctx.index.insert("b.bin", declaration, 1, late);

    expect(await sweep).toEqual(["a.bin"]);
    expect(ctx.uploader.status("a.bin").exists).toBe(false);
    expect(ctx.uploader.status("b.bin")).toEqual({
      exists: true,
      complete: true,
      receivedCount: 2,
      totalChunks: 2,
    });
  });

  it("does nothing when no upload is idle", async () => {
    expect(await runUploadGc(ctx.uploader, 30_000, ctx.log, 20_000)).toEqual([]);
    expect(ctx.log.warn).not.toHaveBeenCalled();
  });
});

describe("reconcileOrphanChunks", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it("removes identity directories left by a previous process", async () => {
    const orphan = path.join(root, identityDirName("left-behind.bin"));
    await fs.mkdir(orphan);
    await fs.writeFile(path.join(orphan, "0.chunk"), "stale");
    await fs.mkdir(path.join(root, "keep-me"));
    await fs.writeFile(path.join(root, "a".repeat(64)), "not a directory");

    const log = createTestLogger();
    const removed = await reconcileOrphanChunks(root, log);

    expect(removed).toBe(1);
    expect(await listFiles(root)).toEqual(["a".repeat(64), "keep-me"]);
  });

  it("tolerates a missing chunk directory", async () => {
    const log = createTestLogger();

    expect(await reconcileOrphanChunks(path.join(root, "absent"), log)).toBe(0);
    expect(log.warn).toHaveBeenCalledTimes(1);
  });
});
