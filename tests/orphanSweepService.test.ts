import { describe, it } from "node:test";
import assert from "node:assert";
import * as fs from "fs/promises";
import * as path from "path";
import { runOrphanSweep, sweepOrphanBlobs } from "../src/services/orphanSweepService";
import { FileSystemBlobStore } from "../src/stores/blobStore";
import { KeyedLock } from "../src/utils/keyedLock";
import { MemoryImageMetadataStore, createFixture, createTestRoot } from "./helpers/memoryStores";

const HOUR_AGO = new Date(Date.now() - 60 * 60 * 1000);

describe("sweepOrphanBlobs", () => {
  it("removes old blobs without a row and keeps everything else", async () => {
    const fx = await createFixture();
    const outcome = await fx.coordinator.uploadImage(
      { userId: "ALICE" },
      { originalName: "kept.png", bytes: Buffer.from("x") }
    );
    assert.strictEqual(outcome.status, "stored");
    if (outcome.status !== "stored") return;
    const kept = `${outcome.image.imageId}-kept.png`;

    for (const name of ["deadbeef-old.png", "README"]) {
      await fs.writeFile(path.join(fx.root, name), "orphan");
      await fs.utimes(path.join(fx.root, name), HOUR_AGO, HOUR_AGO);
    }
    await fs.writeFile(path.join(fx.root, "cafe01-fresh.png"), "in flight");

    const report = await sweepOrphanBlobs({
      blobs: fx.blobs,
      images: fx.images,
      graceMinutes: 10,
    });

    assert.deepStrictEqual(report, { removedBlobs: ["README", "deadbeef-old.png"], danglingImageIds: [] });
    assert.deepStrictEqual(await fx.blobs.listEntries(), ["cafe01-fresh.png", kept].sort());

    await fx.cleanup();
  });

  it("leaves blobs whose id still has a row even when the name differs", async () => {
    const fx = await createFixture();
    await fx.images.insertImage({
      imageId: "abc123",
      ownerId: "ALICE",
      filename: "cat.png",
      uploadedAt: "2024-05-01T10:00:00.000Z",
    });
    await fs.writeFile(path.join(fx.root, "abc123-renamed.png"), "x");
    await fs.utimes(path.join(fx.root, "abc123-renamed.png"), HOUR_AGO, HOUR_AGO);

    const report = await sweepOrphanBlobs({
      blobs: fx.blobs,
      images: fx.images,
      graceMinutes: 10,
    });

    assert.deepStrictEqual(report, { removedBlobs: [], danglingImageIds: ["abc123"] });
    assert.deepStrictEqual(await fx.blobs.listEntries(), ["abc123-renamed.png"]);

    await fx.cleanup();
  });

  it("reports rows whose blob is missing", async () => {
    const fx = await createFixture();
    await fx.images.insertImage({
      imageId: "feed42",
      ownerId: "BOB",
      filename: "gone.gif",
      uploadedAt: "2024-05-01T10:00:00.000Z",
    });

    const report = await sweepOrphanBlobs({
      blobs: fx.blobs,
      images: fx.images,
      graceMinutes: 10,
    });

    assert.deepStrictEqual(report.danglingImageIds, ["feed42"]);
    assert.strictEqual(await fx.images.ownerOfImage("feed42"), "BOB");

    await fx.cleanup();
  });

  it("waits for an image delete holding the lock instead of racing it", async () => {
    class ListingSpyStore extends FileSystemBlobStore {
      onList: () => void = () => undefined;

      async listEntries(): Promise<string[]> {
        const entries = await super.listEntries();
        this.onList();
        return entries;
      }
    }

    const fx = await createFixture();
    const outcome = await fx.coordinator.uploadImage(
      { userId: "ALICE" },
      { originalName: "racy.png", bytes: Buffer.from("x") }
    );
    if (outcome.status !== "stored") throw new Error("upload was rejected");
    const { imageId } = outcome.image;

    const locks = new KeyedLock();
    const blobs = new ListingSpyStore(fx.root);
    let release = (): void => undefined;
    const gate = new Promise<void>((resolve) => {
      release = () => resolve();
    });
    let rowGone = (): void => undefined;
    const rowDeleted = new Promise<void>((resolve) => {
      rowGone = () => resolve();
    });

    // Row first, then blob, both under the image lock
    const deleting = locks.run(`image:${imageId}`, async () => {
      await fx.images.deleteImageMeta(imageId);
      rowGone();
      await gate;
      await fx.blobs.remove(`${imageId}-racy.png`);
    });
    await rowDeleted;

    // The sweep sees the blob without a row, then the delete finishes
    blobs.onList = release;
    const report = await sweepOrphanBlobs({
      blobs,
      images: fx.images,
      graceMinutes: 10,
      now: () => new Date(Date.now() + 60 * 60 * 1000),
      locks,
    });
    await deleting;

    assert.deepStrictEqual(report, { removedBlobs: [], danglingImageIds: [] });
    assert.deepStrictEqual(await fx.blobs.listEntries(), []);

    await fx.cleanup();
  });

  it("uses the injected clock for the grace period", async () => {
    const fx = await createFixture();
    await fs.writeFile(path.join(fx.root, "deadbeef-new.png"), "x");

    const report = await sweepOrphanBlobs({
      blobs: fx.blobs,
      images: fx.images,
      graceMinutes: 10,
      now: () => new Date(Date.now() + 11 * 60 * 1000),
    });

    assert.deepStrictEqual(report.removedBlobs, ["deadbeef-new.png"]);

    await fx.cleanup();
  });
});

describe("runOrphanSweep", () => {
  it("logs and resolves when the sweep fails", async () => {
    // Never initialised, so listing the directory fails
    const blobs = new FileSystemBlobStore(createTestRoot());

    await assert.doesNotReject(() =>
      runOrphanSweep({ blobs, images: new MemoryImageMetadataStore(), graceMinutes: 10 })
    );
  });
});
