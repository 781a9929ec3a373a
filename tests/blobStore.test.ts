import { describe, it } from "node:test";
import assert from "node:assert";
import * as fs from "fs/promises";
import * as path from "path";
import { FileSystemBlobStore } from "../src/stores/blobStore";
import { ConflictError, ValidationError } from "../src/utils/errors";
import { createTestRoot } from "./helpers/memoryStores";

describe("FileSystemBlobStore", () => {
  it("saves, lists and removes blobs", async () => {
    const root = createTestRoot();
    const blobs = new FileSystemBlobStore(root);
    await blobs.initialize();

    await blobs.save("b2-second.png", Buffer.from("two"));
    await blobs.save("a1-first.png", Buffer.from("one"));

    assert.deepStrictEqual(await blobs.listEntries(), [
      "a1-first.png",
      "b2-second.png",
    ]);
    assert.strictEqual(
      await fs.readFile(path.join(root, "a1-first.png"), "utf8"),
      "one"
    );

    await blobs.remove("a1-first.png");
    assert.deepStrictEqual(await blobs.listEntries(), ["b2-second.png"]);

    await fs.rm(root, { recursive: true, force: true });
  });

  it("refuses to overwrite an existing blob", async () => {
    const root = createTestRoot();
    const blobs = new FileSystemBlobStore(root);
    await blobs.initialize();

    await blobs.save("a1-photo.png", Buffer.from("original"));
    await assert.rejects(
      () => blobs.save("a1-photo.png", Buffer.from("replacement")),
      (error: unknown) => error instanceof ConflictError && error.code === "BLOB_EXISTS"
    );
    assert.strictEqual(
      await fs.readFile(path.join(root, "a1-photo.png"), "utf8"),
      "original"
    );

    await fs.rm(root, { recursive: true, force: true });
  });

  it("rejects names that leave the upload directory", async () => {
    const blobs = new FileSystemBlobStore(createTestRoot());

    assert.throws(() => blobs.pathOf("../escape.png"), ValidationError);
    assert.throws(() => blobs.pathOf("nested/file.png"), ValidationError);
    assert.throws(() => blobs.pathOf(".."), ValidationError);
  });

  it("resolves blob paths inside the root", () => {
    const root = createTestRoot();
    const blobs = new FileSystemBlobStore(root);
    assert.strictEqual(blobs.pathOf("a1-photo.png"), path.join(path.resolve(root), "a1-photo.png"));
  });

  it("ignores sub-directories when listing", async () => {
    const root = createTestRoot();
    const blobs = new FileSystemBlobStore(root);
    await blobs.initialize();
    await fs.mkdir(path.join(root, "tmp"));
    await blobs.save("a1-photo.png", Buffer.from("x"));

    assert.deepStrictEqual(await blobs.listEntries(), ["a1-photo.png"]);

    await fs.rm(root, { recursive: true, force: true });
  });
});
