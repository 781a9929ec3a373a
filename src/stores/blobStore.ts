import fs from "fs/promises";
import path from "path";
import { BlobStore } from "./types";
import { ConflictError, ValidationError, hasErrorCode } from "../utils/errors";

/**
 * Blob store backed by a single upload directory. Names are plain file
 * names; anything that would resolve outside the directory is refused.
 */
export class FileSystemBlobStore implements BlobStore {
  private readonly root: string;

  constructor(directory: string) {
    this.root = path.resolve(directory);
  }

  async initialize(): Promise<void> {
    await fs.mkdir(this.root, { recursive: true });
  }

  pathOf(name: string): string {
    if (
      name.length === 0 ||
      name === "." ||
      name === ".." ||
      path.basename(name) !== name
    ) {
      throw new ValidationError(`Invalid blob name: ${name}`, "INVALID_BLOB_NAME");
    }
    return path.join(this.root, name);
  }

  async save(name: string, bytes: Buffer): Promise<void> {
    try {
      // "wx" fails instead of overwriting an existing blob
      await fs.writeFile(this.pathOf(name), bytes, { flag: "wx" });
    } catch (error) {
      if (hasErrorCode(error, "EEXIST")) {
        throw new ConflictError(`Blob ${name} already exists`, "BLOB_EXISTS", {
          name,
        });
      }
      throw error;
    }
  }

  async listEntries(): Promise<string[]> {
    const entries = await fs.readdir(this.root, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .sort();
  }

  async remove(name: string): Promise<void> {
    await fs.unlink(this.pathOf(name));
  }

  async lastModified(name: string): Promise<Date> {
    const stats = await fs.stat(this.pathOf(name));
    return stats.mtime;
  }
}
