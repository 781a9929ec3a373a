/**
 * In-process stand-ins for the Mongo-backed stores, used by the tests in
 * place of a database.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { tmpdir } from "os";
import { randomUUID } from "crypto";
import type {
  CredentialStore,
  ImageMetadataStore,
  ImageRecord,
  NoteRecord,
  NoteStore,
} from "../../src/stores/types";
import { FileSystemBlobStore } from "../../src/stores/blobStore";
import { ResourceLifecycleCoordinator } from "../../src/services/lifecycleCoordinator";
import { ConflictError } from "../../src/utils/errors";

export class MemoryCredentialStore implements CredentialStore {
  private readonly passwords = new Map<string, string>();

  async verify(userId: string, password: string): Promise<boolean> {
    return this.passwords.get(userId) === password;
  }

  async exists(userId: string): Promise<boolean> {
    return this.passwords.has(userId);
  }

  async listUserIds(): Promise<Set<string>> {
    return new Set(this.passwords.keys());
  }

  async createUser(userId: string, password: string): Promise<void> {
    if (this.passwords.has(userId)) {
      throw new ConflictError("User already exists", "USER_DUPLICATE", { userId });
    }
    this.passwords.set(userId, password);
  }

  async deleteUser(userId: string): Promise<boolean> {
    return this.passwords.delete(userId);
  }
}

export class MemoryNoteStore implements NoteStore {
  private readonly notes = new Map<string, NoteRecord>();
  private nextId = 1;

  async insertNote(ownerId: string, text: string): Promise<string> {
    const noteId = `note-${this.nextId++}`;
    this.notes.set(noteId, { noteId, ownerId, text, createdAt: new Date() });
    return noteId;
  }

  async listNotesFor(ownerId: string): Promise<NoteRecord[]> {
    return [...this.notes.values()].filter((note) => note.ownerId === ownerId);
  }

  async ownerOfNote(noteId: string): Promise<string | null> {
    return this.notes.get(noteId)?.ownerId ?? null;
  }

  async deleteNote(noteId: string): Promise<boolean> {
    return this.notes.delete(noteId);
  }

  async deleteNotesFor(ownerId: string): Promise<number> {
    let removed = 0;
    for (const [noteId, note] of this.notes) {
      if (note.ownerId === ownerId) {
        this.notes.delete(noteId);
        removed++;
      }
    }
    return removed;
  }
}

export class MemoryImageMetadataStore implements ImageMetadataStore {
  private readonly rows = new Map<string, ImageRecord>();
  /** When set, the next insertImage call rejects with this error. */
  failNextInsert: Error | null = null;

  async insertImage(record: ImageRecord): Promise<void> {
    if (this.failNextInsert) {
      const error = this.failNextInsert;
      this.failNextInsert = null;
      throw error;
    }
    if (this.rows.has(record.imageId)) {
      throw new ConflictError("Image id already in use", "IMAGE_ID_CONFLICT");
    }
    this.rows.set(record.imageId, { ...record });
  }

  async listImagesFor(ownerId: string): Promise<ImageRecord[]> {
    return [...this.rows.values()].filter((row) => row.ownerId === ownerId);
  }

  async listAllImages(): Promise<ImageRecord[]> {
    return [...this.rows.values()];
  }

  async findImage(imageId: string): Promise<ImageRecord | null> {
    return this.rows.get(imageId) ?? null;
  }

  async ownerOfImage(imageId: string): Promise<string | null> {
    return this.rows.get(imageId)?.ownerId ?? null;
  }

  async deleteImageMeta(imageId: string): Promise<boolean> {
    return this.rows.delete(imageId);
  }
}

export function createTestRoot(): string {
  return path.join(tmpdir(), `locker-test-${Date.now()}-${randomUUID()}`);
}

export interface Fixture {
  root: string;
  credentials: MemoryCredentialStore;
  notes: MemoryNoteStore;
  images: MemoryImageMetadataStore;
  blobs: FileSystemBlobStore;
  coordinator: ResourceLifecycleCoordinator;
  cleanup(): Promise<void>;
}

/**
 * Memory stores, a blob directory under the OS temp dir and a coordinator
 * whose clock returns `times` in order (then keeps the last one).
 */
export async function createFixture(
  times: Date[] = [new Date("2024-05-01T10:00:00.000Z")]
): Promise<Fixture> {
  const root = createTestRoot();
  const blobs = new FileSystemBlobStore(root);
  await blobs.initialize();

  const credentials = new MemoryCredentialStore();
  await credentials.createUser("ADMIN", "admin-pw");
  await credentials.createUser("ALICE", "alice-pw");
  await credentials.createUser("BOB", "bob-pw");

  const notes = new MemoryNoteStore();
  const images = new MemoryImageMetadataStore();

  let tick = 0;
  const clock = (): Date => {
    const time = times[Math.min(tick, times.length - 1)];
    tick++;
    return time;
  };

  const coordinator = new ResourceLifecycleCoordinator({
    credentials,
    notes,
    images,
    blobs,
    clock,
  });

  return {
    root,
    credentials,
    notes,
    images,
    blobs,
    coordinator,
    cleanup: () => fs.rm(root, { recursive: true, force: true }),
  };
}
