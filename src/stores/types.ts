// Contracts between the ownership layer and the stores it coordinates.
// Owner lookups return null when the id does not resolve.

export interface NoteRecord {
  noteId: string;
  ownerId: string;
  text: string;
  createdAt: Date;
}

export interface ImageRecord {
  imageId: string;
  ownerId: string;
  filename: string; // sanitised original filename
  uploadedAt: string; // ISO-8601, also the hash input for imageId
}

export interface CredentialStore {
  verify(userId: string, password: string): Promise<boolean>;
  exists(userId: string): Promise<boolean>;
  listUserIds(): Promise<Set<string>>;
  /** Throws ConflictError when the id is taken. */
  createUser(userId: string, password: string): Promise<void>;
  deleteUser(userId: string): Promise<boolean>;
}

export interface NoteStore {
  insertNote(ownerId: string, text: string): Promise<string>;
  listNotesFor(ownerId: string): Promise<NoteRecord[]>;
  ownerOfNote(noteId: string): Promise<string | null>;
  deleteNote(noteId: string): Promise<boolean>;
  deleteNotesFor(ownerId: string): Promise<number>;
}

export interface ImageMetadataStore {
  /** Throws ConflictError when a row with the same imageId exists. */
  insertImage(record: ImageRecord): Promise<void>;
  listImagesFor(ownerId: string): Promise<ImageRecord[]>;
  listAllImages(): Promise<ImageRecord[]>;
  findImage(imageId: string): Promise<ImageRecord | null>;
  ownerOfImage(imageId: string): Promise<string | null>;
  deleteImageMeta(imageId: string): Promise<boolean>;
}

/** Flat directory of uploaded bytes, addressed by `<imageId>-<filename>`. */
export interface BlobStore {
  /** Throws ConflictError when the name is already taken. */
  save(name: string, bytes: Buffer): Promise<void>;
  listEntries(): Promise<string[]>;
  remove(name: string): Promise<void>;
  lastModified(name: string): Promise<Date>;
  /** Absolute path of a blob, for streaming it back. */
  pathOf(name: string): string;
}
