import {
  BlobStore,
  CredentialStore,
  ImageMetadataStore,
  ImageRecord,
  NoteRecord,
  NoteStore,
} from "../stores/types";
import { RequestContext } from "../types/context";
import { OwnershipGuard } from "./ownershipGuard";
import { KeyedLock } from "../utils/keyedLock";
import {
  CascadeError,
  CascadeFailure,
  ConflictError,
  ForbiddenError,
  IntegrityError,
  ResourceNotFoundError,
  UnauthorizedError,
  ValidationError,
  errorMessage,
} from "../utils/errors";
import {
  blobIdOf,
  blobNameFor,
  imageUid,
  isAllowedImage,
  secureFilename,
} from "../utils/filename";
import { ADMIN_ID, isValidUserId, normalizeUserId } from "../utils/identity";
import logger from "../utils/logger";

export interface UploadedFile {
  originalName: string;
  bytes: Buffer;
}

export type UploadRejection = "NO_FILE" | "NO_FILENAME" | "EXTENSION_NOT_ALLOWED";

export type UploadOutcome =
  | { status: "stored"; image: ImageRecord }
  | { status: "rejected"; reason: UploadRejection; message: string };

export interface UserDeletionReport {
  userId: string;
  imagesRemoved: number;
  notesRemoved: number;
}

export interface CoordinatorDeps {
  credentials: CredentialStore;
  notes: NoteStore;
  images: ImageMetadataStore;
  blobs: BlobStore;
  guard?: OwnershipGuard;
  locks?: KeyedLock;
  clock?: () => Date;
}

const rejected = (reason: UploadRejection, message: string): UploadOutcome => ({
  status: "rejected",
  reason,
  message,
});

/**
 * Sequences every mutation that touches more than one store so that image
 * rows and blob files never diverge. Each resource id is serialised through
 * a keyed lock and ownership is re-resolved inside it, so a repeated delete
 * reports ResourceNotFound.
 */
export class ResourceLifecycleCoordinator {
  private readonly credentials: CredentialStore;
  private readonly notes: NoteStore;
  private readonly images: ImageMetadataStore;
  private readonly blobs: BlobStore;
  private readonly guard: OwnershipGuard;
  private readonly locks: KeyedLock;
  private readonly clock: () => Date;

  constructor(deps: CoordinatorDeps) {
    this.credentials = deps.credentials;
    this.notes = deps.notes;
    this.images = deps.images;
    this.blobs = deps.blobs;
    this.guard = deps.guard ?? new OwnershipGuard(deps.notes, deps.images);
    this.locks = deps.locks ?? new KeyedLock();
    this.clock = deps.clock ?? (() => new Date());
  }

  // --- Notes ---

  async writeNote(ctx: RequestContext, text: string): Promise<string> {
    return this.locks.run(`user:${ctx.userId}`, async () => {
      await this.requireLiveUser(ctx);
      const noteId = await this.notes.insertNote(ctx.userId, text);
      logger.info(`[Lifecycle] Note ${noteId} written by ${ctx.userId}`);
      return noteId;
    });
  }

  async listNotes(ctx: RequestContext): Promise<NoteRecord[]> {
    return this.notes.listNotesFor(ctx.userId);
  }

  async deleteNote(ctx: RequestContext, noteId: string): Promise<void> {
    await this.locks.run(`note:${noteId}`, async () => {
      await this.guard.requireNoteOwner(ctx, noteId);
      await this.notes.deleteNote(noteId);
      logger.info(`[Lifecycle] Note ${noteId} deleted by ${ctx.userId}`);
    });
  }

  // --- Images ---

  async listImages(ctx: RequestContext): Promise<ImageRecord[]> {
    return this.images.listImagesFor(ctx.userId);
  }

  /**
   * Stores an upload as blob + metadata row. Missing files and disallowed
   * extensions come back as a rejected outcome, not an error.
   */
  async uploadImage(
    ctx: RequestContext,
    file: UploadedFile | undefined
  ): Promise<UploadOutcome> {
    if (!file) {
      return rejected("NO_FILE", "No file part");
    }
    if (file.originalName === "") {
      return rejected("NO_FILENAME", "No selected file");
    }

    const filename = secureFilename(file.originalName);
    if (!isAllowedImage(file.originalName) || !isAllowedImage(filename)) {
      logger.warn(
        `[Lifecycle] Rejected upload "${file.originalName}" from ${ctx.userId}`
      );
      return rejected(
        "EXTENSION_NOT_ALLOWED",
        "Only png, jpg, jpeg and gif images can be uploaded"
      );
    }

    return this.locks.run(`user:${ctx.userId}`, () =>
      this.storeImage(ctx, file.bytes, filename)
    );
  }

  // Runs under the owner's user lock so a concurrent deleteUser sees the row
  private async storeImage(
    ctx: RequestContext,
    bytes: Buffer,
    filename: string
  ): Promise<UploadOutcome> {
    await this.requireLiveUser(ctx);

    const uploadedAt = this.clock().toISOString();
    const imageId = imageUid(uploadedAt, filename);
    const blobName = blobNameFor(imageId, filename);

    if ((await this.images.ownerOfImage(imageId)) !== null) {
      throw new ConflictError("Image id already in use", "IMAGE_ID_CONFLICT", {
        imageId,
      });
    }

    // Blob first: a blob without a row is an orphan the sweep removes,
    // a row without a blob would be a dangling reference.
    await this.blobs.save(blobName, bytes);

    const image: ImageRecord = {
      imageId,
      ownerId: ctx.userId,
      filename,
      uploadedAt,
    };
    try {
      await this.images.insertImage(image);
    } catch (error) {
      await this.blobs.remove(blobName).catch((rollbackError: unknown) => {
        logger.error(
          `[Lifecycle] Could not roll back blob ${blobName}: ${errorMessage(rollbackError)}`
        );
      });
      throw error;
    }

    logger.info(`[Lifecycle] Image ${imageId} uploaded by ${ctx.userId}`);
    return { status: "stored", image };
  }

  /** Resolves an image the requester may view to its blob path. */
  async openImage(
    ctx: RequestContext,
    imageId: string
  ): Promise<{ image: ImageRecord; path: string }> {
    await this.guard.requireImageAccess(ctx, imageId, "owner-or-admin");
    const image = await this.requireImage(imageId);
    const blobName = this.matchBlob(await this.blobs.listEntries(), image);
    return { image, path: this.blobs.pathOf(blobName) };
  }

  async deleteImage(ctx: RequestContext, imageId: string): Promise<void> {
    await this.locks.run(`image:${imageId}`, async () => {
      await this.guard.requireImageAccess(ctx, imageId, "owner");
      const image = await this.requireImage(imageId);
      // Locate the blob before mutating so an integrity fault changes nothing
      const blobName = this.matchBlob(await this.blobs.listEntries(), image);

      await this.images.deleteImageMeta(imageId);
      await this.blobs.remove(blobName);
      logger.info(`[Lifecycle] Image ${imageId} deleted by ${ctx.userId}`);
    });
  }

  // --- Users ---

  async listUsers(ctx: RequestContext): Promise<string[]> {
    this.guard.requireAdmin(ctx);
    const userIds = await this.credentials.listUserIds();
    return [...userIds].sort();
  }

  async addUser(
    ctx: RequestContext,
    id: string,
    password: string
  ): Promise<string> {
    this.guard.requireAdmin(ctx);
    const userId = normalizeUserId(id);

    if (await this.credentials.exists(userId)) {
      throw new ConflictError("User already exists", "USER_DUPLICATE", {
        userId,
      });
    }
    if (!isValidUserId(id)) {
      throw new ValidationError(
        "User id must not be empty or contain spaces or quotes",
        "USER_ID_INVALID"
      );
    }

    await this.credentials.createUser(userId, password);
    logger.info(`[Lifecycle] User ${userId} added by ${ctx.userId}`);
    return userId;
  }

  /**
   * Removes a user with every note, image row and blob they own.
   *
   * All blobs are resolved before anything is deleted. Images are then
   * removed one by one (blob, then row); if any of them fails the user
   * record and notes stay so the deletion can be retried, and a
   * CascadeError lists the images left behind.
   */
  async deleteUser(
    ctx: RequestContext,
    targetId: string
  ): Promise<UserDeletionReport> {
    const userId = normalizeUserId(targetId);
    if (userId === ADMIN_ID) {
      throw new ForbiddenError("The ADMIN account cannot be deleted", "ADMIN_UNDELETABLE");
    }
    this.guard.requireAdmin(ctx);

    return this.locks.run(`user:${userId}`, async () => {
      if (!(await this.credentials.exists(userId))) {
        throw new ResourceNotFoundError("User not found", "USER_NOT_FOUND", {
          userId,
        });
      }

      const owned = await this.images.listImagesFor(userId);
      const entries = await this.blobs.listEntries();
      const plan = owned.map((image) => ({
        image,
        blobName: this.matchBlob(entries, image),
      }));

      const failures: CascadeFailure[] = [];
      let imagesRemoved = 0;
      for (const { image, blobName } of plan) {
        try {
          const removed = await this.locks.run(`image:${image.imageId}`, async () => {
            // The owner may have deleted it while we were waiting
            if ((await this.images.ownerOfImage(image.imageId)) === null) {
              return false;
            }
            await this.blobs.remove(blobName);
            await this.images.deleteImageMeta(image.imageId);
            return true;
          });
          if (removed) imagesRemoved++;
        } catch (error) {
          failures.push({ imageId: image.imageId, reason: errorMessage(error) });
        }
      }

      if (failures.length > 0) {
        logger.error(
          `[Lifecycle] Deleting user ${userId} failed for ${failures.length} image(s)`,
          failures
        );
        throw new CascadeError(userId, failures);
      }

      const notesRemoved = await this.notes.deleteNotesFor(userId);
      await this.credentials.deleteUser(userId);
      logger.info(
        `[Lifecycle] User ${userId} deleted by ${ctx.userId} (${imagesRemoved} images, ${notesRemoved} notes)`
      );
      return { userId, imagesRemoved, notesRemoved };
    });
  }

  /** Creates the ADMIN account at start-up when it is missing. */
  async ensureAdminAccount(password: string): Promise<boolean> {
    if (await this.credentials.exists(ADMIN_ID)) {
      return false;
    }
    if (password === "") {
      logger.warn(
        "[Lifecycle] No ADMIN account and no ADMIN_PASSWORD configured; admin routes are unusable"
      );
      return false;
    }
    await this.credentials.createUser(ADMIN_ID, password);
    logger.info("[Lifecycle] Created ADMIN account");
    return true;
  }

  // --- Helpers ---

  // The session may outlive the account when the user is deleted meanwhile
  private async requireLiveUser(ctx: RequestContext): Promise<void> {
    if (!(await this.credentials.exists(ctx.userId))) {
      throw new UnauthorizedError("User no longer exists", "USER_GONE", {
        userId: ctx.userId,
      });
    }
  }

  private async requireImage(imageId: string): Promise<ImageRecord> {
    const image = await this.images.findImage(imageId);
    if (!image) {
      throw new ResourceNotFoundError("Image not found", "IMAGE_NOT_FOUND", {
        imageId,
      });
    }
    return image;
  }

  /**
   * Exactly one directory entry may carry the image id as its prefix, and it
   * must be the name derived from the row.
   */
  private matchBlob(entries: string[], image: ImageRecord): string {
    const matches = entries.filter((name) => blobIdOf(name) === image.imageId);
    const expected = blobNameFor(image.imageId, image.filename);

    if (matches.length !== 1 || matches[0] !== expected) {
      logger.error(
        `[Lifecycle] Integrity fault for image ${image.imageId}: expected ${expected}, found [${matches.join(", ")}]`
      );
      throw new IntegrityError(
        `Image ${image.imageId} does not map to exactly one blob`,
        { imageId: image.imageId, expected, found: matches }
      );
    }
    return expected;
  }
}
