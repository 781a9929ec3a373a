import { ImageMetadataStore, NoteStore } from "../stores/types";
import { RequestContext } from "../types/context";
import { ADMIN_ID } from "../utils/identity";
import { ResourceNotFoundError, UnauthorizedError } from "../utils/errors";

/**
 * "owner": only the creator may act (mutations).
 * "owner-or-admin": the creator or ADMIN may act (viewing).
 */
export type AccessMode = "owner" | "owner-or-admin";

export const authorize = (
  requesterId: string,
  resourceOwnerId: string,
  mode: AccessMode = "owner-or-admin"
): boolean => {
  if (requesterId === resourceOwnerId) return true;
  return mode === "owner-or-admin" && requesterId === ADMIN_ID;
};

export class OwnershipGuard {
  constructor(
    private readonly notes: NoteStore,
    private readonly images: ImageMetadataStore
  ) {}

  requireAdmin(ctx: RequestContext): void {
    if (ctx.userId !== ADMIN_ID) {
      throw new UnauthorizedError(
        "Only ADMIN may perform this operation",
        "ADMIN_REQUIRED"
      );
    }
  }

  /** Resolves the note's owner and checks the requester is that owner. */
  async requireNoteOwner(ctx: RequestContext, noteId: string): Promise<string> {
    const ownerId = await this.notes.ownerOfNote(noteId);
    if (ownerId === null) {
      throw new ResourceNotFoundError("Note not found", "NOTE_NOT_FOUND", {
        noteId,
      });
    }
    if (!authorize(ctx.userId, ownerId, "owner")) {
      throw new UnauthorizedError(
        "You do not have permission to modify this note",
        "NOTE_ACCESS_DENIED"
      );
    }
    return ownerId;
  }

  async requireImageAccess(
    ctx: RequestContext,
    imageId: string,
    mode: AccessMode
  ): Promise<string> {
    const ownerId = await this.images.ownerOfImage(imageId);
    if (ownerId === null) {
      throw new ResourceNotFoundError("Image not found", "IMAGE_NOT_FOUND", {
        imageId,
      });
    }
    if (!authorize(ctx.userId, ownerId, mode)) {
      throw new UnauthorizedError(
        "You do not have permission to access this image",
        "IMAGE_ACCESS_DENIED"
      );
    }
    return ownerId;
  }
}
