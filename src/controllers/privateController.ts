import { Response, NextFunction } from "express";
import { AuthRequest, contextOf } from "../middleware/authMiddleware";
import { ResourceLifecycleCoordinator } from "../services/lifecycleCoordinator";

// The signed-in user's own notes and images, each with its delete link
export const createPrivateController = (
  coordinator: ResourceLifecycleCoordinator
) => {
  const getPrivatePage = async (
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const ctx = contextOf(req);
      const [notes, images] = await Promise.all([
        coordinator.listNotes(ctx),
        coordinator.listImages(ctx),
      ]);

      res.status(200).json({
        userId: ctx.userId,
        notes: notes.map((note) => ({
          noteId: note.noteId,
          text: note.text,
          createdAt: note.createdAt.toISOString(),
          deleteUrl: `/api/notes/${note.noteId}`,
        })),
        images: images.map((image) => ({
          imageId: image.imageId,
          filename: image.filename,
          uploadedAt: image.uploadedAt,
          viewUrl: `/api/images/${image.imageId}`,
          deleteUrl: `/api/images/${image.imageId}`,
        })),
      });
    } catch (err) {
      next(err);
    }
  };

  return { getPrivatePage };
};
