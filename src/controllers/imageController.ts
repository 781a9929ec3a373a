import { Response, NextFunction } from "express";
import { AuthRequest, contextOf } from "../middleware/authMiddleware";
import { ResourceLifecycleCoordinator } from "../services/lifecycleCoordinator";

export const createImageController = (
  coordinator: ResourceLifecycleCoordinator
) => {
  const uploadImage = async (
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const file = req.file
        ? { originalName: req.file.originalname, bytes: req.file.buffer }
        : undefined;
      const outcome = await coordinator.uploadImage(contextOf(req), file);

      if (outcome.status === "rejected") {
        // Soft failure: send the caller back to their page with a flash message
        res
          .status(303)
          .location("/api/private")
          .json({
            flash: { category: "danger", message: outcome.message },
            reason: outcome.reason,
          });
        return;
      }

      res.status(201).json(outcome.image);
    } catch (err) {
      next(err);
    }
  };

  const getImage = async (
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const { path } = await coordinator.openImage(contextOf(req), req.params.id);
      res.sendFile(path, (err) => {
        if (err) next(err);
      });
    } catch (err) {
      next(err);
    }
  };

  const deleteImage = async (
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      await coordinator.deleteImage(contextOf(req), req.params.id);
      res.status(200).json({ message: "Image deleted successfully" });
    } catch (err) {
      next(err);
    }
  };

  return { uploadImage, getImage, deleteImage };
};
