import { Response, NextFunction } from "express";
import { AuthRequest, contextOf } from "../middleware/authMiddleware";
import { ResourceLifecycleCoordinator } from "../services/lifecycleCoordinator";
import { writeNoteSchema } from "./validation";

export const createNoteController = (
  coordinator: ResourceLifecycleCoordinator
) => {
  const writeNote = async (
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const { error, value } = writeNoteSchema.validate(req.body);
      if (error) {
        res.status(400).json({ message: error.details[0].message });
        return;
      }

      const noteId = await coordinator.writeNote(contextOf(req), value.text);
      res.status(201).json({ noteId });
    } catch (err) {
      next(err);
    }
  };

  const deleteNote = async (
    req: AuthRequest,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      await coordinator.deleteNote(contextOf(req), req.params.id);
      res.status(200).json({ message: "Note deleted successfully" });
    } catch (err) {
      next(err);
    }
  };

  return { writeNote, deleteNote };
};
