import express, { RequestHandler } from "express";
import { ResourceLifecycleCoordinator } from "../services/lifecycleCoordinator";
import { createNoteController } from "../controllers/noteController";

export const createNoteRoutes = (
  coordinator: ResourceLifecycleCoordinator,
  protect: RequestHandler
) => {
  const { writeNote, deleteNote } = createNoteController(coordinator);
  const router = express.Router();

  // Apply protect middleware to all note routes
  router.use(protect);

  router.post("/", writeNote);
  router.delete("/:id", deleteNote);

  return router;
};
