import express, { RequestHandler } from "express";
import { ResourceLifecycleCoordinator } from "../services/lifecycleCoordinator";
import { createImageController } from "../controllers/imageController";

export const createImageRoutes = (
  coordinator: ResourceLifecycleCoordinator,
  protect: RequestHandler,
  imageUpload: RequestHandler
) => {
  const { uploadImage, getImage, deleteImage } =
    createImageController(coordinator);
  const router = express.Router();

  router.use(protect);

  router.post("/", imageUpload, uploadImage);
  router.route("/:id").get(getImage).delete(deleteImage);

  return router;
};
