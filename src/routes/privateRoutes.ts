import express, { RequestHandler } from "express";
import { ResourceLifecycleCoordinator } from "../services/lifecycleCoordinator";
import { createPrivateController } from "../controllers/privateController";

export const createPrivateRoutes = (
  coordinator: ResourceLifecycleCoordinator,
  protect: RequestHandler
) => {
  const { getPrivatePage } = createPrivateController(coordinator);
  const router = express.Router();

  router.use(protect);
  router.get("/", getPrivatePage);

  return router;
};
