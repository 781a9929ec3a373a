import express, { RequestHandler } from "express";
import { ResourceLifecycleCoordinator } from "../services/lifecycleCoordinator";
import { createAdminController } from "../controllers/adminController";

export const createAdminRoutes = (
  coordinator: ResourceLifecycleCoordinator,
  protect: RequestHandler
) => {
  const { listUsers, addUser, deleteUser } = createAdminController(coordinator);
  const router = express.Router();

  // ADMIN itself is checked by the coordinator, so that deleting ADMIN is
  // refused as Forbidden whoever asks
  router.use(protect);

  router.route("/users").get(listUsers).post(addUser);
  router.delete("/users/:id", deleteUser);

  return router;
};
