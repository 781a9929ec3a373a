import express, { RequestHandler } from "express";
import { CredentialStore } from "../stores/types";
import { createAuthController } from "../controllers/authController";

export const createAuthRoutes = (
  credentials: CredentialStore,
  protect: RequestHandler,
  loginRateLimiter: RequestHandler
) => {
  const { loginUser, logoutUser, getMe } = createAuthController(credentials);
  const router = express.Router();

  router.post("/login", loginRateLimiter, loginUser);
  router.post("/logout", logoutUser);
  router.get("/me", protect, getMe);

  return router;
};
