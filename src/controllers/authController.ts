import { Request, Response, NextFunction } from "express";
import config from "../config";
import { CredentialStore } from "../stores/types";
import { AuthRequest, contextOf } from "../middleware/authMiddleware";
import generateToken from "../utils/generateToken";
import { normalizeUserId } from "../utils/identity";
import logger from "../utils/logger";
import { loginSchema } from "./validation";

const cookieOptions = () => ({
  httpOnly: true,
  secure: config.nodeEnv === "production",
  sameSite: "lax" as const,
});

export const createAuthController = (credentials: CredentialStore) => {
  const loginUser = async (
    req: Request,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const { error, value } = loginSchema.validate(req.body);
      if (error) {
        res.status(400).json({ message: error.details[0].message });
        return;
      }

      const userId = normalizeUserId(value.id);
      logger.info(`[auth] Login attempt by user: ${userId}`);

      if (
        (await credentials.exists(userId)) &&
        (await credentials.verify(userId, value.pw))
      ) {
        const token = generateToken(userId);
        res.cookie("token", token, {
          ...cookieOptions(),
          maxAge: config.jwtExpiresInSeconds * 1000,
        });
        logger.info(`[auth] Successful login for user: ${userId}`);
        res.json({ userId, token });
      } else {
        logger.warn(`[auth] Failed login attempt for user: ${userId}`);
        res.status(401).json({ message: "Invalid id or password" });
      }
    } catch (err) {
      next(err);
    }
  };

  const logoutUser = (
    _req: Request,
    res: Response,
    next: NextFunction
  ): void => {
    try {
      res.cookie("token", "", { ...cookieOptions(), expires: new Date(0) });
      res.status(200).json({ message: "User logged out successfully" });
    } catch (err) {
      next(err);
    }
  };

  const getMe = (req: AuthRequest, res: Response, next: NextFunction): void => {
    try {
      const ctx = contextOf(req);
      res.status(200).json({ userId: ctx.userId });
    } catch (err) {
      next(err);
    }
  };

  return { loginUser, logoutUser, getMe };
};
