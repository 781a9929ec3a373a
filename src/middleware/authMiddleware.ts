import { Request, Response, NextFunction } from "express";
import jwt from "jsonwebtoken";
import config from "../config";
import { CredentialStore } from "../stores/types";
import { RequestContext } from "../types/context";
import { UnauthorizedError } from "../utils/errors";
import logger from "../utils/logger";

export interface AuthRequest extends Request {
  context?: RequestContext;
}

const readToken = (req: Request): string | undefined => {
  if (
    req.headers.authorization &&
    req.headers.authorization.startsWith("Bearer")
  ) {
    return req.headers.authorization.split(" ")[1];
  }
  if (req.cookies && typeof req.cookies.token === "string") {
    return req.cookies.token;
  }
  return undefined;
};

// Resolves the session token to a RequestContext; the user must still exist
export const createProtect =
  (credentials: CredentialStore) =>
  async (req: AuthRequest, res: Response, next: NextFunction): Promise<void> => {
    const token = readToken(req);
    if (!token) {
      res.status(401).json({ message: "Not authorized, no token" });
      return;
    }

    let userId: string;
    try {
      const decoded = jwt.verify(token, config.jwtSecret);
      if (typeof decoded === "string" || typeof decoded.userId !== "string") {
        res.status(401).json({ message: "Not authorized, malformed token" });
        return;
      }
      userId = decoded.userId;
    } catch (error) {
      logger.warn("[auth] Token verification error:", error);
      res.status(401).json({ message: "Not authorized, token failed" });
      return;
    }

    try {
      if (!(await credentials.exists(userId))) {
        res.status(401).json({ message: "Not authorized, user not found" });
        return;
      }
      req.context = { userId };
      next();
    } catch (error) {
      next(error);
    }
  };

/** The caller's context; only valid behind `protect`. */
export const contextOf = (req: AuthRequest): RequestContext => {
  if (!req.context) {
    throw new UnauthorizedError("User not authenticated", "NO_SESSION");
  }
  return req.context;
};
