import { Request, Response } from "express";
import rateLimit, { RateLimitRequestHandler } from "express-rate-limit";
import logger from "../utils/logger";

// Per-IP limit on login attempts within a one-minute window
export const createLoginRateLimiter = (
  limitPerMinute: number
): RateLimitRequestHandler =>
  rateLimit({
    windowMs: 60 * 1000,
    limit: limitPerMinute,
    standardHeaders: "draft-7",
    legacyHeaders: false,
    handler: (req: Request, res: Response) => {
      logger.warn(`[rateLimiter] Rate limit exceeded: ${req.ip}`);
      res
        .status(429)
        .json({ message: "Rate limit exceeded. Please try again later." });
    },
  });
