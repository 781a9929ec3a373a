import { Request, Response, NextFunction } from "express";
import multer from "multer";
import { AppError } from "../utils/errors";
import logger from "../utils/logger";

// express.json() rejects unparsable bodies with a SyntaxError tagged by body-parser
const isMalformedBody = (err: unknown): boolean =>
  err instanceof SyntaxError && "type" in err && err.type === "entity.parse.failed";

export const errorHandler = (
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void => {
  if (err instanceof multer.MulterError) {
    const statusCode = err.code === "LIMIT_FILE_SIZE" ? 413 : 400;
    logger.warn(`[errorHandler] Upload rejected: ${err.code}`);
    res.status(statusCode).json({
      status: "error",
      code: err.code,
      message: err.message,
    });
    return;
  }

  if (isMalformedBody(err)) {
    logger.warn("[errorHandler] Malformed JSON body");
    res.status(400).json({
      status: "error",
      code: "MALFORMED_BODY",
      message: "Request body is not valid JSON",
    });
    return;
  }

  // Operational, expected error: send message to client
  if (err instanceof AppError && err.isOperational) {
    logger.warn(`[errorHandler] ${err.code}: ${err.message}`);
    res.status(err.statusCode).json({
      status: "error",
      code: err.code,
      message: err.message,
    });
    return;
  }

  // Integrity faults, failed cascades and unknown errors: don't leak details
  logger.error("ERROR 💥", err);
  res.status(500).json({
    status: "error",
    code: err instanceof AppError ? err.code : "INTERNAL_ERROR",
    message: "Something went very wrong!",
  });
};
