import multer from "multer";
import { RequestHandler } from "express";

// Keeps the single "file" part in memory; the coordinator decides where it goes
export const createImageUpload = (maxUploadBytes: number): RequestHandler =>
  multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxUploadBytes, files: 1 },
  }).single("file");
