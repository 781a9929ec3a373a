import { createHash } from "crypto";

export const ALLOWED_IMAGE_EXTENSIONS: ReadonlySet<string> = new Set([
  "png",
  "jpg",
  "jpeg",
  "gif",
]);

/** Extension check on the last dot-separated segment, case-insensitive. */
export const isAllowedImage = (filename: string): boolean => {
  const dot = filename.lastIndexOf(".");
  if (dot === -1) return false;
  return ALLOWED_IMAGE_EXTENSIONS.has(filename.slice(dot + 1).toLowerCase());
};

/**
 * Reduce an uploaded filename to a safe ASCII name: accents are decomposed
 * and dropped, path separators and whitespace runs become "_", anything
 * outside [A-Za-z0-9_.-] is removed and leading/trailing dots and
 * underscores are trimmed. May return "" for names with nothing usable.
 */
export const secureFilename = (filename: string): string =>
  filename
    .normalize("NFKD")
    .replace(/[^\x00-\x7F]/g, "")
    .replace(/[/\\]/g, " ")
    .split(/\s+/)
    .filter((part) => part.length > 0)
    .join("_")
    .replace(/[^A-Za-z0-9_.-]/g, "")
    .replace(/^[._]+|[._]+$/g, "");

/** sha1 hex of the upload timestamp followed by the sanitised filename. */
export const imageUid = (uploadedAt: string, filename: string): string =>
  createHash("sha1").update(uploadedAt + filename).digest("hex");

export const blobNameFor = (imageId: string, filename: string): string =>
  `${imageId}-${filename}`;

/** The image id a blob file belongs to: everything before the first "-". */
export const blobIdOf = (blobName: string): string | null => {
  const dash = blobName.indexOf("-");
  return dash > 0 ? blobName.slice(0, dash) : null;
};
