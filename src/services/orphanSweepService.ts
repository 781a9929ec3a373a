import { CronJob } from "cron";
import { BlobStore, ImageMetadataStore } from "../stores/types";
import { blobIdOf, blobNameFor } from "../utils/filename";
import { hasErrorCode } from "../utils/errors";
import { KeyedLock } from "../utils/keyedLock";
import logger from "../utils/logger";

export interface OrphanSweepDeps {
  blobs: BlobStore;
  images: ImageMetadataStore;
  graceMinutes: number;
  now?: () => Date;
  /** Share the coordinator's locks so a blob is never removed mid-delete. */
  locks?: KeyedLock;
}

export interface OrphanSweepReport {
  removedBlobs: string[];
  danglingImageIds: string[];
}

/**
 * Removes blob files that no image row refers to, and reports rows whose
 * blob is missing. Blobs younger than the grace period are left alone:
 * uploads write the blob before inserting the row.
 */
export const sweepOrphanBlobs = async ({
  blobs,
  images,
  graceMinutes,
  now = () => new Date(),
  locks = new KeyedLock(),
}: OrphanSweepDeps): Promise<OrphanSweepReport> => {
  const threshold = now().getTime() - graceMinutes * 60 * 1000;
  const records = await images.listAllImages();
  const entries = await blobs.listEntries();

  const expectedNames = new Set(
    records.map((image) => blobNameFor(image.imageId, image.filename))
  );

  const removeIfOrphan = async (name: string, imageId: string | null): Promise<boolean> => {
    // A prefix that still has a row is a naming mismatch, not an orphan
    if (imageId !== null && (await images.ownerOfImage(imageId)) !== null) {
      logger.error(
        `[OrphanSweep] Blob ${name} does not match the filename recorded for image ${imageId}`
      );
      return false;
    }

    let modifiedAt: Date;
    try {
      modifiedAt = await blobs.lastModified(name);
    } catch (error) {
      // Removed by an image delete while we waited for its lock
      if (hasErrorCode(error, "ENOENT")) return false;
      throw error;
    }
    if (modifiedAt.getTime() > threshold) return false;

    await blobs.remove(name);
    return true;
  };

  const removedBlobs: string[] = [];
  for (const name of entries) {
    if (expectedNames.has(name)) continue;

    const imageId = blobIdOf(name);
    const key = imageId === null ? `blob:${name}` : `image:${imageId}`;
    if (await locks.run(key, () => removeIfOrphan(name, imageId))) {
      removedBlobs.push(name);
    }
  }

  const present = new Set(entries);
  const danglingImageIds = records
    .filter((image) => !present.has(blobNameFor(image.imageId, image.filename)))
    .map((image) => image.imageId);

  if (danglingImageIds.length > 0) {
    logger.error(
      `[OrphanSweep] ${danglingImageIds.length} image row(s) have no blob: ${danglingImageIds.join(", ")}`
    );
  }
  if (removedBlobs.length > 0) {
    logger.info(`[OrphanSweep] Removed ${removedBlobs.length} orphaned blob(s).`);
  } else {
    logger.info("[OrphanSweep] No orphaned blobs found.");
  }

  return { removedBlobs, danglingImageIds };
};

// Scheduled entry point: failures are logged and the next tick tries again
export const runOrphanSweep = async (deps: OrphanSweepDeps): Promise<void> => {
  try {
    await sweepOrphanBlobs(deps);
  } catch (error) {
    logger.error("[OrphanSweep] Error during sweep:", error);
  }
};

export const createOrphanSweepJob = (
  deps: OrphanSweepDeps,
  schedule: string
): CronJob =>
  new CronJob(
    schedule,
    async () => {
      logger.info("[OrphanSweep] Cron job triggered. Running sweep...");
      await runOrphanSweep(deps);
    },
    null, // onComplete
    false, // started explicitly by the server
    "UTC"
  );
