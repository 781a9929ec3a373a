import http from "http";
import mongoose from "mongoose";
import config from "./config";
import { createApp } from "./app";
import { FileSystemBlobStore } from "./stores/blobStore";
import {
  MongoCredentialStore,
  MongoImageMetadataStore,
  MongoNoteStore,
} from "./stores/mongoStores";
import { ResourceLifecycleCoordinator } from "./services/lifecycleCoordinator";
import { createOrphanSweepJob } from "./services/orphanSweepService";
import { KeyedLock } from "./utils/keyedLock";
import logger from "./utils/logger";

const start = async (): Promise<void> => {
  await mongoose.connect(config.mongoURI);
  logger.info("MongoDB Connected");

  const blobs = new FileSystemBlobStore(config.uploadFolder);
  await blobs.initialize();

  const credentials = new MongoCredentialStore();
  const images = new MongoImageMetadataStore();
  const locks = new KeyedLock();
  const coordinator = new ResourceLifecycleCoordinator({
    credentials,
    notes: new MongoNoteStore(),
    images,
    blobs,
    locks,
  });
  await coordinator.ensureAdminAccount(config.adminPassword);

  const server = http.createServer(createApp({ credentials, coordinator }));
  const sweepJob = createOrphanSweepJob(
    { blobs, images, graceMinutes: config.orphanSweepGraceMinutes, locks },
    config.orphanSweepCronSchedule
  );

  server.listen(config.port, () => {
    logger.info(`Server running on port ${config.port}`);
    sweepJob.start();
    logger.info(
      `[OrphanSweep] Job initiated. Will run based on schedule: ${config.orphanSweepCronSchedule}.`
    );
  });
};

start().catch((err) => {
  logger.error("Startup error:", err);
  process.exit(1);
});
