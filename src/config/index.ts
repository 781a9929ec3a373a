import dotenv from "dotenv";

dotenv.config();

const config = {
  port: process.env.PORT || "5001",
  mongoURI: process.env.MONGO_URI || "mongodb://localhost:27017/private-locker",
  jwtSecret: process.env.JWT_SECRET || "change-me",
  jwtExpiresInSeconds: parseInt(
    process.env.JWT_EXPIRES_IN_SECONDS || "86400",
    10
  ), // 1 day
  nodeEnv: process.env.NODE_ENV || "development",
  corsOrigin: process.env.CORS_ORIGIN || "http://localhost:3000",
  uploadFolder: process.env.UPLOAD_FOLDER || "uploads",
  maxUploadBytes: parseInt(process.env.MAX_UPLOAD_BYTES || "5242880", 10), // 5 MiB
  loginRateLimitPerMinute: parseInt(
    process.env.LOGIN_RATE_LIMIT_PER_MINUTE || "5",
    10
  ),
  orphanSweepCronSchedule:
    process.env.ORPHAN_SWEEP_CRON_SCHEDULE || "*/30 * * * *", // Every 30 minutes
  orphanSweepGraceMinutes: parseInt(
    process.env.ORPHAN_SWEEP_GRACE_MINUTES || "10",
    10
  ),
  // Only used to create the ADMIN account when it does not exist yet
  adminPassword: process.env.ADMIN_PASSWORD || "",
};

export default config;
