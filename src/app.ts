import express, { Express, Request, Response } from "express";
import cors from "cors";
import morgan from "morgan";
import helmet from "helmet";
import cookieParser from "cookie-parser";
import config from "./config";
import { CredentialStore } from "./stores/types";
import { ResourceLifecycleCoordinator } from "./services/lifecycleCoordinator";
import { createProtect } from "./middleware/authMiddleware";
import { errorHandler } from "./middleware/errorHandler";
import { createLoginRateLimiter } from "./middleware/rateLimiter";
import { createImageUpload } from "./middleware/upload";
import { createAuthRoutes } from "./routes/authRoutes";
import { createPrivateRoutes } from "./routes/privateRoutes";
import { createNoteRoutes } from "./routes/noteRoutes";
import { createImageRoutes } from "./routes/imageRoutes";
import { createAdminRoutes } from "./routes/adminRoutes";

export interface AppServices {
  credentials: CredentialStore;
  coordinator: ResourceLifecycleCoordinator;
}

export interface AppOptions {
  corsOrigin: string;
  loginRateLimitPerMinute: number;
  maxUploadBytes: number;
  logRequests: boolean;
}

const defaultOptions = (): AppOptions => ({
  corsOrigin: config.corsOrigin,
  loginRateLimitPerMinute: config.loginRateLimitPerMinute,
  maxUploadBytes: config.maxUploadBytes,
  logRequests: config.nodeEnv !== "test",
});

// Hosts the front-end pulls scripts, styles and fonts from
const CDN_SOURCES = [
  "https://stackpath.bootstrapcdn.com",
  "https://code.jquery.com",
  "https://cdn.jsdelivr.net",
  "https://cdnjs.cloudflare.com",
  "https://fonts.googleapis.com",
  "https://fonts.gstatic.com",
  "https://cdn.datatables.net",
];

export const createApp = (
  services: AppServices,
  overrides: Partial<AppOptions> = {}
): Express => {
  const options = { ...defaultOptions(), ...overrides };
  const app: Express = express();
  const protect = createProtect(services.credentials);

  // Middleware
  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'", ...CDN_SOURCES],
          styleSrcElem: [
            "'self'",
            "https://stackpath.bootstrapcdn.com",
            "https://cdn.jsdelivr.net",
            "https://fonts.googleapis.com",
            "https://cdn.datatables.net",
          ],
        },
      },
      strictTransportSecurity: { maxAge: 31536000, includeSubDomains: true },
      xFrameOptions: { action: "sameorigin" },
    })
  );
  app.use(cors({ origin: options.corsOrigin, credentials: true }));
  if (options.logRequests) {
    app.use(morgan(config.nodeEnv === "development" ? "dev" : "combined"));
  }
  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ limit: "1mb", extended: true }));
  app.use(cookieParser());

  // Routes
  app.use(
    "/api/auth",
    createAuthRoutes(
      services.credentials,
      protect,
      createLoginRateLimiter(options.loginRateLimitPerMinute)
    )
  );
  app.use("/api/private", createPrivateRoutes(services.coordinator, protect));
  app.use("/api/notes", createNoteRoutes(services.coordinator, protect));
  app.use(
    "/api/images",
    createImageRoutes(
      services.coordinator,
      protect,
      createImageUpload(options.maxUploadBytes)
    )
  );
  app.use("/api/admin", createAdminRoutes(services.coordinator, protect));

  // Root Route
  app.get("/", (_req: Request, res: Response) => {
    res.send("Private Locker API Running");
  });

  // Global Error Handler
  app.use(errorHandler);

  return app;
};
