import cors from "cors";
import express from "express";
import { createAdminRouter } from "../routes/admin.router.js";
import { createAuthRouter } from "../routes/auth.router.js";
import { createEventPhotosRouter } from "../routes/event-photos.router.js";
import { createEventsRouter } from "../routes/events.router.js";
import { createJobsRouter } from "../routes/jobs.router.js";
import { createPublicEventsRouter } from "../routes/public-events.router.js";
import { createRequireActor, requireAdmin } from "../middleware/auth.middleware.js";
import { errorHandler } from "./error-handler.js";
import type { AppServices } from "./services.js";

export function createApp(services: AppServices) {
  const app = express();
  const requireActor = createRequireActor(services);

  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/", (_req, res) => {
    res.json({ service: "eventfolio-api" });
  });

  app.use("/public/events", createPublicEventsRouter(services));
  app.use("/auth", requireActor, createAuthRouter(services));
  app.use("/events", requireActor, createEventsRouter(services), createEventPhotosRouter(services));
  app.use("/jobs", requireActor, createJobsRouter(services));
  app.use("/admin", requireActor, requireAdmin, createAdminRouter(services));
  app.use(errorHandler);

  return app;
}
