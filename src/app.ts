import express from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import { ZodError } from "zod";
import { env } from "./config/env";
import { createAuthRouter } from "./routes/auth";
import { createProgressRouter } from "./routes/progress";
import { createSitesRouter } from "./routes/sites";
import { createContentRouter } from "./routes/content";
import { createAchievementsRouter } from "./routes/achievements";
import { RouteDeps } from "./routes/deps";

export function buildApp(deps: RouteDeps) {
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));
  if (env.NODE_ENV !== "test") app.use(morgan("dev"));

  app.get("/health", (_req, res) => {
    res.json({ ok: true, sites: deps.catalog.sites().length });
  });

  app.use("/auth", createAuthRouter());
  app.use("/progress", createProgressRouter(deps));
  app.use("/sites", createSitesRouter(deps));
  app.use("/achievements", createAchievementsRouter(deps));
  app.use("/", createContentRouter(deps));

  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof ZodError) {
      res.status(400).json({ error: "validation_failed", detail: err.issues });
      return;
    }

    console.error("Unhandled request error:", err);
    const detail = err instanceof Error ? err.message : String(err);
    res.status(500).json({ error: "internal_server_error", detail });
  });

  return app;
}
