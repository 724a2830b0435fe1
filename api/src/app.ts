// api/src/app.ts
import express from "express";
import cors from "cors";
import { createAssessmentRouter, type AssessmentDeps } from "./assessment.js";
import { errorHandler } from "./middleware/errorHandler.js";

export function createApp(deps: AssessmentDeps, options: { corsOrigin?: string[] } = {}) {
  const app = express();

  app.use(express.json({ limit: "100kb" }));
  app.use(cors({ origin: options.corsOrigin ?? true, credentials: true }));

  // Quick health/ping
  app.get("/health", (_req, res) => res.json({ ok: true }));
  app.get("/", (_req, res) => res.json({ ok: true }));

  app.use(createAssessmentRouter(deps));

  // error handler
  app.use(errorHandler);

  return app;
}
