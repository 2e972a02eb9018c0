import express from "express";
import { env } from "./config/env";
import { evaluationsRouter } from "./routes/evaluations";
import { errorHandler, notFoundHandler } from "./middlewares/errorHandler";

const ALLOWED_ORIGINS = (env.CORS_ORIGINS ?? "")
  .split(",")
  .map((o) => o.trim())
  .filter(Boolean);

export function createApp() {
  const app = express();
  app.use(express.json({ limit: env.JSON_BODY_LIMIT }));

  app.use((req, res, next) => {
    const origin = req.headers.origin;
    if (origin && ALLOWED_ORIGINS.includes(origin)) {
      res.setHeader("Access-Control-Allow-Origin", origin);
    }
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");
    if (req.method === "OPTIONS") {
      return res.sendStatus(204);
    }
    next();
  });

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.use("/api/evaluations", evaluationsRouter);
  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}
