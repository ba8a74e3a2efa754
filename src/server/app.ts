import express from "express";
import type { Container } from "../app/container";
import { unixNow } from "../core/retry";
import { errorMiddleware } from "./http";
import { accountsRoutes } from "./routes/accounts.routes";
import { groupsRoutes } from "./routes/groups.routes";
import { postsRoutes } from "./routes/posts.routes";
import { analysisRoutes } from "./routes/analysis.routes";
import { jobsRoutes } from "./routes/jobs.routes";
import { configRoutes } from "./routes/config.routes";

export function createApp(container: Container): express.Express {
  const app = express();

  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", timestamp: unixNow() });
  });

  app.use("/api/accounts", accountsRoutes(container));
  app.use("/api/groups", groupsRoutes(container));
  app.use("/api/posts", postsRoutes(container));
  app.use("/api/analysis", analysisRoutes(container));
  app.use("/api/jobs", jobsRoutes(container));
  app.use("/api/config", configRoutes(container));

  app.use(errorMiddleware);

  return app;
}
