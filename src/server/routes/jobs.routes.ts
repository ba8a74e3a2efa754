import { Router } from "express";
import type { Container } from "../../app/container";
import { NotFoundError } from "../../core/errors";

export function jobsRoutes(container: Container): Router {
  const router = Router();

  router.get("/", (_req, res) => {
    res.json(container.jobs.list());
  });

  router.get("/:id", (req, res, next) => {
    const job = container.jobs.get(req.params.id);
    if (!job) {
      next(new NotFoundError(`Job ${req.params.id} not found`));
      return;
    }
    res.json(job);
  });

  return router;
}
