import { Router } from "express";
import { z } from "zod";
import type { Container } from "../../app/container";

const setSchema = z.object({ value: z.union([z.string(), z.number(), z.boolean()]).transform(String) });

export function configRoutes(container: Container): Router {
  const router = Router();

  router.get("/", (_req, res) => {
    res.json(container.settings.current);
  });

  router.post("/reload", async (_req, res, next) => {
    try {
      const settings = await container.settings.reload();
      res.json({ success: true, message: "Settings reloaded", settings });
    } catch (error) {
      next(error);
    }
  });

  router.put("/:key", async (req, res, next) => {
    try {
      const { value } = setSchema.parse(req.body);
      const settings = await container.settings.set(req.params.key, value);
      res.json({ success: true, message: `Setting ${req.params.key} updated`, settings });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
