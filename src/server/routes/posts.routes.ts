import { Router } from "express";
import type { Container } from "../../app/container";
import { NotFoundError } from "../../core/errors";

export function postsRoutes(container: Container): Router {
  const router = Router();

  router.post("/:externalPostId/scan", async (req, res, next) => {
    try {
      const comments = await container.scraper.scanPost(req.params.externalPostId);
      res.json({ success: true, message: `Fetched ${comments.length} comments`, comments });
    } catch (error) {
      next(error);
    }
  });

  router.get("/:externalPostId/comments", async (req, res, next) => {
    try {
      const post = await container.repos.posts.findByExternalId(req.params.externalPostId);
      if (!post) throw new NotFoundError(`Post ${req.params.externalPostId} not found`);
      res.json(await container.repos.comments.listByPost(post.id));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
