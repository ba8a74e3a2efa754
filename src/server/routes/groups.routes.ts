import { Router } from "express";
import { z } from "zod";
import type { Container } from "../../app/container";
import { NotFoundError } from "../../core/errors";
import { idParam, queryLimit } from "../http";

const linkSchema = z.object({
  accountId: z.number().int().positive(),
  externalGroupId: z.string().min(1),
  groupName: z.string().min(1),
  isJoined: z.boolean().default(false),
});

const joinSchema = z.object({ accountId: z.number().int().positive() });

export function groupsRoutes(container: Container): Router {
  const router = Router();

  // Static routes first; /:id patterns would shadow them.
  router.post("/link", async (req, res, next) => {
    try {
      const body = linkSchema.parse(req.body);
      const account = await container.scraper.requireActiveAccount(body.accountId);
      const group = await container.scraper.linkGroup(account, body.externalGroupId, body.groupName, body.isJoined);
      res.json({ success: true, message: "Group linked", group });
    } catch (error) {
      next(error);
    }
  });

  router.post("/:id/join", async (req, res, next) => {
    try {
      const groupId = idParam.parse(req.params.id);
      const { accountId } = joinSchema.parse(req.body);
      const joined = await container.scraper.joinGroup(accountId, groupId);
      res.json({ success: joined, message: joined ? "Group joined" : "Group not joined" });
    } catch (error) {
      next(error);
    }
  });

  router.get("/:id/posts", async (req, res, next) => {
    try {
      const groupId = idParam.parse(req.params.id);
      const group = await container.repos.groups.findById(groupId);
      if (!group) throw new NotFoundError(`Group ${groupId} not found`);
      res.json(await container.repos.posts.listByGroup(group.id, queryLimit(req.query.limit)));
    } catch (error) {
      next(error);
    }
  });

  router.post("/:externalGroupId/scan", async (req, res, next) => {
    try {
      const posts = await container.scraper.scanGroup(req.params.externalGroupId);
      res.json({ success: true, message: `Fetched ${posts.length} posts`, posts });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
