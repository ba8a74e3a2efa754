import { Router } from "express";
import { z } from "zod";
import type { Container } from "../../app/container";
import { NotFoundError, PreconditionError } from "../../core/errors";
import { generateUserAgent } from "../../core/user-agent";
import { idParam, toPublicAccount } from "../http";

const PAGE_SIZE = 20;

const createAccountSchema = z.object({
  username: z.string().min(1),
  email: z.string().email(),
  password: z.string().min(1),
  ua: z.string().min(1).optional(),
  proxyServer: z.string().min(1).optional(),
  proxyUsername: z.string().min(1).optional(),
  proxyPassword: z.string().min(1).optional(),
});

const blockSchema = z.object({ isBlocked: z.boolean() });

export function accountsRoutes(container: Container): Router {
  const router = Router();
  const { accounts } = container.repos;

  async function requireAccount(rawId: unknown) {
    const id = idParam.parse(rawId);
    const account = await accounts.findById(id);
    if (!account) throw new NotFoundError(`Account ${id} not found`);
    return account;
  }

  router.get("/", async (req, res, next) => {
    try {
      const page = Math.max(1, Number.parseInt(String(req.query.page ?? "1"), 10) || 1);
      const result = await accounts.list(page, PAGE_SIZE);
      res.json({ ...result, items: result.items.map(toPublicAccount) });
    } catch (error) {
      next(error);
    }
  });

  router.post("/", async (req, res, next) => {
    try {
      const body = createAccountSchema.parse(req.body);
      if (await accounts.findByUsername(body.username)) {
        throw new PreconditionError(`Account ${body.username} already exists`, "username_taken");
      }
      const account = await accounts.create({ ...body, ua: body.ua ?? generateUserAgent() });
      res.status(201).json({ success: true, message: "Account created", account: toPublicAccount(account) });
    } catch (error) {
      next(error);
    }
  });

  router.get("/:id", async (req, res, next) => {
    try {
      const account = await requireAccount(req.params.id);
      res.json(toPublicAccount(account));
    } catch (error) {
      next(error);
    }
  });

  router.patch("/:id/block", async (req, res, next) => {
    try {
      const account = await requireAccount(req.params.id);
      const { isBlocked } = blockSchema.parse(req.body);
      const updated = await accounts.setBlocked(account.id, isBlocked);
      if (!updated) throw new NotFoundError(`Account ${account.id} not found`);
      res.json({ success: true, message: isBlocked ? "Account blocked" : "Account unblocked", account: toPublicAccount(updated) });
    } catch (error) {
      next(error);
    }
  });

  router.post("/:id/login", async (req, res, next) => {
    try {
      const account = await requireAccount(req.params.id);
      const ok = await container.sessions.login(account);
      res.json({ success: ok, message: ok ? "Login succeeded" : "Login failed" });
    } catch (error) {
      next(error);
    }
  });

  router.post("/:id/access-token", async (req, res, next) => {
    try {
      const account = await requireAccount(req.params.id);
      const token = await container.sessions.deriveAccessToken(account);
      res.json({
        success: token !== null,
        message: token ? "Access token derived" : "Access token could not be derived",
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
