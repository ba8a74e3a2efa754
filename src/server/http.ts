import type { NextFunction, Request, Response } from "express";
import { z, ZodError } from "zod";
import type { Account } from "../db/schema";
import { httpStatusFor, publicMessageFor } from "../core/errors";
import { logger } from "../core/logger";

export const idParam = z.coerce.number().int().positive();

export function queryLimit(value: unknown, fallback = 50, max = 200): number {
  const parsed = typeof value === "string" ? Number.parseInt(value, 10) : Number.NaN;
  if (Number.isNaN(parsed)) return fallback;
  return Math.min(Math.max(parsed, 1), max);
}

export function toPublicAccount(account: Account) {
  const { password: _password, cookiesJson, accessToken, proxyPassword: _proxyPassword, ...rest } = account;
  return { ...rest, hasCookies: Boolean(cookiesJson), hasAccessToken: Boolean(accessToken) };
}

export function errorMiddleware(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof ZodError) {
    const detail = err.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; ");
    res.status(400).json({ detail });
    return;
  }

  const status = httpStatusFor(err);
  if (status >= 500) {
    logger.error({ err }, "Request failed");
  } else {
    logger.warn({ err: err instanceof Error ? err.message : err }, "Request rejected");
  }
  res.status(status).json({ detail: publicMessageFor(err) });
}
