import { z } from "zod";
import { ParseError } from "../core/errors";
import { FACEBOOK_SELECTORS } from "../platforms/facebook/selectors";

export const StoredCookieSchema = z.object({
  name: z.string().min(1),
  value: z.string(),
  domain: z.string().default(FACEBOOK_SELECTORS.AUTH.COOKIE_DOMAIN),
  path: z.string().default("/"),
  secure: z.boolean().default(true),
  httpOnly: z.boolean().default(false),
  expires: z.number().optional(),
  sameSite: z.enum(["Strict", "Lax", "None"]).optional(),
});

const CookieSetSchema = z.array(StoredCookieSchema);

export type StoredCookie = z.infer<typeof StoredCookieSchema>;

export function serializeCookies(cookies: StoredCookie[]): string {
  return JSON.stringify(CookieSetSchema.parse(cookies));
}

/** Accepts an empty/null blob as "no cookies"; anything malformed is a ParseError. */
export function parseCookies(json: string | null | undefined): StoredCookie[] {
  if (!json || json.trim() === "") return [];

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new ParseError(`Stored cookies are not valid JSON: ${error instanceof Error ? error.message : "unknown"}`);
  }

  const result = CookieSetSchema.safeParse(parsed);
  if (!result.success) {
    throw new ParseError(`Stored cookies are malformed: ${result.error.issues[0]?.message ?? "invalid"}`);
  }
  return result.data;
}

export function toCookieHeader(cookies: StoredCookie[]): string {
  return cookies.map((cookie) => `${cookie.name}=${cookie.value}`).join("; ");
}

/** Order-insensitive equality on the fields that identify and carry a cookie. */
export function sameCookieSet(a: StoredCookie[], b: StoredCookie[]): boolean {
  if (a.length !== b.length) return false;
  const key = (c: StoredCookie) => `${c.domain}|${c.path}|${c.name}=${c.value}`;
  const left = new Set(a.map(key));
  return b.every((cookie) => left.has(key(cookie)));
}
