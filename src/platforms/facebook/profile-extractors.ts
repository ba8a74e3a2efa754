import type { BrowserSession } from "../../services/browser/types";
import type { ProfileFields } from "../../db/repositories/user-profiles.repo";
import { logger } from "../../core/logger";
import {
  ACCESS_WALL_MARKERS,
  FACEBOOK_SELECTORS,
  POSTS_SAMPLE_LIMIT,
  POSTS_SAMPLE_MIN_LENGTH,
  POSTS_SAMPLE_SEPARATOR,
} from "./selectors";

type ExtractedFields = { [K in keyof ProfileFields]?: NonNullable<ProfileFields[K]> };

interface FieldExtractor {
  field: keyof ProfileFields;
  extract(session: BrowserSession): Promise<ExtractedFields>;
}

async function firstText(session: BrowserSession, selectors: readonly string[]): Promise<string | null> {
  for (const selector of selectors) {
    const text = await session.textOf(selector);
    if (text) return text;
  }
  return null;
}

function textField(
  field: "name" | "bio" | "work" | "education" | "location" | "relationshipStatus",
  selectors: readonly string[]
): FieldExtractor {
  return {
    field,
    async extract(session) {
      const found: ExtractedFields = {};
      const text = await firstText(session, selectors);
      if (text) found[field] = text;
      return found;
    },
  };
}

export function parseCount(text: string): number | null {
  const match = text.replace(/,/g, "").match(/(\d+(?:\.\d+)?)\s*([KkMm])?/);
  if (!match?.[1]) return null;
  const base = Number.parseFloat(match[1]);
  const multiplier = match[2]?.toLowerCase() === "k" ? 1_000 : match[2]?.toLowerCase() === "m" ? 1_000_000 : 1;
  return Math.round(base * multiplier);
}

export const PROFILE_EXTRACTORS: FieldExtractor[] = [
  textField("name", FACEBOOK_SELECTORS.PROFILE.NAME),
  textField("bio", FACEBOOK_SELECTORS.PROFILE.BIO),
  textField("work", FACEBOOK_SELECTORS.PROFILE.WORK),
  textField("education", FACEBOOK_SELECTORS.PROFILE.EDUCATION),
  textField("location", FACEBOOK_SELECTORS.PROFILE.LOCATION),
  textField("relationshipStatus", FACEBOOK_SELECTORS.PROFILE.RELATIONSHIP),
  {
    field: "profilePictureUrl",
    async extract(session) {
      for (const selector of FACEBOOK_SELECTORS.PROFILE.PICTURE) {
        const src = await session.attributeOf(selector, "src");
        if (src) return { profilePictureUrl: src };
      }
      return {};
    },
  },
  {
    field: "postsSample",
    async extract(session) {
      const texts: string[] = [];
      for (const selector of FACEBOOK_SELECTORS.PROFILE.POSTS) {
        texts.push(...(await session.allTextsOf(selector)));
      }
      const sample = texts.filter((t) => t.length > POSTS_SAMPLE_MIN_LENGTH).slice(0, POSTS_SAMPLE_LIMIT);
      return sample.length > 0 ? { postsSample: sample.join(POSTS_SAMPLE_SEPARATOR) } : {};
    },
  },
  {
    field: "friendsCount",
    async extract(session) {
      const text = await firstText(session, FACEBOOK_SELECTORS.PROFILE.FRIENDS_COUNT);
      const friendsCount = text ? parseCount(text) : null;
      return friendsCount === null ? {} : { friendsCount };
    },
  },
  {
    field: "isVerified",
    async extract(session) {
      for (const selector of FACEBOOK_SELECTORS.PROFILE.VERIFIED_BADGE) {
        if (await session.attributeOf(selector, "aria-label")) return { isVerified: true };
      }
      return {};
    },
  },
];

/**
 * Runs every extractor on the current page. Each one fails on its own;
 * the rest still run. Returns only the fields that were found.
 */
export async function extractProfileFields(
  session: BrowserSession,
  extractors: FieldExtractor[] = PROFILE_EXTRACTORS
): Promise<ExtractedFields> {
  let fields: ExtractedFields = {};
  for (const extractor of extractors) {
    try {
      fields = { ...fields, ...(await extractor.extract(session)) };
    } catch (error) {
      logger.debug({ field: extractor.field, err: error }, "Profile field extractor failed");
    }
  }
  return fields;
}

export function detectAccessWall(pageText: string): string | null {
  const haystack = pageText.toLowerCase();
  return ACCESS_WALL_MARKERS.find((marker) => haystack.includes(marker.toLowerCase())) ?? null;
}

export type { ExtractedFields, FieldExtractor };
