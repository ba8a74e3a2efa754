import { and, desc, eq, inArray, isNotNull, isNull, lte, or, sql } from "drizzle-orm";
import type { NewUserProfile, UserProfile } from "../schema";
import { financialAnalyses, userProfiles } from "../schema";
import type { AppDatabase } from "../client";
import { unixNow } from "../../core/retry";

export type ProfileFields = Pick<
  NewUserProfile,
  | "name"
  | "bio"
  | "location"
  | "work"
  | "education"
  | "relationshipStatus"
  | "profilePictureUrl"
  | "postsSample"
  | "friendsCount"
  | "isVerified"
>;

export class UserProfilesRepository {
  constructor(private readonly db: AppDatabase) {}

  async findById(id: number): Promise<UserProfile | null> {
    const [result] = await this.db.select().from(userProfiles).where(eq(userProfiles.id, id)).limit(1);
    return result ?? null;
  }

  async findByIds(ids: number[]): Promise<UserProfile[]> {
    if (ids.length === 0) return [];
    return this.db.select().from(userProfiles).where(inArray(userProfiles.id, ids));
  }

  async findByFacebookId(facebookId: string): Promise<UserProfile | null> {
    const [result] = await this.db
      .select()
      .from(userProfiles)
      .where(eq(userProfiles.facebookId, facebookId))
      .limit(1);
    return result ?? null;
  }

  /** Writes freshly scraped fields and stamps `lastScraped`. */
  async upsertScraped(
    facebookId: string,
    profileUrl: string,
    accountId: number,
    fields: ProfileFields
  ): Promise<UserProfile> {
    const now = unixNow();
    const [result] = await this.db
      .insert(userProfiles)
      .values({ ...fields, facebookId, profileUrl, scrapedByAccountId: accountId, lastScraped: now })
      .onConflictDoUpdate({
        target: userProfiles.facebookId,
        set: { ...fields, profileUrl, scrapedByAccountId: accountId, lastScraped: now, updatedAt: now },
      })
      .returning();
    if (!result) {
      throw new Error(`Failed to upsert profile ${facebookId}`);
    }
    return result;
  }

  /** Returns the known profile or creates an unscraped stub (`lastScraped` null). */
  async findOrCreateStub(
    facebookId: string,
    profileUrl: string,
    accountId: number,
    name: string | null
  ): Promise<UserProfile> {
    const existing = await this.findByFacebookId(facebookId);
    if (existing) return existing;

    const [created] = await this.db
      .insert(userProfiles)
      .values({ facebookId, profileUrl, name, scrapedByAccountId: accountId })
      .onConflictDoNothing({ target: userProfiles.facebookId })
      .returning();
    if (created) return created;

    const raced = await this.findByFacebookId(facebookId);
    if (!raced) {
      throw new Error(`Failed to create profile ${facebookId}`);
    }
    return raced;
  }

  async listRecent(limit = 50, accountId?: number): Promise<UserProfile[]> {
    return this.db
      .select()
      .from(userProfiles)
      .where(accountId === undefined ? undefined : eq(userProfiles.scrapedByAccountId, accountId))
      .orderBy(desc(userProfiles.lastScraped), desc(userProfiles.id))
      .limit(limit);
  }

  /** Profiles with a bio whose latest analysis is missing or at or before `cutoff`. */
  async listNeedingAnalysis(cutoff: number, limit = 50): Promise<UserProfile[]> {
    const latest = this.db
      .select({
        userProfileId: financialAnalyses.userProfileId,
        latestAt: sql<number>`max(${financialAnalyses.createdAt})`.as("latest_at"),
      })
      .from(financialAnalyses)
      .groupBy(financialAnalyses.userProfileId)
      .as("latest");

    const rows = await this.db
      .select({ profile: userProfiles })
      .from(userProfiles)
      .leftJoin(latest, eq(latest.userProfileId, userProfiles.id))
      .where(
        and(
          isNotNull(userProfiles.bio),
          or(isNull(latest.latestAt), lte(latest.latestAt, cutoff))
        )
      )
      .orderBy(desc(userProfiles.lastScraped), desc(userProfiles.id))
      .limit(limit);
    return rows.map((row) => row.profile);
  }
}
