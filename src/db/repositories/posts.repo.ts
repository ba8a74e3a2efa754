import { desc, eq, inArray, sql } from "drizzle-orm";
import type { Account, Group, NewPost, Post } from "../schema";
import { accounts, groups, posts } from "../schema";
import type { AppDatabase } from "../client";

export interface PostContext {
  post: Post;
  group: Group;
  owner: Account | null;
}

export class PostsRepository {
  constructor(private readonly db: AppDatabase) {}

  /** Inserts new posts and refreshes content of known ones. Returns the rows in input order. */
  async upsertMany(items: NewPost[]): Promise<Post[]> {
    if (items.length === 0) return [];

    await this.db
      .insert(posts)
      .values(items)
      .onConflictDoUpdate({
        target: posts.externalId,
        set: {
          content: sql`excluded.content`,
          createdAt: sql`excluded.created_at`,
        },
      });

    const externalIds = items.map((item) => item.externalId);
    const rows = await this.db.select().from(posts).where(inArray(posts.externalId, externalIds));
    const byExternalId = new Map(rows.map((row) => [row.externalId, row]));
    return externalIds.flatMap((id) => {
      const row = byExternalId.get(id);
      return row ? [row] : [];
    });
  }

  async findByExternalId(externalId: string): Promise<Post | null> {
    const [result] = await this.db.select().from(posts).where(eq(posts.externalId, externalId)).limit(1);
    return result ?? null;
  }

  async findContextByExternalId(externalId: string): Promise<PostContext | null> {
    const [row] = await this.db
      .select({ post: posts, group: groups, owner: accounts })
      .from(posts)
      .innerJoin(groups, eq(posts.groupId, groups.id))
      .leftJoin(accounts, eq(groups.accountId, accounts.id))
      .where(eq(posts.externalId, externalId))
      .limit(1);
    return row ?? null;
  }

  async listByGroup(groupId: number, limit = 50): Promise<Post[]> {
    return this.db
      .select()
      .from(posts)
      .where(eq(posts.groupId, groupId))
      .orderBy(desc(posts.createdAt))
      .limit(limit);
  }

  async markAnalyzed(id: number): Promise<Post | null> {
    const [result] = await this.db.update(posts).set({ isAnalyzed: true }).where(eq(posts.id, id)).returning();
    return result ?? null;
  }
}
