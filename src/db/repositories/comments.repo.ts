import { asc, eq, inArray, sql } from "drizzle-orm";
import type { Comment, NewComment } from "../schema";
import { comments } from "../schema";
import type { AppDatabase } from "../client";

export class CommentsRepository {
  constructor(private readonly db: AppDatabase) {}

  async upsertMany(items: NewComment[]): Promise<Comment[]> {
    if (items.length === 0) return [];

    await this.db
      .insert(comments)
      .values(items)
      .onConflictDoUpdate({
        target: comments.externalId,
        set: {
          content: sql`excluded.content`,
          authorProfileId: sql`excluded.author_profile_id`,
        },
      });

    const externalIds = items.map((item) => item.externalId);
    const rows = await this.db.select().from(comments).where(inArray(comments.externalId, externalIds));
    const byExternalId = new Map(rows.map((row) => [row.externalId, row]));
    return externalIds.flatMap((id) => {
      const row = byExternalId.get(id);
      return row ? [row] : [];
    });
  }

  async listByPost(postId: number): Promise<Comment[]> {
    return this.db.select().from(comments).where(eq(comments.postId, postId)).orderBy(asc(comments.createdAt));
  }
}
