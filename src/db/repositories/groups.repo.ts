import { and, desc, eq } from "drizzle-orm";
import type { Account, Group, NewGroup } from "../schema";
import { accounts, groups } from "../schema";
import type { AppDatabase } from "../client";
import { logger } from "../../core/logger";
import { unixNow } from "../../core/retry";

export interface GroupWithOwner {
  group: Group;
  owner: Account | null;
}

export class GroupsRepository {
  constructor(private readonly db: AppDatabase) {}

  /**
   * Creates the `(externalId, name)` group if absent and assigns the owner.
   * Runs as one transaction; a failure leaves no partial row behind.
   */
  linkToAccount(accountId: number, externalId: string, name: string, isJoined: boolean): Group {
    return this.db.transaction((tx) => {
      const existing = tx
        .select()
        .from(groups)
        .where(and(eq(groups.externalId, externalId), eq(groups.name, name)))
        .get();

      if (existing) {
        const updated = tx
          .update(groups)
          .set({ accountId, isJoined: existing.isJoined || isJoined, updatedAt: unixNow() })
          .where(eq(groups.id, existing.id))
          .returning()
          .get();
        logger.info({ groupId: updated.id, accountId }, "Group owner reassigned");
        return updated;
      }

      const created = tx.insert(groups).values({ externalId, name, isJoined, accountId }).returning().get();
      logger.info({ groupId: created.id, accountId }, "Group created");
      return created;
    });
  }

  async findById(id: number): Promise<Group | null> {
    const [result] = await this.db.select().from(groups).where(eq(groups.id, id)).limit(1);
    return result ?? null;
  }

  async findByExternalIdWithOwner(externalId: string): Promise<GroupWithOwner | null> {
    const [row] = await this.db
      .select({ group: groups, owner: accounts })
      .from(groups)
      .leftJoin(accounts, eq(groups.accountId, accounts.id))
      .where(eq(groups.externalId, externalId))
      .orderBy(desc(groups.id))
      .limit(1);
    return row ?? null;
  }

  async update(id: number, data: Partial<NewGroup>): Promise<Group | null> {
    const [result] = await this.db
      .update(groups)
      .set({ ...data, updatedAt: unixNow() })
      .where(eq(groups.id, id))
      .returning();
    return result ?? null;
  }
}
