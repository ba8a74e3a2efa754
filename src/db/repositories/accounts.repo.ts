import { eq, desc, count } from "drizzle-orm";
import type { Account, NewAccount } from "../schema";
import { accounts } from "../schema";
import type { AppDatabase } from "../client";
import { logger } from "../../core/logger";
import { unixNow } from "../../core/retry";

export interface AccountPage {
  items: Account[];
  total: number;
  page: number;
  pageSize: number;
}

export class AccountsRepository {
  constructor(private readonly db: AppDatabase) {}

  async create(data: NewAccount): Promise<Account> {
    const [result] = await this.db.insert(accounts).values(data).returning();
    if (!result) {
      throw new Error("Failed to create account");
    }
    logger.info({ accountId: result.id, username: result.username }, "Account created");
    return result;
  }

  async findById(id: number): Promise<Account | null> {
    const [result] = await this.db.select().from(accounts).where(eq(accounts.id, id)).limit(1);
    return result ?? null;
  }

  async findByUsername(username: string): Promise<Account | null> {
    const [result] = await this.db.select().from(accounts).where(eq(accounts.username, username)).limit(1);
    return result ?? null;
  }

  async list(page = 1, pageSize = 20): Promise<AccountPage> {
    const safePage = Math.max(1, Math.floor(page));
    const items = await this.db
      .select()
      .from(accounts)
      .orderBy(desc(accounts.createdAt), desc(accounts.id))
      .limit(pageSize)
      .offset((safePage - 1) * pageSize);
    const [totals] = await this.db.select({ total: count() }).from(accounts);
    return { items, total: totals?.total ?? 0, page: safePage, pageSize };
  }

  async update(id: number, data: Partial<NewAccount>): Promise<Account | null> {
    const [result] = await this.db
      .update(accounts)
      .set({ ...data, updatedAt: unixNow() })
      .where(eq(accounts.id, id))
      .returning();
    return result ?? null;
  }

  async setBlocked(id: number, isBlocked: boolean): Promise<Account | null> {
    const result = await this.update(id, { isBlocked });
    if (result) {
      logger.info({ accountId: id, isBlocked }, "Account block flag changed");
    }
    return result;
  }

  async recordError(id: number, errorCode: string, errorDetail: string): Promise<Account | null> {
    return this.update(id, {
      lastErrorCode: errorCode,
      lastErrorDetail: errorDetail,
      lastErrorAt: unixNow(),
    });
  }
}
