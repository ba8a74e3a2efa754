import { asc } from "drizzle-orm";
import { appConfig, type AppConfigEntry } from "../schema";
import type { AppDatabase } from "../client";
import type { SettingsSource } from "../../core/settings";
import { unixNow } from "../../core/retry";

export class AppConfigRepository implements SettingsSource {
  constructor(private readonly db: AppDatabase) {}

  async list(): Promise<AppConfigEntry[]> {
    return this.db.select().from(appConfig).orderBy(asc(appConfig.key));
  }

  async set(key: string, value: string): Promise<void> {
    const updatedAt = unixNow();
    await this.db
      .insert(appConfig)
      .values({ key, value, updatedAt })
      .onConflictDoUpdate({ target: appConfig.key, set: { value, updatedAt } });
  }
}
