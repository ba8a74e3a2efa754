import { sqliteTable, text, integer, real, uniqueIndex, index } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

export const accounts = sqliteTable(
  "accounts",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    username: text("username").notNull(),
    email: text("email").notNull(),
    password: text("password").notNull(),
    isBlocked: integer("is_blocked", { mode: "boolean" }).notNull().default(false),
    ua: text("ua").notNull(),
    cookiesJson: text("cookies_json"),
    accessToken: text("access_token"),
    proxyServer: text("proxy_server"),
    proxyUsername: text("proxy_username"),
    proxyPassword: text("proxy_password"),
    lastLoginAt: integer("last_login_at"),
    lastErrorCode: text("last_error_code"),
    lastErrorDetail: text("last_error_detail"),
    lastErrorAt: integer("last_error_at"),
    createdAt: integer("created_at").notNull().default(sql`(unixepoch())`),
    updatedAt: integer("updated_at").notNull().default(sql`(unixepoch())`),
  },
  (table) => ({
    usernameIdx: uniqueIndex("accounts_username_idx").on(table.username),
    emailIdx: uniqueIndex("accounts_email_idx").on(table.email),
  })
);

export const groups = sqliteTable(
  "groups",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    externalId: text("external_id").notNull(),
    name: text("name").notNull(),
    isJoined: integer("is_joined", { mode: "boolean" }).notNull().default(false),
    accountId: integer("account_id").references(() => accounts.id, { onDelete: "cascade" }),
    createdAt: integer("created_at").notNull().default(sql`(unixepoch())`),
    updatedAt: integer("updated_at").notNull().default(sql`(unixepoch())`),
  },
  (table) => ({
    externalNameIdx: uniqueIndex("groups_external_name_idx").on(table.externalId, table.name),
    accountIdx: index("groups_account_idx").on(table.accountId),
  })
);

export const posts = sqliteTable(
  "posts",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    externalId: text("external_id").notNull(),
    groupId: integer("group_id").notNull().references(() => groups.id, { onDelete: "cascade" }),
    content: text("content").notNull().default(""),
    createdAt: integer("created_at"),
    isAnalyzed: integer("is_analyzed", { mode: "boolean" }).notNull().default(false),
    insertedAt: integer("inserted_at").notNull().default(sql`(unixepoch())`),
  },
  (table) => ({
    externalIdx: uniqueIndex("posts_external_idx").on(table.externalId),
    groupIdx: index("posts_group_idx").on(table.groupId, sql`created_at DESC`),
  })
);

export const userProfiles = sqliteTable(
  "user_profiles",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    facebookId: text("facebook_id").notNull(),
    name: text("name"),
    bio: text("bio"),
    location: text("location"),
    work: text("work"),
    education: text("education"),
    relationshipStatus: text("relationship_status"),
    profileUrl: text("profile_url").notNull(),
    profilePictureUrl: text("profile_picture_url"),
    postsSample: text("posts_sample"),
    friendsCount: integer("friends_count"),
    isVerified: integer("is_verified", { mode: "boolean" }).notNull().default(false),
    lastScraped: integer("last_scraped"),
    scrapedByAccountId: integer("scraped_by_account_id")
      .notNull()
      .references(() => accounts.id, { onDelete: "cascade" }),
    createdAt: integer("created_at").notNull().default(sql`(unixepoch())`),
    updatedAt: integer("updated_at").notNull().default(sql`(unixepoch())`),
  },
  (table) => ({
    facebookIdIdx: uniqueIndex("user_profiles_facebook_id_idx").on(table.facebookId),
    scrapedIdx: index("user_profiles_last_scraped_idx").on(table.scrapedByAccountId, sql`last_scraped DESC`),
  })
);

export const comments = sqliteTable(
  "comments",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    externalId: text("external_id").notNull(),
    postId: integer("post_id").notNull().references(() => posts.id, { onDelete: "cascade" }),
    authorProfileId: integer("author_profile_id").references(() => userProfiles.id, { onDelete: "set null" }),
    content: text("content").notNull().default(""),
    createdAt: integer("created_at"),
    insertedAt: integer("inserted_at").notNull().default(sql`(unixepoch())`),
  },
  (table) => ({
    externalIdx: uniqueIndex("comments_external_idx").on(table.externalId),
    postIdx: index("comments_post_idx").on(table.postId),
  })
);

export const financialAnalyses = sqliteTable(
  "financial_analyses",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    userProfileId: integer("user_profile_id")
      .notNull()
      .references(() => userProfiles.id, { onDelete: "cascade" }),
    financialStatus: text("financial_status", { enum: ["low", "medium", "high"] }).notNull(),
    confidenceScore: real("confidence_score").notNull(),
    analysisSummary: text("analysis_summary").notNull(),
    indicatorsJson: text("indicators_json").notNull(),
    modelName: text("model_name").notNull(),
    promptTokens: integer("prompt_tokens"),
    completionTokens: integer("completion_tokens"),
    totalTokens: integer("total_tokens"),
    sharedCallSize: integer("shared_call_size").notNull().default(1),
    createdAt: integer("created_at").notNull().default(sql`(unixepoch())`),
  },
  (table) => ({
    profileCreatedIdx: index("financial_analyses_profile_created_idx").on(
      table.userProfileId,
      sql`created_at DESC`
    ),
    statusIdx: index("financial_analyses_status_idx").on(table.financialStatus),
  })
);

export const appConfig = sqliteTable("app_config", {
  key: text("key").primaryKey(),
  value: text("value").notNull(),
  updatedAt: integer("updated_at").notNull().default(sql`(unixepoch())`),
});

export type Account = typeof accounts.$inferSelect;
export type NewAccount = typeof accounts.$inferInsert;
export type Group = typeof groups.$inferSelect;
export type NewGroup = typeof groups.$inferInsert;
export type Post = typeof posts.$inferSelect;
export type NewPost = typeof posts.$inferInsert;
export type Comment = typeof comments.$inferSelect;
export type NewComment = typeof comments.$inferInsert;
export type UserProfile = typeof userProfiles.$inferSelect;
export type NewUserProfile = typeof userProfiles.$inferInsert;
export type FinancialAnalysis = typeof financialAnalyses.$inferSelect;
export type NewFinancialAnalysis = typeof financialAnalyses.$inferInsert;
export type AppConfigEntry = typeof appConfig.$inferSelect;
