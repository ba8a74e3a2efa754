import { z } from "zod";
import { ConfigError } from "./errors";
import { logger } from "./logger";

const settingsSchema = z.object({
  postFetchLimit: z.coerce.number().int().min(1).max(100).default(20),
  commentFetchLimit: z.coerce.number().int().min(1).max(100).default(20),
  profileStaleHours: z.coerce.number().positive().default(24),
  pageSettleMs: z.coerce.number().int().min(0).default(3000),
  loginPollIntervalMs: z.coerce.number().int().min(50).default(1000),
  loginTimeoutSeconds: z.coerce.number().int().min(1).default(600),
  tokenEndpointUrl: z.string().url().default("https://business.facebook.com/content_management"),
  tokenPrefix: z.string().min(1).default("EAAG"),
  graphBaseUrl: z.string().url().default("https://graph.facebook.com/v23.0"),
  analysisBatchSize: z.coerce.number().int().min(1).max(20).default(5),
  analysisBatchDelayMs: z.coerce.number().int().min(0).default(2000),
  analysisRecentDays: z.coerce.number().positive().default(7),
});

export type Settings = z.infer<typeof settingsSchema>;
export type SettingKey = keyof Settings;

/** Environment variable that seeds each setting before stored overrides are applied. */
export const SETTING_ENV_KEYS: Record<SettingKey, string> = {
  postFetchLimit: "FB_POST_FETCH_LIMIT",
  commentFetchLimit: "FB_COMMENT_FETCH_LIMIT",
  profileStaleHours: "FB_PROFILE_STALE_HOURS",
  pageSettleMs: "FB_PAGE_SETTLE_MS",
  loginPollIntervalMs: "FB_LOGIN_POLL_INTERVAL_MS",
  loginTimeoutSeconds: "FB_LOGIN_TIMEOUT_SECONDS",
  tokenEndpointUrl: "FB_TOKEN_ENDPOINT_URL",
  tokenPrefix: "FB_TOKEN_PREFIX",
  graphBaseUrl: "FB_GRAPH_BASE_URL",
  analysisBatchSize: "ANALYSIS_BATCH_SIZE",
  analysisBatchDelayMs: "ANALYSIS_BATCH_DELAY_MS",
  analysisRecentDays: "ANALYSIS_RECENT_DAYS",
};

const SETTING_KEYS = Object.keys(SETTING_ENV_KEYS).filter(isSettingKey);

export function isSettingKey(key: string): key is SettingKey {
  return Object.prototype.hasOwnProperty.call(SETTING_ENV_KEYS, key);
}

export interface SettingsSource {
  list(): Promise<Array<{ key: string; value: string }>>;
  set(key: string, value: string): Promise<void>;
}

type RawSettings = Partial<Record<SettingKey, string>>;

/**
 * Runtime settings: environment defaults overlaid with rows from the durable
 * store. Readers always see one consistent snapshot; a rejected update leaves
 * it untouched.
 */
export class SettingsStore {
  private snapshot: Settings;

  constructor(
    private readonly store: SettingsSource,
    private readonly environment: NodeJS.ProcessEnv = process.env
  ) {
    this.snapshot = parseSettings(this.fromEnvironment());
  }

  get current(): Settings {
    return this.snapshot;
  }

  async load(): Promise<Settings> {
    return this.reload();
  }

  async reload(): Promise<Settings> {
    const raw = this.fromEnvironment();
    const rows = await this.store.list();
    for (const row of rows) {
      if (isSettingKey(row.key)) {
        raw[row.key] = row.value;
      } else {
        logger.warn({ key: row.key }, "Ignoring unknown stored setting");
      }
    }
    this.snapshot = parseSettings(raw);
    logger.debug({ settings: this.snapshot }, "Settings loaded");
    return this.snapshot;
  }

  async set(key: string, value: string): Promise<Settings> {
    if (!isSettingKey(key)) {
      throw new ConfigError(`Unknown setting: ${key}`);
    }
    const candidate: RawSettings = { ...stringify(this.snapshot), [key]: value };
    parseSettings(candidate);

    await this.store.set(key, value);
    logger.info({ key }, "Setting updated");
    return this.reload();
  }

  private fromEnvironment(): RawSettings {
    const raw: RawSettings = {};
    for (const key of SETTING_KEYS) {
      const value = this.environment[SETTING_ENV_KEYS[key]];
      if (value !== undefined && value !== "") raw[key] = value;
    }
    return raw;
  }
}

function parseSettings(raw: RawSettings): Settings {
  const result = settingsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid settings: ${issues.join("; ")}`);
  }
  return result.data;
}

function stringify(settings: Settings): RawSettings {
  const raw: RawSettings = {};
  for (const key of SETTING_KEYS) {
    raw[key] = String(settings[key]);
  }
  return raw;
}
