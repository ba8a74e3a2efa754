import axios, { type AxiosAdapter, type AxiosInstance, type InternalAxiosRequestConfig } from "axios";
import { openDatabase, type AppDatabase } from "../../src/db/client";
import { SettingsStore, type SettingsSource } from "../../src/core/settings";
import type { BrowserDriver, BrowserSession, SessionOptions } from "../../src/services/browser/types";
import type { StoredCookie } from "../../src/services/cookie-codec";
import type { ConfirmationPort } from "../../src/services/confirmation";
import type { LLMClient, LLMCompletion, LLMPrompt } from "../../src/llm/contracts";
import { AccountsRepository } from "../../src/db/repositories/accounts.repo";
import type { Account } from "../../src/db/schema";

export function createTestDb(): AppDatabase {
  return openDatabase(":memory:").db;
}

export class MemorySettingsSource implements SettingsSource {
  readonly rows = new Map<string, string>();

  async list() {
    return [...this.rows.entries()].map(([key, value]) => ({ key, value }));
  }

  async set(key: string, value: string) {
    this.rows.set(key, value);
  }
}

export function testSettings(env: NodeJS.ProcessEnv = {}): SettingsStore {
  return new SettingsStore(new MemorySettingsSource(), env);
}

export async function createAccount(db: AppDatabase, overrides: Partial<Account> = {}): Promise<Account> {
  const repo = new AccountsRepository(db);
  const suffix = Math.random().toString(36).slice(2, 8);
  return repo.create({
    username: `user-${suffix}`,
    email: `user-${suffix}@example.com`,
    password: "test-password",
    ua: "test-agent",
    ...overrides,
  });
}

export interface FakePage {
  text?: string;
  texts?: Record<string, string>;
  lists?: Record<string, string[]>;
  attributes?: Record<string, string>;
}

export class FakeSession implements BrowserSession {
  url = "about:blank";
  jar: StoredCookie[] = [];
  tabs = 1;
  closed = false;
  visited: string[] = [];
  waits: number[] = [];
  /** Called on every `cookies()` read; lets a test change the jar over time. */
  onCookiesRead?: (session: FakeSession, reads: number) => void;
  private reads = 0;

  constructor(private readonly pages: Record<string, FakePage> = {}) {}

  private get page(): FakePage {
    return this.pages[this.url] ?? {};
  }

  async goto(url: string) {
    this.url = url;
    this.visited.push(url);
  }

  async reload() {}

  currentUrl() {
    return this.url;
  }

  async pageText() {
    return this.page.text ?? "";
  }

  async textOf(selector: string) {
    return this.page.texts?.[selector] ?? null;
  }

  async allTextsOf(selector: string) {
    return this.page.lists?.[selector] ?? [];
  }

  async attributeOf(selector: string, attribute: string) {
    return this.page.attributes?.[`${selector}|${attribute}`] ?? null;
  }

  openTabCount() {
    return this.tabs;
  }

  async setCookies(cookies: StoredCookie[]) {
    this.jar = [...cookies];
  }

  async cookies() {
    this.reads++;
    this.onCookiesRead?.(this, this.reads);
    return [...this.jar];
  }

  async wait(ms: number) {
    this.waits.push(ms);
  }

  async close() {
    this.closed = true;
    this.tabs = 0;
  }
}

export class FakeBrowserDriver implements BrowserDriver {
  readonly created: SessionOptions[] = [];
  readonly sessions: FakeSession[] = [];
  failWith: Error | null = null;

  constructor(private readonly factory: () => FakeSession = () => new FakeSession()) {}

  async createSession(options: SessionOptions): Promise<BrowserSession> {
    if (this.failWith) throw this.failWith;
    this.created.push(options);
    const session = this.factory();
    this.sessions.push(session);
    return session;
  }
}

export class ScriptedLLM implements LLMClient {
  readonly prompts: LLMPrompt[] = [];

  constructor(private readonly responses: Array<LLMCompletion | Error>) {}

  async complete(prompt: LLMPrompt): Promise<LLMCompletion> {
    this.prompts.push(prompt);
    const next = this.responses.shift();
    if (!next) throw new Error("No scripted response left");
    if (next instanceof Error) throw next;
    return next;
  }
}

export class StubConfirmation implements ConfirmationPort {
  readonly asked: string[] = [];

  constructor(private readonly answer: boolean) {}

  async ask(_title: string, message: string) {
    this.asked.push(message);
    return this.answer;
  }
}

export interface StubResponse {
  status: number;
  data: unknown;
}

/** axios instance whose requests are answered in process by `respond`. */
export function stubHttp(respond: (config: InternalAxiosRequestConfig) => StubResponse): {
  http: AxiosInstance;
  requests: InternalAxiosRequestConfig[];
} {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    const { status, data } = respond(config);
    const response = { data, status, statusText: String(status), headers: {}, config };
    if (status >= 400) {
      throw new axios.AxiosError(`Request failed with status code ${status}`, "ERR_BAD_REQUEST", config, null, response);
    }
    return response;
  };
  return { http: axios.create({ adapter }), requests };
}

export const noSleep = async (_ms: number): Promise<void> => {};
