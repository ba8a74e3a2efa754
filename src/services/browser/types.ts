import type { StoredCookie } from "../cookie-codec";

export interface ProxySettings {
  server: string;
  username?: string;
  password?: string;
}

export interface SessionOptions {
  userAgent: string;
  proxy?: ProxySettings;
  headless?: boolean;
}

/** One browser context with a single working tab. */
export interface BrowserSession {
  goto(url: string): Promise<void>;
  reload(): Promise<void>;
  currentUrl(): string;
  pageText(): Promise<string>;
  textOf(selector: string): Promise<string | null>;
  allTextsOf(selector: string): Promise<string[]>;
  attributeOf(selector: string, attribute: string): Promise<string | null>;
  openTabCount(): number;
  setCookies(cookies: StoredCookie[]): Promise<void>;
  cookies(): Promise<StoredCookie[]>;
  wait(ms: number): Promise<void>;
  close(): Promise<void>;
}

export interface BrowserDriver {
  createSession(options: SessionOptions): Promise<BrowserSession>;
}

export async function closeSessionSafely(session: BrowserSession | null): Promise<void> {
  if (!session) return;
  await session.close().catch(() => undefined);
}
