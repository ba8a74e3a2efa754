import axios, { type AxiosInstance } from "axios";
import type { Account } from "../db/schema";
import { SessionError, errorMessage } from "../core/errors";
import { logger } from "../core/logger";
import { sleep as defaultSleep, type Sleep } from "../core/retry";
import type { SettingsStore } from "../core/settings";
import { FACEBOOK_SELECTORS, LOGIN_FAILURE_URL_PATTERNS } from "../platforms/facebook/selectors";
import { closeSessionSafely, type BrowserDriver, type BrowserSession } from "./browser/types";
import { sameCookieSet, toCookieHeader, type StoredCookie } from "./cookie-codec";
import type { CredentialStore } from "./credential-store";

export type SettingsView = Pick<SettingsStore, "current">;

/**
 * Returns the substring starting at the first `prefix` and ending before the
 * next double quote, or null when either is missing.
 */
export function extractAccessToken(text: string, prefix: string): string | null {
  const start = text.indexOf(prefix);
  if (start === -1) return null;
  const end = text.indexOf('"', start);
  if (end === -1) return null;
  return text.slice(start, end);
}

export function isAuthenticatedJar(cookies: StoredCookie[]): boolean {
  return cookies.some((c) => c.name === FACEBOOK_SELECTORS.AUTH.SESSION_COOKIE && c.value.length > 0);
}

export interface SessionManagerDeps {
  credentials: CredentialStore;
  browser: BrowserDriver;
  settings: SettingsView;
  http?: AxiosInstance;
  sleep?: Sleep;
}

export class SessionManager {
  private readonly credentials: CredentialStore;
  private readonly browser: BrowserDriver;
  private readonly settings: SettingsView;
  private readonly http: AxiosInstance;
  private readonly sleep: Sleep;

  constructor(deps: SessionManagerDeps) {
    this.credentials = deps.credentials;
    this.browser = deps.browser;
    this.settings = deps.settings;
    this.http = deps.http ?? axios.create({ timeout: 30000 });
    this.sleep = deps.sleep ?? defaultSleep;
  }

  /** Opens a session with the account's cookies replayed. The caller owns closing it. */
  async acquireSession(account: Account, options: { headless?: boolean } = {}): Promise<BrowserSession> {
    let session: BrowserSession;
    try {
      session = await this.browser.createSession({
        userAgent: account.ua,
        proxy: this.credentials.proxyFor(account),
        headless: options.headless,
      });
    } catch (error) {
      logger.error({ accountId: account.id, err: error }, "Browser failed to start");
      throw new SessionError("Browser failed to start", "browser_start_failed", { cause: error });
    }

    try {
      const stored = this.credentials.loadCookies(account);
      await session.goto(FACEBOOK_SELECTORS.HOME_URL);
      await session.setCookies(stored);
      await session.reload();

      const jar = await session.cookies();
      if (isAuthenticatedJar(jar) && !sameCookieSet(jar, stored)) {
        await this.credentials.saveCookies(account.id, jar);
      }
      return session;
    } catch (error) {
      logger.error({ accountId: account.id, err: error }, "Failed to prepare browser session");
      await closeSessionSafely(session);
      throw new SessionError("Failed to prepare browser session", "session_prepare_failed", { cause: error });
    }
  }

  /**
   * Interactive login in a visible browser. Polls until the operator closes
   * every tab, the jar authenticates, a failure page is reached, or the
   * timeout elapses. Never throws.
   */
  async login(account: Account): Promise<boolean> {
    const { loginPollIntervalMs, loginTimeoutSeconds } = this.settings.current;

    let session: BrowserSession;
    try {
      session = await this.browser.createSession({
        userAgent: account.ua,
        proxy: this.credentials.proxyFor(account),
        headless: false,
      });
    } catch (error) {
      logger.error({ accountId: account.id, err: error }, "Browser failed to start for login");
      await this.credentials.recordFailure(account.id, "browser_start_failed", errorMessage(error));
      return false;
    }

    let lastJar = this.credentials.loadCookies(account);
    const maxPolls = Math.max(1, Math.ceil((loginTimeoutSeconds * 1000) / loginPollIntervalMs));

    try {
      await session.goto(FACEBOOK_SELECTORS.LOGIN_URL);
      logger.info({ accountId: account.id }, "Waiting for login to complete in the browser");

      for (let poll = 0; poll < maxPolls; poll++) {
        if (session.openTabCount() === 0) {
          logger.info({ accountId: account.id }, "Login window closed");
          break;
        }

        const jar = await session.cookies();
        if (!sameCookieSet(jar, lastJar)) {
          await this.credentials.saveCookies(account.id, jar);
          lastJar = jar;
        }

        if (isAuthenticatedJar(jar)) {
          await this.credentials.recordLogin(account.id);
          logger.info({ accountId: account.id }, "Login succeeded");
          return true;
        }

        const url = session.currentUrl();
        if (LOGIN_FAILURE_URL_PATTERNS.some((pattern) => pattern.test(url))) {
          logger.warn({ accountId: account.id, url }, "Login reached a failure page");
          await this.credentials.recordFailure(account.id, "login_checkpoint", `Login stopped at ${url}`);
          return false;
        }

        await this.sleep(loginPollIntervalMs);
      }

      await this.credentials.recordFailure(account.id, "login_not_completed", "Login was not completed");
      return false;
    } catch (error) {
      logger.error({ accountId: account.id, err: error }, "Login failed");
      await this.credentials.recordFailure(account.id, "login_failed", errorMessage(error));
      return false;
    } finally {
      await closeSessionSafely(session);
    }
  }

  /** Fetches the token page with the stored cookies and persists the bearer token found in it. */
  async deriveAccessToken(account: Account): Promise<string | null> {
    const { tokenEndpointUrl, tokenPrefix } = this.settings.current;
    const cookies = this.credentials.loadCookies(account);
    if (cookies.length === 0) {
      logger.warn({ accountId: account.id }, "No stored cookies; cannot derive access token");
      return null;
    }

    let body: string;
    try {
      const response = await this.http.get<unknown>(tokenEndpointUrl, {
        headers: { Cookie: toCookieHeader(cookies), "User-Agent": account.ua },
        responseType: "text",
      });
      body = typeof response.data === "string" ? response.data : JSON.stringify(response.data);
    } catch (error) {
      logger.warn({ accountId: account.id, err: errorMessage(error) }, "Access token request failed");
      return null;
    }

    const token = extractAccessToken(body, tokenPrefix);
    if (!token) {
      logger.warn({ accountId: account.id }, "Access token not found in response");
      return null;
    }

    try {
      await this.credentials.saveAccessToken(account.id, token);
    } catch (error) {
      logger.warn({ accountId: account.id, err: errorMessage(error) }, "Failed to persist access token");
      return null;
    }
    return token;
  }
}
