import { describe, expect, it } from "vitest";
import { SessionManager } from "../../src/services/session-manager";
import { CredentialStore } from "../../src/services/credential-store";
import { AccountsRepository } from "../../src/db/repositories/accounts.repo";
import { parseCookies } from "../../src/services/cookie-codec";
import { SessionError } from "../../src/core/errors";
import type { Account } from "../../src/db/schema";
import {
  FakeBrowserDriver,
  FakeSession,
  createAccount,
  createTestDb,
  stubHttp,
  testSettings,
  type StubResponse,
} from "../helpers/fakes";

const AUTH_COOKIES = '[{"name":"c_user","value":"42"}]';
const TOKEN_URL = "https://business.facebook.com/content_management";

class ReadOnlyCredentials extends CredentialStore {
  override async saveAccessToken(_accountId: number, _accessToken: string): Promise<void> {
    throw new Error("attempt to write a readonly database");
  }
}

class UnreachableSession extends FakeSession {
  override async goto(_url: string): Promise<void> {
    throw new Error("net::ERR_NAME_NOT_RESOLVED");
  }
}

function setup(
  options: {
    session?: () => FakeSession;
    respond?: (url: string) => StubResponse;
    environment?: NodeJS.ProcessEnv;
    onSleep?: (browser: FakeBrowserDriver) => void;
    credentials?: (accounts: AccountsRepository) => CredentialStore;
  } = {}
) {
  const db = createTestDb();
  const accounts = new AccountsRepository(db);
  const browser = new FakeBrowserDriver(options.session);
  const sleeps: number[] = [];
  const { http, requests } = stubHttp((config) => (options.respond ?? (() => ({ status: 404, data: "" })))(config.url ?? ""));
  const sessions = new SessionManager({
    credentials: options.credentials?.(accounts) ?? new CredentialStore(accounts),
    browser,
    settings: testSettings(options.environment),
    http,
    sleep: async (ms) => {
      sleeps.push(ms);
      options.onSleep?.(browser);
    },
  });
  const reload = async (account: Account) => accounts.findById(account.id);
  return { db, browser, sleeps, requests, sessions, reload };
}

describe("SessionManager.acquireSession", () => {
  it("replays stored cookies on the home page", async () => {
    const h = setup();
    const account = await createAccount(h.db, { cookiesJson: AUTH_COOKIES, ua: "test-agent" });

    const session = await h.sessions.acquireSession(account);

    const fake = h.browser.sessions[0];
    expect(session).toBe(fake);
    expect(fake?.visited).toEqual(["https://www.facebook.com/"]);
    expect(fake?.jar.map((c) => `${c.name}=${c.value}`)).toEqual(["c_user=42"]);
    expect(h.browser.created[0]).toMatchObject({ userAgent: "test-agent", proxy: undefined });
    expect((await h.reload(account))?.cookiesJson).toBe(AUTH_COOKIES);
  });

  it("persists a refreshed authenticated jar", async () => {
    const h = setup({
      session: () => {
        const session = new FakeSession();
        session.onCookiesRead = (s) => {
          s.jar = [...s.jar, { name: "xs", value: "fresh", domain: ".facebook.com", path: "/", secure: true, httpOnly: true }];
        };
        return session;
      },
    });
    const account = await createAccount(h.db, { cookiesJson: AUTH_COOKIES });

    await h.sessions.acquireSession(account);

    const stored = parseCookies((await h.reload(account))?.cookiesJson ?? null);
    expect(stored.map((c) => c.name)).toEqual(["c_user", "xs"]);
  });

  it("passes the account proxy to the browser", async () => {
    const h = setup();
    const account = await createAccount(h.db, {
      proxyServer: "http://proxy.test:8080",
      proxyUsername: "proxy-user",
      proxyPassword: "test-password",
    });

    await h.sessions.acquireSession(account, { headless: false });

    expect(h.browser.created[0]).toMatchObject({
      headless: false,
      proxy: { server: "http://proxy.test:8080", username: "proxy-user", password: "test-password" },
    });
  });

  it("fails with browser_start_failed when the browser does not start", async () => {
    const h = setup();
    h.browser.failWith = new Error("chromium missing");
    const account = await createAccount(h.db);

    const error = await h.sessions.acquireSession(account).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SessionError);
    expect(error).toMatchObject({ code: "browser_start_failed" });
  });

  it("closes the session when preparing it fails", async () => {
    const h = setup({ session: () => new UnreachableSession() });
    const account = await createAccount(h.db);

    await expect(h.sessions.acquireSession(account)).rejects.toMatchObject({ code: "session_prepare_failed" });
    expect(h.browser.sessions[0]?.closed).toBe(true);
  });
});

describe("SessionManager.login", () => {
  it("saves the jar and records the login once the session cookie appears", async () => {
    const h = setup({
      session: () => {
        const session = new FakeSession();
        session.onCookiesRead = (s, reads) => {
          if (reads === 2) s.jar = [{ name: "c_user", value: "42", domain: ".facebook.com", path: "/", secure: true, httpOnly: false }];
        };
        return session;
      },
    });
    const account = await createAccount(h.db, { lastErrorCode: "login_failed" });

    expect(await h.sessions.login(account)).toBe(true);

    const updated = await h.reload(account);
    expect(parseCookies(updated?.cookiesJson ?? null).map((c) => c.name)).toEqual(["c_user"]);
    expect(updated?.lastLoginAt).not.toBeNull();
    expect(updated?.lastErrorCode).toBeNull();
    expect(h.sleeps).toEqual([1000]);
    expect(h.browser.created[0]?.headless).toBe(false);
    expect(h.browser.sessions[0]?.visited).toEqual(["https://www.facebook.com/login"]);
    expect(h.browser.sessions[0]?.closed).toBe(true);
  });

  it("stops at a checkpoint page", async () => {
    const h = setup({
      session: () => {
        const session = new FakeSession();
        session.onCookiesRead = (s) => {
          s.url = "https://www.facebook.com/checkpoint/828281030927956/";
        };
        return session;
      },
    });
    const account = await createAccount(h.db);

    expect(await h.sessions.login(account)).toBe(false);
    expect((await h.reload(account))?.lastErrorCode).toBe("login_checkpoint");
    expect(h.sleeps).toEqual([]);
  });

  it("gives up when the operator closes the window", async () => {
    const h = setup({
      onSleep: (browser) => {
        const session = browser.sessions[0];
        if (session) session.tabs = 0;
      },
    });
    const account = await createAccount(h.db);

    expect(await h.sessions.login(account)).toBe(false);
    expect(h.sleeps).toEqual([1000]);
    expect((await h.reload(account))?.lastErrorCode).toBe("login_not_completed");
  });

  it("gives up after the timeout", async () => {
    const h = setup({ environment: { FB_LOGIN_TIMEOUT_SECONDS: "2" } });
    const account = await createAccount(h.db);

    expect(await h.sessions.login(account)).toBe(false);
    expect(h.sleeps).toEqual([1000, 1000]);
    expect((await h.reload(account))?.lastErrorCode).toBe("login_not_completed");
  });

  it("records a browser that does not start", async () => {
    const h = setup();
    h.browser.failWith = new Error("chromium missing");
    const account = await createAccount(h.db);

    expect(await h.sessions.login(account)).toBe(false);
    expect(await h.reload(account)).toMatchObject({
      lastErrorCode: "browser_start_failed",
      lastErrorDetail: "chromium missing",
    });
  });
});

describe("SessionManager.deriveAccessToken", () => {
  it("fetches the token page with the stored cookies and saves the token", async () => {
    const h = setup({
      respond: (url) =>
        url === TOKEN_URL ? { status: 200, data: 'window.__data={"token":"EAAGtest-token","x":1}' } : { status: 404, data: "" },
    });
    const account = await createAccount(h.db, { cookiesJson: AUTH_COOKIES, ua: "test-agent" });

    expect(await h.sessions.deriveAccessToken(account)).toBe("EAAGtest-token");
    expect(h.requests[0]?.headers.get("Cookie")).toBe("c_user=42");
    expect(h.requests[0]?.headers.get("User-Agent")).toBe("test-agent");
    expect((await h.reload(account))?.accessToken).toBe("EAAGtest-token");
  });

  it("returns null without a request when no cookies are stored", async () => {
    const h = setup();
    const account = await createAccount(h.db);

    expect(await h.sessions.deriveAccessToken(account)).toBeNull();
    expect(h.requests).toHaveLength(0);
  });

  it("returns null when the page holds no token", async () => {
    const h = setup({ respond: () => ({ status: 200, data: "<html>Log in</html>" }) });
    const account = await createAccount(h.db, { cookiesJson: AUTH_COOKIES });

    expect(await h.sessions.deriveAccessToken(account)).toBeNull();
    expect((await h.reload(account))?.accessToken).toBeNull();
  });

  it("returns null when the token cannot be stored", async () => {
    const h = setup({
      respond: () => ({ status: 200, data: 'window.__data={"token":"EAAGtest-token","x":1}' }),
      credentials: (accounts) => new ReadOnlyCredentials(accounts),
    });
    const account = await createAccount(h.db, { cookiesJson: AUTH_COOKIES });

    expect(await h.sessions.deriveAccessToken(account)).toBeNull();
    expect((await h.reload(account))?.accessToken).toBeNull();
  });

  it("returns null when the request fails", async () => {
    const h = setup({ respond: () => ({ status: 500, data: "" }) });
    const account = await createAccount(h.db, { cookiesJson: AUTH_COOKIES });

    expect(await h.sessions.deriveAccessToken(account)).toBeNull();
  });
});
