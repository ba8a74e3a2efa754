import type { Account } from "../db/schema";
import type { AccountsRepository } from "../db/repositories/accounts.repo";
import { logger } from "../core/logger";
import { unixNow } from "../core/retry";
import { parseCookies, serializeCookies, type StoredCookie } from "./cookie-codec";
import type { ProxySettings } from "./browser/types";

/**
 * Owns the secret-bearing columns of an account. Writes are full replaces;
 * two sessions on the same account race as last-writer-wins.
 */
export class CredentialStore {
  constructor(private readonly accounts: AccountsRepository) {}

  loadCookies(account: Account): StoredCookie[] {
    try {
      return parseCookies(account.cookiesJson);
    } catch (error) {
      logger.warn({ accountId: account.id, err: error }, "Discarding unreadable stored cookies");
      return [];
    }
  }

  async saveCookies(accountId: number, cookies: StoredCookie[]): Promise<void> {
    await this.accounts.update(accountId, { cookiesJson: serializeCookies(cookies) });
    logger.info({ accountId, cookieCount: cookies.length }, "Cookies persisted");
  }

  async saveAccessToken(accountId: number, accessToken: string): Promise<void> {
    await this.accounts.update(accountId, { accessToken });
    logger.info({ accountId }, "Access token persisted");
  }

  async recordLogin(accountId: number): Promise<void> {
    await this.accounts.update(accountId, {
      lastLoginAt: unixNow(),
      lastErrorCode: null,
      lastErrorDetail: null,
      lastErrorAt: null,
    });
  }

  async recordFailure(accountId: number, code: string, detail: string): Promise<void> {
    await this.accounts.recordError(accountId, code, detail);
  }

  proxyFor(account: Account): ProxySettings | undefined {
    if (!account.proxyServer) return undefined;
    return {
      server: account.proxyServer,
      username: account.proxyUsername ?? undefined,
      password: account.proxyPassword ?? undefined,
    };
  }
}
