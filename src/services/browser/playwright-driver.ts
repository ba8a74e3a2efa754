import { chromium, type Browser, type BrowserContext, type Page } from "playwright-core";
import { env } from "../../core/config";
import { logger } from "../../core/logger";
import type { StoredCookie } from "../cookie-codec";
import type { BrowserDriver, BrowserSession, SessionOptions } from "./types";

const NAVIGATION_TIMEOUT_MS = 30000;
const SELECTOR_TIMEOUT_MS = 2000;

class PlaywrightSession implements BrowserSession {
  constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    private readonly page: Page
  ) {}

  async goto(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: "domcontentloaded", timeout: NAVIGATION_TIMEOUT_MS });
  }

  async reload(): Promise<void> {
    await this.page.reload({ waitUntil: "domcontentloaded", timeout: NAVIGATION_TIMEOUT_MS });
  }

  currentUrl(): string {
    return this.page.url();
  }

  async pageText(): Promise<string> {
    return this.page.locator("body").innerText({ timeout: SELECTOR_TIMEOUT_MS }).catch(() => "");
  }

  async textOf(selector: string): Promise<string | null> {
    const text = await this.page
      .locator(selector)
      .first()
      .textContent({ timeout: SELECTOR_TIMEOUT_MS })
      .catch(() => null);
    const trimmed = text?.trim();
    return trimmed ? trimmed : null;
  }

  async allTextsOf(selector: string): Promise<string[]> {
    const texts = await this.page.locator(selector).allTextContents().catch(() => []);
    return texts.map((t) => t.trim()).filter((t) => t.length > 0);
  }

  async attributeOf(selector: string, attribute: string): Promise<string | null> {
    return this.page
      .locator(selector)
      .first()
      .getAttribute(attribute, { timeout: SELECTOR_TIMEOUT_MS })
      .catch(() => null);
  }

  openTabCount(): number {
    return this.context.pages().length;
  }

  async setCookies(cookies: StoredCookie[]): Promise<void> {
    if (cookies.length === 0) return;
    await this.context.addCookies(
      cookies.map((cookie) => ({
        name: cookie.name,
        value: cookie.value,
        domain: cookie.domain,
        path: cookie.path,
        secure: cookie.secure,
        httpOnly: cookie.httpOnly,
        expires: cookie.expires,
        sameSite: cookie.sameSite,
      }))
    );
  }

  async cookies(): Promise<StoredCookie[]> {
    const cookies = await this.context.cookies();
    return cookies.map((cookie) => ({
      name: cookie.name,
      value: cookie.value,
      domain: cookie.domain,
      path: cookie.path,
      secure: cookie.secure,
      httpOnly: cookie.httpOnly,
      expires: cookie.expires > 0 ? cookie.expires : undefined,
      sameSite: cookie.sameSite,
    }));
  }

  async wait(ms: number): Promise<void> {
    if (this.page.isClosed()) {
      await new Promise((resolve) => setTimeout(resolve, ms));
      return;
    }
    await this.page.waitForTimeout(ms);
  }

  async close(): Promise<void> {
    for (const page of this.context.pages()) {
      await page.close().catch(() => undefined);
    }
    await this.context.close().catch(() => undefined);
    await this.browser.close();
  }
}

export class PlaywrightDriver implements BrowserDriver {
  async createSession(options: SessionOptions): Promise<BrowserSession> {
    const browser = await chromium.launch({
      headless: options.headless ?? env.PLAYWRIGHT_HEADLESS,
      slowMo: env.PLAYWRIGHT_SLOW_MO,
      proxy: options.proxy,
      args: ["--disable-blink-features=AutomationControlled"],
    });

    try {
      const context = await browser.newContext({
        userAgent: options.userAgent,
        viewport: { width: 1280, height: 800 },
        locale: "en-US",
      });
      const page = await context.newPage();
      logger.debug({ headless: options.headless, proxied: Boolean(options.proxy) }, "Browser session created");
      return new PlaywrightSession(browser, context, page);
    } catch (error) {
      await browser.close().catch(() => undefined);
      throw error;
    }
  }
}
