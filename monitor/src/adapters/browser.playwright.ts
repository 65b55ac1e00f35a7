import { Logger } from "@marketwatch/shared-utils";
import { Browser, BrowserContext, chromium, errors, Page } from "playwright-core";
import { BrowserSession, BrowserSessionFactory } from "../core/ports";
import { pickUserAgent } from "./user-agents";

const BROWSER_ARGS = [
  "--disable-blink-features=AutomationControlled",
  "--disable-dev-shm-usage",
  "--no-sandbox",
];

// Runs in the page before any site script
const STEALTH_SCRIPT = "Object.defineProperty(navigator, 'webdriver', { get: () => undefined });";

const BLOCKED_RESOURCES = /\.(css|woff2?|ttf|otf)(\?|$)/;

export interface PlaywrightFactoryOptions {
  headless: boolean;
  /** Chromium binary; falls back to the installed Chrome channel */
  executablePath?: string;
  logger: Logger;
}

/**
 * Launches one Chromium lazily and hands out an isolated context per
 * session. playwright-core never downloads browsers, so a local Chrome or
 * Chromium must exist.
 */
export class PlaywrightSessionFactory implements BrowserSessionFactory {
  private browser: Browser | null = null;
  private logger: Logger;

  constructor(private options: PlaywrightFactoryOptions) {
    this.logger = options.logger.child("browser");
  }

  async create(): Promise<BrowserSession> {
    const browser = await this.launch();
    const context = await browser.newContext({
      userAgent: pickUserAgent(),
      locale: "ja-JP",
      timezoneId: "Asia/Tokyo",
      viewport: { width: 1366, height: 900 },
    });
    await context.addInitScript(STEALTH_SCRIPT);
    await context.route(BLOCKED_RESOURCES, (route) => route.abort());

    const page = await context.newPage();
    return new PlaywrightSession(context, page);
  }

  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    if (browser) {
      await browser.close();
      this.logger.info("Browser closed");
    }
  }

  private async launch(): Promise<Browser> {
    if (this.browser?.isConnected()) {
      return this.browser;
    }

    this.browser = await chromium.launch({
      headless: this.options.headless,
      args: BROWSER_ARGS,
      ...(this.options.executablePath
        ? { executablePath: this.options.executablePath }
        : { channel: "chrome" }),
    });
    this.logger.info(`Browser launched (headless=${this.options.headless})`);
    return this.browser;
  }
}

class PlaywrightSession implements BrowserSession {
  constructor(private context: BrowserContext, private page: Page) {}

  async open(url: string, timeoutMs: number): Promise<number | null> {
    const response = await this.page.goto(url, {
      waitUntil: "domcontentloaded",
      timeout: timeoutMs,
    });
    return response ? response.status() : null;
  }

  async waitFor(selector: string, timeoutMs: number): Promise<boolean> {
    try {
      await this.page.waitForSelector(selector, { timeout: timeoutMs });
      return true;
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        return false;
      }
      throw error;
    }
  }

  async scroll(pixels: number): Promise<void> {
    await this.page.mouse.wheel(0, pixels);
  }

  content(): Promise<string> {
    return this.page.content();
  }

  async close(): Promise<void> {
    await this.context.close();
  }
}
