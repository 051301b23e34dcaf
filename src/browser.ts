/**
 * Browser management utilities for Puppeteer, and the rendering engine
 * built on top of them.
 */

import puppeteer, { type Browser, type Page, TimeoutError } from "puppeteer-core";
import type { RenderingEngine } from "./engine.js";
import { NavigationTimeout, errorMessage } from "./errors.js";

/**
 * Realistic Chrome user agent to avoid bot detection.
 */
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

/** Default viewport dimensions for the browser page */
export const DEFAULT_VIEWPORT = { width: 1280, height: 800 };

export interface LaunchOptions {
  /** Path to a local Chrome or Chromium binary */
  executablePath: string;
  headless: boolean;
  /** Delay added to every browser operation, in ms */
  slowMo: number;
}

/**
 * Launch a browser with the security sandbox disabled.
 * The sandbox is disabled for compatibility in Docker/CI environments.
 */
export function launchBrowser(options: LaunchOptions): Promise<Browser> {
  return puppeteer.launch({
    executablePath: options.executablePath,
    headless: options.headless,
    slowMo: options.slowMo,
    args: ["--no-sandbox", "--disable-setuid-sandbox"],
  });
}

/**
 * Create a new page with realistic browser settings.
 *
 * @param browser - Browser instance to create the page in
 */
export async function createPage(browser: Browser): Promise<Page> {
  const page = await browser.newPage();
  await page.setUserAgent(DEFAULT_USER_AGENT);
  await page.setViewport(DEFAULT_VIEWPORT);
  return page;
}

async function translateTimeout<T>(action: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (error) {
    if (error instanceof TimeoutError) {
      throw new NavigationTimeout(`${action} timed out: ${errorMessage(error)}`, { cause: error });
    }
    throw error;
  }
}

/**
 * Rendering engine backed by a single Puppeteer page.
 */
export class PuppeteerEngine implements RenderingEngine {
  constructor(
    private readonly browser: Browser,
    private readonly page: Page,
    private readonly timeoutMs: number,
  ) {}

  static async open(options: LaunchOptions & { timeoutMs: number }): Promise<PuppeteerEngine> {
    const browser = await launchBrowser(options);
    try {
      const page = await createPage(browser);
      return new PuppeteerEngine(browser, page, options.timeoutMs);
    } catch (error) {
      await browser.close();
      throw error;
    }
  }

  navigate(url: string): Promise<void> {
    return translateTimeout(`Navigation to ${url}`, async () => {
      await this.page.goto(url, { waitUntil: "domcontentloaded", timeout: this.timeoutMs });
    });
  }

  click(selector: string): Promise<void> {
    return translateTimeout(`Click on ${selector}`, async () => {
      await this.page.waitForSelector(selector, { timeout: this.timeoutMs });
      await this.page.click(selector);
    });
  }

  reload(): Promise<void> {
    return translateTimeout("Reload", async () => {
      await this.page.reload({ waitUntil: "domcontentloaded", timeout: this.timeoutMs });
    });
  }

  readMarkup(selector: string): Promise<string> {
    return this.page.$eval(selector, (element) => element.innerHTML);
  }

  waitForSelector(selector: string, timeoutMs: number): Promise<void> {
    return translateTimeout(`Waiting for ${selector}`, async () => {
      await this.page.waitForSelector(selector, { timeout: timeoutMs });
    });
  }

  currentUrl(): string {
    return this.page.url();
  }

  close(): Promise<void> {
    return this.browser.close();
  }
}
