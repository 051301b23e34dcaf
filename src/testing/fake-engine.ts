/**
 * In-process stand-in for a rendering session, for tests.
 */

import type { RenderingEngine } from "../engine.js";
import { NavigationTimeout } from "../errors.js";

export interface FakeView {
  url: string;
  /** Inner markup returned by `readMarkup`, keyed by selector */
  regions: Record<string, string>;
  /** Selectors that can only be clicked while this view is shown */
  links?: Record<string, string>;
}

export class FakeEngine implements RenderingEngine {
  readonly navigations: string[] = [];
  readonly clicks: string[] = [];
  reloads = 0;
  closed = false;
  private current: string;
  private readonly clickTimeouts = new Map<string, number>();
  private readonly waitTimeouts = new Map<string, number>();

  /**
   * @param views - Views by name
   * @param links - Selector to the view a click on it leads to, from any view
   * @param start - Name of the initial view
   */
  constructor(
    private readonly views: Record<string, FakeView>,
    private readonly links: Record<string, string>,
    start: string,
  ) {
    this.current = start;
  }

  /** Make the next `times` clicks on `selector` time out */
  failClicks(selector: string, times: number): this {
    this.clickTimeouts.set(selector, times);
    return this;
  }

  /** Make the next `times` waits for `selector` time out, wherever the session is */
  failWaits(selector: string, times: number): this {
    this.waitTimeouts.set(selector, times);
    return this;
  }

  get view(): string {
    return this.current;
  }

  private viewOf(name: string): FakeView {
    const view = this.views[name];
    if (!view) throw new Error(`Unknown view: ${name}`);
    return view;
  }

  async navigate(url: string): Promise<void> {
    this.navigations.push(url);
    const match = Object.entries(this.views).find(([, view]) => view.url === url);
    if (!match) throw new Error(`net::ERR_NAME_NOT_RESOLVED at ${url}`);
    this.current = match[0];
  }

  async click(selector: string): Promise<void> {
    this.clicks.push(selector);
    const timeouts = this.clickTimeouts.get(selector) ?? 0;
    if (timeouts > 0) {
      this.clickTimeouts.set(selector, timeouts - 1);
      throw new NavigationTimeout(`Click on ${selector} timed out`);
    }
    const target = this.viewOf(this.current).links?.[selector] ?? this.links[selector];
    if (!target) throw new Error(`No element found for selector: ${selector}`);
    this.current = target;
  }

  async reload(): Promise<void> {
    this.reloads++;
  }

  async readMarkup(selector: string): Promise<string> {
    const markup = this.viewOf(this.current).regions[selector];
    if (markup === undefined) throw new Error(`No element found for selector: ${selector}`);
    return markup;
  }

  async waitForSelector(selector: string): Promise<void> {
    const timeouts = this.waitTimeouts.get(selector) ?? 0;
    if (timeouts > 0) {
      this.waitTimeouts.set(selector, timeouts - 1);
      throw new NavigationTimeout(`Waiting for ${selector} timed out`);
    }
  }

  currentUrl(): string {
    return this.viewOf(this.current).url;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
