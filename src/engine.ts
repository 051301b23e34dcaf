/**
 * Capabilities the archiver needs from a live rendering session.
 * The session is owned by one component at a time and is never driven
 * concurrently.
 */
export interface RenderingEngine {
  /** Load a URL and wait for its DOM */
  navigate(url: string): Promise<void>;
  /** Activate the first element matching a selector (follow a link, run a click handler) */
  click(selector: string): Promise<void>;
  /** Reload the current view */
  reload(): Promise<void>;
  /** Inner markup of the first element matching a selector */
  readMarkup(selector: string): Promise<string>;
  /**
   * Wait until an element matching the selector exists.
   *
   * @throws {NavigationTimeout} If it does not appear within `timeoutMs`
   */
  waitForSelector(selector: string, timeoutMs: number): Promise<void>;
  /** URL of the current view */
  currentUrl(): string;
  close(): Promise<void>;
}
