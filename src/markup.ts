/**
 * Helpers for working with rendered markup outside the browser.
 */

import { JSDOM } from "jsdom";

/**
 * Parse a markup fragment or document into a DOM document.
 * Scripts are not executed.
 */
export function parseMarkup(markup: string): Document {
  return new JSDOM(markup).window.document;
}

/**
 * Whitespace-collapsed text content of an element.
 */
export function textOf(element: Element | null): string {
  return (element?.textContent ?? "").replace(/\s+/g, " ").trim();
}
