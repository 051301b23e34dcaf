/**
 * xmanhua.com adapter.
 *
 * The chapter list is declared newest-first; each entry is an
 * `a.detail-list-form-item` whose `span` holds the page count.
 */

import { attributeStrategy, srcsetStrategy } from "../extract.js";
import { parseMarkup, textOf } from "../markup.js";
import type { Chapter, ChapterLink } from "../types.js";
import { toSafePathSegment } from "../utils.js";
import type { BookInfo, SourceAdapter } from "./types.js";

const BASE_URL = "https://www.xmanhua.com";

const CHAPTER_LIST_SELECTOR = "div.detail-list-form-con";
const CHAPTER_IMAGE_SELECTOR = "#cp_img img";
const BACK_SELECTOR = "a.view-back";

const COMPLETED_LABELS = ["已完結", "完結"];

export function chapterSelector(chapter: Chapter): string {
  return `a[href="${chapter.handle.value.replace(/"/g, '\\"')}"]`;
}

/**
 * Read title and status from the landing page body.
 */
export function parseXmanhuaBook(bodyMarkup: string): BookInfo {
  const document = parseMarkup(bodyMarkup);
  const title = textOf(document.querySelector("p.detail-info-title"));
  const status = textOf(document.querySelector("p.detail-info-tip"));
  return {
    title: title || "Unknown Comic",
    completed: COMPLETED_LABELS.some((label) => status.includes(label)),
  };
}

export function parseXmanhuaChapters(markup: string): ChapterLink[] {
  const document = parseMarkup(markup);
  const links: ChapterLink[] = [];
  for (const anchor of document.querySelectorAll("a.detail-list-form-item")) {
    const href = anchor.getAttribute("href");
    if (!href) continue;
    anchor.querySelector("span")?.remove();
    links.push({ handle: { kind: "href", value: href }, name: toSafePathSegment(textOf(anchor)) });
  }
  return links;
}

export const xmanhua: SourceAdapter = {
  siteTag: "xmanhua",
  chapterOrder: "newest-first",
  extractionStrategies: [
    attributeStrategy("chapter images", "#cp_img img[src]", "src"),
    attributeStrategy("lazy images", "img[data-src]", "data-src"),
    srcsetStrategy("source sets", "source[srcset]"),
  ],

  bookUrl(bookId) {
    return `${BASE_URL}/${encodeURIComponent(bookId)}/`;
  },

  async readBookInfo(engine) {
    return parseXmanhuaBook(await engine.readMarkup("body"));
  },

  readChapterListMarkup(engine) {
    return engine.readMarkup(CHAPTER_LIST_SELECTOR);
  },

  parseChapterList: parseXmanhuaChapters,

  async openChapter(engine, chapter, timeoutMs) {
    await engine.click(chapterSelector(chapter));
    await engine.waitForSelector(CHAPTER_IMAGE_SELECTOR, timeoutMs);
  },

  returnToChapterList(engine) {
    return engine.click(BACK_SELECTOR);
  },
};
