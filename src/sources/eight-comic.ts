/**
 * 8comic.com adapter.
 *
 * Chapters are anchors with an `id` inside `div#chapters`, listed in reading
 * order; the chapter view renders into `div#comics-pics`.
 */

import type { RenderingEngine } from "../engine.js";
import { attributeStrategy, encodedAttributeStrategy, srcsetStrategy } from "../extract.js";
import { parseMarkup, textOf } from "../markup.js";
import type { Chapter, ChapterLink } from "../types.js";
import { toSafePathSegment } from "../utils.js";
import type { BookInfo, SourceAdapter } from "./types.js";

const BASE_URL = "https://www.8comic.com";

const CHAPTER_LIST_SELECTOR = "div#chapters";
const CHAPTER_END_SELECTOR = "div.comics-end";
const CHAPTER_IMAGE_SELECTOR = "div#comics-pics img";
const BACK_SELECTOR = "a.view-back";

/** Status labels the site shows for finished series */
const COMPLETED_LABELS = ["已完結", "完結"];

const UNKNOWN_TITLE = "Unknown Comic";

export function chapterSelector(chapter: Chapter): string {
  return `a[id="${chapter.handle.value.replace(/"/g, '\\"')}"]`;
}

/**
 * Read book title and status from the landing page.
 *
 * @param headMarkup - Inner markup of `<head>`; the title is in `meta[name=name]`
 * @param bodyMarkup - Inner markup of `<body>`; the status label is in `.item-info-status`
 */
export function parseEightComicBook(headMarkup: string, bodyMarkup: string): BookInfo {
  const head = parseMarkup(`<head>${headMarkup}</head>`);
  const title = head.querySelector('meta[name="name"]')?.getAttribute("content")?.trim() || UNKNOWN_TITLE;

  const body = parseMarkup(bodyMarkup);
  const status = textOf(body.querySelector(".item-info-status"));
  const completed = COMPLETED_LABELS.some((label) => status.includes(label));

  return { title, completed };
}

/**
 * Chapter anchors are the `a` elements carrying an `id`. Chapter numbers
 * count every anchor of the list, so an anchor without an id still takes
 * up a number.
 */
export function parseEightComicChapters(markup: string): ChapterLink[] {
  const document = parseMarkup(markup);
  const links: ChapterLink[] = [];
  document.querySelectorAll("a").forEach((anchor, position) => {
    const id = anchor.getAttribute("id");
    if (!id) return;
    links.push({
      handle: { kind: "element-id", value: id },
      name: toSafePathSegment(textOf(anchor)),
      ordinal: position + 1,
    });
  });
  return links;
}

async function waitForChapterView(engine: RenderingEngine, timeoutMs: number): Promise<void> {
  await Promise.all([
    engine.waitForSelector(CHAPTER_END_SELECTOR, timeoutMs),
    engine.waitForSelector(CHAPTER_IMAGE_SELECTOR, timeoutMs),
  ]);
}

export const eightComic: SourceAdapter = {
  siteTag: "8comic",
  chapterOrder: "reading",
  extractionStrategies: [
    attributeStrategy("chapter images", "div#comics-pics img[src]", "src"),
    attributeStrategy("lazy images", "img[data-src]", "data-src"),
    srcsetStrategy("source sets", "source[srcset]"),
    encodedAttributeStrategy("encoded image addresses", "img[s]", "s"),
  ],

  bookUrl(bookId) {
    return `${BASE_URL}/html/${encodeURIComponent(bookId)}.html`;
  },

  async readBookInfo(engine) {
    const head = await engine.readMarkup("head");
    const body = await engine.readMarkup("body");
    return parseEightComicBook(head, body);
  },

  readChapterListMarkup(engine) {
    return engine.readMarkup(CHAPTER_LIST_SELECTOR);
  },

  parseChapterList: parseEightComicChapters,

  // the first chapter view sets the session cookies the later ones depend on
  async prepareSession(engine, first, timeoutMs) {
    await engine.click(chapterSelector(first));
    await engine.waitForSelector(CHAPTER_END_SELECTOR, timeoutMs);
    await engine.click(BACK_SELECTOR);
  },

  async openChapter(engine, chapter, timeoutMs) {
    await engine.click(chapterSelector(chapter));
    await waitForChapterView(engine, timeoutMs);
  },

  returnToChapterList(engine) {
    return engine.click(BACK_SELECTOR);
  },
};
