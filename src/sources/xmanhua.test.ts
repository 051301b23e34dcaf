import { describe, expect, it } from "vitest";
import { listChapters } from "../resolve.js";
import { FakeEngine } from "../testing/fake-engine.js";
import { getSourceAdapter } from "./index.js";
import { chapterSelector, parseXmanhuaBook, parseXmanhuaChapters, xmanhua } from "./xmanhua.js";

const LIST = `
  <a class="detail-list-form-item" href="/m103/" title="">第3話 <span>（20P）</span></a>
  <a class="detail-list-form-item" href="/m102/" title="">第2話 <span>（18P）</span></a>
  <a class="detail-list-form-item" href="/m101/" title="">第1話 <span>（22P）</span></a>`;

describe("parseXmanhuaBook", () => {
  it("reads the title and completion label", () => {
    const info = parseXmanhuaBook(`
      <p class="detail-info-title"> 測試漫畫 </p>
      <p class="detail-info-tip"><span>狀態：<span>已完結</span></span></p>`);

    expect(info).toEqual({ title: "測試漫畫", completed: true });
  });

  it("treats missing labels as ongoing", () => {
    expect(parseXmanhuaBook(`<p class="detail-info-title">A</p>`)).toEqual({ title: "A", completed: false });
  });
});

describe("parseXmanhuaChapters", () => {
  it("drops the page-count span from names", () => {
    expect(parseXmanhuaChapters(LIST)).toEqual([
      { handle: { kind: "href", value: "/m103/" }, name: "第3話" },
      { handle: { kind: "href", value: "/m102/" }, name: "第2話" },
      { handle: { kind: "href", value: "/m101/" }, name: "第1話" },
    ]);
  });

  it("numbers the newest-first list in reading order", () => {
    const chapters = listChapters(LIST, xmanhua.parseChapterList, xmanhua.chapterOrder);

    expect(chapters.map((c) => `${c.index}:${c.handle.value}`)).toEqual(["1:/m101/", "2:/m102/", "3:/m103/"]);
  });
});

describe("xmanhua adapter", () => {
  it("is registered for its tag", () => {
    expect(getSourceAdapter("xmanhua")).toBe(xmanhua);
    expect(xmanhua.prepareSession).toBeUndefined();
  });

  it("builds the book URL", () => {
    expect(xmanhua.bookUrl("103xm")).toBe("https://www.xmanhua.com/103xm/");
  });

  it("opens a chapter by its link and returns", async () => {
    const [first] = listChapters(LIST, xmanhua.parseChapterList, xmanhua.chapterOrder);
    expect(first).toBeDefined();
    if (!first) return;

    const engine = new FakeEngine(
      {
        book: { url: "https://www.xmanhua.com/103xm/", regions: {} },
        m101: { url: "https://www.xmanhua.com/m101/", regions: {} },
      },
      { 'a[href="/m101/"]': "m101", "a.view-back": "book" },
      "book",
    );

    expect(chapterSelector(first)).toBe('a[href="/m101/"]');
    await xmanhua.openChapter(engine, first, 1000);
    expect(engine.view).toBe("m101");
    await xmanhua.returnToChapterList(engine);
    expect(engine.view).toBe("book");
  });
});
