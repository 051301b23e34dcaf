import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ArtifactIOError } from "./errors.js";
import {
  archiveBook,
  bookDirectoryName,
  createBookLayout,
  documentNameForUrlList,
  documentPath,
  listUrlListFiles,
  urlListFileName,
  urlListPath,
} from "./layout.js";

describe("naming", () => {
  it("derives the book directory from title and id", () => {
    expect(bookDirectoryName("海賊王", "103")).toBe("海賊王_103");
    expect(bookDirectoryName("Who? Me: A/B", "7")).toBe("Who Me A B_7");
  });

  it("names chapter artifacts with a zero-padded index", () => {
    const chapter = { index: 12, name: "第12話" };
    const layout = createBookLayout("/out", "xmanhua", "Book_1");

    expect(urlListFileName(chapter, "xmanhua")).toBe("ch0012 - 第12話 - xmanhua.txt");
    expect(urlListPath(layout, chapter)).toBe("/out/xmanhua/Book_1/Book_1-images/ch0012 - 第12話 - xmanhua.txt");
    expect(documentPath(layout, chapter)).toBe("/out/xmanhua/Book_1/Book_1-pdf/ch0012 - 第12話.pdf");
  });

  it("maps URL lists to documents", () => {
    expect(documentNameForUrlList("ch0003 - Finale - xmanhua.txt", "xmanhua")).toBe("ch0003 - Finale.pdf");
    expect(documentNameForUrlList("ch0004 - Extra.txt", "8comic")).toBe("ch0004 - Extra.pdf");
    expect(documentNameForUrlList(urlListFileName({ index: 1, name: "Prologue" }, "8comic"), "8comic")).toBe(
      "ch0001 - Prologue.pdf",
    );
  });
});

describe("createBookLayout", () => {
  it("places active books under the site root", () => {
    expect(createBookLayout("/out", "8comic", "Book_1")).toEqual({
      siteTag: "8comic",
      state: "active",
      bookDir: "Book_1",
      root: "/out/8comic/Book_1",
      imagesDir: "/out/8comic/Book_1/Book_1-images",
      documentsDir: "/out/8comic/Book_1/Book_1-pdf",
    });
  });

  it("places completed books under the completed root", () => {
    const layout = createBookLayout("/out", "8comic", "Book_1", "completed");

    expect(layout.root).toBe("/out/completed/Book_1");
    expect(layout.documentsDir).toBe("/out/completed/Book_1/Book_1-pdf");
  });
});

describe("on disk", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "layout-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("lists URL-list files sorted by name", async () => {
    const layout = createBookLayout(dir, "8comic", "Book_1");
    expect(await listUrlListFiles(layout)).toEqual([]);

    await fs.mkdir(path.join(layout.imagesDir, "nested.txt"), { recursive: true });
    await fs.writeFile(path.join(layout.imagesDir, "ch0002 - B - 8comic.txt"), "u\n");
    await fs.writeFile(path.join(layout.imagesDir, "ch0001 - A - 8comic.txt"), "u\n");
    await fs.writeFile(path.join(layout.imagesDir, "notes.md"), "");

    expect(await listUrlListFiles(layout)).toEqual(["ch0001 - A - 8comic.txt", "ch0002 - B - 8comic.txt"]);
  });

  it("archives a book with a single move", async () => {
    const layout = createBookLayout(dir, "xmanhua", "Book_2");
    await fs.mkdir(layout.documentsDir, { recursive: true });
    await fs.writeFile(path.join(layout.documentsDir, "ch0001 - A.pdf"), "pdf");

    const archived = await archiveBook(dir, layout);

    expect(archived.root).toBe(path.join(dir, "completed", "Book_2"));
    expect(await fs.readFile(path.join(archived.documentsDir, "ch0001 - A.pdf"), "utf-8")).toBe("pdf");
    expect(await fs.readdir(path.join(dir, "xmanhua"))).toEqual([]);
  });

  it("refuses to overwrite an archived book", async () => {
    const layout = createBookLayout(dir, "xmanhua", "Book_3");
    await fs.mkdir(layout.root, { recursive: true });
    await fs.mkdir(path.join(dir, "completed", "Book_3"), { recursive: true });

    await expect(archiveBook(dir, layout)).rejects.toBeInstanceOf(ArtifactIOError);
    expect(await fs.readdir(path.join(dir, "xmanhua"))).toEqual(["Book_3"]);
  });
});
