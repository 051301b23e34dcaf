/**
 * On-disk layout of a book and the archive transition between roots.
 *
 *   <outputDir>/<siteTag>/<bookDir>/<bookDir>-images/ch0001 - <name> - <siteTag>.txt
 *   <outputDir>/<siteTag>/<bookDir>/<bookDir>-pdf/ch0001 - <name>.pdf
 *
 * Archiving renames the `<siteTag>` segment to `completed`.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { ArtifactIOError, errorMessage } from "./errors.js";
import { type BookState, type Chapter, COMPLETED_TAG, type SiteTag } from "./types.js";
import { pathExists, toSafePathSegment } from "./utils.js";

const URL_LIST_EXTENSION = ".txt";
const DOCUMENT_EXTENSION = ".pdf";

export interface BookLayout {
  siteTag: SiteTag;
  state: BookState;
  bookDir: string;
  /** Book Root: `<outputDir>/<siteTag|completed>/<bookDir>` */
  root: string;
  /** Subtree holding URL-list files */
  imagesDir: string;
  /** Subtree holding assembled documents */
  documentsDir: string;
}

/**
 * Derive the stable directory name for a book.
 *
 * @example
 * bookDirectoryName('海賊王', '103') // '海賊王_103'
 */
export function bookDirectoryName(title: string, bookId: string): string {
  return toSafePathSegment(`${title}_${bookId}`, toSafePathSegment(bookId, "book"));
}

export function createBookLayout(
  outputDir: string,
  siteTag: SiteTag,
  bookDir: string,
  state: BookState = "active",
): BookLayout {
  const root = path.join(outputDir, state === "completed" ? COMPLETED_TAG : siteTag, bookDir);
  return {
    siteTag,
    state,
    bookDir,
    root,
    imagesDir: path.join(root, `${bookDir}-images`),
    documentsDir: path.join(root, `${bookDir}-pdf`),
  };
}

function chapterPrefix(chapter: Pick<Chapter, "index" | "name">): string {
  return `ch${String(chapter.index).padStart(4, "0")} - ${chapter.name}`;
}

/** File name of a chapter's URL list, e.g. `ch0001 - Prologue - 8comic.txt` */
export function urlListFileName(chapter: Pick<Chapter, "index" | "name">, siteTag: SiteTag): string {
  return `${chapterPrefix(chapter)} - ${siteTag}${URL_LIST_EXTENSION}`;
}

export function urlListPath(layout: BookLayout, chapter: Pick<Chapter, "index" | "name">): string {
  return path.join(layout.imagesDir, urlListFileName(chapter, layout.siteTag));
}

export function documentPath(layout: BookLayout, chapter: Pick<Chapter, "index" | "name">): string {
  return path.join(layout.documentsDir, `${chapterPrefix(chapter)}${DOCUMENT_EXTENSION}`);
}

/**
 * Map a URL-list file name to its document file name.
 * Lists written without the site suffix map by extension alone.
 *
 * @example
 * documentNameForUrlList('ch0003 - Finale - xmanhua.txt', 'xmanhua') // 'ch0003 - Finale.pdf'
 */
export function documentNameForUrlList(fileName: string, siteTag: SiteTag): string {
  const stem = fileName.slice(0, -URL_LIST_EXTENSION.length);
  const suffix = ` - ${siteTag}`;
  const base = stem.endsWith(suffix) ? stem.slice(0, -suffix.length) : stem;
  return `${base}${DOCUMENT_EXTENSION}`;
}

/**
 * List URL-list files of a book, sorted by name (and therefore by chapter index).
 */
export async function listUrlListFiles(layout: BookLayout): Promise<string[]> {
  if (!(await pathExists(layout.imagesDir))) return [];
  const entries = await fs.readdir(layout.imagesDir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && entry.name.endsWith(URL_LIST_EXTENSION))
    .map((entry) => entry.name)
    .sort();
}

/**
 * Move a Book Root from the active root to the completed root.
 * A single rename: observers see the directory under exactly one root.
 *
 * @returns Layout of the archived book
 * @throws {ArtifactIOError} If the destination already exists or the rename fails
 */
export async function archiveBook(outputDir: string, layout: BookLayout): Promise<BookLayout> {
  const archived = createBookLayout(outputDir, layout.siteTag, layout.bookDir, "completed");
  if (await pathExists(archived.root)) {
    throw new ArtifactIOError(`Archive destination already exists: ${archived.root}`, archived.root);
  }

  try {
    await fs.mkdir(path.dirname(archived.root), { recursive: true });
    await fs.rename(layout.root, archived.root);
  } catch (error) {
    throw new ArtifactIOError(`Failed to archive ${layout.root}: ${errorMessage(error)}`, layout.root, {
      cause: error,
    });
  }

  return archived;
}
