/**
 * Chapter resolution: turn chapter-list markup into the chapters that still
 * need discovery. The only resumability signal is whether a chapter's
 * URL-list file exists.
 */

import { type BookLayout, urlListPath } from "./layout.js";
import type { Chapter, ChapterLink, ChapterOrder } from "./types.js";
import { pathExists } from "./utils.js";

export interface ResolveParams {
  /** Rendered chapter-list markup */
  markup: string;
  /** Source parser, returning links in declared order */
  parse: (markup: string) => ChapterLink[];
  /** Declared order of the source list */
  order: ChapterOrder;
  layout: BookLayout;
  /** Resolve every chapter, even those with a URL list */
  overwrite: boolean;
}

/**
 * Number chapter links in reading order, starting at 1.
 * A link that carries its own ordinal keeps it.
 */
export function listChapters(markup: string, parse: ResolveParams["parse"], order: ChapterOrder): Chapter[] {
  const links = parse(markup);
  const reading = order === "newest-first" ? [...links].reverse() : links;
  return reading.map((link, i): Chapter => ({
    index: link.ordinal ?? i + 1,
    name: link.name,
    handle: link.handle,
    status: "pending",
  }));
}

/**
 * Chapters without a URL-list artifact (or all of them when overwriting),
 * in reading order.
 */
export async function resolvePendingChapters(params: ResolveParams): Promise<Chapter[]> {
  const chapters = listChapters(params.markup, params.parse, params.order);
  if (params.overwrite) return chapters;

  const pending: Chapter[] = [];
  for (const chapter of chapters) {
    if (!(await pathExists(urlListPath(params.layout, chapter)))) {
      pending.push(chapter);
    }
  }
  return pending;
}
