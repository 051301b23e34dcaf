import type { SiteTag } from "../types.js";
import { eightComic } from "./eight-comic.js";
import type { SourceAdapter } from "./types.js";
import { xmanhua } from "./xmanhua.js";

export type { BookInfo, SourceAdapter } from "./types.js";

const ADAPTERS: Record<SiteTag, SourceAdapter> = {
  "8comic": eightComic,
  xmanhua,
};

export function getSourceAdapter(siteTag: SiteTag): SourceAdapter {
  return ADAPTERS[siteTag];
}
