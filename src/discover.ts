/**
 * Chapter navigation controller.
 *
 * Drives one rendering session through the chapters strictly one at a time:
 *
 *   idle -> navigating -> extracting -> persisted
 *   idle -> navigating -> failed
 *   idle -> navigating -> extracting -> failed
 *
 * A failed chapter is logged and skipped; it never aborts the book. Every
 * chapter, failed or not, hands the session back on the chapter list.
 */

import type { RenderingEngine } from "./engine.js";
import { ArtifactIOError, ExtractionEmpty, NavigationTimeout, errorMessage } from "./errors.js";
import { extractImageUrls } from "./extract.js";
import { type BookLayout, urlListPath } from "./layout.js";
import type { Logger } from "./logger.js";
import type { SourceAdapter } from "./sources/index.js";
import type { Chapter, ChapterOutcome, SkipReason } from "./types.js";
import { writeFileAtomic } from "./utils.js";

export type ChapterState = "idle" | "navigating" | "extracting" | "persisted" | "failed";

export interface NavigationSettings {
  /** Total attempts to open a chapter, reloading between them */
  attempts: number;
  /** Wait for the chapter view to render, per attempt */
  timeoutMs: number;
}

export interface DiscoveryParams {
  engine: RenderingEngine;
  adapter: SourceAdapter;
  layout: BookLayout;
  /** Pending chapters in reading order */
  chapters: readonly Chapter[];
  /** URL of the chapter list, used to recover when returning fails */
  bookUrl: string;
  navigation: NavigationSettings;
  logger: Logger;
}

/** Discovery params plus the URL the chapter list was showing at the start */
interface Session extends DiscoveryParams {
  listUrl: string;
}

class ChapterSkipped extends Error {
  constructor(readonly reason: SkipReason) {
    super(reason.kind);
  }
}

async function navigateToChapter(params: Session, chapter: Chapter, log: Logger): Promise<void> {
  const { engine, adapter, navigation } = params;

  for (let attempt = 1; attempt <= navigation.attempts; attempt++) {
    try {
      await adapter.openChapter(engine, chapter, navigation.timeoutMs);
      return;
    } catch (error) {
      if (!(error instanceof NavigationTimeout)) {
        throw new ChapterSkipped({ kind: "navigation-failed", message: errorMessage(error) });
      }
      if (attempt === navigation.attempts) {
        throw new ChapterSkipped({ kind: "navigation-timeout", attempts: attempt });
      }
      log.warn({ attempt, attempts: navigation.attempts, err: error.message }, "Chapter navigation timed out, reloading");
      try {
        await engine.reload();
      } catch (reloadError) {
        throw new ChapterSkipped({ kind: "navigation-failed", message: errorMessage(reloadError) });
      }
      // a click that got as far as the chapter view reloads that view, not the list
      await restoreList(params, log);
    }
  }
}

async function extractChapter(params: Session, chapter: Chapter): Promise<string[]> {
  const markup = await params.engine.readMarkup("body");
  const urls = extractImageUrls(markup, params.engine.currentUrl(), params.adapter.extractionStrategies);
  if (urls.length === 0) {
    throw new ExtractionEmpty(`No images found for chapter ${chapter.index}`);
  }
  return urls;
}

async function extractAndPersist(
  params: Session,
  chapter: Chapter,
): Promise<{ urlListPath: string; imageCount: number }> {
  const urls = await extractChapter(params, chapter);
  const target = await persistUrlList(params.layout, chapter, urls);
  return { urlListPath: target, imageCount: urls.length };
}

async function persistUrlList(layout: BookLayout, chapter: Chapter, urls: string[]): Promise<string> {
  const target = urlListPath(layout, chapter);
  try {
    await writeFileAtomic(target, urls.map((url) => `${url}\n`).join(""));
  } catch (error) {
    throw new ArtifactIOError(`Failed to write ${target}: ${errorMessage(error)}`, target, { cause: error });
  }
  return target;
}

async function returnToList(params: Session, log: Logger): Promise<void> {
  try {
    await params.adapter.returnToChapterList(params.engine);
  } catch (error) {
    log.warn({ err: errorMessage(error) }, "Return to chapter list failed, reopening book page");
    try {
      await params.engine.navigate(params.bookUrl);
    } catch (navigateError) {
      // the next chapter will fail to open and be reported on its own
      log.error({ err: errorMessage(navigateError) }, "Could not reopen book page");
    }
  }
}

/**
 * Return to the chapter list unless the session is still showing it.
 */
async function restoreList(params: Session, log: Logger): Promise<void> {
  if (params.engine.currentUrl() === params.listUrl) return;
  await returnToList(params, log);
}

async function discoverChapter(params: Session, chapter: Chapter): Promise<ChapterOutcome> {
  const log = params.logger.child({ chapter: chapter.index, name: chapter.name });
  let state: ChapterState = "idle";
  const enter = (next: ChapterState) => {
    log.debug({ from: state, to: next }, "Chapter state");
    state = next;
  };

  try {
    enter("navigating");
    await navigateToChapter(params, chapter, log).catch(async (error: unknown) => {
      await restoreList(params, log);
      throw error;
    });

    enter("extracting");
    const saved = await extractAndPersist(params, chapter).finally(() => returnToList(params, log));
    enter("persisted");
    log.info({ images: saved.imageCount, path: saved.urlListPath }, "Saved image list");

    return { ok: true, chapter: { ...chapter, status: "discovered" }, ...saved };
  } catch (error) {
    enter("failed");
    const reason = toSkipReason(error);
    log.error({ reason }, "Chapter skipped");
    return { ok: false, chapter: { ...chapter, status: "failed" }, reason };
  }
}

function toSkipReason(error: unknown): SkipReason {
  if (error instanceof ChapterSkipped) return error.reason;
  if (error instanceof ExtractionEmpty) return { kind: "extraction-empty" };
  if (error instanceof ArtifactIOError) return { kind: "artifact-io", path: error.path, message: error.message };
  return { kind: "navigation-failed", message: errorMessage(error) };
}

/**
 * Discover image lists for the given chapters, one after another.
 *
 * @returns One outcome per chapter, in the order given
 */
export async function discoverChapters(params: DiscoveryParams): Promise<ChapterOutcome[]> {
  const session: Session = { ...params, listUrl: params.engine.currentUrl() };
  const outcomes: ChapterOutcome[] = [];
  for (const chapter of params.chapters) {
    outcomes.push(await discoverChapter(session, chapter));
  }
  return outcomes;
}
