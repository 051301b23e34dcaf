import type { RenderingEngine } from "../engine.js";
import type { ExtractionStrategy } from "../extract.js";
import type { Chapter, ChapterLink, ChapterOrder, SiteTag } from "../types.js";

/** What a source reports about a book on its landing page */
export interface BookInfo {
  title: string;
  /** Whether the source labels the book as finished */
  completed: boolean;
}

/**
 * Everything that is specific to one source site.
 * Parsers are pure; navigation actions drive the given engine.
 */
export interface SourceAdapter {
  readonly siteTag: SiteTag;
  /** Order the chapter list is declared in */
  readonly chapterOrder: ChapterOrder;
  /** Fallback chain for the chapter view */
  readonly extractionStrategies: readonly ExtractionStrategy[];

  bookUrl(bookId: string): string;
  /** Read title and completion flag from the book's landing view */
  readBookInfo(engine: RenderingEngine): Promise<BookInfo>;
  /** Markup of the region holding the chapter list */
  readChapterListMarkup(engine: RenderingEngine): Promise<string>;
  /** Chapter links in source-declared order */
  parseChapterList(markup: string): ChapterLink[];
  /** Optional one-off action before the first chapter is opened */
  prepareSession?(engine: RenderingEngine, first: Chapter, timeoutMs: number): Promise<void>;
  /**
   * Navigate from the chapter list into a chapter and wait for its images.
   *
   * @throws {NavigationTimeout} When the chapter view does not render in time
   */
  openChapter(engine: RenderingEngine, chapter: Chapter, timeoutMs: number): Promise<void>;
  returnToChapterList(engine: RenderingEngine): Promise<void>;
}
