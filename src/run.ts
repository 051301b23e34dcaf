/**
 * Run orchestrator: discovery for a whole book, then assembly, then the
 * archive transition.
 *
 * Every stage is resumable from artifacts on disk, so a failed run can be
 * repeated from scratch without duplicating work.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { type AcquisitionContext, acquire } from "./acquire.js";
import { type NavigationSettings, discoverChapters } from "./discover.js";
import type { RenderingEngine } from "./engine.js";
import { ArtifactIOError, AssemblyError, FatalRunError, errorMessage } from "./errors.js";
import {
  type BookLayout,
  archiveBook,
  bookDirectoryName,
  createBookLayout,
  documentNameForUrlList,
  listUrlListFiles,
} from "./layout.js";
import type { Logger } from "./logger.js";
import { assemble } from "./pdf.js";
import { resolvePendingChapters } from "./resolve.js";
import type { SourceAdapter } from "./sources/index.js";
import type { AssemblyOutcome, Book, ChapterOutcome, NormalizedImage, SkipReason } from "./types.js";
import { pathExists, writeFileAtomic } from "./utils.js";

/** Everything a run needs, passed explicitly instead of living in module state */
export interface RunContext {
  outputDir: string;
  logger: Logger;
  /** Opens a fresh rendering session; the run owns and closes it */
  openEngine: () => Promise<RenderingEngine>;
  acquisition: Omit<AcquisitionContext, "logger">;
  navigation: NavigationSettings;
  /** Called once all documents are written; returns the generated index path */
  listing?: (documentsDir: string) => Promise<string>;
}

export interface RunRequest {
  adapter: SourceAdapter;
  bookId: string;
  overwrite: boolean;
}

export interface RunSummary {
  book: Book;
  status: "already-archived" | "active" | "archived";
  /** Book Root at the end of the run */
  root: string;
  discovered: ChapterOutcome[];
  assembled: AssemblyOutcome[];
  indexPath: string | null;
}

async function openBook(
  context: RunContext,
  engine: RenderingEngine,
  request: RunRequest,
): Promise<{ book: Book; bookUrl: string }> {
  const { adapter, bookId } = request;
  const bookUrl = adapter.bookUrl(bookId);
  try {
    await engine.navigate(bookUrl);
    const info = await adapter.readBookInfo(engine);
    const book: Book = {
      id: bookId,
      title: info.title,
      siteTag: adapter.siteTag,
      state: info.completed ? "completed" : "active",
      directoryName: bookDirectoryName(info.title, bookId),
    };
    context.logger.info({ title: book.title, dir: book.directoryName, completed: info.completed }, "Opened book");
    return { book, bookUrl };
  } catch (error) {
    throw new FatalRunError(`Cannot open book ${bookId} at ${bookUrl}: ${errorMessage(error)}`, { cause: error });
  }
}

async function discover(
  context: RunContext,
  engine: RenderingEngine,
  request: RunRequest,
  layout: BookLayout,
  bookUrl: string,
): Promise<ChapterOutcome[]> {
  const { adapter, overwrite } = request;

  let markup: string;
  try {
    markup = await adapter.readChapterListMarkup(engine);
  } catch (error) {
    throw new FatalRunError(`Cannot read chapter list: ${errorMessage(error)}`, { cause: error });
  }

  const pending = await resolvePendingChapters({
    markup,
    parse: adapter.parseChapterList,
    order: adapter.chapterOrder,
    layout,
    overwrite,
  });

  const [first] = pending;
  if (!first) {
    context.logger.info("No pending chapters");
    return [];
  }
  context.logger.info({ pending: pending.length }, "Resolved pending chapters");

  if (adapter.prepareSession) {
    try {
      await adapter.prepareSession(engine, first, context.navigation.timeoutMs);
    } catch (error) {
      context.logger.warn({ err: errorMessage(error) }, "Session warm-up failed, continuing");
      await engine.navigate(bookUrl).catch((navigateError: unknown) => {
        throw new FatalRunError(`Cannot return to book page: ${errorMessage(navigateError)}`, {
          cause: navigateError,
        });
      });
    }
  }

  return discoverChapters({
    engine,
    adapter,
    layout,
    chapters: pending,
    bookUrl,
    navigation: context.navigation,
    logger: context.logger,
  });
}

function assemblyReason(error: unknown): SkipReason {
  if (error instanceof ArtifactIOError) {
    return { kind: "artifact-io", path: error.path, message: error.message };
  }
  if (error instanceof AssemblyError) {
    return { kind: "assembly-failed", message: error.message };
  }
  return { kind: "fetch-failed", message: errorMessage(error) };
}

async function readUrlList(urlListPath: string): Promise<string[]> {
  try {
    const text = await fs.readFile(urlListPath, "utf-8");
    return text
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  } catch (error) {
    throw new ArtifactIOError(`Failed to read ${urlListPath}: ${errorMessage(error)}`, urlListPath, { cause: error });
  }
}

async function assembleOne(
  urlListPath: string,
  documentPath: string,
  acquisition: AcquisitionContext,
): Promise<AssemblyOutcome> {
  const urls = await readUrlList(urlListPath);
  if (urls.length === 0) {
    return { urlListPath, documentPath, status: "failed", reason: { kind: "empty-url-list", path: urlListPath } };
  }

  const images: NormalizedImage[] = await acquire(urls, acquisition);
  const bytes = await assemble(images, { title: path.parse(documentPath).name });
  try {
    await writeFileAtomic(documentPath, bytes);
  } catch (error) {
    throw new ArtifactIOError(`Failed to write ${documentPath}: ${errorMessage(error)}`, documentPath, {
      cause: error,
    });
  }
  acquisition.logger.info({ path: documentPath, pages: images.length }, "Generated PDF");
  return { urlListPath, documentPath, status: "assembled", pageCount: images.length };
}

/**
 * Assemble a document for every URL list whose document is missing.
 * Chapters are processed one at a time; the pages of each are fetched
 * concurrently by the acquisition pool.
 */
export async function assembleBook(
  context: RunContext,
  layout: BookLayout,
  overwrite: boolean,
): Promise<AssemblyOutcome[]> {
  const outcomes: AssemblyOutcome[] = [];

  for (const fileName of await listUrlListFiles(layout)) {
    const urlListPath = path.join(layout.imagesDir, fileName);
    const documentPath = path.join(layout.documentsDir, documentNameForUrlList(fileName, layout.siteTag));

    if (!overwrite && (await pathExists(documentPath))) {
      outcomes.push({ urlListPath, documentPath, status: "up-to-date" });
      continue;
    }

    const logger = context.logger.child({ list: fileName });
    logger.info("Generating PDF");
    try {
      outcomes.push(await assembleOne(urlListPath, documentPath, { ...context.acquisition, logger }));
    } catch (error) {
      const reason = assemblyReason(error);
      logger.error({ reason }, "PDF generation failed, chapter left for the next run");
      outcomes.push({ urlListPath, documentPath, status: "failed", reason });
    }
  }

  return outcomes;
}

async function withEngine<T>(context: RunContext, use: (engine: RenderingEngine) => Promise<T>): Promise<T> {
  let engine: RenderingEngine;
  try {
    engine = await context.openEngine();
  } catch (error) {
    throw new FatalRunError(`Cannot start rendering session: ${errorMessage(error)}`, { cause: error });
  }

  try {
    return await use(engine);
  } finally {
    await engine.close();
  }
}

type DiscoveryResult =
  | { kind: "already-archived"; book: Book; root: string }
  | { kind: "discovered"; book: Book; layout: BookLayout; outcomes: ChapterOutcome[] };

async function discoverBook(context: RunContext, engine: RenderingEngine, request: RunRequest): Promise<DiscoveryResult> {
  const { adapter } = request;
  const { book, bookUrl } = await openBook(context, engine, request);

  const archived = createBookLayout(context.outputDir, adapter.siteTag, book.directoryName, "completed");
  if (await pathExists(archived.root)) {
    if (book.state !== "completed") {
      context.logger.warn({ root: archived.root }, "Book is archived but the source reports it ongoing");
    }
    return { kind: "already-archived", book, root: archived.root };
  }

  const layout = createBookLayout(context.outputDir, adapter.siteTag, book.directoryName);
  await fs.mkdir(layout.imagesDir, { recursive: true });
  const outcomes = await discover(context, engine, request, layout, bookUrl);
  return { kind: "discovered", book, layout, outcomes };
}

/**
 * Run one book end to end.
 *
 * @throws {FatalRunError} If the rendering session cannot start, or the book
 *   or its chapter list cannot be read
 */
export async function runBook(context: RunContext, request: RunRequest): Promise<RunSummary> {
  const logger = context.logger.child({ site: request.adapter.siteTag, bookId: request.bookId });
  const scoped: RunContext = { ...context, logger };

  const discovery = await withEngine(scoped, (engine) => discoverBook(scoped, engine, request));
  if (discovery.kind === "already-archived") {
    logger.info({ root: discovery.root }, "Book already archived, nothing to do");
    return {
      book: discovery.book,
      status: "already-archived",
      root: discovery.root,
      discovered: [],
      assembled: [],
      indexPath: null,
    };
  }

  const { book, layout, outcomes: discovered } = discovery;
  const assembled = await assembleBook(scoped, layout, request.overwrite);

  let indexPath: string | null = null;
  if (context.listing && (await pathExists(layout.documentsDir))) {
    indexPath = await context.listing(layout.documentsDir);
  }

  const failedDiscovery = discovered.filter((outcome) => !outcome.ok);
  const failedAssembly = assembled.filter((outcome) => outcome.status === "failed");
  for (const outcome of failedDiscovery) {
    logger.warn({ chapter: outcome.chapter.index, name: outcome.chapter.name }, "Skipped chapter");
  }

  // a finished book with gaps stays active so the next run can fill them
  if (book.state !== "completed" || failedDiscovery.length > 0 || failedAssembly.length > 0) {
    return { book, status: "active", root: layout.root, discovered, assembled, indexPath };
  }

  const archivedLayout = await archiveBook(context.outputDir, layout);
  logger.info({ root: archivedLayout.root }, "Book archived");
  if (indexPath) {
    indexPath = path.join(archivedLayout.documentsDir, path.basename(indexPath));
  }
  return { book, status: "archived", root: archivedLayout.root, discovered, assembled, indexPath };
}
