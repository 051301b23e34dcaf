/**
 * Shared type definitions for the archiver
 */

/** Tag of a supported source site; also the name of its active root directory */
export type SiteTag = "8comic" | "xmanhua";

/** Root directory name that holds archived books */
export const COMPLETED_TAG = "completed";

/** Lifecycle state of a book on disk */
export type BookState = "active" | "completed";

/** A book as reported by its source */
export interface Book {
  /** Source-assigned identifier */
  id: string;
  /** Display title read from the landing page */
  title: string;
  siteTag: SiteTag;
  state: BookState;
  /** Filesystem-safe `<title>_<id>`, the key for every artifact of the book */
  directoryName: string;
}

/** How a chapter is reached from the chapter list */
export type ChapterHandle = { kind: "href"; value: string } | { kind: "element-id"; value: string };

/** A (handle, name) pair as declared by the chapter-list markup */
export interface ChapterLink {
  handle: ChapterHandle;
  name: string;
  /**
   * One-based position among every anchor of the list, for sources whose
   * numbering also counts anchors that are not chapters
   */
  ordinal?: number;
}

export type ChapterStatus = "pending" | "discovered" | "failed";

/** Metadata for a single chapter */
export interface Chapter {
  /** One-based reading-order index, stable across runs */
  index: number;
  /** Filesystem-safe display name */
  name: string;
  handle: ChapterHandle;
  status: ChapterStatus;
}

/** Order in which a source declares its chapter list */
export type ChapterOrder = "reading" | "newest-first";

/** Re-encoded page image, ready for assembly */
export interface NormalizedImage {
  /** JPEG bytes at 72 DPI */
  data: Buffer;
  width: number;
  height: number;
}

/** Why a chapter was left for a later run */
export type SkipReason =
  | { kind: "navigation-timeout"; attempts: number }
  | { kind: "navigation-failed"; message: string }
  | { kind: "extraction-empty" }
  | { kind: "artifact-io"; path: string; message: string }
  | { kind: "empty-url-list"; path: string }
  | { kind: "fetch-failed"; message: string }
  | { kind: "assembly-failed"; message: string };

/** Result of discovering one chapter */
export type ChapterOutcome =
  | { ok: true; chapter: Chapter; urlListPath: string; imageCount: number }
  | { ok: false; chapter: Chapter; reason: SkipReason };

/** Result of assembling the document for one URL list */
export type AssemblyOutcome = { urlListPath: string; documentPath: string } & (
  | { status: "assembled"; pageCount: number }
  | { status: "up-to-date" }
  | { status: "failed"; reason: SkipReason }
);
