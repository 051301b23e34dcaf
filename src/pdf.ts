/**
 * Assemble normalized page images into a single PDF
 */

import { PDFDocument } from "pdf-lib";
import { AssemblyError, errorMessage } from "./errors.js";
import type { NormalizedImage } from "./types.js";

export interface AssembleOptions {
  /** Document title metadata */
  title?: string;
}

/**
 * Build a PDF with one page per image.
 * Each page is sized to its own image (1 px = 1 pt at 72 DPI), with no
 * margin or border; input order becomes reading order.
 *
 * @param images - Normalized JPEG pages in reading order
 * @returns Serialized PDF bytes
 * @throws {AssemblyError} If `images` is empty or a page cannot be embedded
 */
export async function assemble(images: readonly NormalizedImage[], options: AssembleOptions = {}): Promise<Uint8Array> {
  if (images.length === 0) {
    throw new AssemblyError("Cannot assemble a document from an empty image list");
  }

  try {
    const doc = await PDFDocument.create();
    if (options.title) {
      doc.setTitle(options.title);
    }

    for (const image of images) {
      const embedded = await doc.embedJpg(image.data);
      const page = doc.addPage([image.width, image.height]);
      page.drawImage(embedded, { x: 0, y: 0, width: image.width, height: image.height });
    }

    return await doc.save();
  } catch (error) {
    throw new AssemblyError(`PDF assembly failed: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Count the pages of a serialized PDF.
 */
export async function countPages(bytes: Uint8Array): Promise<number> {
  const doc = await PDFDocument.load(bytes);
  return doc.getPageCount();
}
