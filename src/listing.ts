/**
 * Generate a browsable index.html for a documents subtree
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import { countPages } from "./pdf.js";
import { writeFileAtomic } from "./utils.js";

export const INDEX_FILE = "index.html";

/** Metadata shown for one document */
export interface ListingEntry {
  title: string;
  filename: string;
  pages: number;
  /** Size in kilobytes, one decimal */
  sizeKb: string;
  modified: Date;
}

export interface ListingOptions {
  logger: Logger;
  /** Timestamp printed in the header */
  now?: Date;
}

/**
 * Escape text for use in HTML content and attribute values.
 */
export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/**
 * Collect metadata for every PDF in a directory, sorted by file name.
 * Files that cannot be parsed are logged and left out.
 */
export async function collectEntries(documentsDir: string, logger: Logger): Promise<ListingEntry[]> {
  const names = (await fs.readdir(documentsDir)).filter((name) => name.toLowerCase().endsWith(".pdf")).sort();

  const entries: ListingEntry[] = [];
  for (const filename of names) {
    const filepath = path.join(documentsDir, filename);
    try {
      const [bytes, stats] = await Promise.all([fs.readFile(filepath), fs.stat(filepath)]);
      entries.push({
        title: path.parse(filename).name,
        filename,
        pages: await countPages(bytes),
        sizeKb: (stats.size / 1024).toFixed(1),
        modified: stats.mtime,
      });
    } catch (error) {
      logger.warn({ path: filepath, err: errorMessage(error) }, "Skipping unreadable document");
    }
  }
  return entries;
}

/**
 * Render the listing page.
 */
export function renderListing(heading: string, entries: readonly ListingEntry[], now: Date): string {
  const items = entries
    .map(
      (entry) =>
        `      <li class="pdf-item">` +
        `<a href="${escapeHtml(encodeURI(entry.filename))}" target="_blank">${escapeHtml(entry.title)}</a>` +
        `<span class="pdf-info">Pages: ${entry.pages} | Size: ${entry.sizeKb} KB | ` +
        `Modified: ${entry.modified.toISOString()}</span></li>`,
    )
    .join("\n");

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>PDF Content Index - ${escapeHtml(heading)}</title>
  <style>
    body { font-family: Arial, sans-serif; margin: 2rem; background-color: #f5f5f5; }
    .header { text-align: center; margin-bottom: 2rem; color: #2c3e50; }
    .stats { color: #7f8c8d; }
    .pdf-list { max-width: 800px; margin: 0 auto; padding: 2rem; list-style: none; background: white; border-radius: 10px; }
    .pdf-item { padding: 1rem; border-bottom: 1px solid #eee; display: flex; justify-content: space-between; }
    .pdf-info { color: #666; font-size: 0.9rem; }
    a { color: #2980b9; text-decoration: none; font-weight: bold; }
  </style>
</head>
<body>
  <div class="header">
    <h1>${escapeHtml(heading)}</h1>
    <div class="stats">Total PDFs: ${entries.length} | Last Updated: ${now.toISOString()}</div>
  </div>
  <ul class="pdf-list">
${items}
  </ul>
</body>
</html>
`;
}

/**
 * Write `index.html` into a documents subtree.
 *
 * @param documentsDir - Directory holding the chapter PDFs
 * @returns Path of the generated index
 */
export async function generateListing(documentsDir: string, options: ListingOptions): Promise<string> {
  const entries = await collectEntries(documentsDir, options.logger);
  const html = renderListing(path.basename(documentsDir), entries, options.now ?? new Date());
  const output = path.join(documentsDir, INDEX_FILE);
  await writeFileAtomic(output, html);
  return output;
}
