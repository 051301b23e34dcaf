/**
 * Acquisition worker pool: fetch and normalize every image of a chapter.
 *
 * All-or-nothing: a chapter with one unrecoverable page yields no images at
 * all, so it is never assembled from an incomplete set. Losing a page stops
 * the other workers before the chapter's failure is reported.
 */

import * as os from "node:os";
import pLimit from "p-limit";
import { FetchError, errorMessage } from "./errors.js";
import type { ImageFetcher } from "./http.js";
import type { Logger } from "./logger.js";
import { normalize as defaultNormalize } from "./normalize.js";
import type { NormalizedImage } from "./types.js";
import { delay } from "./utils.js";

/** Hard cap on concurrent image workers */
export const MAX_WORKERS = 20;

export interface AcquisitionContext {
  fetcher: ImageFetcher;
  logger: Logger;
  /** Requested worker count; capped by {@link MAX_WORKERS} and CPU parallelism */
  concurrency: number;
  /** Attempts per URL, covering fetch, integrity check and normalization */
  attempts: number;
  /** Base backoff; attempt n (0-based) is followed by a `backoffMs * 2^n` wait */
  backoffMs: number;
  normalize?: (raw: Buffer) => Promise<NormalizedImage>;
}

/**
 * Resolve the effective worker count for this machine.
 */
export function workerCount(requested: number, parallelism: number = os.availableParallelism()): number {
  return Math.max(1, Math.min(requested, MAX_WORKERS, parallelism));
}

async function acquireOne(
  url: string,
  position: number,
  context: AcquisitionContext,
  signal: AbortSignal,
): Promise<NormalizedImage> {
  const normalize = context.normalize ?? defaultNormalize;
  const { attempts, backoffMs } = context;

  for (let attempt = 0; attempt < attempts; attempt++) {
    if (signal.aborted) {
      throw new FetchError(`chapter abandoned before ${url}`, { url });
    }
    try {
      const raw = await context.fetcher.getBuffer(url);
      return await normalize(raw);
    } catch (error) {
      context.logger.warn(
        { url, page: position + 1, attempt: attempt + 1, attempts, err: errorMessage(error) },
        "Image attempt failed",
      );
      if (attempt < attempts - 1) {
        await delay(backoffMs * 2 ** attempt, signal);
      }
    }
  }

  context.logger.error({ url, page: position + 1 }, "Permanent failure for image");
  throw new FetchError(`essential image missing: ${url}`, { url });
}

/**
 * Fetch and normalize all URLs concurrently.
 *
 * @param urls - Image references in reading order
 * @returns Normalized images in the same order as `urls`
 * @throws {FetchError} Once any URL exhausts its attempts and the other workers have stopped
 */
export async function acquire(urls: readonly string[], context: AcquisitionContext): Promise<NormalizedImage[]> {
  const limit = pLimit(workerCount(context.concurrency));
  const controller = new AbortController();
  const tasks = urls.map((url, position) => limit(() => acquireOne(url, position, context, controller.signal)));

  try {
    return await Promise.all(tasks);
  } catch (error) {
    // queued pages give up without fetching; running ones stop at their next attempt
    controller.abort();
    await Promise.allSettled(tasks);
    throw error;
  }
}
