#!/usr/bin/env node
/**
 * Download a book's chapters, assemble one PDF per chapter and archive the
 * book once the source reports it finished.
 *
 * Usage: npm start -- --book-id <id> (--from-8comic | --from-xmanhua) [options]
 */

import "dotenv/config";
import { execFile } from "node:child_process";
import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { PuppeteerEngine } from "./browser.js";
import { type AppConfig, loadConfig } from "./config.js";
import { FatalRunError, errorMessage } from "./errors.js";
import { HttpClient } from "./http.js";
import { generateListing } from "./listing.js";
import { type Logger, createLogger } from "./logger.js";
import { type RunContext, type RunRequest, type RunSummary, runBook } from "./run.js";
import { getSourceAdapter } from "./sources/index.js";
import type { SiteTag } from "./types.js";
import {
  formatDuration,
  getNullableStringArg,
  hasFlag,
  hasHelpFlag,
  onInterrupt,
  setupSignalHandlers,
} from "./utils.js";

export interface CliOptions {
  bookId: string | null;
  sources: SiteTag[];
  overwrite: boolean;
  showIndex: boolean;
  rescan: boolean;
  showHelp: boolean;
}

const SOURCE_FLAGS: ReadonlyArray<[flag: string, siteTag: SiteTag]> = [
  ["--from-8comic", "8comic"],
  ["--from-xmanhua", "xmanhua"],
];

/**
 * Print usage information.
 */
function showUsage(): void {
  console.log("Usage: npm start -- --book-id <id> (--from-8comic | --from-xmanhua) [options]");
  console.log("");
  console.log("Download comic chapters and assemble one PDF per chapter.");
  console.log("");
  console.log("Options:");
  console.log("  --book-id <id>       Book identifier on the source site (required)");
  console.log("  --from-8comic        Use https://www.8comic.com");
  console.log("  --from-xmanhua       Use https://www.xmanhua.com");
  console.log("  --overwrite          Re-discover and re-assemble existing chapters");
  console.log("  --show-index         Open the generated index page when done");
  console.log("  --rescan             Revisit archived books (reserved)");
  console.log("  --help, -h           Show this help message");
  console.log("");
  console.log("Environment: CHROME_PATH must point at a local Chrome or Chromium binary.");
}

/**
 * Parse command line arguments.
 */
export function parseArgs(args: string[] = process.argv.slice(2)): CliOptions {
  return {
    bookId: getNullableStringArg(args, "--book-id"),
    sources: SOURCE_FLAGS.filter(([flag]) => hasFlag(args, flag)).map(([, siteTag]) => siteTag),
    overwrite: hasFlag(args, "--overwrite"),
    showIndex: hasFlag(args, "--show-index"),
    rescan: hasFlag(args, "--rescan"),
    showHelp: hasHelpFlag(args),
  };
}

/**
 * Run a book, starting over from scratch on fatal errors.
 * Resumability makes every retry pick up where the previous one stopped.
 */
export async function runWithRetries(
  context: RunContext,
  request: RunRequest,
  attempts: number,
): Promise<RunSummary> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await runBook(context, request);
    } catch (error) {
      if (!(error instanceof FatalRunError) || attempt >= attempts) throw error;
      context.logger.warn({ attempt, attempts, err: error.message }, "Run failed, starting over");
    }
  }
}

function openerCommand(platform: NodeJS.Platform): string {
  if (platform === "darwin") return "open";
  if (platform === "win32") return "explorer";
  return "xdg-open";
}

/**
 * Open a generated file with the platform's default viewer.
 */
export function openInViewer(target: string, logger: Logger): void {
  execFile(openerCommand(process.platform), [target], (error) => {
    if (error) logger.warn({ path: target, err: error.message }, "Could not open index page");
  });
}

export function createRunContext(config: AppConfig, logger: Logger): RunContext {
  const fetcher = new HttpClient({
    maxConnections: config.HTTP_MAX_CONNECTIONS,
    retries: config.TRANSPORT_RETRIES,
    backoffMs: config.TRANSPORT_BACKOFF_MS,
    timeoutMs: config.FETCH_TIMEOUT_MS,
  });

  return {
    outputDir: config.outputDirAbsolute,
    logger,
    openEngine: async () => {
      const engine = await PuppeteerEngine.open({
        executablePath: config.CHROME_PATH,
        headless: config.HEADLESS,
        slowMo: config.SLOW_MO_MS,
        timeoutMs: config.NAVIGATION_TIMEOUT_MS,
      });
      onInterrupt(() => engine.close());
      return engine;
    },
    acquisition: {
      fetcher,
      concurrency: config.FETCH_CONCURRENCY,
      attempts: config.FETCH_ATTEMPTS,
      backoffMs: config.FETCH_BACKOFF_MS,
    },
    navigation: {
      attempts: config.NAVIGATION_ATTEMPTS,
      timeoutMs: config.NAVIGATION_TIMEOUT_MS,
    },
    listing: (documentsDir) => generateListing(documentsDir, { logger }),
  };
}

export async function main(): Promise<void> {
  const options = parseArgs();

  if (options.showHelp) {
    showUsage();
    process.exit(0);
  }

  const [siteTag, ...extra] = options.sources;
  if (!siteTag || extra.length > 0) {
    console.error(
      siteTag ? "You must select only one source from 8comic and xmanhua." : "You must select one source from 8comic and xmanhua.",
    );
    showUsage();
    process.exit(1);
  }

  if (!options.bookId) {
    showUsage();
    process.exit(1);
  }

  const config = loadConfig();
  const logger = createLogger(config.LOG_LEVEL);

  if (options.rescan) {
    logger.info("Rescan of archived books is reserved and currently does nothing");
    return;
  }

  if (!config.CHROME_PATH) {
    logger.fatal("CHROME_PATH is not set");
    process.exit(1);
  }

  const started = Date.now();
  try {
    const summary = await runWithRetries(
      createRunContext(config, logger),
      { adapter: getSourceAdapter(siteTag), bookId: options.bookId, overwrite: options.overwrite },
      config.RUN_ATTEMPTS,
    );

    const skipped = summary.discovered.filter((o) => !o.ok).length;
    const failed = summary.assembled.filter((o) => o.status === "failed").length;
    logger.info(
      { root: summary.root, status: summary.status, skipped, failed, duration: formatDuration(Date.now() - started) },
      "Run complete",
    );

    if (options.showIndex && summary.indexPath) {
      openInViewer(summary.indexPath, logger);
    }
  } catch (error) {
    logger.fatal({ err: errorMessage(error) }, "Run failed");
    process.exit(1);
  }
}

/** True when this module is the process entry point, including through an npm bin link */
function isEntryPoint(): boolean {
  const entry = process.argv[1];
  return entry !== undefined && import.meta.url === pathToFileURL(realpathSync(entry)).href;
}

// Only run main when executed directly (not when imported for testing)
if (isEntryPoint()) {
  setupSignalHandlers("Download");
  main().catch((error) => {
    console.error("Error:", error);
    process.exit(1);
  });
}
