/**
 * Image URL extraction from a rendered chapter view.
 *
 * Strategies are tried in order and the chain stops at the first one that
 * yields at least one usable reference.
 */

import { parseMarkup } from "./markup.js";
import { uniqueInOrder } from "./utils.js";

/** A pure extraction step over a parsed chapter view */
export interface ExtractionStrategy {
  name: string;
  collect(document: Document): string[];
}

/**
 * Read one attribute from every element matching a selector.
 *
 * @example
 * attributeStrategy('lazy images', 'img[data-src]', 'data-src')
 */
export function attributeStrategy(name: string, selector: string, attribute: string): ExtractionStrategy {
  return {
    name,
    collect(document) {
      const values: string[] = [];
      for (const element of document.querySelectorAll(selector)) {
        const value = element.getAttribute(attribute);
        if (value) values.push(value);
      }
      return values;
    },
  };
}

/**
 * Pick the largest candidate of a `srcset` value.
 * Candidates without a descriptor count as `1x`; width descriptors win
 * over density ones only by their numeric size.
 *
 * @example
 * pickSrcsetCandidate('a.jpg 480w, b.jpg 1080w') // 'b.jpg'
 */
export function pickSrcsetCandidate(srcset: string): string | null {
  let best: { url: string; size: number } | null = null;
  for (const candidate of srcset.split(",")) {
    const [url, descriptor] = candidate.trim().split(/\s+/);
    if (!url) continue;
    const size = descriptor ? Number.parseFloat(descriptor) : 1;
    const weight = Number.isFinite(size) ? size : 1;
    if (!best || weight > best.size) {
      best = { url, size: weight };
    }
  }
  return best?.url ?? null;
}

/**
 * Media-source-set elements: one URL per element, the largest candidate.
 */
export function srcsetStrategy(name: string, selector: string): ExtractionStrategy {
  return {
    name,
    collect(document) {
      const values: string[] = [];
      for (const element of document.querySelectorAll(selector)) {
        const picked = pickSrcsetCandidate(element.getAttribute("srcset") ?? "");
        if (picked) values.push(picked);
      }
      return values;
    },
  };
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * Site-specific attribute holding a URL-encoded image address.
 */
export function encodedAttributeStrategy(name: string, selector: string, attribute: string): ExtractionStrategy {
  const plain = attributeStrategy(name, selector, attribute);
  return {
    name,
    collect(document) {
      return plain.collect(document).map(safeDecode);
    },
  };
}

/**
 * Generic chain used when a source does not supply its own.
 */
export const DEFAULT_STRATEGIES: readonly ExtractionStrategy[] = [
  attributeStrategy("image source", "img[src]", "src"),
  attributeStrategy("lazy image source", "img[data-src]", "data-src"),
  srcsetStrategy("source set", "source[srcset]"),
];

/**
 * Normalize one candidate into an absolute image reference.
 * Strips the query string, percent-decodes, upgrades protocol-relative
 * references to the page's scheme and resolves relative ones.
 *
 * @param raw - Attribute value as found in the markup
 * @param baseUrl - URL of the page the markup came from
 * @returns Absolute URL, or null for inline data and unresolvable values
 *
 * @example
 * normalizeImageUrl('//img.example.com/p/1.jpg?t=9', 'https://www.example.com/c/1')
 * // 'https://img.example.com/p/1.jpg'
 */
export function normalizeImageUrl(raw: string, baseUrl: string): string | null {
  const trimmed = raw.trim();
  if (!trimmed) return null;

  const withoutQuery = trimmed.split("?")[0] ?? "";
  const decoded = safeDecode(withoutQuery);
  if (!decoded || /^(data|javascript|blob):/i.test(decoded)) return null;

  let base: URL;
  try {
    base = new URL(baseUrl);
  } catch {
    return null;
  }

  if (decoded.startsWith("//")) {
    return `${base.protocol}${decoded}`;
  }
  if (/^https?:\/\//i.test(decoded)) {
    return decoded;
  }

  try {
    return new URL(decoded, base).href;
  } catch {
    return null;
  }
}

/**
 * Recover the ordered, deduplicated image references of a chapter view.
 *
 * @param markup - Rendered markup of the chapter view
 * @param baseUrl - URL the markup was rendered at
 * @param strategies - Ordered fallback chain
 * @returns References in first-occurrence order; empty when no strategy matched
 */
export function extractImageUrls(
  markup: string,
  baseUrl: string,
  strategies: readonly ExtractionStrategy[] = DEFAULT_STRATEGIES,
): string[] {
  const document = parseMarkup(markup);

  for (const strategy of strategies) {
    const urls = strategy
      .collect(document)
      .map((candidate) => normalizeImageUrl(candidate, baseUrl))
      .filter((url): url is string => url !== null);
    if (urls.length > 0) {
      return uniqueInOrder(urls);
    }
  }

  return [];
}
