/**
 * Alert email → listing stubs
 *
 * Flow per document:
 *   preprocess (cut secondary listings) → card extraction
 *   → link-scan fallback when no card carried an identifier
 * Extraction of one document is synchronous and deterministic; the only
 * state shared across documents is the deduplicator.
 */

import { load } from "cheerio";
import type {
  AlertDocument,
  ExtractListingsBatchOptions,
  ExtractListingsOptions,
  ListingStub,
} from "@/types";
import * as logger from "@/logger";
import { extractFromCards } from "./cardExtractor";
import { ListingDeduplicator } from "./deduplicator";
import { ExtractionInputError } from "./errors";
import { scanListingLinks } from "./linkScanFallback";
import { truncateAtSecondaryListings } from "./preprocess";

/**
 * Extract the primary listings of one alert email
 *
 * Never throws on odd markup: unknown layouts, missing identifiers, prices
 * or addresses only make the result shorter or emptier.
 *
 * @param html - Decoded alert body
 * @param options - Diagnostics label and an optional shared deduplicator
 * @returns Stubs in first-seen order
 * @throws {ExtractionInputError} If `html` is not a string
 */
export function extractListings(
  html: string,
  options: ExtractListingsOptions = {},
): ListingStub[] {
  if (typeof html !== "string") {
    throw new ExtractionInputError("Alert document must be a string", html);
  }

  const log = logger.withContext(
    options.label !== undefined ? { label: options.label } : {},
  );
  const deduplicator = options.deduplicator ?? new ListingDeduplicator();

  if (html.trim() === "") {
    log.debug("Empty alert document");
    return [];
  }

  const truncated = truncateAtSecondaryListings(html);
  if (truncated.marker !== null) {
    log.debug("Alert truncated at secondary listings marker", {
      marker: truncated.marker,
      keptChars: truncated.html.length,
      totalChars: html.length,
    });
  }

  const $ = load(truncated.html);

  const cards = extractFromCards($, deduplicator, log);
  if (cards.recognizedCards > 0) {
    return cards.stubs;
  }

  const linkStubs = scanListingLinks($, truncated.html, deduplicator);
  log.debug("No listing cards recognized, used link scan", {
    listings: linkStubs.length,
  });

  return linkStubs;
}

/**
 * Extract a batch of alert emails into one run-wide list
 *
 * Each document is extracted on its own (local seen-set), then the
 * per-document results are merged in input order through a single
 * deduplicator, so a listing mentioned by two alerts yields one stub.
 *
 * @param documents - Alert bodies with optional labels
 * @param options - Deduplicator to merge through (e.g. carried across calls)
 * @throws {ExtractionInputError} If the batch or an entry's html is malformed
 */
export function extractListingsBatch(
  documents: readonly AlertDocument[],
  options: ExtractListingsBatchOptions = {},
): ListingStub[] {
  if (!Array.isArray(documents)) {
    throw new ExtractionInputError(
      "Alert batch must be an array of documents",
      documents,
    );
  }

  const perDocument = documents.map((document, index) => {
    if (typeof document !== "object" || document === null) {
      throw new ExtractionInputError(
        `Alert batch entry ${index} must be an object`,
        document,
      );
    }
    return extractListings(document.html, {
      label: document.label ?? `document ${index + 1}`,
    });
  });

  const deduplicator = options.deduplicator ?? new ListingDeduplicator();
  const merged = perDocument.flatMap((stubs) => deduplicator.merge(stubs));

  logger.debug("Alert batch merged", {
    documents: documents.length,
    extracted: perDocument.reduce((sum, stubs) => sum + stubs.length, 0),
    unique: merged.length,
  });

  return merged;
}
