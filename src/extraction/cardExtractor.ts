/**
 * Structured extraction from listing card tables
 *
 * Each card is read through two views:
 * - raw serialization (comments included) for the identifier, because the
 *   real listing link often only exists inside Outlook-only VML markup while
 *   the visible anchors point at click-tracking redirects;
 * - the parsed tree for the address lines and the price element.
 */

import type { CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import type {
  CardExtraction,
  ListingSeenSet,
  ListingStub,
  Logger,
} from "@/types";
import {
  CARD_CLASS_TOKEN_PATTERN,
  CARD_PRICE_SELECTOR,
  PRICE_NOISE_PATTERN,
} from "@/constants";
import { createListingStub } from "./listingStub";
import {
  BLOCK_IDENTIFIER_STRATEGIES,
  addressFromListingUrl,
  findAddressLine,
  matchListingIdentifier,
} from "./patterns";
import { collectTextLines } from "./textLines";

/**
 * Card tables in document order (nested matches included)
 */
export function findCardContainers($: CheerioAPI): Element[] {
  return $("table")
    .toArray()
    .filter((table) => {
      const classTokens = ($(table).attr("class") ?? "").split(/\s+/);
      return classTokens.some((token) => CARD_CLASS_TOKEN_PATTERN.test(token));
    });
}

/**
 * Parse a display price such as "$485,000"
 *
 * @returns Whole currency units, or 0 for anything that is not a plain
 * digit run once "$" and "," are removed ("TBD", "$1.2M", "")
 */
export function parseDisplayPrice(text: string): number {
  const cleaned = text.replace(PRICE_NOISE_PATTERN, "").trim();
  if (!/^\d+$/.test(cleaned)) {
    return 0;
  }
  const price = Number.parseInt(cleaned, 10);
  return Number.isSafeInteger(price) ? price : 0;
}

function extractCardPrice($: CheerioAPI, card: Element): number {
  const priceElement = $(card).find(CARD_PRICE_SELECTOR).get(0);
  if (!priceElement) {
    return 0;
  }
  return parseDisplayPrice(collectTextLines(priceElement).join(""));
}

/**
 * Extract one stub per recognized card
 *
 * Cards without an identifier, or whose identifier the deduplicator has
 * already seen, are skipped before address and price are read. Cards with
 * an identifier are counted as recognized even when they are duplicates.
 */
export function extractFromCards(
  $: CheerioAPI,
  deduplicator: ListingSeenSet,
  log: Logger,
): CardExtraction {
  const stubs: ListingStub[] = [];
  const cards = findCardContainers($);
  let recognizedCards = 0;

  for (const card of cards) {
    const match = matchListingIdentifier(
      $.html(card),
      BLOCK_IDENTIFIER_STRATEGIES,
    );
    if (!match) {
      log.debug("Card without listing identifier skipped");
      continue;
    }

    recognizedCards += 1;
    if (!deduplicator.claim(match.identifier)) {
      continue;
    }

    const address =
      findAddressLine(collectTextLines(card)) ||
      addressFromListingUrl(match.canonicalUrl);

    stubs.push(
      createListingStub(match, address, extractCardPrice($, card)),
    );

    log.debug("Listing card extracted", {
      identifier: match.identifier,
      strategy: match.strategy,
    });
  }

  log.debug("Card extraction finished", {
    cards: cards.length,
    recognizedCards,
    listings: stubs.length,
  });

  return { stubs, recognizedCards };
}
