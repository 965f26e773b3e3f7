/**
 * Link-scan fallback for alert layouts without recognizable cards
 *
 * Two passes over the preprocessed document, both feeding the same
 * deduplicator: anchor targets first, then every direct listing URL in the
 * raw text (covers links in plain text or non-anchor markup).
 * Only direct links count here; no block context exists, so the address
 * comes from the URL slug and the price is unknown.
 */

import type { CheerioAPI } from "cheerio";
import type { IdentifierMatch, ListingSeenSet, ListingStub } from "@/types";
import { createListingStub } from "./listingStub";
import {
  LINK_IDENTIFIER_STRATEGIES,
  addressFromListingUrl,
  matchListingIdentifier,
  scanListingIdentifiers,
} from "./patterns";

export function scanListingLinks(
  $: CheerioAPI,
  html: string,
  deduplicator: ListingSeenSet,
): ListingStub[] {
  const stubs: ListingStub[] = [];

  const accept = (match: IdentifierMatch): void => {
    if (deduplicator.claim(match.identifier)) {
      stubs.push(
        createListingStub(match, addressFromListingUrl(match.canonicalUrl)),
      );
    }
  };

  for (const anchor of $("a[href]").toArray()) {
    const href = $(anchor).attr("href");
    if (!href) {
      continue;
    }
    const match = matchListingIdentifier(href, LINK_IDENTIFIER_STRATEGIES);
    if (match) {
      accept(match);
    }
  }

  for (const match of scanListingIdentifiers(html)) {
    accept(match);
  }

  return stubs;
}
