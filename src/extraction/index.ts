/**
 * Listing alert extraction
 *
 * Turns vendor alert email HTML into deduplicated listing stubs.
 * Does not fetch mail, look anything up, or persist results.
 */

export { extractListings, extractListingsBatch } from "./extractListings";
export { ListingDeduplicator } from "./deduplicator";
export { ExtractionInputError } from "./errors";
export { truncateAtSecondaryListings } from "./preprocess";
export { findCardContainers, parseDisplayPrice } from "./cardExtractor";
export { collectTextLines } from "./textLines";
export {
  addressFromListingUrl,
  canonicalUrlForIdentifier,
  canonicalizeListingUrl,
  findAddressLine,
  matchListingIdentifier,
  scanListingIdentifiers,
} from "./patterns";
