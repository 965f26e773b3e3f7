import type { IdentifierMatch, ListingStub } from "@/types";

/**
 * Build the frozen stub handed to downstream stages
 */
export function createListingStub(
  match: IdentifierMatch,
  address: string,
  price = 0,
): ListingStub {
  return Object.freeze({
    identifier: match.identifier,
    canonicalUrl: match.canonicalUrl,
    address,
    price: Number.isSafeInteger(price) && price > 0 ? price : 0,
  });
}
