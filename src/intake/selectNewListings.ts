/**
 * Selection of the stubs worth a property-data lookup
 *
 * Known listings are dropped before any lookup is paid for; the remainder
 * is capped per run and the overflow waits for the next run.
 */

import type { ListingSelection, ListingStub } from "@/types";

/**
 * @param stubs - Extracted stubs in run order
 * @param knownIdentifiers - Identifiers the ledger already recorded
 * @param maxPerRun - Cap on selected stubs (values below 0 select nothing)
 */
export function selectNewListings(
  stubs: readonly ListingStub[],
  knownIdentifiers: ReadonlySet<string>,
  maxPerRun: number,
): ListingSelection {
  const fresh = stubs.filter((stub) => !knownIdentifiers.has(stub.identifier));
  const cap = Math.max(0, Math.floor(maxPerRun));
  const listings = fresh.slice(0, cap);

  return {
    listings,
    selected: listings.length,
    skippedKnown: stubs.length - fresh.length,
    deferred: fresh.length - listings.length,
  };
}
