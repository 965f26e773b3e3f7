/**
 * ListingDeduplicator — the run-wide seen-set of listing identifiers
 *
 * One instance is owned by whoever drives a run and passed explicitly to
 * every stage that checks or inserts identifiers. First occurrence wins;
 * later ones are dropped without being reported.
 */

import type { ListingSeenSet, ListingStub } from "@/types";

export class ListingDeduplicator implements ListingSeenSet {
  private readonly seen: Set<string>;

  constructor(initialIdentifiers: Iterable<string> = []) {
    this.seen = new Set(initialIdentifiers);
  }

  get size(): number {
    return this.seen.size;
  }

  has(identifier: string): boolean {
    return this.seen.has(identifier);
  }

  /**
   * Record an identifier
   *
   * @returns true if it was not seen before (caller may emit it)
   */
  claim(identifier: string): boolean {
    if (this.seen.has(identifier)) {
      return false;
    }
    this.seen.add(identifier);
    return true;
  }

  /**
   * Keep the stubs whose identifiers are new to this set, in order
   */
  merge(stubs: readonly ListingStub[]): ListingStub[] {
    return stubs.filter((stub) => this.claim(stub.identifier));
  }
}
