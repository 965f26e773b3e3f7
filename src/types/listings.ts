/**
 * Listing alert type definitions
 *
 * Shapes produced by the alert extraction engine and consumed by the
 * lookup/scoring stages downstream.
 */

/**
 * Minimal record for one listing found in an alert email
 */
export type ListingStub = {
  /** Vendor-assigned numeric listing ID (digits only) */
  readonly identifier: string;
  /** Absolute listing URL, always ending in `<identifier>_zpid/` */
  readonly canonicalUrl: string;
  /** Best-effort street address; empty when unknown */
  readonly address: string;
  /** Listing price in whole currency units; 0 means unknown */
  readonly price: number;
};

/**
 * One alert email body handed over by the mailbox collaborator
 */
export type AlertDocument = {
  html: string;
  /** Subject or file name, used for diagnostics only */
  label?: string;
};

/**
 * Which identifier pattern produced a match
 *
 * - primary: direct homedetails link
 * - secondary: identifier encoded in a zpid_target redirect
 */
export type IdentifierStrategy = "primary" | "secondary";

/**
 * Successful identifier match
 */
export type IdentifierMatch = {
  readonly identifier: string;
  readonly canonicalUrl: string;
  readonly strategy: IdentifierStrategy;
};

/**
 * Result of cutting the secondary-listings section off a document
 */
export type TruncationResult = {
  html: string;
  /** Marker phrase that cut the document, null when nothing was cut */
  marker: string | null;
};

/**
 * Seen-set of listing identifiers shared by the extraction stages
 */
export interface ListingSeenSet {
  /** Record an identifier; true if it was not seen before */
  claim(identifier: string): boolean;
  /** Keep the stubs whose identifiers are new, in order */
  merge(stubs: readonly ListingStub[]): ListingStub[];
}

/**
 * Outcome of the card pass over one document
 */
export type CardExtraction = {
  stubs: ListingStub[];
  /** Cards that carried an identifier, duplicates included */
  recognizedCards: number;
};

export type ExtractListingsOptions = {
  /** Subject or file name for log context */
  label?: string;
  /**
   * Shared seen-set. When omitted, a fresh one is used and uniqueness holds
   * within this document only.
   */
  deduplicator?: ListingSeenSet;
};

export type ExtractListingsBatchOptions = {
  /** Seen-set the per-document results are merged through */
  deduplicator?: ListingSeenSet;
};

/**
 * Outcome of filtering extracted stubs against the ledger
 */
export type ListingSelection = {
  /** Stubs to hand to the lookup stage, in extraction order */
  listings: readonly ListingStub[];
  /** Number of stubs passed to the lookup stage */
  selected: number;
  /** Number of stubs already present in the ledger */
  skippedKnown: number;
  /** Number of new stubs left for a later run by the per-run cap */
  deferred: number;
};
