/**
 * Alert document preprocessing
 */

import type { TruncationResult } from "@/types";
import { SECONDARY_LISTINGS_MARKERS } from "@/constants";

/**
 * Drop the "recommended / similar homes" section of an alert
 *
 * Those sections contain full listing cards indistinguishable from the
 * primary ones, so the document is cut strictly before the earliest marker
 * found. Equal offsets go to the marker listed first.
 *
 * @param html - Full alert body
 * @returns The kept prefix and the marker that cut it (null if none)
 */
export function truncateAtSecondaryListings(html: string): TruncationResult {
  let cutAt = -1;
  let marker: string | null = null;

  for (const candidate of SECONDARY_LISTINGS_MARKERS) {
    const index = html.indexOf(candidate);
    if (index !== -1 && (cutAt === -1 || index < cutAt)) {
      cutAt = index;
      marker = candidate;
    }
  }

  if (marker === null) {
    return { html, marker: null };
  }

  return { html: html.slice(0, cutAt), marker };
}
