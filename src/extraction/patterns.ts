/**
 * Listing identifier and address patterns
 *
 * Every extraction path (card blocks, anchors, raw text) resolves identifiers
 * through the same ordered list of attempts, so a link is read the same way
 * wherever it appears.
 */

import type { IdentifierMatch, IdentifierStrategy } from "@/types";
import {
  ADDRESS_LINE_PATTERN,
  CANONICAL_LISTING_URL_BASE,
  LISTING_URL_SLUG_PATTERN,
  PRIMARY_LISTING_URL_PATTERN,
  SECONDARY_LISTING_TARGET_PATTERN,
} from "@/constants";

type IdentifierAttempt = (text: string) => IdentifierMatch | null;

/**
 * Card blocks may carry either a direct link or a redirect target
 */
export const BLOCK_IDENTIFIER_STRATEGIES: readonly IdentifierStrategy[] = [
  "primary",
  "secondary",
];

/**
 * Fallback scanning only trusts direct links
 */
export const LINK_IDENTIFIER_STRATEGIES: readonly IdentifierStrategy[] = [
  "primary",
];

/**
 * Canonical URL for a bare identifier
 *
 * @example
 * canonicalUrlForIdentifier("113449928")
 * // "https://www.zillow.com/homedetails/113449928_zpid/"
 */
export function canonicalUrlForIdentifier(identifier: string): string {
  return `${CANONICAL_LISTING_URL_BASE}${identifier}_zpid/`;
}

/**
 * Normalize a matched homedetails URL: exactly one trailing slash, and an
 * explicit https scheme for scheme-relative links
 */
export function canonicalizeListingUrl(matchedUrl: string): string {
  const withoutSlash = matchedUrl.replace(/\/+$/, "");
  const absolute = withoutSlash.startsWith("//")
    ? `https:${withoutSlash}`
    : withoutSlash;
  return `${absolute}/`;
}

function primaryMatchFrom(match: RegExpMatchArray): IdentifierMatch {
  return {
    identifier: match[1],
    canonicalUrl: canonicalizeListingUrl(match[0]),
    strategy: "primary",
  };
}

const IDENTIFIER_ATTEMPTS: Record<IdentifierStrategy, IdentifierAttempt> = {
  primary: (text) => {
    const match = PRIMARY_LISTING_URL_PATTERN.exec(text);
    return match ? primaryMatchFrom(match) : null;
  },
  secondary: (text) => {
    const match = SECONDARY_LISTING_TARGET_PATTERN.exec(text);
    if (!match) {
      return null;
    }
    return {
      identifier: match[1],
      canonicalUrl: canonicalUrlForIdentifier(match[1]),
      strategy: "secondary",
    };
  },
};

/**
 * Resolve the first listing identifier in a piece of text
 *
 * Strategies are tried in order; the first one that matches wins.
 *
 * @param text - Raw markup or a single URL
 * @param strategies - Ordered attempts (defaults to primary, then secondary)
 * @returns The match, or null when no strategy applies
 */
export function matchListingIdentifier(
  text: string,
  strategies: readonly IdentifierStrategy[] = BLOCK_IDENTIFIER_STRATEGIES,
): IdentifierMatch | null {
  for (const strategy of strategies) {
    const match = IDENTIFIER_ATTEMPTS[strategy](text);
    if (match) {
      return match;
    }
  }
  return null;
}

/**
 * Every direct listing link in the text, in text order (duplicates included)
 */
export function scanListingIdentifiers(text: string): IdentifierMatch[] {
  const pattern = new RegExp(PRIMARY_LISTING_URL_PATTERN.source, "gi");
  return Array.from(text.matchAll(pattern), primaryMatchFrom);
}

/**
 * First line that looks like "123 Main St, City, ST"
 *
 * @returns The trimmed line, or "" when no line qualifies
 */
export function findAddressLine(lines: readonly string[]): string {
  for (const rawLine of lines) {
    const line = rawLine.trim();
    if (ADDRESS_LINE_PATTERN.test(line)) {
      return line;
    }
  }
  return "";
}

/**
 * Rough address from the URL slug
 *
 * @example
 * addressFromListingUrl("https://www.zillow.com/homedetails/408-Manchester-Rd-Auburn-NH-03032/87654321_zpid/")
 * // "408 Manchester Rd Auburn NH 03032"
 */
export function addressFromListingUrl(url: string): string {
  const match = LISTING_URL_SLUG_PATTERN.exec(url);
  if (!match) {
    return "";
  }
  return match[1].replace(/-/g, " ");
}
