/**
 * Listing alert extraction constants
 *
 * Patterns, markers and layout conventions of the vendor's alert emails.
 */

/**
 * Direct listing link: `.../homedetails/<optional-slug>/<digits>_zpid/`
 *
 * Absolute or scheme-relative. Group 1 is the listing identifier.
 * The slug part is lazy so the identifier segment is never swallowed.
 */
export const PRIMARY_LISTING_URL_PATTERN =
  /(?:https?:)?\/\/(?:www\.)?zillow\.com\/homedetails\/(?:[^\s"'<>]*?\/)?(\d+)_zpid\/?/i;

/**
 * Redirect-wrapped target used by "New Listing" alerts:
 * `zpid_target/<digits>_zpid` or `zpid_target%2F<digits>_zpid`
 */
export const SECONDARY_LISTING_TARGET_PATTERN =
  /zpid_target(?:\/|%2F)(\d+)_zpid/i;

/**
 * Canonical URL used when only the identifier is known
 */
export const CANONICAL_LISTING_URL_BASE = "https://www.zillow.com/homedetails/";

/**
 * Slug segment of a homedetails URL, e.g. `408-Manchester-Rd-Auburn-NH-03032`
 */
export const LISTING_URL_SLUG_PATTERN = /\/homedetails\/([^/]+)\/\d+_zpid/;

/**
 * Address-like text line: "123 Main St, City, NH" (zip optional)
 */
export const ADDRESS_LINE_PATTERN = /^\d+\s+\w+.*,\s*\w+.*,\s*[A-Z]{2}/;

/**
 * Phrases that open a "recommended / similar homes" section.
 * Everything from the earliest occurrence onward is ignored.
 * Listed in priority order (used to break ties).
 */
export const SECONDARY_LISTINGS_MARKERS = [
  "Our recommendations for you",
  "Check out these similar homes",
] as const;

/**
 * Class token family of listing card tables.
 * Liked-homes and open-house alerts use `mw502`, new-listing alerts `mw504`.
 */
export const CARD_CLASS_TOKEN_PATTERN = /mw50[24]/;

/**
 * Element holding the display price inside a card
 */
export const CARD_PRICE_SELECTOR = "h5";

/**
 * Characters stripped from a display price before parsing
 */
export const PRICE_NOISE_PATTERN = /[$,]/g;
