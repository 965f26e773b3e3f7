/**
 * Integration: saved alert emails → listing stubs (offline)
 *
 * One fixture per alert layout in the vendor family:
 * - liked_homes: mw502 cards, real links only inside conditional comments
 * - new_listing: mw504 card with a zpid_target redirect + recommendations
 * - open_house: mw502 primary card + mw504 similar homes
 * - plain_digest: no cards, exercises the link-scan fallback
 */

import { describe, it, expect } from "vitest";
import { extractListings, extractListingsBatch } from "@/extraction";
import { loadFixtureText } from "../../helpers/fixtures";

const LIKED_HOMES = loadFixtureText("alerts/liked_homes.html");
const NEW_LISTING = loadFixtureText("alerts/new_listing.html");
const OPEN_HOUSE = loadFixtureText("alerts/open_house.html");
const PLAIN_DIGEST = loadFixtureText("alerts/plain_digest.html");

describe("Integration: alert layouts (offline fixtures)", () => {
  it("liked-homes digest yields both cards from their VML links", () => {
    expect(extractListings(LIKED_HOMES, { label: "liked_homes" })).toEqual([
      {
        identifier: "86814380",
        canonicalUrl:
          "https://www.zillow.com/homedetails/408-Manchester-Rd-Auburn-NH-03032/86814380_zpid/",
        address: "408 Manchester Road, Auburn, NH 03032",
        price: 485000,
      },
      {
        identifier: "86808454",
        canonicalUrl:
          "https://www.zillow.com/homedetails/378-Chester-Rd-Candia-NH-03034/86808454_zpid/",
        address: "378 Chester Road, Candia, NH 03034",
        price: 400000,
      },
    ]);
  });

  it("new-listing alert yields only the primary listing", () => {
    expect(extractListings(NEW_LISTING, { label: "new_listing" })).toEqual([
      {
        identifier: "113449928",
        canonicalUrl: "https://www.zillow.com/homedetails/113449928_zpid/",
        address: "13 Birchdale Road, Bow, NH 03304",
        price: 479000,
      },
    ]);
  });

  it("open-house alert excludes the similar homes section", () => {
    const stubs = extractListings(OPEN_HOUSE, { label: "open_house" });

    expect(stubs).toEqual([
      {
        identifier: "120666053",
        canonicalUrl:
          "https://www.zillow.com/homedetails/7-Molly-Stark-Ln-New-Boston-NH-03070/120666053_zpid/",
        address: "7 Molly Stark Lane, New Boston, NH 03070",
        price: 460000,
      },
    ]);
  });

  it("digest without cards falls back to anchors, then raw text", () => {
    expect(extractListings(PLAIN_DIGEST, { label: "plain_digest" })).toEqual([
      {
        identifier: "55555555",
        canonicalUrl:
          "https://www.zillow.com/homedetails/99-Pine-Ave-Nashua-NH-03060/55555555_zpid/",
        address: "99 Pine Ave Nashua NH 03060",
        price: 0,
      },
      {
        identifier: "66666666",
        canonicalUrl:
          "https://www.zillow.com/homedetails/12-Elm-St-Concord-NH-03301/66666666_zpid/",
        address: "12 Elm St Concord NH 03301",
        price: 0,
      },
      {
        identifier: "77777777",
        canonicalUrl:
          "https://www.zillow.com/homedetails/7-Oak-Ln-Bedford-NH-03110/77777777_zpid/",
        address: "7 Oak Ln Bedford NH 03110",
        price: 0,
      },
    ]);
  });

  it("batch of all layouts keeps first-seen order and unique identifiers", () => {
    const stubs = extractListingsBatch([
      { html: LIKED_HOMES, label: "liked_homes" },
      { html: NEW_LISTING, label: "new_listing" },
      { html: LIKED_HOMES, label: "liked_homes (resent)" },
      { html: OPEN_HOUSE, label: "open_house" },
      { html: PLAIN_DIGEST, label: "plain_digest" },
    ]);

    const identifiers = stubs.map((stub) => stub.identifier);
    expect(identifiers).toEqual([
      "86814380",
      "86808454",
      "113449928",
      "120666053",
      "55555555",
      "66666666",
      "77777777",
    ]);
    expect(new Set(identifiers).size).toBe(identifiers.length);
  });
});
