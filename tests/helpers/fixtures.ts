/**
 * Fixture helpers for offline tests
 */

import { readFileSync } from "fs";
import { join } from "path";

export const FIXTURES_DIR = join(process.cwd(), "tests", "fixtures");

/**
 * Read a fixture relative to tests/fixtures
 */
export function loadFixtureText(relativePath: string): string {
  return readFileSync(join(FIXTURES_DIR, relativePath), "utf-8");
}

/**
 * Minimal "liked homes" card with a direct listing link
 */
export function likedHomeCard(options: {
  identifier: string;
  slug?: string;
  price?: string;
  address?: string;
  cardClass?: string;
}): string {
  const slug = options.slug ? `${options.slug}/` : "";
  const priceLine = options.price === undefined ? "" : `<h5>${options.price}</h5>`;
  const addressLine =
    options.address === undefined ? "" : `<p>${options.address}</p>`;
  return `
<table class="${options.cardClass ?? "mw502"}">
  <tr><td>
    <a href="https://www.zillow.com/homedetails/${slug}${options.identifier}_zpid/"><img src="photo.jpg" /></a>
  </td></tr>
  <tr><td>
    ${priceLine}
    ${addressLine}
  </td></tr>
</table>`;
}
