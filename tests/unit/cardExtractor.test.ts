/**
 * Unit tests for card table extraction
 */

import { describe, it, expect } from "vitest";
import { load } from "cheerio";
import { findCardContainers, parseDisplayPrice } from "@/extraction";

describe("parseDisplayPrice", () => {
  it("should strip currency symbol and group separators", () => {
    expect(parseDisplayPrice("$485,000")).toBe(485000);
    expect(parseDisplayPrice(" $1,250,000 ")).toBe(1250000);
    expect(parseDisplayPrice("399999")).toBe(399999);
  });

  it("should accept whitespace between the currency symbol and digits", () => {
    expect(parseDisplayPrice("$ 485,000")).toBe(485000);
    expect(parseDisplayPrice("$\u00a0485,000")).toBe(485000);
  });

  it("should return 0 for non-numeric displays", () => {
    expect(parseDisplayPrice("TBD")).toBe(0);
    expect(parseDisplayPrice("")).toBe(0);
    expect(parseDisplayPrice("$1.2M")).toBe(0);
    expect(parseDisplayPrice("$485,000+")).toBe(0);
  });

  it("should never return a negative price", () => {
    expect(parseDisplayPrice("-$5,000")).toBe(0);
  });
});

describe("findCardContainers", () => {
  it("should find card tables by class token in document order", () => {
    const $ = load(`
      <table class="header"><tr><td>Header</td></tr></table>
      <table class="mw504" id="second-layout"><tr><td>A</td></tr></table>
      <table class="card mw502" id="first-layout"><tr><td>B</td></tr></table>
      <div class="mw502">not a table</div>
    `);

    expect(findCardContainers($).map((el) => $(el).attr("id"))).toEqual([
      "second-layout",
      "first-layout",
    ]);
  });

  it("should include nested card tables after their container", () => {
    const $ = load(`
      <table class="mw502" id="outer"><tr><td>
        <table class="mw504" id="inner"><tr><td>x</td></tr></table>
      </td></tr></table>
    `);

    expect(findCardContainers($).map((el) => $(el).attr("id"))).toEqual([
      "outer",
      "inner",
    ]);
  });

  it("should ignore unrelated mw tokens", () => {
    const $ = load(
      '<table class="mw500"><tr><td>x</td></tr></table><table><tr><td>y</td></tr></table>',
    );
    expect(findCardContainers($)).toHaveLength(0);
  });
});
