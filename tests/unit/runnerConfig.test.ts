import { describe, it, expect } from "vitest";
import { RunnerConfigError, loadRunnerConfig } from "@/config/runnerConfig";

describe("loadRunnerConfig", () => {
  it("should apply defaults for an empty environment", () => {
    expect(loadRunnerConfig({})).toEqual({
      alertsDir: "data/alerts",
      knownListingsFile: undefined,
      maxListingsPerRun: 20,
      outputFile: undefined,
    });
  });

  it("should read all values from the environment", () => {
    expect(
      loadRunnerConfig({
        ALERTS_DIR: "./inbox",
        KNOWN_LISTINGS_FILE: "./ledger.txt",
        MAX_LISTINGS_PER_RUN: "5",
        OUTPUT_FILE: "./out/listings.json",
      }),
    ).toEqual({
      alertsDir: "./inbox",
      knownListingsFile: "./ledger.txt",
      maxListingsPerRun: 5,
      outputFile: "./out/listings.json",
    });
  });

  it("should treat blank values as unset", () => {
    const config = loadRunnerConfig({
      ALERTS_DIR: "   ",
      KNOWN_LISTINGS_FILE: "",
      MAX_LISTINGS_PER_RUN: " ",
    });

    expect(config.alertsDir).toBe("data/alerts");
    expect(config.knownListingsFile).toBeUndefined();
    expect(config.maxListingsPerRun).toBe(20);
  });

  it.each(["0", "-3", "abc", "2.5"])(
    "should reject MAX_LISTINGS_PER_RUN=%s",
    (value) => {
      expect(() => loadRunnerConfig({ MAX_LISTINGS_PER_RUN: value })).toThrow(
        RunnerConfigError,
      );
    },
  );
});
