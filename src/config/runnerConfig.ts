/**
 * Runner configuration from environment variables
 *
 *   - ALERTS_DIR: directory of saved alert bodies (default data/alerts)
 *   - KNOWN_LISTINGS_FILE: ledger export, one identifier per line (optional)
 *   - MAX_LISTINGS_PER_RUN: positive integer (default 20)
 *   - OUTPUT_FILE: JSON output path (optional, stdout when unset)
 */

import type { RunnerConfig } from "@/types";
import {
  DEFAULT_ALERTS_DIR,
  DEFAULT_MAX_LISTINGS_PER_RUN,
} from "@/constants";

/**
 * Error thrown when an environment value cannot be used
 */
export class RunnerConfigError extends Error {
  constructor(message: string) {
    super(`Invalid runner configuration: ${message}`);
    this.name = "RunnerConfigError";
  }
}

function optionalValue(raw: string | undefined): string | undefined {
  const value = raw?.trim();
  return value ? value : undefined;
}

function parseMaxListings(raw: string | undefined): number {
  const value = optionalValue(raw);
  if (value === undefined) {
    return DEFAULT_MAX_LISTINGS_PER_RUN;
  }
  if (!/^\d+$/.test(value) || Number.parseInt(value, 10) < 1) {
    throw new RunnerConfigError(
      `MAX_LISTINGS_PER_RUN must be a positive integer, got "${value}"`,
    );
  }
  return Number.parseInt(value, 10);
}

/**
 * @throws {RunnerConfigError} If MAX_LISTINGS_PER_RUN is not a positive integer
 */
export function loadRunnerConfig(
  env: NodeJS.ProcessEnv = process.env,
): RunnerConfig {
  return {
    alertsDir: optionalValue(env.ALERTS_DIR) ?? DEFAULT_ALERTS_DIR,
    knownListingsFile: optionalValue(env.KNOWN_LISTINGS_FILE),
    maxListingsPerRun: parseMaxListings(env.MAX_LISTINGS_PER_RUN),
    outputFile: optionalValue(env.OUTPUT_FILE),
  };
}
