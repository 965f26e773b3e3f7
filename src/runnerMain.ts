/**
 * Runner entrypoint — one extraction pass over saved alert emails
 *
 * Usage:
 *   npm start
 *   ALERTS_DIR=./inbox OUTPUT_FILE=./out/listings.json npm start
 *
 * Environment variables (see .env.example):
 *   - ALERTS_DIR: Directory of saved alert bodies (defaults to data/alerts)
 *   - KNOWN_LISTINGS_FILE: Ledger export of recorded identifiers (optional)
 *   - MAX_LISTINGS_PER_RUN: Cap on listings handed to lookup (defaults to 20)
 *   - OUTPUT_FILE: JSON output path (optional, stdout when unset)
 *   - LOG_LEVEL: Logging level (debug, info, warn, error)
 */

import "dotenv/config";
import { loadRunnerConfig } from "./config/runnerConfig";
import { runExtraction } from "./orchestration/extractionRunner";
import * as logger from "./logger";

function main(): void {
  try {
    const config = loadRunnerConfig();
    const summary = runExtraction(config);

    if (summary.documents === 0) {
      logger.warn("No alert documents found - nothing extracted");
    }
  } catch (error) {
    logger.error("Runner failed with fatal error", {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(1);
  }
}

main();
