/**
 * Extraction runner — one pass over saved alert emails
 *
 * Steps:
 * 1. Load alert bodies from the alerts directory
 * 2. Extract and deduplicate stubs across all documents
 * 3. Drop listings the ledger already has, cap at MAX_LISTINGS_PER_RUN
 * 4. Write the selected stubs as JSON for the lookup stage
 */

import { randomUUID } from "crypto";
import { mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import type { ListingStub, RunnerConfig, RunSummary } from "@/types";
import { RUN_ID_LENGTH } from "@/constants";
import { extractListingsBatch } from "@/extraction";
import {
  loadAlertDocuments,
  readKnownIdentifiers,
  selectNewListings,
} from "@/intake";
import * as logger from "@/logger";

function writeListings(
  listings: readonly ListingStub[],
  outputFile: string | undefined,
): void {
  const json = JSON.stringify(listings, null, 2) + "\n";
  if (!outputFile) {
    process.stdout.write(json);
    return;
  }
  mkdirSync(dirname(outputFile), { recursive: true });
  writeFileSync(outputFile, json, "utf-8");
}

export function runExtraction(config: RunnerConfig): RunSummary {
  const startedAt = Date.now();
  const runId = randomUUID().replace(/-/g, "").slice(0, RUN_ID_LENGTH);
  const log = logger.withContext({ runId });

  log.info("Extraction run starting", { alertsDir: config.alertsDir });

  const documents = loadAlertDocuments(config.alertsDir);
  const stubs = extractListingsBatch(documents);
  log.info("Extracted unique listings", {
    documents: documents.length,
    listings: stubs.length,
  });

  const known = config.knownListingsFile
    ? readKnownIdentifiers(config.knownListingsFile)
    : new Set<string>();
  const selection = selectNewListings(stubs, known, config.maxListingsPerRun);

  if (selection.skippedKnown > 0) {
    log.info("Skipped listings already in ledger", {
      skipped: selection.skippedKnown,
    });
  }
  if (selection.deferred > 0) {
    log.warn("Per-run cap reached, deferring listings", {
      deferred: selection.deferred,
      maxListingsPerRun: config.maxListingsPerRun,
    });
  }

  writeListings(selection.listings, config.outputFile);

  const summary: RunSummary = {
    runId,
    documents: documents.length,
    extracted: stubs.length,
    selected: selection.selected,
    skippedKnown: selection.skippedKnown,
    deferred: selection.deferred,
    elapsedMs: Date.now() - startedAt,
  };

  log.info("Extraction run finished", { ...summary });

  return summary;
}
