/**
 * Ledger export reader
 *
 * The ledger collaborator exports the identifiers it already recorded as a
 * plain text file: one identifier per line, blank lines and `#` comments
 * ignored.
 */

import { existsSync, readFileSync } from "fs";
import * as logger from "@/logger";

export function parseKnownIdentifiers(content: string): Set<string> {
  const identifiers = new Set<string>();
  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line && !line.startsWith("#")) {
      identifiers.add(line);
    }
  }
  return identifiers;
}

/**
 * Read the ledger export
 *
 * A missing file means an empty ledger (first run), not an error.
 */
export function readKnownIdentifiers(filePath: string): Set<string> {
  if (!existsSync(filePath)) {
    logger.warn("Known listings file not found, treating ledger as empty", {
      filePath,
    });
    return new Set();
  }

  const identifiers = parseKnownIdentifiers(readFileSync(filePath, "utf-8"));
  logger.info("Loaded known listings", {
    filePath,
    count: identifiers.size,
  });
  return identifiers;
}
