/**
 * Saved alert email loader
 *
 * Reads decoded alert bodies the mailbox collaborator dropped into a
 * directory. Each file is one document; its name is the label.
 */

import { existsSync, readFileSync, readdirSync } from "fs";
import { extname, join } from "path";
import type { AlertDocument } from "@/types";
import { ALERT_FILE_EXTENSIONS } from "@/constants";
import * as logger from "@/logger";

function isAlertFile(fileName: string): boolean {
  const extension = extname(fileName).toLowerCase();
  return ALERT_FILE_EXTENSIONS.some((allowed) => allowed === extension);
}

/**
 * Load every alert body in `alertsDir`, sorted by file name
 *
 * A missing directory yields no documents; an unreadable file is logged
 * and skipped.
 */
export function loadAlertDocuments(alertsDir: string): AlertDocument[] {
  if (!existsSync(alertsDir)) {
    logger.warn("Alerts directory not found", { alertsDir });
    return [];
  }

  const fileNames = readdirSync(alertsDir).filter(isAlertFile).sort();
  const documents: AlertDocument[] = [];

  for (const fileName of fileNames) {
    try {
      documents.push({
        html: readFileSync(join(alertsDir, fileName), "utf-8"),
        label: fileName,
      });
    } catch (error) {
      logger.warn("Skipping unreadable alert file", {
        fileName,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  logger.info("Loaded alert documents", {
    alertsDir,
    documents: documents.length,
  });

  return documents;
}
