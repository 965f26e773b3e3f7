/**
 * Extraction runner constants
 */

/**
 * Default directory of saved alert bodies, relative to the working directory
 */
export const DEFAULT_ALERTS_DIR = "data/alerts";

/**
 * Default cap on stubs handed to the lookup stage per run.
 * Each stub costs one property-data lookup downstream.
 */
export const DEFAULT_MAX_LISTINGS_PER_RUN = 20;

/**
 * File extensions treated as alert bodies
 */
export const ALERT_FILE_EXTENSIONS = [".html", ".htm"] as const;

/**
 * Length of the run id used in log lines
 */
export const RUN_ID_LENGTH = 8;
