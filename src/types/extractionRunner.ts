/**
 * Runner type definitions
 *
 * Configuration and result shapes for one extraction pass over saved
 * alert emails.
 */

/**
 * Runner configuration, resolved from the environment
 */
export type RunnerConfig = {
  /** Directory holding saved alert bodies (.html / .htm) */
  alertsDir: string;
  /** Ledger file with already-recorded identifiers, one per line */
  knownListingsFile?: string;
  /** Maximum stubs handed to the lookup stage per run */
  maxListingsPerRun: number;
  /** JSON output path; stdout when unset */
  outputFile?: string;
};

/**
 * Counters for one runner pass
 */
export type RunSummary = {
  /** Short random id used to correlate log lines */
  runId: string;
  /** Alert documents loaded */
  documents: number;
  /** Unique stubs extracted across all documents */
  extracted: number;
  /** Stubs written to the output */
  selected: number;
  /** Stubs dropped because the ledger already has them */
  skippedKnown: number;
  /** New stubs held back by MAX_LISTINGS_PER_RUN */
  deferred: number;
  /** Wall-clock duration of the pass */
  elapsedMs: number;
};
