/**
 * Application-wide constants
 */

/** Workspace directory scanned when none is given on the command line */
export const DEFAULT_WORKSPACE_DIR = '.migration-workspace';

/** Snapshot file expected inside each round directory */
export const DEFAULT_SNAPSHOT_FILE = 'kantra_output.yaml';

/** Rounds an issue must appear in before it counts as persistent */
export const DEFAULT_MIN_ROUNDS = 3;

/** Number of snapshots loaded at the same time */
export const DEFAULT_CONCURRENCY = 4;

/** Latest incident count at or above which an issue is high impact */
export const DEFAULT_HIGH_IMPACT_MIN_INCIDENTS = 5;

/** Latest affected-file count at or above which an issue is high impact */
export const DEFAULT_HIGH_IMPACT_MIN_FILES = 3;

/** Marker that precedes the timestamp in a round directory name */
export const ROUND_MARKER = 'round_';

/** Project-local configuration directory */
export const CONFIG_DIR_NAME = '.roundwatch';

/** Exit codes returned by CLI commands */
export const ExitCode = {
  Ok: 0,
  Failure: 1,
  InsufficientRounds: 2,
} as const;
export type ExitCode = typeof ExitCode[keyof typeof ExitCode];
