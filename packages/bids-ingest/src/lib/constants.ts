/**
 * File-name conventions and table layouts for BIDS sidecar ingest
 * Centralizes suffixes and column names to prevent magic strings
 */

// ============================================================================
// Data files
// ============================================================================

export const DATA_FILE_FORMATS = {
  set: ".set",
  edf: ".edf",
} as const;

export type DataFileFormat = keyof typeof DATA_FILE_FORMATS;

/** Modality suffix every EEG data file name ends with, before its extension */
export const EEG_DATA_SUFFIX = "_eeg";

// ============================================================================
// Sidecars
// ============================================================================

export type SidecarKind = "events" | "electrodes";

export const SIDECAR_EXTENSIONS = {
  table: ".tsv",
  metadata: ".json",
  packedBinary: ".msgpack",
} as const;

/** Columns each table must carry before a merge indexes into it */
export const REQUIRED_COLUMNS = {
  events: ["value"],
  electrodes: ["name", "x", "y", "z"],
  annotations: ["onset", "duration", "label", "channels"],
} as const;

export type TableKind = keyof typeof REQUIRED_COLUMNS;

/** Cell text BIDS uses for "no value" */
export const BIDS_NA = "n/a";

// ============================================================================
// Channels and marks
// ============================================================================

export const FIDUCIAL_CHANNEL_TYPE = "FID";

export const DEFAULT_CHANNEL_TYPE = "EEG";

export const MARK_PREFIX_LENGTH = 4;

export const DISCRETE_MARK_DOMAINS = {
  chan: { categoryPrefix: "chan_", domain: "EEG" },
  comp: { categoryPrefix: "comp_", domain: "ICA" },
} as const;

export type DiscreteMarkDomain = keyof typeof DISCRETE_MARK_DOMAINS;
