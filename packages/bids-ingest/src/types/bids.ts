// Types for BIDS sidecar tables and the outcomes of merging them

import type { DataFileFormat, DiscreteMarkDomain } from "@/lib/constants";
import type { Recording } from "./recording";

/**
 * Row-oriented view of a delimited table. Every cell is kept as the
 * trimmed text it was read as; numeric parsing happens where a column is used.
 */
export interface BidsTable {
  path: string;
  columns: string[];
  rows: Array<Record<string, string>>;
}

export interface ElectrodeRow {
  name: string;
  x: number;
  y: number;
  z: number;
}

export interface AnnotationRow {
  onset?: number;
  duration?: number;
  label: string;
  channels: string;
}

// ============================================================================
// Outcomes
// ============================================================================

export type ElectrodeOutcome =
  | { kind: "matched"; label: string; rowIndex: number }
  | { kind: "unmatched"; label: string }
  | { kind: "nonData"; label: string; rowIndex: number };

export type AnnotationOutcome =
  | {
      kind: "discrete";
      rowIndex: number;
      domain: DiscreteMarkDomain;
      category: string;
    }
  | {
      kind: "timeRange";
      rowIndex: number;
      label: string;
      // Sample indices before clamping to the track
      start: number;
      end: number;
    }
  // Onset or duration missing: the TimeMark exists but no flag was set
  | { kind: "untimed"; rowIndex: number; label: string }
  | { kind: "unclassified"; rowIndex: number; label: string };

export type IcaOutcome = "skipped" | "incomplete" | "attached";

export type DiagnosticCode =
  | "UNMATCHED_LABEL"
  | "UNCLASSIFIED_MARK"
  | "INCOMPLETE_OPTION_PAIR";

export interface IngestDiagnostic {
  code: DiagnosticCode;
  message: string;
  path?: string;
}

// ============================================================================
// Collaborators
// ============================================================================

export interface TableLoader {
  loadTable: (path: string) => Promise<BidsTable>;
  loadMatrix: (path: string) => Promise<number[][]>;
  loadJson: (path: string) => Promise<unknown>;
  loadPackedBinary: (path: string) => Promise<unknown>;
  exists: (path: string) => Promise<boolean>;
}

export type RebuildRecording = (recording: Recording) => Recording;

export type RecordingLoader = (
  filePath: string,
  format: DataFileFormat,
) => Promise<Recording>;

export interface IngestEnvironment {
  loadRecording: RecordingLoader;
  tables?: TableLoader;
  rebuild?: RebuildRecording;
  // Whether the discrete/continuous marking subsystem is installed
  marksAvailable?: boolean;
  redraw?: (recording: Recording) => void;
}
