/**
 * Annotation Merger
 *
 * Rebuilds the recording's MarkSet from an annotations table:
 * - rows without onset and duration are discrete marks on channels ("chan*")
 *   or ICA components ("comp*")
 * - rows with timing set flags over a sample range on a TimeMark of the same
 *   label, creating it on first use
 * - a `.msgpack` companion, when present, contributes prebuilt TimeMarks that
 *   are appended as they are
 */

import {
  DISCRETE_MARK_DOMAINS,
  MARK_PREFIX_LENGTH,
  REQUIRED_COLUMNS,
  SIDECAR_EXTENSIONS,
  type DiscreteMarkDomain,
} from "@/lib/constants";
import { loggers } from "@/lib/logger";
import {
  AnnotationCompanionSchema,
  TimeMarkSupplementSchema,
  type TimeMarkRecord,
} from "@/lib/schemas";
import type {
  AnnotationOutcome,
  AnnotationRow,
  BidsTable,
  IngestDiagnostic,
  TableLoader,
} from "@/types/bids";
import type { MarkSet, Recording, TimeMark } from "@/types/recording";
import { companionPath } from "@/utils/bidsPaths";
import {
  BidsIngestError,
  invalidCompanion,
  missingFile,
} from "@/utils/ingestErrors";
import { componentCount } from "./recording";
import { requireColumns } from "./tableLoader";

const logger = loggers.annotations;

export type AnnotationMergeState = "idle" | "ingesting" | "done";

export interface AnnotationMergeDeps {
  tables: TableLoader;
  marksAvailable: boolean;
  diagnostics?: IngestDiagnostic[];
}

export interface AnnotationMergeResult {
  recording: Recording;
  state: "done";
  outcomes: AnnotationOutcome[];
  appendedFromSupplement: number;
}

function parseTiming(cell: string | undefined): number | undefined {
  const text = cell?.trim() ?? "";
  if (text === "") return undefined;
  const value = Number(text);
  return Number.isNaN(value) ? undefined : value;
}

export function readAnnotationRows(table: BidsTable): AnnotationRow[] {
  return table.rows.map((row) => ({
    onset: parseTiming(row.onset),
    duration: parseTiming(row.duration),
    label: row.label.trim(),
    channels: row.channels.trim(),
  }));
}

/**
 * "chan_bad" -> "chan_bad", "CHANbad" -> "chan_bad"
 */
export function discreteCategory(
  label: string,
  domain: DiscreteMarkDomain,
): string {
  const rest = label.slice(MARK_PREFIX_LENGTH).replace(/^_/, "");
  return DISCRETE_MARK_DOMAINS[domain].categoryPrefix + rest;
}

function classifyDiscrete(label: string): DiscreteMarkDomain | undefined {
  const prefix = label.slice(0, MARK_PREFIX_LENGTH).toLowerCase();
  if (prefix === "chan" || prefix === "comp") return prefix;
  return undefined;
}

function emptyMarkSet(): MarkSet {
  return {
    discreteChannelMarks: new Map(),
    discreteComponentMarks: new Map(),
    timeInfo: [],
  };
}

/**
 * Row-by-row MarkSet builder. `begin` clears the recording's marks and fixes
 * the flag width; rows are then applied in table order until `finish`.
 */
export class AnnotationMerger {
  private state: AnnotationMergeState = "idle";
  private width = 0;
  private readonly outcomes: AnnotationOutcome[] = [];

  constructor(
    private readonly recording: Recording,
    private readonly diagnostics?: IngestDiagnostic[],
  ) {}

  get currentState(): AnnotationMergeState {
    return this.state;
  }

  private get marks(): MarkSet {
    if (this.state !== "ingesting" || !this.recording.marks) {
      throw new Error(`Annotation merger is ${this.state}, not ingesting`);
    }
    return this.recording.marks;
  }

  begin(): void {
    if (this.state !== "idle") {
      throw new Error(`Annotation merger already ${this.state}`);
    }
    this.recording.marks = emptyMarkSet();
    this.width = componentCount(this.recording) ?? this.recording.sampleCount;
    this.state = "ingesting";
  }

  applyRow(row: AnnotationRow, rowIndex: number): AnnotationOutcome {
    const outcome =
      row.onset === undefined && row.duration === undefined
        ? this.applyDiscrete(row, rowIndex)
        : this.applyTimeRange(row, rowIndex);
    this.outcomes.push(outcome);
    return outcome;
  }

  private applyDiscrete(
    row: AnnotationRow,
    rowIndex: number,
  ): AnnotationOutcome {
    const domain = classifyDiscrete(row.label);
    if (!domain) {
      const message = `Mark ingest not defined for mark of this type: "${row.label}"`;
      logger.warn(message, { rowIndex });
      this.diagnostics?.push({ code: "UNCLASSIFIED_MARK", message });
      return { kind: "unclassified", rowIndex, label: row.label };
    }

    const bucket =
      domain === "chan"
        ? this.marks.discreteChannelMarks
        : this.marks.discreteComponentMarks;
    const category = discreteCategory(row.label, domain);
    const entries = bucket.get(category) ?? new Set<string>();
    row.channels
      .split(/[\s,]+/)
      .filter((entry) => entry.length > 0)
      .forEach((entry) => entries.add(entry));
    bucket.set(category, entries);

    return { kind: "discrete", rowIndex, domain, category };
  }

  private findOrCreateTimeMark(label: string): TimeMark {
    const existing = this.marks.timeInfo.find((mark) => mark.label === label);
    if (existing) return existing;

    const created: TimeMark = {
      label,
      flags: new Array<boolean>(this.width).fill(false),
    };
    this.marks.timeInfo.push(created);
    return created;
  }

  private applyTimeRange(
    row: AnnotationRow,
    rowIndex: number,
  ): AnnotationOutcome {
    const mark = this.findOrCreateTimeMark(row.label);
    const { onset, duration } = row;
    if (onset === undefined || duration === undefined) {
      logger.debug("Time mark row without full timing, no samples flagged", {
        rowIndex,
        label: row.label,
      });
      return { kind: "untimed", rowIndex, label: row.label };
    }

    const start = Math.round(onset * this.recording.sampleRate);
    const end = Math.round((onset + duration) * this.recording.sampleRate);

    const first = Math.max(0, start);
    const last = Math.min(mark.flags.length - 1, end);
    for (let index = first; index <= last; index++) {
      mark.flags[index] = true;
    }

    return { kind: "timeRange", rowIndex, label: row.label, start, end };
  }

  appendTimeMarks(records: TimeMarkRecord[]): void {
    for (const record of records) {
      this.marks.timeInfo.push({ label: record.label, flags: record.flags });
    }
  }

  finish(): AnnotationOutcome[] {
    if (this.state !== "ingesting") {
      throw new Error(`Annotation merger is ${this.state}, not ingesting`);
    }
    this.state = "done";
    return this.outcomes;
  }
}

async function loadSupplement(
  tables: TableLoader,
  path: string,
): Promise<TimeMarkRecord[]> {
  const parsed = TimeMarkSupplementSchema.safeParse(
    await tables.loadPackedBinary(path),
  );
  if (!parsed.success) {
    throw invalidCompanion(path, "time mark supplement", parsed.error);
  }
  return parsed.data;
}

export async function mergeAnnotations(
  recording: Recording,
  annoPath: string,
  deps: AnnotationMergeDeps,
): Promise<AnnotationMergeResult> {
  if (!deps.marksAvailable) {
    throw new BidsIngestError(
      "CAPABILITY_UNAVAILABLE",
      "Marking subsystem not found. Unable to ingest annotations",
      { path: annoPath },
    );
  }

  const jsonPath = companionPath(annoPath, SIDECAR_EXTENSIONS.metadata);
  if (!(await deps.tables.exists(jsonPath))) {
    throw missingFile(jsonPath, "BIDS annotation JSON");
  }

  logger.info("Rebuilding marks structure", { annoPath, jsonPath });

  const companion = AnnotationCompanionSchema.safeParse(
    await deps.tables.loadJson(jsonPath),
  );
  if (!companion.success) {
    throw invalidCompanion(jsonPath, "annotation companion", companion.error);
  }

  const table = await deps.tables.loadTable(annoPath);
  requireColumns(table, [
    ...REQUIRED_COLUMNS.annotations,
    ...(companion.data.Columns ?? []),
  ]);

  const merger = new AnnotationMerger(recording, deps.diagnostics);
  merger.begin();
  readAnnotationRows(table).forEach((row, index) => merger.applyRow(row, index));

  let appendedFromSupplement = 0;
  const supplementPath = companionPath(
    annoPath,
    SIDECAR_EXTENSIONS.packedBinary,
  );
  if (await deps.tables.exists(supplementPath)) {
    logger.info("Continuous mark file found", { supplementPath });
    const records = await loadSupplement(deps.tables, supplementPath);
    merger.appendTimeMarks(records);
    appendedFromSupplement = records.length;
  }

  const outcomes = merger.finish();
  return { recording, state: "done", outcomes, appendedFromSupplement };
}
