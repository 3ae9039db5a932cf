/**
 * BIDS single-file ingest
 *
 * Loads one data file and folds its sidecars back into the recording.
 * SET files are loaded as they are. EDF files get their event types from
 * `_events.tsv` and their channel positions from `_electrodes.tsv`, looked
 * up next to the data file unless an explicit location is given. ICA
 * matrices and annotations are merged for either format when requested.
 */

import type { SidecarKind } from "@/lib/constants";
import { loggers } from "@/lib/logger";
import { IngestOptionsSchema, type IngestOptionsInput } from "@/lib/schemas";
import type {
  IcaOutcome,
  IngestDiagnostic,
  IngestEnvironment,
  TableLoader,
} from "@/types/bids";
import type { Recording } from "@/types/recording";
import { deriveSidecarPath, parseDataFilePath } from "@/utils/bidsPaths";
import {
  BidsIngestError,
  formatZodIssues,
  missingFile,
} from "@/utils/ingestErrors";
import { mergeAnnotations, type AnnotationMergeResult } from "./annotations";
import {
  readElectrodeRows,
  reconcileElectrodes,
  type ElectrodeReconciliation,
} from "./electrodes";
import { readEventValues, relabelEvents } from "./events";
import { mergeIca } from "./ica";
import { rebuildRecording } from "./recording";
import { createFileTableLoader } from "./tableLoader";

const logger = loggers.ingest;

export interface IngestReport {
  recording: Recording;
  diagnostics: IngestDiagnostic[];
  electrodes?: ElectrodeReconciliation;
  annotations?: AnnotationMergeResult;
  ica: IcaOutcome;
}

/**
 * Explicit location if given, otherwise the path derived from the data file
 */
export async function resolveSidecar(
  tables: TableLoader,
  fileLocation: string,
  explicitPath: string,
  kind: SidecarKind,
): Promise<string> {
  const path = explicitPath || deriveSidecarPath(fileLocation, kind);
  if (!(await tables.exists(path))) {
    throw missingFile(path, `BIDS ${kind} file`);
  }
  return path;
}

export async function ingestBidsFile(
  fileLocation: string,
  options: IngestOptionsInput,
  environment: IngestEnvironment,
): Promise<IngestReport> {
  const parsedOptions = IngestOptionsSchema.safeParse(options);
  if (!parsedOptions.success) {
    throw new BidsIngestError(
      "INVALID_OPTIONS",
      `Invalid ingest options: ${formatZodIssues(parsedOptions.error)}`,
      { cause: parsedOptions.error },
    );
  }
  const opt = parsedOptions.data;

  const tables = environment.tables ?? createFileTableLoader();
  const rebuild = environment.rebuild ?? rebuildRecording;
  const diagnostics: IngestDiagnostic[] = [];

  const { format, extension } = parseDataFilePath(fileLocation);
  if (!format) {
    throw new BidsIngestError(
      "UNSUPPORTED_FORMAT",
      `Unsupported data file extension "${extension}": ${fileLocation}`,
      { path: fileLocation },
    );
  }

  let recording: Recording;
  let electrodes: ElectrodeReconciliation | undefined;

  if (format === "set") {
    logger.info("Set file detected. Loading as normal.", { fileLocation });
    recording = await environment.loadRecording(fileLocation, "set");
  } else {
    logger.info("BIDS parsing needed.", { fileLocation });
    recording = await environment.loadRecording(fileLocation, "edf");

    const eventsPath = await resolveSidecar(
      tables,
      fileLocation,
      opt.eventLoc,
      "events",
    );
    const eventValues = readEventValues(await tables.loadTable(eventsPath));
    recording.events = relabelEvents(recording.events, eventValues, eventsPath);

    const electrodesPath = await resolveSidecar(
      tables,
      fileLocation,
      opt.elecLoc,
      "electrodes",
    );
    const electrodeRows = readElectrodeRows(
      await tables.loadTable(electrodesPath),
    );
    electrodes = reconcileElectrodes(recording.channels, electrodeRows);
    recording.channels = electrodes.channels;
    recording.nonDataChannels = [
      ...recording.nonDataChannels,
      ...electrodes.nonDataChannels,
    ];
    for (const outcome of electrodes.outcomes) {
      if (outcome.kind === "unmatched") {
        diagnostics.push({
          code: "UNMATCHED_LABEL",
          message: `${outcome.label} not found in electrodes table`,
          path: electrodesPath,
        });
      }
    }

    recording = rebuild(recording);
  }

  const ica = await mergeIca(recording, opt.icaWeights, opt.icaSphere, {
    tables,
    rebuild,
    diagnostics,
  });
  recording = ica.recording;

  let annotations: AnnotationMergeResult | undefined;
  if (opt.annoLoc !== "") {
    annotations = await mergeAnnotations(recording, opt.annoLoc, {
      tables,
      marksAvailable: environment.marksAvailable ?? false,
      diagnostics,
    });
    recording = annotations.recording;
  }

  if (opt.redraw && environment.redraw) {
    environment.redraw(recording);
  }

  logger.info("Ingest complete", {
    fileLocation,
    diagnostics: diagnostics.length,
  });

  return {
    recording,
    diagnostics,
    electrodes,
    annotations,
    ica: ica.outcome,
  };
}
