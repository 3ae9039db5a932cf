/**
 * ICA Merger
 *
 * Attaches a weights/sphering pair and the channel subset they were computed
 * over (`icachansind` in the weights file's JSON companion, 1-based). Both
 * matrices are required; with only one of them nothing is loaded.
 */

import { SIDECAR_EXTENSIONS } from "@/lib/constants";
import { loggers } from "@/lib/logger";
import { IcaCompanionSchema } from "@/lib/schemas";
import type {
  IngestDiagnostic,
  IcaOutcome,
  RebuildRecording,
  TableLoader,
} from "@/types/bids";
import type { Recording } from "@/types/recording";
import { companionPath } from "@/utils/bidsPaths";
import { invalidCompanion, schemaMismatch } from "@/utils/ingestErrors";

const logger = loggers.ica;

export interface IcaMergeDeps {
  tables: TableLoader;
  rebuild: RebuildRecording;
  diagnostics?: IngestDiagnostic[];
}

export interface IcaMergeResult {
  recording: Recording;
  outcome: IcaOutcome;
}

function validateShapes(
  weights: number[][],
  sphering: number[][],
  channelIndices: number[],
  channelCount: number,
  paths: { weightsPath: string; spherePath: string; jsonPath: string },
): void {
  const sphereSize = sphering.length;
  if (sphereSize === 0 || sphering.some((row) => row.length !== sphereSize)) {
    throw schemaMismatch(paths.spherePath, "Sphering matrix must be square");
  }
  if (
    weights.length === 0 ||
    weights.some((row) => row.length !== sphereSize)
  ) {
    throw schemaMismatch(
      paths.weightsPath,
      `Weights matrix must have ${sphereSize} columns to match the sphering matrix`,
    );
  }
  if (channelIndices.length !== sphereSize) {
    throw schemaMismatch(
      paths.jsonPath,
      `icachansind lists ${channelIndices.length} channels, sphering matrix covers ${sphereSize}`,
    );
  }
  const outOfRange = channelIndices.find((index) => index > channelCount);
  if (outOfRange !== undefined) {
    throw schemaMismatch(
      paths.jsonPath,
      `icachansind entry ${outOfRange} is outside the ${channelCount} recording channels`,
    );
  }
}

export async function mergeIca(
  recording: Recording,
  weightsPath: string,
  spherePath: string,
  deps: IcaMergeDeps,
): Promise<IcaMergeResult> {
  if (weightsPath === "" && spherePath === "") {
    return { recording, outcome: "skipped" };
  }

  if (weightsPath === "" || spherePath === "") {
    const message = "Only one ICA option given. Both are required.";
    logger.warn(message, { weightsPath, spherePath });
    deps.diagnostics?.push({
      code: "INCOMPLETE_OPTION_PAIR",
      message,
      path: weightsPath || spherePath,
    });
    return { recording, outcome: "incomplete" };
  }

  logger.info("Attempting to load ICA decomposition", {
    weightsPath,
    spherePath,
  });

  const jsonPath = companionPath(weightsPath, SIDECAR_EXTENSIONS.metadata);
  const parsed = IcaCompanionSchema.safeParse(
    await deps.tables.loadJson(jsonPath),
  );
  if (!parsed.success) {
    throw invalidCompanion(jsonPath, "ICA companion", parsed.error);
  }

  const weights = await deps.tables.loadMatrix(weightsPath);
  const sphering = await deps.tables.loadMatrix(spherePath);
  const channelIndices = parsed.data.icachansind;

  validateShapes(
    weights,
    sphering,
    channelIndices,
    recording.channels.length,
    { weightsPath, spherePath, jsonPath },
  );

  recording.ica = { weights, sphering, channelIndices };
  logger.debug("ICA decomposition attached", {
    components: weights.length,
    channels: channelIndices.length,
  });

  return { recording: deps.rebuild(recording), outcome: "attached" };
}
