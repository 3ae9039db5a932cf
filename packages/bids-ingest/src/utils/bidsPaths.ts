/**
 * BIDS Path Utility
 *
 * Derives sidecar locations from a data file path. Expected layout:
 * /path/to/dataset/sub-XX/[ses-XX/]eeg/sub-XX_[ses-XX_]task-XXX_[run-X_]eeg.ext
 */

import {
  DATA_FILE_FORMATS,
  EEG_DATA_SUFFIX,
  SIDECAR_EXTENSIONS,
  type DataFileFormat,
  type SidecarKind,
} from "@/lib/constants";

export interface DataFilePathInfo {
  directory: string;
  // File name without extension
  baseName: string;
  extension: string;
  format?: DataFileFormat;
}

/**
 * Split a data file path into directory, base name and extension
 */
export function parseDataFilePath(filePath: string): DataFilePathInfo {
  const slash = filePath.lastIndexOf("/");
  const directory = slash >= 0 ? filePath.slice(0, slash) : "";
  const fileName = slash >= 0 ? filePath.slice(slash + 1) : filePath;

  const dot = fileName.lastIndexOf(".");
  const baseName = dot > 0 ? fileName.slice(0, dot) : fileName;
  const extension = dot > 0 ? fileName.slice(dot).toLowerCase() : "";

  const format = (Object.keys(DATA_FILE_FORMATS) as DataFileFormat[]).find(
    (key) => DATA_FILE_FORMATS[key] === extension,
  );

  return { directory, baseName, extension, format };
}

/**
 * Replace the trailing `_eeg` of a data file with `_<kind>.tsv`
 *
 * @example
 * deriveSidecarPath("/ds/sub-01/eeg/sub-01_task-rest_eeg.edf", "events")
 * // "/ds/sub-01/eeg/sub-01_task-rest_events.tsv"
 */
export function deriveSidecarPath(filePath: string, kind: SidecarKind): string {
  const { directory, baseName } = parseDataFilePath(filePath);
  const stem = baseName.endsWith(EEG_DATA_SUFFIX)
    ? baseName.slice(0, -EEG_DATA_SUFFIX.length)
    : baseName;
  const fileName = `${stem}_${kind}${SIDECAR_EXTENSIONS.table}`;
  return directory ? `${directory}/${fileName}` : fileName;
}

/**
 * Swap a table's `.tsv` extension for a companion extension
 */
export function companionPath(
  tablePath: string,
  extension: (typeof SIDECAR_EXTENSIONS)["metadata" | "packedBinary"],
): string {
  if (tablePath.endsWith(SIDECAR_EXTENSIONS.table)) {
    return tablePath.slice(0, -SIDECAR_EXTENSIONS.table.length) + extension;
  }
  return tablePath + extension;
}
