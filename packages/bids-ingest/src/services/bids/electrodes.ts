/**
 * Electrode Reconciler
 *
 * Matches the rows of an `_electrodes.tsv` table to the recording's channel
 * list by label and assigns 3D positions. Rows no channel claims become
 * non-data (fiducial) channels.
 */

import {
  BIDS_NA,
  DEFAULT_CHANNEL_TYPE,
  FIDUCIAL_CHANNEL_TYPE,
  REQUIRED_COLUMNS,
} from "@/lib/constants";
import { loggers } from "@/lib/logger";
import type { BidsTable, ElectrodeOutcome, ElectrodeRow } from "@/types/bids";
import type { Channel } from "@/types/recording";
import { schemaMismatch } from "@/utils/ingestErrors";
import { requireColumns } from "./tableLoader";

const logger = loggers.electrodes;

export interface ElectrodeReconciliation {
  channels: Channel[];
  nonDataChannels: Channel[];
  outcomes: ElectrodeOutcome[];
}

function parseCoordinate(
  table: BidsTable,
  cell: string,
  column: string,
  rowIndex: number,
): number {
  // BIDS writes unknown coordinates as n/a
  if (cell === BIDS_NA) return Number.NaN;
  const value = Number(cell);
  if (cell === "" || Number.isNaN(value)) {
    throw schemaMismatch(
      table.path,
      `Non-numeric ${column} "${cell}" in row ${rowIndex + 1}`,
    );
  }
  return value;
}

/**
 * Read `name x y z` rows out of an electrodes table
 */
export function readElectrodeRows(table: BidsTable): ElectrodeRow[] {
  requireColumns(table, REQUIRED_COLUMNS.electrodes);

  return table.rows.map((row, rowIndex) => ({
    name: row.name.trim(),
    x: parseCoordinate(table, row.x, "x", rowIndex),
    y: parseCoordinate(table, row.y, "y", rowIndex),
    z: parseCoordinate(table, row.z, "z", rowIndex),
  }));
}

/**
 * Assign electrode positions to channels and bucket the leftovers
 *
 * Labels are compared exactly after trimming the row name. When a name is
 * repeated in the table the first row wins; the repeats are left unconsumed.
 */
export function reconcileElectrodes(
  channels: Channel[],
  electrodeRows: ElectrodeRow[],
): ElectrodeReconciliation {
  const rowIndexByName = new Map<string, number>();
  electrodeRows.forEach((row, index) => {
    const name = row.name.trim();
    if (!rowIndexByName.has(name)) {
      rowIndexByName.set(name, index);
    }
  });

  const consumed = new Set<number>();
  const outcomes: ElectrodeOutcome[] = [];

  const updatedChannels = channels.map((channel) => {
    const rowIndex = rowIndexByName.get(channel.label);
    if (rowIndex === undefined) {
      logger.warn(`${channel.label} not found. Adding to non-data set`);
      outcomes.push({ kind: "unmatched", label: channel.label });
      return channel;
    }

    const row = electrodeRows[rowIndex];
    consumed.add(rowIndex);
    outcomes.push({ kind: "matched", label: channel.label, rowIndex });
    return { ...channel, position: { x: row.x, y: row.y, z: row.z } };
  });

  // First entry takes the shape of a data channel; the rest copy the first
  const template: Channel = channels[0] ?? {
    label: "",
    type: DEFAULT_CHANNEL_TYPE,
    isDataChannel: true,
  };
  const nonDataChannels: Channel[] = [];

  electrodeRows.forEach((row, rowIndex) => {
    if (consumed.has(rowIndex)) return;

    const label = row.name.trim();
    logger.info(`Moving ${label} to non-data set`);

    const base: Channel =
      nonDataChannels.length === 0
        ? { ...template, type: FIDUCIAL_CHANNEL_TYPE, isDataChannel: false }
        : { ...nonDataChannels[0] };

    nonDataChannels.push({
      ...base,
      label,
      position: { x: row.x, y: row.y, z: row.z },
    });
    outcomes.push({ kind: "nonData", label, rowIndex });
  });

  return { channels: updatedChannels, nonDataChannels, outcomes };
}
