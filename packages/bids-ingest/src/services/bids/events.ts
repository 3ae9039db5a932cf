/**
 * Event Relabeler
 *
 * Overwrites the recording's event types with the `value` column of an
 * `_events.tsv` table, row i onto event i.
 */

import { REQUIRED_COLUMNS } from "@/lib/constants";
import { loggers } from "@/lib/logger";
import type { BidsTable } from "@/types/bids";
import type { RecordingEvent } from "@/types/recording";
import { schemaMismatch } from "@/utils/ingestErrors";
import { requireColumns } from "./tableLoader";

const logger = loggers.events;

export function readEventValues(table: BidsTable): string[] {
  requireColumns(table, REQUIRED_COLUMNS.events);
  return table.rows.map((row) => row.value);
}

export function relabelEvents(
  events: RecordingEvent[],
  valueColumn: string[],
  sourcePath = "events table",
): RecordingEvent[] {
  if (valueColumn.length !== events.length) {
    throw schemaMismatch(
      sourcePath,
      `Event count mismatch: recording has ${events.length} events, table has ${valueColumn.length} values`,
    );
  }

  logger.debug("Relabelling events", { count: events.length });
  return events.map((event, index) => ({
    ...event,
    type: valueColumn[index].trim(),
  }));
}
