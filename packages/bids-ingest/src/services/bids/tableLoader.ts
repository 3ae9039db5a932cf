/**
 * BIDS Table Loader
 *
 * Reads tab-separated sidecar tables, numeric matrices and their JSON /
 * MessagePack companions from disk.
 */

import { access, readFile } from "node:fs/promises";
import { decode as msgpackDecode } from "@msgpack/msgpack";

import { loggers } from "@/lib/logger";
import type { BidsTable, TableLoader } from "@/types/bids";
import {
  BidsIngestError,
  extractErrorMessage,
  missingFile,
  schemaMismatch,
} from "@/utils/ingestErrors";

const logger = loggers.tables;

function splitLines(content: string): string[] {
  return content
    .split("\n")
    .map((line) => line.replace(/\r$/, ""))
    .filter((line) => line.trim().length > 0);
}

/**
 * Parse tab-separated text into a table. Header and cell text is trimmed;
 * short rows are padded with empty cells.
 */
export function parseTsv(content: string, path: string): BidsTable {
  const lines = splitLines(content);
  if (lines.length === 0) {
    throw new BidsIngestError("MALFORMED_FILE", `Empty table: ${path}`, {
      path,
    });
  }

  const columns = lines[0].split("\t").map((header) => header.trim());
  const rows: Array<Record<string, string>> = [];

  for (let i = 1; i < lines.length; i++) {
    const values = lines[i].split("\t");
    const row: Record<string, string> = {};
    columns.forEach((column, index) => {
      row[column] = (values[index] ?? "").trim();
    });
    rows.push(row);
  }

  return { path, columns, rows };
}

/**
 * Parse tab-delimited numeric text into a row-major matrix
 */
export function parseNumericMatrix(content: string, path: string): number[][] {
  return splitLines(content).map((line, rowIndex) =>
    line
      .trim()
      .split("\t")
      .map((cell, columnIndex) => {
        const value = Number(cell.trim());
        if (cell.trim() === "" || !Number.isFinite(value)) {
          throw new BidsIngestError(
            "MALFORMED_FILE",
            `Non-numeric cell "${cell}" at row ${rowIndex + 1}, column ${columnIndex + 1}: ${path}`,
            { path },
          );
        }
        return value;
      }),
  );
}

/**
 * Throw SCHEMA_MISMATCH unless every named column is present
 */
export function requireColumns(
  table: BidsTable,
  required: readonly string[],
): void {
  const missing = required.filter((column) => !table.columns.includes(column));
  if (missing.length > 0) {
    throw schemaMismatch(
      table.path,
      `Missing column(s) ${missing.map((c) => `"${c}"`).join(", ")}`,
    );
  }
}

export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

async function readExisting(path: string, what: string): Promise<Buffer> {
  if (!(await fileExists(path))) {
    throw missingFile(path, what);
  }
  return readFile(path);
}

/**
 * Default loader backed by node:fs
 */
export function createFileTableLoader(): TableLoader {
  return {
    exists: fileExists,

    async loadTable(path) {
      const content = await readExisting(path, "Table");
      const table = parseTsv(content.toString("utf8"), path);
      logger.debug("Loaded table", {
        path,
        columns: table.columns,
        rowCount: table.rows.length,
      });
      return table;
    },

    async loadMatrix(path) {
      const content = await readExisting(path, "Matrix");
      return parseNumericMatrix(content.toString("utf8"), path);
    },

    async loadJson(path) {
      const content = await readExisting(path, "JSON companion");
      try {
        return JSON.parse(content.toString("utf8"));
      } catch (error) {
        throw new BidsIngestError(
          "MALFORMED_FILE",
          `Invalid JSON in ${path}: ${extractErrorMessage(error)}`,
          { path, cause: error },
        );
      }
    },

    async loadPackedBinary(path) {
      const content = await readExisting(path, "Packed-binary companion");
      try {
        return msgpackDecode(content);
      } catch (error) {
        throw new BidsIngestError(
          "MALFORMED_FILE",
          `Invalid MessagePack in ${path}: ${extractErrorMessage(error)}`,
          { path, cause: error },
        );
      }
    },
  };
}
