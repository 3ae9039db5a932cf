import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import type { Channel, Recording } from "@/types/recording";

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "bids-ingest-"));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function writeFixture(
  dir: string,
  name: string,
  content: string | Uint8Array,
): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, content);
  return path;
}

export function tsv(rows: string[][]): string {
  return rows.map((row) => row.join("\t")).join("\n") + "\n";
}

export function makeChannel(label: string): Channel {
  return { label, type: "EEG", isDataChannel: true };
}

export function makeRecording(overrides: Partial<Recording> = {}): Recording {
  return {
    filePath: "/data/sub-01/eeg/sub-01_task-rest_eeg.edf",
    sampleRate: 10,
    sampleCount: 30,
    channels: ["Cz", "Fz", "X1"].map(makeChannel),
    nonDataChannels: [],
    events: [],
    ...overrides,
  };
}

/**
 * Run `fn` and return what it threw
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected function to throw");
}
