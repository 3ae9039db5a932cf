import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { encode } from "@msgpack/msgpack";
import { AnnotationMerger, discreteCategory, mergeAnnotations } from "../annotations";
import { createFileTableLoader } from "../tableLoader";
import type { IngestDiagnostic } from "@/types/bids";
import {
  captureError,
  makeRecording,
  makeTempDir,
  removeTempDir,
  tsv,
  writeFixture,
} from "@/test/fixtures";

const HEADER = ["onset", "duration", "label", "channels"];

function expectedFlags(length: number, first: number, last: number): boolean[] {
  return Array.from({ length }, (_, index) => index >= first && index <= last);
}

describe("discreteCategory", () => {
  it("derives the category key from the label", () => {
    expect(discreteCategory("chan_bad", "chan")).toBe("chan_bad");
    expect(discreteCategory("CHANbad", "chan")).toBe("chan_bad");
    expect(discreteCategory("Comp_eye", "comp")).toBe("comp_eye");
  });
});

describe("mergeAnnotations", () => {
  let dir: string;
  let annoPath: string;
  let diagnostics: IngestDiagnostic[];
  const tables = createFileTableLoader();

  async function writeAnnotations(rows: string[][], companion: object = {}) {
    annoPath = await writeFixture(
      dir,
      "sub-01_task-rest_annotations.tsv",
      tsv([HEADER, ...rows]),
    );
    await writeFixture(
      dir,
      "sub-01_task-rest_annotations.json",
      JSON.stringify(companion),
    );
  }

  beforeEach(async () => {
    dir = await makeTempDir();
    diagnostics = [];
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("flags the inclusive sample range of a time-range row", async () => {
    await writeAnnotations([["1.0", "0.5", "blink", ""]]);
    const recording = makeRecording({ sampleRate: 10, sampleCount: 30 });

    const result = await mergeAnnotations(recording, annoPath, {
      tables,
      marksAvailable: true,
      diagnostics,
    });

    expect(result.state).toBe("done");
    expect(recording.marks?.timeInfo).toEqual([
      { label: "blink", flags: expectedFlags(30, 10, 15) },
    ]);
    expect(result.outcomes).toEqual([
      { kind: "timeRange", rowIndex: 0, label: "blink", start: 10, end: 15 },
    ]);
  });

  it("unions overlapping ranges of the same label", async () => {
    await writeAnnotations([
      ["0.5", "0.5", "blink", ""],
      ["0.8", "0.7", "blink", ""],
    ]);
    const recording = makeRecording();

    await mergeAnnotations(recording, annoPath, { tables, marksAvailable: true });

    expect(recording.marks?.timeInfo).toEqual([
      { label: "blink", flags: expectedFlags(30, 5, 15) },
    ]);
  });

  it("keeps one track per label in first-seen order", async () => {
    await writeAnnotations([
      ["0", "0.1", "muscle", ""],
      ["1", "0", "blink", ""],
      ["2", "0", "muscle", ""],
    ]);
    const recording = makeRecording();

    await mergeAnnotations(recording, annoPath, { tables, marksAvailable: true });

    const timeInfo = recording.marks?.timeInfo ?? [];
    expect(timeInfo.map((mark) => mark.label)).toEqual(["muscle", "blink"]);
    expect(timeInfo[0].flags.flatMap((flag, index) => (flag ? [index] : []))).toEqual([
      0, 1, 20,
    ]);
  });

  it("clamps ranges that run past the end of the recording", async () => {
    await writeAnnotations([["2.5", "1", "tail", ""]]);
    const recording = makeRecording();

    await mergeAnnotations(recording, annoPath, { tables, marksAvailable: true });

    expect(recording.marks?.timeInfo[0].flags).toEqual(expectedFlags(30, 25, 29));
  });

  it("records a discrete channel mark without creating a time track", async () => {
    await writeAnnotations([["n/a", "n/a", "chan_bad", "Cz"]]);
    const recording = makeRecording();

    const result = await mergeAnnotations(recording, annoPath, {
      tables,
      marksAvailable: true,
    });

    expect(recording.marks?.discreteChannelMarks).toEqual(
      new Map([["chan_bad", new Set(["Cz"])]]),
    );
    expect(recording.marks?.timeInfo).toEqual([]);
    expect(result.outcomes).toEqual([
      { kind: "discrete", rowIndex: 0, domain: "chan", category: "chan_bad" },
    ]);
  });

  it("treats empty timing cells as a discrete row and splits channel lists", async () => {
    await writeAnnotations([
      ["", "", "CHANnoisy", "Fz, C3"],
      ["n/a", "n/a", "chan_noisy", "Fz"],
      ["n/a", "n/a", "comp_eye", "1 3"],
    ]);
    const recording = makeRecording();

    await mergeAnnotations(recording, annoPath, { tables, marksAvailable: true });

    expect(recording.marks?.discreteChannelMarks).toEqual(
      new Map([["chan_noisy", new Set(["Fz", "C3"])]]),
    );
    expect(recording.marks?.discreteComponentMarks).toEqual(
      new Map([["comp_eye", new Set(["1", "3"])]]),
    );
  });

  it("drops discrete rows of an unknown kind with a diagnostic", async () => {
    await writeAnnotations([["n/a", "n/a", "seizure", "Cz"]]);
    const recording = makeRecording();

    const result = await mergeAnnotations(recording, annoPath, {
      tables,
      marksAvailable: true,
      diagnostics,
    });

    expect(result.outcomes).toEqual([
      { kind: "unclassified", rowIndex: 0, label: "seizure" },
    ]);
    expect(diagnostics).toEqual([
      {
        code: "UNCLASSIFIED_MARK",
        message: 'Mark ingest not defined for mark of this type: "seizure"',
      },
    ]);
    expect(recording.marks?.discreteChannelMarks.size).toBe(0);
    expect(recording.marks?.discreteComponentMarks.size).toBe(0);
    expect(recording.marks?.timeInfo).toEqual([]);
  });

  it("sizes time tracks by component count when ICA is attached", async () => {
    await writeAnnotations([["0", "10", "artifact", ""]]);
    const recording = makeRecording({
      ica: {
        weights: [
          [1, 0],
          [0, 1],
          [1, 1],
          [0, 0],
        ],
        sphering: [
          [1, 0],
          [0, 1],
        ],
        channelIndices: [0, 1],
      },
    });

    await mergeAnnotations(recording, annoPath, { tables, marksAvailable: true });

    expect(recording.marks?.timeInfo).toEqual([
      { label: "artifact", flags: [true, true] },
    ]);
  });

  it("clears marks from a previous ingest", async () => {
    await writeAnnotations([["1", "0", "blink", ""]]);
    const recording = makeRecording({
      marks: {
        discreteChannelMarks: new Map([["chan_old", new Set(["Pz"])]]),
        discreteComponentMarks: new Map(),
        timeInfo: [{ label: "old", flags: [true] }],
      },
    });

    await mergeAnnotations(recording, annoPath, { tables, marksAvailable: true });

    expect(recording.marks?.discreteChannelMarks.size).toBe(0);
    expect(recording.marks?.timeInfo.map((mark) => mark.label)).toEqual(["blink"]);
  });

  it("appends the packed-binary supplement without de-duplicating", async () => {
    await writeAnnotations([["1", "0", "blink", ""]]);
    await writeFixture(
      dir,
      "sub-01_task-rest_annotations.msgpack",
      encode({
        timeAccum: [
          { label: "blink", flags: [0, 1, 1] },
          { label: "manual", flags: [true, false, false] },
        ],
      }),
    );
    const recording = makeRecording();

    const result = await mergeAnnotations(recording, annoPath, {
      tables,
      marksAvailable: true,
    });

    expect(result.appendedFromSupplement).toBe(2);
    expect(recording.marks?.timeInfo).toEqual([
      { label: "blink", flags: expectedFlags(30, 10, 10) },
      { label: "blink", flags: [false, true, true] },
      { label: "manual", flags: [true, false, false] },
    ]);
  });

  it("rejects a supplement that does not hold time mark records", async () => {
    await writeAnnotations([["1", "0", "blink", ""]]);
    const supplementPath = await writeFixture(
      dir,
      "sub-01_task-rest_annotations.msgpack",
      encode({ marks: 1 }),
    );

    await expect(
      mergeAnnotations(makeRecording(), annoPath, { tables, marksAvailable: true }),
    ).rejects.toMatchObject({ code: "SCHEMA_MISMATCH", path: supplementPath });
  });

  it("fails when the marking subsystem is unavailable", async () => {
    await writeAnnotations([["1", "0", "blink", ""]]);
    const recording = makeRecording();

    await expect(
      mergeAnnotations(recording, annoPath, { tables, marksAvailable: false }),
    ).rejects.toMatchObject({ code: "CAPABILITY_UNAVAILABLE" });
    expect(recording.marks).toBeUndefined();
  });

  it("fails when the companion JSON is missing", async () => {
    annoPath = await writeFixture(
      dir,
      "lonely_annotations.tsv",
      tsv([HEADER, ["1", "0", "blink", ""]]),
    );

    await expect(
      mergeAnnotations(makeRecording(), annoPath, { tables, marksAvailable: true }),
    ).rejects.toMatchObject({
      code: "MISSING_FILE",
      path: `${dir}/lonely_annotations.json`,
    });
  });

  it("requires the columns the companion declares", async () => {
    await writeAnnotations([["1", "0", "blink", ""]], {
      Columns: ["onset", "duration", "label", "channels", "rater"],
    });

    await expect(
      mergeAnnotations(makeRecording(), annoPath, { tables, marksAvailable: true }),
    ).rejects.toMatchObject({
      code: "SCHEMA_MISMATCH",
      message: `Missing column(s) "rater" (${annoPath})`,
    });
  });

  it("requires the annotation columns", async () => {
    annoPath = await writeFixture(
      dir,
      "sub-01_task-rest_annotations.tsv",
      tsv([
        ["onset", "duration", "label"],
        ["1", "0", "blink"],
      ]),
    );
    await writeFixture(dir, "sub-01_task-rest_annotations.json", "{}");

    await expect(
      mergeAnnotations(makeRecording(), annoPath, { tables, marksAvailable: true }),
    ).rejects.toMatchObject({ code: "SCHEMA_MISMATCH" });
  });
});

describe("AnnotationMerger", () => {
  it("moves from idle through ingesting to done", () => {
    const merger = new AnnotationMerger(makeRecording());

    expect(merger.currentState).toBe("idle");
    merger.begin();
    expect(merger.currentState).toBe("ingesting");
    merger.finish();
    expect(merger.currentState).toBe("done");
  });

  it("refuses rows outside of ingesting", () => {
    const merger = new AnnotationMerger(makeRecording());
    const row = { onset: 1, duration: 0, label: "blink", channels: "" };

    expect(captureError(() => merger.applyRow(row, 0))).toBeInstanceOf(Error);
    merger.begin();
    merger.applyRow(row, 0);
    merger.finish();
    expect(captureError(() => merger.applyRow(row, 1))).toBeInstanceOf(Error);
    expect(captureError(() => merger.begin())).toBeInstanceOf(Error);
  });

  it("creates an unflagged track for a row with only a duration", () => {
    const recording = makeRecording();
    const merger = new AnnotationMerger(recording);
    merger.begin();

    const outcome = merger.applyRow(
      { duration: 0.2, label: "start", channels: "" },
      0,
    );

    expect(outcome).toEqual({ kind: "untimed", rowIndex: 0, label: "start" });
    expect(recording.marks?.timeInfo).toEqual([
      { label: "start", flags: new Array<boolean>(30).fill(false) },
    ]);
  });

  it("flags nothing for a row with only an onset", () => {
    const recording = makeRecording();
    const merger = new AnnotationMerger(recording);
    merger.begin();

    merger.applyRow({ onset: 1, duration: 0.5, label: "blink", channels: "" }, 0);
    const outcome = merger.applyRow({ onset: 2, label: "blink", channels: "" }, 1);

    expect(outcome).toEqual({ kind: "untimed", rowIndex: 1, label: "blink" });
    const flagged = recording.marks?.timeInfo[0].flags.flatMap((flag, index) =>
      flag ? [index] : [],
    );
    expect(flagged).toEqual([10, 11, 12, 13, 14, 15]);
  });
});
