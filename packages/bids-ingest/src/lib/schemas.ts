/**
 * Zod schemas for runtime validation of ingest options and sidecar companions
 * These schemas validate data at runtime to catch malformed sidecars early
 */

import { z } from "zod";

// ============================================================================
// Ingest options
// ============================================================================

export const IngestOptionsSchema = z
  .object({
    elecLoc: z.string().default(""),
    eventLoc: z.string().default(""),
    icaSphere: z.string().default(""),
    icaWeights: z.string().default(""),
    annoLoc: z.string().default(""),
    redraw: z.boolean().default(true),
  })
  .strict();

// ============================================================================
// Companion metadata (JSON)
// ============================================================================

// 1-based positions in the recording's channel list
const ChannelIndexSchema = z.number().int().positive();

// A single-channel decomposition is written as a bare number
export const IcaCompanionSchema = z
  .object({
    icachansind: z
      .union([ChannelIndexSchema, z.array(ChannelIndexSchema)])
      .transform((value) => (Array.isArray(value) ? value : [value])),
  })
  .passthrough();

export const AnnotationCompanionSchema = z
  .object({
    Columns: z.array(z.string()).optional(),
  })
  .passthrough();

// ============================================================================
// Packed-binary time mark supplement
// ============================================================================

const FlagValuesSchema = z.union([
  z.array(z.union([z.boolean(), z.number()])),
  z.instanceof(Uint8Array).transform((bytes) => Array.from(bytes)),
]);

export const TimeMarkRecordSchema = z.object({
  label: z.string(),
  flags: FlagValuesSchema.transform((flags) =>
    flags.map((flag) => flag === true || flag === 1),
  ),
});

export const TimeMarkSupplementSchema = z.union([
  z.array(TimeMarkRecordSchema),
  z
    .object({ timeAccum: z.array(TimeMarkRecordSchema) })
    .transform((supplement) => supplement.timeAccum),
]);

// ============================================================================
// Type exports (inferred from schemas)
// ============================================================================

export type IngestOptionsInput = z.input<typeof IngestOptionsSchema>;
export type IngestOptions = z.infer<typeof IngestOptionsSchema>;
export type IcaCompanion = z.infer<typeof IcaCompanionSchema>;
export type AnnotationCompanion = z.infer<typeof AnnotationCompanionSchema>;
export type TimeMarkRecord = z.infer<typeof TimeMarkRecordSchema>;
