import { z } from "zod";
import { TABLE_FILE_TYPES } from "../source/table.source";

export const SCHEMA_VERSION = 1;

export const ColumnRefSchema = z.union([z.number().int().nonnegative(), z.string().min(1)]);

/** role -> column; the inference answer and the persisted document share this shape */
export const RoleMapSchema = z.record(z.string(), ColumnRefSchema.nullable());

export const NumericRangeSchema = z.object({
    min: z.number(),
    max: z.number(),
});

export const RoleRangeSchema = z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("numeric"), min: z.number(), max: z.number() }),
    // Longitude is split at 0 because a single range is ambiguous across the antimeridian
    z.object({
        kind: z.literal("longitude"),
        neg: NumericRangeSchema.nullable(),
        pos: NumericRangeSchema.nullable(),
    }),
    z.object({ kind: z.literal("time"), min: z.string(), max: z.string() }),
]);

export const FingerprintSchema = z.object({
    path: z.string(),
    size: z.number().int().nonnegative(),
    mtimeMs: z.number(),
});

export const SchemaDocumentSchema = z.object({
    version: z.literal(SCHEMA_VERSION),
    filetype: z.enum(TABLE_FILE_TYPES),
    fingerprint: FingerprintSchema,
    encoding: z.string(),
    roles: RoleMapSchema,
    /** Seconds between the first two samples; null when unknown */
    deltaTime: z.number().nullable(),
    ranges: z.record(z.string(), RoleRangeSchema),
});

export type NumericRange = z.infer<typeof NumericRangeSchema>;
export type RoleRange = z.infer<typeof RoleRangeSchema>;
export type Fingerprint = z.infer<typeof FingerprintSchema>;
export type Schema = z.infer<typeof SchemaDocumentSchema>;
