import { max, min } from "lodash";
import { readColumn, type TableData } from "../source/table.source";
import { formatInstant, parseInstant, toNumber } from "../source/value.parse";
import { SchemaError } from "../track.errors";
import type { RoleMap } from "../track.types";
import type { NumericRange, RoleRange } from "./schema.types";

/**
 * Sampling interval in seconds, from the first two rows of the timestamp column.
 *
 * Throws SchemaError when the role map has no timestamp, the column is missing or empty,
 * or one of the two leading timestamps does not parse.
 * Returns null for a single-row column or a zero difference.
 */
export function deriveTimeStep(table: TableData, roles: RoleMap): number | null {
    const ref = roles.timestamp;
    if (ref == null) throw new SchemaError("Inferred schema has no timestamp column");

    const column = readColumn(table, ref);
    if (!column) throw new SchemaError(`Timestamp column ${JSON.stringify(ref)} is not in the file`);
    if (column.length === 0) throw new SchemaError("Timestamp column is empty");
    if (column.length === 1) return null;

    const t0 = parseInstant(column[0]);
    const t1 = parseInstant(column[1]);
    if (t0 === null || t1 === null) {
        throw new SchemaError(
            `Leading timestamps do not parse: ${JSON.stringify(column[0])}, ${JSON.stringify(column[1])}`
        );
    }

    const dt = (t1 - t0) / 1000;
    return dt === 0 ? null : dt;
}

/**
 * Value range per role. Roles whose column is missing or holds no parseable value
 * get no entry (a warning is logged).
 */
export function deriveRanges(table: TableData, roles: RoleMap): Record<string, RoleRange> {
    const ranges: Record<string, RoleRange> = {};

    for (const [role, ref] of Object.entries(roles)) {
        if (ref == null) continue;

        const column = readColumn(table, ref);
        if (!column) {
            console.warn(`Range for "${role}" skipped: column ${JSON.stringify(ref)} is not in the file`);
            continue;
        }

        const range = role === "timestamp" ? timeRange(column.map(parseInstant)) : valueRange(role, column.map(toNumber));
        if (!range) {
            console.warn(`Range for "${role}" skipped: no parseable values`);
            continue;
        }
        ranges[role] = range;
    }

    return ranges;
}

function timeRange(values: (number | null)[]): RoleRange | null {
    const valid = values.filter((v): v is number => v !== null);
    const lo = min(valid);
    const hi = max(valid);
    if (lo === undefined || hi === undefined) return null;
    return { kind: "time", min: formatInstant(lo), max: formatInstant(hi) };
}

function valueRange(role: string, values: (number | null)[]): RoleRange | null {
    const valid = values.filter((v): v is number => v !== null);
    if (valid.length === 0) return null;

    if (role === "longitude") {
        return {
            kind: "longitude",
            neg: numericRange(valid.filter((v) => v < 0)),
            pos: numericRange(valid.filter((v) => v >= 0)),
        };
    }

    const r = numericRange(valid);
    return r && { kind: "numeric", ...r };
}

function numericRange(values: number[]): NumericRange | null {
    const lo = min(values);
    const hi = max(values);
    if (lo === undefined || hi === undefined) return null;
    return { min: lo, max: hi };
}
