import { resolve } from "node:path";
import type { SchemaCache } from "../schema/schema.cache";
import type { Schema } from "../schema/schema.types";
import { readTable, resolveColumn, type TableData } from "../source/table.source";
import { toNumber } from "../source/value.parse";
import { ConfigError, SchemaError, UnknownField } from "../track.errors";
import type { ClipFn, ClipMap, RawValue, RowRange } from "../track.types";

export type DataChunkOptions = {
    /** Ready schema; skips the cache entirely */
    schema?: Schema;
    /** Cache consulted (and filled) when no schema is given */
    cache?: SchemaCache;
    forceRegeneration?: boolean;
    range?: RowRange;
    clip?: ClipMap;
    /** Defaults to the encoding the schema was built with */
    encoding?: string;
};

export type ColumnBatch = {
    columns: Map<string, RawValue[]>;
    /** Roles the schema declares but the file has no column for */
    missing: string[];
};

/**
 * Clip function that nulls numeric readings outside [min, max].
 * Non-numeric readings pass through untouched.
 */
export function clipRange(min: number, max: number): ClipFn {
    return (value) => {
        const n = toNumber(value);
        if (n === null) return value;
        return n < min || n > max ? null : value;
    };
}

/**
 * Lazy, indexed view over one tabular source.
 *
 * Rows are never kept: every read goes back to the file, so no slice survives
 * a change of restriction. `length` is fixed when the chunk is opened and
 * index i is the same physical row for every role.
 */
export class DataChunk {
    readonly length: number;

    private constructor(
        readonly path: string,
        readonly schema: Schema,
        readonly range: Readonly<{ start: number; end: number }>,
        readonly encoding: string,
        private readonly clip: ClipMap
    ) {
        this.length = range.end - range.start;
    }

    /**
     * Open a chunk. Without `options.schema` the schema cache is consulted
     * (and built when missing or forced).
     */
    static async open(path: string, options: DataChunkOptions): Promise<DataChunk> {
        let schema = options.schema;
        if (!schema) {
            if (!options.cache) throw new ConfigError("DataChunk.open needs a schema or a schema cache");
            schema = await options.cache.loadOrBuild(path, options.forceRegeneration ?? false);
        }
        return DataChunk.fromSchema(path, schema, options);
    }

    static fromSchema(path: string, schema: Schema, options: Omit<DataChunkOptions, "schema" | "cache"> = {}): DataChunk {
        const abs = resolve(path);
        const encoding = options.encoding ?? schema.encoding;
        const total = readTable(abs, { encoding }).rows.length;

        const start = clampInt(options.range?.start ?? 0, 0, total);
        const end = clampInt(options.range?.end ?? total, start, total);

        return new DataChunk(abs, schema, { start, end }, encoding, { ...options.clip });
    }

    /** Roles the schema maps to a column. */
    roles(): string[] {
        return Object.entries(this.schema.roles)
            .filter(([, ref]) => ref != null)
            .map(([role]) => role);
    }

    hasRole(role: string): boolean {
        return this.schema.roles[role] != null;
    }

    /**
     * Raw values of one role for the restricted rows, clip applied.
     * Throws UnknownField when the schema has no such role or the file has no such column.
     */
    getData(role: string): RawValue[] {
        const table = this.read();
        const values = this.slice(table, role);
        if (!values) {
            throw new UnknownField(role, `Column for "${role}" is not in ${this.path}`);
        }
        return values;
    }

    /**
     * Several roles from a single read of the source.
     * Roles unknown to the schema throw; declared roles without a column are reported in `missing`.
     */
    getMany(roles: readonly string[]): ColumnBatch {
        const table = this.read();
        const columns = new Map<string, RawValue[]>();
        const missing: string[] = [];

        for (const role of roles) {
            const values = this.slice(table, role);
            if (values) columns.set(role, values);
            else missing.push(role);
        }
        return { columns, missing };
    }

    private read(): TableData {
        const table = readTable(this.path, { encoding: this.encoding });
        if (table.rows.length < this.range.end) {
            throw new SchemaError(
                `${this.path} has ${table.rows.length} rows, expected at least ${this.range.end}; reopen the chunk`
            );
        }
        return table;
    }

    private slice(table: TableData, role: string): RawValue[] | null {
        const ref = this.schema.roles[role];
        if (ref == null) throw new UnknownField(role);

        const col = resolveColumn(table.headers, ref);
        if (col < 0) return null;

        const clip = this.clip[role];
        const out: RawValue[] = new Array(this.length);
        for (let i = 0; i < this.length; i++) {
            const v = table.rows[this.range.start + i][col];
            out[i] = clip ? clip(v) : v;
        }
        return out;
    }
}

function clampInt(n: number, lo: number, hi: number): number {
    const i = Number.isFinite(n) ? Math.trunc(n) : lo;
    return Math.min(hi, Math.max(lo, i));
}
