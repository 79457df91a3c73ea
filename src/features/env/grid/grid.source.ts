// src/features/env/grid/grid.source.ts
import { readFileSync } from "node:fs";
import { basename } from "node:path";
import { z } from "zod";
import { parseInstant } from "../../track/source/value.parse";
import { SchemaError, TrackError, UnknownField } from "../../track/track.errors";
import type { GridAxes, GridDataset, GridInit, GridSource } from "./grid.types";

/**
 * Dataset over flattened in-memory arrays. The arrays are shared, never copied;
 * closing only invalidates this handle.
 */
export class InMemoryGrid implements GridDataset {
    readonly axes: GridAxes;
    private readonly data: Map<string, Float64Array | readonly number[]>;
    private closed = false;

    constructor(init: GridInit) {
        this.axes = init.axes;
        this.data = new Map(Object.entries(init.variables));

        const expected = init.axes.time.length * init.axes.latitude.length * init.axes.longitude.length;
        for (const [name, values] of this.data) {
            if (values.length !== expected) {
                throw new SchemaError(`Grid variable "${name}" has ${values.length} values, expected ${expected}`);
            }
        }
    }

    variables(): string[] {
        return [...this.data.keys()];
    }

    has(variable: string): boolean {
        return this.data.has(variable);
    }

    valueAt(variable: string, ti: number, li: number, lj: number): number | null {
        if (this.closed) throw new TrackError("Grid dataset is closed", "GRID_CLOSED");

        const values = this.data.get(variable);
        if (!values) throw new UnknownField(variable, `Grid has no variable "${variable}"`);

        const nLat = this.axes.latitude.length;
        const nLon = this.axes.longitude.length;
        const v = values[(ti * nLat + li) * nLon + lj];
        return v === undefined || Number.isNaN(v) ? null : v;
    }

    close(): void {
        this.closed = true;
    }

    get isClosed(): boolean {
        return this.closed;
    }
}

export function inMemoryGridSource(name: string, init: GridInit): GridSource {
    return {
        name,
        open: () => new InMemoryGrid(init),
    };
}

/**
 * Run `fn` with a freshly opened dataset; the handle is closed when `fn` returns or throws.
 */
export function withGrid<T>(source: GridSource, fn: (ds: GridDataset) => T): T {
    const ds = source.open();
    try {
        return fn(ds);
    } finally {
        ds.close();
    }
}

// ---- JSON grid files ----

const Cube = z.array(z.array(z.array(z.number().nullable())));

export const GridFileSchema = z.object({
    latitude: z.array(z.number()).min(1),
    longitude: z.array(z.number()).min(1),
    /** ISO strings or epoch milliseconds */
    time: z.array(z.union([z.string(), z.number()])).min(1),
    /** variable -> [time][latitude][longitude] */
    variables: z.record(z.string(), Cube),
});

export type GridFile = z.infer<typeof GridFileSchema>;

export function gridInitFromFile(file: GridFile, origin = "grid"): GridInit {
    const time = file.time.map((t) => {
        const parsed = parseInstant(t);
        if (parsed === null) throw new SchemaError(`${origin}: time value ${JSON.stringify(t)} does not parse`);
        return parsed;
    });

    const nt = time.length;
    const nl = file.latitude.length;
    const nn = file.longitude.length;

    const variables: Record<string, Float64Array> = {};
    for (const [name, cube] of Object.entries(file.variables)) {
        const flat = new Float64Array(nt * nl * nn);
        if (cube.length !== nt) throw shapeError(origin, name, "time", cube.length, nt);

        cube.forEach((plane, ti) => {
            if (plane.length !== nl) throw shapeError(origin, name, "latitude", plane.length, nl);
            plane.forEach((row, li) => {
                if (row.length !== nn) throw shapeError(origin, name, "longitude", row.length, nn);
                row.forEach((v, lj) => {
                    flat[(ti * nl + li) * nn + lj] = v ?? Number.NaN;
                });
            });
        });
        variables[name] = flat;
    }

    return {
        axes: { latitude: file.latitude, longitude: file.longitude, time },
        variables,
    };
}

/**
 * Grid stored as JSON. The file is read and validated on every open().
 */
export function jsonGridSource(path: string): GridSource {
    return {
        name: basename(path),
        open: () => {
            let json: unknown;
            try {
                json = JSON.parse(readFileSync(path, "utf8"));
            } catch (e) {
                const reason = e instanceof Error ? e.message : String(e);
                throw new SchemaError(`${path}: grid file is not readable JSON (${reason})`);
            }

            const parsed = GridFileSchema.safeParse(json);
            if (!parsed.success) {
                throw new SchemaError(`${path}: invalid grid file: ${parsed.error.issues[0]?.message ?? "unknown issue"}`);
            }
            return new InMemoryGrid(gridInitFromFile(parsed.data, path));
        },
    };
}

function shapeError(origin: string, name: string, axis: string, got: number, expected: number): SchemaError {
    return new SchemaError(`${origin}: variable "${name}" has ${got} entries along ${axis}, expected ${expected}`);
}
