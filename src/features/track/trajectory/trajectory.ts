import type { DataChunk } from "../chunk/data.chunk";
import { TrajPoint, WIND_LEVELS, type Displacement } from "../point/traj.point";
import { parseInstant, toFieldValue, toNumber } from "../source/value.parse";
import {
    ConflictingInitialization,
    FieldConflict,
    IndexOutOfRange,
    InvalidIndex,
    SchemaError,
    TrackError,
    UnknownField,
} from "../track.errors";
import { CORE_ROLES, isCoreRole, type FieldValue, type ProgressFn } from "../track.types";

export type TrajectoryInit = {
    points?: readonly TrajPoint[];
    chunk?: DataChunk;
    onProgress?: ProgressFn;
};

/** [start, end) of one chunk inside the global point sequence */
export type Partition = readonly [start: number, end: number];

const PROGRESS_EVERY = 1000;

/**
 * Ordered sequence of points, optionally backed by data chunks.
 *
 * The chunk partition is derived from chunk lengths only and recomputed on
 * every append. Fusion results live in a series bag (one value per index)
 * and are mirrored into each point's field map.
 */
export class Trajectory {
    private readonly points: TrajPoint[] = [];
    private readonly chunks: DataChunk[] = [];
    private partition: Partition[] = [];
    private readonly bag = new Map<string, FieldValue[]>();

    constructor(init: TrajectoryInit = {}) {
        const { points, chunk, onProgress } = init;
        if (points && chunk) throw new ConflictingInitialization();

        if (chunk) {
            this.appendChunk(chunk, onProgress);
        } else if (points) {
            for (const p of points) this.points.push(p);
        } else {
            console.warn("Trajectory created empty: pass points or a chunk");
        }
    }

    static fromChunk(chunk: DataChunk, onProgress?: ProgressFn): Trajectory {
        return new Trajectory({ chunk, onProgress });
    }

    static fromPoints(points: readonly TrajPoint[]): Trajectory {
        return new Trajectory({ points });
    }

    get length(): number {
        return this.points.length;
    }

    get isChunked(): boolean {
        return this.chunks.length > 0;
    }

    [Symbol.iterator](): Iterator<TrajPoint> {
        return this.points[Symbol.iterator]();
    }

    toArray(): TrajPoint[] {
        return this.points.slice();
    }

    backingChunks(): readonly DataChunk[] {
        return this.chunks.slice();
    }

    /**
     * Materialize every row of `chunk` and append it. The new partition is
     * [previous end, previous end + chunk.length).
     */
    appendChunk(chunk: DataChunk, onProgress?: ProgressFn): this {
        const end = this.partitionEnd();
        if (this.points.length !== end) {
            throw new ConflictingInitialization(
                "Chunks can only be appended to a trajectory whose points all come from chunks"
            );
        }

        const fresh = materialize(chunk, onProgress);
        for (const p of fresh) this.points.push(p);
        this.chunks.push(chunk);
        this.recomputePartition();
        this.padSeries(fresh);
        return this;
    }

    /** [start, end) per backing chunk, in order. */
    chunk2index(): Partition[] {
        return this.partition.slice();
    }

    /**
     * Contiguous ranges covering every point: one per chunk, plus a tail for
     * points added after the last chunk. A chunk-less trajectory is one range.
     */
    ranges(): Partition[] {
        const out = this.partition.slice();
        const end = this.partitionEnd();
        if (this.points.length > end) out.push([end, this.points.length]);
        return out;
    }

    indexByPosition(i: number): TrajPoint {
        if (!Number.isInteger(i) || i < 0 || i >= this.points.length) {
            throw new IndexOutOfRange(i, this.points.length);
        }
        return this.points[i];
    }

    /**
     * Bulk values of one role.
     *
     * Lookup order: fusion series, then position/time from the points, then the
     * backing chunks' schemas (concatenated in partition order; chunks without
     * the role contribute nulls). A chunk-less trajectory falls back to the
     * points' field maps.
     *
     * A single value is returned bare, not wrapped in an array. An empty result
     * throws UnknownField instead of returning [].
     */
    indexByKey(role: string): FieldValue[] | FieldValue {
        const values = this.series(role);
        return values.length === 1 ? values[0] : values;
    }

    /** Same lookup as indexByKey, always an array. */
    series(role: string): FieldValue[] {
        const values = this.lookup(role);
        if (values.length === 0) {
            throw new UnknownField(role, `"${role}" has no values: the trajectory is empty`);
        }
        return values;
    }

    hasSeries(key: string): boolean {
        return this.bag.has(key);
    }

    seriesKeys(): string[] {
        return [...this.bag.keys()];
    }

    /**
     * Store a bulk result (one value per point) and copy it into every point.
     * Sensor columns of the backing chunks cannot be shadowed.
     */
    setSeries(key: string, values: readonly FieldValue[]): void {
        if (values.length !== this.points.length) {
            throw new TrackError(
                `Series "${key}" has ${values.length} values for ${this.points.length} points`,
                "SERIES_LENGTH"
            );
        }
        if (isCoreRole(key) || (!this.bag.has(key) && this.chunks.some((c) => c.hasRole(key)))) {
            throw new FieldConflict(key);
        }

        const copy = values.slice();
        this.bag.set(key, copy);
        copy.forEach((v, i) => this.points[i].setField(key, v));
    }

    /**
     * New chunk-less trajectory with copies of the given points, in the given order.
     * Series are carried over for the same points. Writes to the subset never
     * reach this trajectory, and the other way round.
     */
    indexBySubset(indices: readonly number[]): Trajectory {
        const seen = new Set<number>();
        for (const i of indices) {
            if (!Number.isInteger(i) || i < 0 || i >= this.points.length) {
                throw new InvalidIndex(`Index ${i} is outside [0, ${this.points.length})`);
            }
            if (seen.has(i)) throw new InvalidIndex(`Index ${i} appears more than once`);
            seen.add(i);
        }

        const subset = new Trajectory({ points: indices.map((i) => this.points[i].clone()) });
        for (const [key, values] of this.bag) {
            subset.bag.set(key, indices.map((i) => values[i]));
        }
        return subset;
    }

    /**
     * Per-point environment import for the point at `i`. Wind keys this
     * trajectory already stores as series are updated at `i` as well.
     */
    importEnvAt(i: number): boolean {
        const p = this.indexByPosition(i);
        if (!p.importEnv()) return false;

        for (const level of WIND_LEVELS) {
            for (const key of [level.u, level.v, level.speed, level.angle]) {
                const values = this.bag.get(key);
                if (values && p.hasField(key)) values[i] = p.field(key) ?? null;
            }
        }
        return true;
    }

    /**
     * Dead-reckon a new point from the last one and append it.
     * The new point sits outside every chunk partition.
     */
    extendSeries(displacement: Displacement, elapsedS: number): TrajPoint {
        const last = this.points[this.points.length - 1];
        if (!last) throw new IndexOutOfRange(0, 0);

        const next = TrajPoint.follow(last, displacement, elapsedS);
        this.points.push(next);
        this.padSeries([next]);
        return next;
    }

    private lookup(role: string): FieldValue[] {
        const fused = this.bag.get(role);
        if (fused) return fused.slice();

        if (isCoreRole(role)) return this.points.map((p) => p[role]);

        if (this.chunks.length === 0) {
            if (!this.points.some((p) => p.hasField(role))) throw new UnknownField(role);
            return this.points.map((p) => p.field(role) ?? null);
        }

        if (!this.chunks.some((c) => c.hasRole(role))) throw new UnknownField(role);

        const out: FieldValue[] = [];
        this.chunks.forEach((chunk) => {
            // chunks without the role, or whose file lacks its column, contribute nulls
            const values = chunk.hasRole(role) ? chunk.getMany([role]).columns.get(role) : undefined;
            if (!values) {
                for (let i = 0; i < chunk.length; i++) out.push(null);
                return;
            }
            for (const raw of values) out.push(toFieldValue(role, raw));
        });

        // points appended after the last chunk only know their own fields
        for (let i = this.partitionEnd(); i < this.points.length; i++) {
            out.push(this.points[i].field(role) ?? null);
        }
        return out;
    }

    private partitionEnd(): number {
        const last = this.partition[this.partition.length - 1];
        return last ? last[1] : 0;
    }

    private recomputePartition(): void {
        let start = 0;
        this.partition = this.chunks.map((c) => {
            const range: Partition = [start, start + c.length];
            start += c.length;
            return range;
        });
    }

    // keep every series one value per point
    private padSeries(added: readonly TrajPoint[]): void {
        for (const [key, values] of this.bag) {
            for (const p of added) {
                values.push(null);
                p.setField(key, null);
            }
        }
    }
}

/**
 * One point per chunk row. Position/time roles are required; other roles are
 * read as numbers and skipped (with a warning) when the file lacks their column.
 * Unparseable position/time cells become NaN so the row stays aligned.
 */
function materialize(chunk: DataChunk, onProgress?: ProgressFn): TrajPoint[] {
    for (const role of CORE_ROLES) {
        if (!chunk.hasRole(role)) throw new SchemaError(`${chunk.path}: schema has no "${role}" column`);
    }

    const sensorRoles = chunk.roles().filter((r) => !isCoreRole(r));
    const { columns, missing } = chunk.getMany([...CORE_ROLES, ...sensorRoles]);

    const core = missing.filter(isCoreRole);
    if (core.length > 0) throw new SchemaError(`${chunk.path}: no column for ${core.join(", ")}`);
    for (const role of missing) console.warn(`${chunk.path}: column for "${role}" not found, skipping`);

    const lat = columns.get("latitude") ?? [];
    const lon = columns.get("longitude") ?? [];
    const time = columns.get("timestamp") ?? [];
    const sensors = sensorRoles.flatMap((role) => {
        const values = columns.get(role);
        return values ? [{ role, values }] : [];
    });

    const points: TrajPoint[] = new Array(chunk.length);
    let invalid = 0;

    for (let i = 0; i < chunk.length; i++) {
        const latitude = toNumber(lat[i]);
        const longitude = toNumber(lon[i]);
        const timestamp = parseInstant(time[i]);
        if (latitude === null || longitude === null || timestamp === null) invalid++;

        const data: Record<string, FieldValue> = {};
        for (const s of sensors) data[s.role] = toNumber(s.values[i]);

        points[i] = new TrajPoint(
            { latitude: latitude ?? Number.NaN, longitude: longitude ?? Number.NaN },
            timestamp ?? Number.NaN,
            data
        );

        if (onProgress && ((i + 1) % PROGRESS_EVERY === 0 || i + 1 === chunk.length)) {
            onProgress(i + 1, chunk.length);
        }
    }

    if (invalid > 0) {
        console.warn(`${chunk.path}: ${invalid} row(s) with missing position or time (kept as NaN)`);
    }
    return points;
}
