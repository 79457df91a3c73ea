import { apparentWind, displace, vectorAngle, vectorSpeed, type ApparentWind } from "../../env/geo/geo.math";
import { interpolate } from "../../env/grid/grid.interp";
import { withGrid } from "../../env/grid/grid.source";
import type { GridDataset, GridSource } from "../../env/grid/grid.types";
import { ImmutableField } from "../track.errors";
import { isCoreRole, type FieldValue, type Instant } from "../track.types";

export type Location = {
    latitude: number;
    longitude: number;
};

/** East/north offset in meters. */
export type Displacement = readonly [dxEast: number, dyNorth: number];

/** u/v pairs per height, with the derived speed/angle keys they write. */
export const WIND_LEVELS = [
    { u: "u10", v: "v10", speed: "w10", angle: "w10_angle" },
    { u: "u100", v: "v100", speed: "w100", angle: "w100_angle" },
] as const;

/**
 * One trajectory sample.
 *
 * Position and time never change after construction. The field map starts with
 * latitude/longitude/timestamp plus the extra readings passed in and may gain
 * keys later (fusion results).
 */
export class TrajPoint {
    readonly latitude: number;
    readonly longitude: number;
    readonly timestamp: Instant;

    windU: number | null = null;
    windV: number | null = null;

    private readonly data = new Map<string, FieldValue>();
    // navigation only: must not keep the predecessor alive
    private parentRef: WeakRef<TrajPoint> | null = null;
    private env: GridSource | null = null;

    constructor(location: Location, timestamp: Instant, data: Readonly<Record<string, FieldValue>> = {}) {
        this.latitude = location.latitude;
        this.longitude = location.longitude;
        this.timestamp = timestamp;

        this.data.set("latitude", this.latitude);
        this.data.set("longitude", this.longitude);
        this.data.set("timestamp", this.timestamp);

        for (const [key, value] of Object.entries(data)) this.setField(key, value);
    }

    /**
     * Dead-reckon a new point from `predecessor`: flat-earth displacement,
     * timestamp + elapsedS. The new point links back without owning the
     * predecessor and inherits its environment source (not its fields);
     * when a source is attached the wind at the new position is sampled.
     */
    static follow(predecessor: TrajPoint, displacement: Displacement, elapsedS: number): TrajPoint {
        const [dx, dy] = displacement;
        const next = new TrajPoint(
            displace(predecessor.latitude, predecessor.longitude, dx, dy),
            predecessor.timestamp + elapsedS * 1000
        );
        next.parentRef = new WeakRef(predecessor);
        next.env = predecessor.env;
        if (next.env) next.sampleWind();
        return next;
    }

    /**
     * Independent copy: same position, time, fields, wind, predecessor and
     * environment link. Later writes to either copy do not reach the other.
     */
    clone(): TrajPoint {
        const copy = new TrajPoint(this.location, this.timestamp);
        for (const [key, value] of this.data) copy.data.set(key, value);
        copy.parentRef = this.parentRef;
        copy.env = this.env;
        copy.windU = this.windU;
        copy.windV = this.windV;
        return copy;
    }

    get location(): Location {
        return { latitude: this.latitude, longitude: this.longitude };
    }

    /** The point this one was derived from; undefined when there is none or it was collected. */
    predecessor(): TrajPoint | undefined {
        return this.parentRef?.deref();
    }

    get envSource(): GridSource | null {
        return this.env;
    }

    attachEnv(source: GridSource | null): void {
        this.env = source;
    }

    field(key: string): FieldValue | undefined {
        return this.data.get(key);
    }

    hasField(key: string): boolean {
        return this.data.has(key);
    }

    /**
     * Add or refresh a reading. The position/time keys are fixed: writing a
     * different value to them throws.
     */
    setField(key: string, value: FieldValue): void {
        if (isCoreRole(key)) {
            if (!Object.is(this.data.get(key), value)) throw new ImmutableField(key);
            return;
        }
        this.data.set(key, value);
    }

    keys(): string[] {
        return [...this.data.keys()];
    }

    /** Snapshot of the field map. */
    fields(): Record<string, FieldValue> {
        return Object.fromEntries(this.data);
    }

    /**
     * Interpolate the attached source at this point: u10/v10 and, when the
     * grid has them, u100/v100, plus the derived speed and angle.
     * Returns false (with a warning) when nothing is attached or the grid has no 10 m wind.
     *
     * Writes this point's fields only. For a point held by a trajectory use
     * `Trajectory.importEnvAt` so the trajectory's stored series follow.
     */
    importEnv(): boolean {
        const source = this.env;
        if (!source) {
            console.warn(`${this.toString()}: no environment source, call attachEnv() first`);
            return false;
        }

        return withGrid(source, (ds) => {
            if (!ds.has("u10") || !ds.has("v10")) {
                console.warn(`${source.name}: no wind at 10 m (u10/v10)`);
                return false;
            }
            for (const level of WIND_LEVELS) {
                if (!ds.has(level.u) || !ds.has(level.v)) continue;
                const u = this.sample(ds, level.u);
                const v = this.sample(ds, level.v);
                this.setField(level.u, u);
                this.setField(level.v, v);
                this.setField(level.speed, vectorSpeed(u, v));
                this.setField(level.angle, vectorAngle(u, v));
            }
            return true;
        });
    }

    /** Use the imported 10 m wind as this point's wind state. */
    useEnv(): void {
        this.windU = this.data.get("u10") ?? null;
        this.windV = this.data.get("v10") ?? null;
    }

    /**
     * Apparent wind for a boat moving at (u east, v north) m/s through this point's wind.
     * Null (with a warning) when the point has no wind yet.
     */
    sailParams(boatU: number, boatV: number): ApparentWind | null {
        if (this.windU === null || this.windV === null) {
            console.warn(`${this.toString()}: no wind, import or sample it first`);
            return null;
        }
        return apparentWind(boatU, boatV, this.windU, this.windV);
    }

    toString(): string {
        const at = Number.isFinite(this.timestamp) ? new Date(this.timestamp).toISOString() : "invalid time";
        return `TrajPoint(${this.latitude}, ${this.longitude} @ ${at})`;
    }

    private sampleWind(): void {
        const source = this.env;
        if (!source) return;
        withGrid(source, (ds) => {
            if (!ds.has("u10") || !ds.has("v10")) return;
            this.windU = this.sample(ds, "u10");
            this.windV = this.sample(ds, "v10");
        });
    }

    private sample(ds: GridDataset, variable: string): FieldValue {
        return interpolate(ds, variable, {
            latitude: this.latitude,
            longitude: this.longitude,
            time: this.timestamp,
        });
    }
}
