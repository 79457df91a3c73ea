import { WIND_LEVELS } from "../../track/point/traj.point";
import { UnknownField } from "../../track/track.errors";
import type { FieldValue, ProgressFn } from "../../track/track.types";
import type { Trajectory } from "../../track/trajectory/trajectory";
import {
    angleDiffDeg,
    apparentWind,
    compassBearing,
    displacementBetween,
    vectorAngle,
    vectorSpeed,
    type Maybe,
} from "../geo/geo.math";
import { interpolateMany, interpolateStrict } from "../grid/grid.interp";
import { withGrid } from "../grid/grid.source";
import type { GridDataset, GridSource, SamplePoint } from "../grid/grid.types";
import { getFusionConfig } from "./fusion.config.store";

export type ImportOptions = {
    onProgress?: ProgressFn;
};

export type WindImportOptions = ImportOptions & {
    /** Overrides the configured `useEnvWind` */
    useEnvWind?: boolean;
};

/** Bulk arrays written by an import, keyed like the trajectory series */
export type FusionResult = Record<string, FieldValue[]>;

/**
 * Interpolate one grid variable onto every trajectory sample.
 *
 * Works range by range (one range per backing chunk). Samples outside the grid
 * are null. The result is stored as a trajectory series and in each point.
 */
export function importField(
    traj: Trajectory,
    fieldName: string,
    source: GridSource,
    options: ImportOptions = {}
): FieldValue[] {
    return withGrid(source, (ds) => importFrom(ds, source.name, traj, fieldName, options.onProgress));
}

/**
 * One grid value at one sample. Throws InterpolationOutOfDomain off the grid
 * and UnknownField when the grid has no such variable.
 */
export function sampleAt(source: GridSource, variable: string, sample: SamplePoint): Maybe {
    return withGrid(source, (ds) => {
        if (!ds.has(variable)) throw new UnknownField(variable, `${source.name} has no "${variable}" variable`);
        return interpolateStrict(ds, variable, sample);
    });
}

/**
 * Import the wind levels the grid carries (u10/v10 required, u100/v100 when present)
 * and derive speed (w10, w100) and angle (w10_angle, w100_angle).
 *
 * Every point is linked to `source`, so points dead-reckoned from them sample the same grid.
 */
export function importWind(traj: Trajectory, source: GridSource, options: WindImportOptions = {}): FusionResult {
    const config = getFusionConfig();
    const useEnvWind = options.useEnvWind ?? config.useEnvWind;

    const result = withGrid(source, (ds) => {
        for (const v of config.requiredVariables) {
            if (!ds.has(v)) throw new UnknownField(v, `${source.name} has no "${v}" variable`);
        }

        const out: FusionResult = {};
        for (const level of WIND_LEVELS) {
            if (!ds.has(level.u) || !ds.has(level.v)) {
                console.info(`${source.name}: no ${level.u}/${level.v}, skipping that level`);
                continue;
            }

            const u = importFrom(ds, source.name, traj, level.u, options.onProgress);
            const v = importFrom(ds, source.name, traj, level.v, options.onProgress);
            const speed = u.map((x, i) => vectorSpeed(x, v[i]));
            const angle = u.map((x, i) => vectorAngle(x, v[i]));

            traj.setSeries(level.speed, speed);
            traj.setSeries(level.angle, angle);

            out[level.u] = u;
            out[level.v] = v;
            out[level.speed] = speed;
            out[level.angle] = angle;
        }
        return out;
    });

    for (const p of traj) {
        p.attachEnv(source);
        if (useEnvWind) p.useEnv();
    }

    return result;
}

/**
 * Compass bearing (0° = North, clockwise) of an east/north series pair, stored under `outKey`.
 */
export function deriveBearing(traj: Trajectory, uKey: string, vKey: string, outKey: string): FieldValue[] {
    const u = traj.series(uKey);
    const v = traj.series(vKey);
    const bearing = u.map((x, i) => compassBearing(x, v[i]));
    traj.setSeries(outKey, bearing);
    return bearing;
}

export type ApparentWindKeys = {
    windU: string;
    windV: string;
};

/**
 * Apparent-wind triangle per sample.
 *
 * Boat velocity comes from the configured boat keys when the trajectory has
 * them, otherwise it is derived from consecutive positions (and stored under
 * those keys). Writes apparent_wind_u/v, apparent_wind_speed, sail_angle
 * (radians), course and true_wind_angle (degrees).
 */
export function deriveApparentWind(
    traj: Trajectory,
    keys: ApparentWindKeys = { windU: "u10", windV: "v10" }
): FusionResult {
    const { boatKeys } = getFusionConfig();

    let boatU = optionalSeries(traj, boatKeys.u);
    let boatV = optionalSeries(traj, boatKeys.v);
    if (!boatU || !boatV) {
        const derived = velocityFromTrack(traj);
        boatU = derived.u;
        boatV = derived.v;
        traj.setSeries(boatKeys.u, boatU);
        traj.setSeries(boatKeys.v, boatV);
    }

    const windU = traj.series(keys.windU);
    const windV = traj.series(keys.windV);

    const out: FusionResult = {
        apparent_wind_u: [],
        apparent_wind_v: [],
        apparent_wind_speed: [],
        sail_angle: [],
        course: [],
        true_wind_angle: [],
    };

    for (let i = 0; i < traj.length; i++) {
        const aw = apparentWind(boatU[i], boatV[i], windU[i], windV[i]);
        const course = compassBearing(boatU[i], boatV[i]);
        const windTo = compassBearing(windU[i], windV[i]);

        out.apparent_wind_u.push(aw ? aw.u : null);
        out.apparent_wind_v.push(aw ? aw.v : null);
        out.apparent_wind_speed.push(aw ? aw.speed : null);
        out.sail_angle.push(aw ? aw.phiOmega : null);
        out.course.push(course);
        out.true_wind_angle.push(course !== null && windTo !== null ? angleDiffDeg(course, windTo) : null);
    }

    for (const [key, values] of Object.entries(out)) traj.setSeries(key, values);
    return out;
}

/**
 * East/north velocity (m/s) from positions: forward difference, backward for the last point.
 */
export function velocityFromTrack(traj: Trajectory): { u: Maybe[]; v: Maybe[] } {
    const points = traj.toArray();
    const u: Maybe[] = [];
    const v: Maybe[] = [];

    for (let i = 0; i < points.length; i++) {
        const a = i + 1 < points.length ? points[i] : points[i - 1];
        const b = i + 1 < points.length ? points[i + 1] : points[i];
        if (!a || !b) {
            u.push(null);
            v.push(null);
            continue;
        }

        const dt = (b.timestamp - a.timestamp) / 1000;
        const { dx, dy } = displacementBetween(a.latitude, a.longitude, b.latitude, b.longitude);
        const ok = dt > 0 && Number.isFinite(dx) && Number.isFinite(dy);
        u.push(ok ? dx / dt : null);
        v.push(ok ? dy / dt : null);
    }

    return { u, v };
}

function importFrom(
    ds: GridDataset,
    sourceName: string,
    traj: Trajectory,
    variable: string,
    onProgress?: ProgressFn
): FieldValue[] {
    if (!ds.has(variable)) throw new UnknownField(variable, `${sourceName} has no "${variable}" variable`);

    const points = traj.toArray();
    const out: FieldValue[] = new Array(points.length).fill(null);
    let done = 0;

    for (const [start, end] of traj.ranges()) {
        const samples = points.slice(start, end).map((p) => ({
            latitude: p.latitude,
            longitude: p.longitude,
            time: p.timestamp,
        }));
        interpolateMany(ds, variable, samples).forEach((value, k) => {
            out[start + k] = value;
        });

        done += end - start;
        onProgress?.(done, points.length);
    }

    traj.setSeries(variable, out);
    return out;
}

function optionalSeries(traj: Trajectory, key: string): FieldValue[] | null {
    try {
        return traj.series(key);
    } catch (e) {
        if (e instanceof UnknownField) return null;
        throw e;
    }
}
