import { haversineKm } from "../../env/geo/geo.math";
import type { TrajPoint } from "../point/traj.point";
import type { FieldValue } from "../track.types";
import type { Trajectory } from "./trajectory";

export const calculationWindow = 600;

/**
 * Per-point ground track values.
 */
export type GroundSample = {
    /** Seconds since the first point */
    tSec: number;

    /** Distance travelled since the first point, km */
    distanceKm: number;

    /** Speed over ground from the previous point, km/h (null for the first point or a time gap of 0) */
    groundSpeedKmh: FieldValue;
};

/**
 * Discrete window-based series.
 */
export type GroundWindow = {
    /** Window end in seconds since the first point */
    tSec: number;

    /** Average speed over ground across the window (km/h) */
    groundSpeedKmh: number;

    /** Points in the window */
    sampleCount: number;
};

function usable(p: TrajPoint): boolean {
    return Number.isFinite(p.latitude) && Number.isFinite(p.longitude) && Number.isFinite(p.timestamp);
}

/**
 * Per-point distance and speed over ground; no window pass.
 */
export function buildGroundSamples(points: readonly TrajPoint[]): GroundSample[] {
    if (points.length === 0) return [];

    const startT = points[0].timestamp;
    const series: GroundSample[] = [];
    let distanceKm = 0;
    for (let i = 0; i < points.length; i++) {
        const p = points[i];

        let groundSpeedKmh: FieldValue = null;
        if (i > 0) {
            const prev = points[i - 1];
            const dt = (p.timestamp - prev.timestamp) / 1000;
            if (usable(p) && usable(prev)) {
                const dk = haversineKm(prev.latitude, prev.longitude, p.latitude, p.longitude);
                distanceKm += dk;
                if (dt > 0) groundSpeedKmh = dk / (dt / 3600);
            }
        }

        series.push({
            tSec: (p.timestamp - startT) / 1000,
            distanceKm,
            groundSpeedKmh,
        });
    }
    return series;
}

export function buildGroundSeries(
    points: readonly TrajPoint[],
    windowSec: number = calculationWindow
): {
    series: GroundSample[];
    windows: GroundWindow[];
} {
    if (points.length === 0) return { series: [], windows: [] };

    if (!Number.isFinite(windowSec) || windowSec <= 0) windowSec = calculationWindow;

    const startT = points[0].timestamp;
    const series = buildGroundSamples(points);

    // Window averages: total distance / total time
    const windows: GroundWindow[] = [];
    let i = 0;

    while (i < points.length - 1) {
        const wStart = points[i];
        const targetEndT = wStart.timestamp + windowSec * 1000;

        let j = i;
        while (j + 1 < points.length && points[j + 1].timestamp <= targetEndT) j++;

        if (j === i) {
            i++;
            continue;
        }

        const dt = (points[j].timestamp - wStart.timestamp) / 1000;
        if (!(dt > 0)) {
            i = j + 1;
            continue;
        }

        const distKm = series[j].distanceKm - series[i].distanceKm;
        windows.push({
            tSec: (points[j].timestamp - startT) / 1000,
            groundSpeedKmh: distKm / (dt / 3600),
            sampleCount: j - i + 1,
        });

        i = j + 1;
    }

    return { series, windows };
}

/**
 * Write `distance_km` and `ground_speed` (km/h) series onto the trajectory.
 * Window averages are not computed; use buildGroundSeries for those.
 */
export function applyGroundSeries(traj: Trajectory): GroundSample[] {
    const series = buildGroundSamples(traj.toArray());
    traj.setSeries("distance_km", series.map((s) => s.distanceKm));
    traj.setSeries("ground_speed", series.map((s) => s.groundSpeedKmh));
    return series;
}
