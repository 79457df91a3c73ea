import { InterpolationOutOfDomain } from "../../track/track.errors";
import type { Maybe } from "../geo/geo.math";
import type { GridDataset, SamplePoint } from "./grid.types";

/** Lower/upper node index and the weight of the upper node. */
export type Bracket = {
    i0: number;
    i1: number;
    w: number;
};

/**
 * Find the two nodes around x on a monotonic axis.
 * Null when x is outside the axis (or NaN). A value on a node gives a single-node bracket.
 */
export function bracket(axis: readonly number[], x: number): Bracket | null {
    const n = axis.length;
    if (n === 0 || !Number.isFinite(x)) return null;
    if (n === 1) return x === axis[0] ? { i0: 0, i1: 0, w: 0 } : null;

    const ascending = axis[n - 1] >= axis[0];
    const lo = ascending ? axis[0] : axis[n - 1];
    const hi = ascending ? axis[n - 1] : axis[0];
    if (x < lo || x > hi) return null;

    // largest i with axis[i] on the "before" side of x
    let a = 0;
    let b = n - 1;
    while (b - a > 1) {
        const mid = (a + b) >> 1;
        const before = ascending ? axis[mid] <= x : axis[mid] >= x;
        if (before) a = mid;
        else b = mid;
    }

    if (axis[a] === x) return { i0: a, i1: a, w: 0 };
    if (axis[b] === x) return { i0: b, i1: b, w: 0 };

    const span = axis[b] - axis[a];
    if (span === 0) return { i0: a, i1: a, w: 0 };
    return { i0: a, i1: b, w: (x - axis[a]) / span };
}

/**
 * Longitude bracket that also tries the sample shifted by ±360°,
 * so a -180..180 track can sample a 0..360 grid.
 */
export function bracketLongitude(axis: readonly number[], lon: number): Bracket | null {
    return bracket(axis, lon) ?? bracket(axis, lon + 360) ?? bracket(axis, lon - 360);
}

/**
 * Trilinear (time × latitude × longitude) interpolation of one variable.
 * Null outside the grid, or when a node that carries weight is missing.
 */
export function interpolate(ds: GridDataset, variable: string, p: SamplePoint): Maybe {
    const bt = bracket(ds.axes.time, p.time);
    const bl = bracket(ds.axes.latitude, p.latitude);
    const bn = bracketLongitude(ds.axes.longitude, p.longitude);
    if (!bt || !bl || !bn) return null;

    let sum = 0;
    for (const [ti, wt] of corners(bt)) {
        for (const [li, wl] of corners(bl)) {
            for (const [lj, wn] of corners(bn)) {
                const w = wt * wl * wn;
                if (w === 0) continue;
                const v = ds.valueAt(variable, ti, li, lj);
                if (v === null) return null;
                sum += w * v;
            }
        }
    }
    return sum;
}

/** Bulk version; one value per sample, in order. */
export function interpolateMany(ds: GridDataset, variable: string, samples: readonly SamplePoint[]): Maybe[] {
    return samples.map((p) => interpolate(ds, variable, p));
}

/**
 * Single-sample lookup that refuses to extrapolate: throws InterpolationOutOfDomain
 * where `interpolate` would return null because the sample is off the grid.
 * A missing node value inside the grid still gives null.
 */
export function interpolateStrict(ds: GridDataset, variable: string, p: SamplePoint): Maybe {
    if (!bracket(ds.axes.time, p.time)) {
        throw new InterpolationOutOfDomain(variable, `time ${p.time} is outside the "${variable}" grid`);
    }
    if (!bracket(ds.axes.latitude, p.latitude)) {
        throw new InterpolationOutOfDomain(variable, `latitude ${p.latitude} is outside the "${variable}" grid`);
    }
    if (!bracketLongitude(ds.axes.longitude, p.longitude)) {
        throw new InterpolationOutOfDomain(variable, `longitude ${p.longitude} is outside the "${variable}" grid`);
    }
    return interpolate(ds, variable, p);
}

function corners(b: Bracket): Array<[number, number]> {
    if (b.i0 === b.i1) return [[b.i0, 1]];
    return [
        [b.i0, 1 - b.w],
        [b.i1, b.w],
    ];
}
