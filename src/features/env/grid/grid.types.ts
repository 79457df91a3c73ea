import type { Instant } from "../../track/track.types";

/**
 * Rectilinear axes. Each axis may be ascending or descending and irregularly spaced.
 */
export type GridAxes = {
    latitude: readonly number[];
    longitude: readonly number[];
    /** Epoch milliseconds */
    time: readonly Instant[];
};

/** Where to sample a grid. */
export type SamplePoint = {
    latitude: number;
    longitude: number;
    time: Instant;
};

/**
 * An open, read-only gridded dataset. Values are indexed [time][latitude][longitude].
 * Handles are scoped: close them when the operation that opened them is done.
 */
export interface GridDataset {
    readonly axes: GridAxes;
    variables(): string[];
    has(variable: string): boolean;
    /** Node value, null for a missing value */
    valueAt(variable: string, ti: number, li: number, lj: number): number | null;
    close(): void;
}

/** Opens a dataset on demand, once per import call. */
export interface GridSource {
    readonly name: string;
    open(): GridDataset;
}

/** In-memory layout: flattened [time][latitude][longitude], NaN for missing. */
export type GridInit = {
    axes: GridAxes;
    variables: Record<string, Float64Array | readonly number[]>;
};
