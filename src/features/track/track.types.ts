// Shared value types for tabular sources, points and trajectories

/** Milliseconds since the Unix epoch (UTC). */
export type Instant = number;

/**
 * One cell as the table readers hand it out.
 * CSV cells are strings (empty cells are null); spreadsheets may also yield numbers, booleans and dates.
 */
export type RawValue = string | number | boolean | Date | null;

/**
 * Typed value stored on a point or in a trajectory series.
 * Timestamps are stored as Instant; unparseable or clipped readings are null.
 */
export type FieldValue = number | null;

/** Column identifier: 0-based index or header text. */
export type ColumnRef = number | string;

/** Role name -> column. A null column means the role was recognised but has no column. */
export type RoleMap = Record<string, ColumnRef | null>;

export const CORE_ROLES = ["latitude", "longitude", "timestamp"] as const;

export type CoreRole = (typeof CORE_ROLES)[number];

export function isCoreRole(role: string): role is CoreRole {
    return CORE_ROLES.some((r) => r === role);
}

/** Row restriction [start, end). `end` defaults to the end of the file. */
export type RowRange = {
    start: number;
    end?: number;
};

/** Maps a raw reading to itself, or to null when it is physically invalid. */
export type ClipFn = (value: RawValue) => RawValue;

export type ClipMap = Partial<Record<string, ClipFn>>;

/** Progress observer for long bulk operations. Has no effect on results. */
export type ProgressFn = (done: number, total: number) => void;
