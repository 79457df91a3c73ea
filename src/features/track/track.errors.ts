// src/features/track/track.errors.ts

export type TrackErrorCode =
    | "UNSUPPORTED_FORMAT"
    | "SCHEMA_ERROR"
    | "UNKNOWN_FIELD"
    | "INDEX_OUT_OF_RANGE"
    | "INVALID_INDEX"
    | "CONFLICTING_INITIALIZATION"
    | "INTERPOLATION_OUT_OF_DOMAIN"
    | "ROLE_INFERENCE"
    | "IMMUTABLE_FIELD"
    | "FIELD_CONFLICT"
    | "SERIES_LENGTH"
    | "GRID_CLOSED"
    | "NOT_LOADED"
    | "CONFIG";

/**
 * Base class for every error the track/fusion core throws.
 * `code` is stable and meant for programmatic checks.
 */
export class TrackError extends Error {
    public readonly code: TrackErrorCode;

    constructor(message: string, code: TrackErrorCode) {
        super(message);
        this.name = "TrackError";
        this.code = code;
    }
}

export class UnsupportedFormat extends TrackError {
    constructor(public readonly path: string, public readonly extension: string) {
        super(`Unsupported file type "${extension}" for ${path}`, "UNSUPPORTED_FORMAT");
        this.name = "UnsupportedFormat";
    }
}

export class SchemaError extends TrackError {
    constructor(message: string) {
        super(message, "SCHEMA_ERROR");
        this.name = "SchemaError";
    }
}

export class UnknownField extends TrackError {
    constructor(public readonly field: string, message = `Unknown field "${field}"`) {
        super(message, "UNKNOWN_FIELD");
        this.name = "UnknownField";
    }
}

export class IndexOutOfRange extends TrackError {
    constructor(public readonly index: number, public readonly length: number) {
        super(`Index ${index} is outside [0, ${length})`, "INDEX_OUT_OF_RANGE");
        this.name = "IndexOutOfRange";
    }
}

export class InvalidIndex extends TrackError {
    constructor(message: string) {
        super(message, "INVALID_INDEX");
        this.name = "InvalidIndex";
    }
}

export class ConflictingInitialization extends TrackError {
    constructor(message = "Pass either points or a chunk, not both") {
        super(message, "CONFLICTING_INITIALIZATION");
        this.name = "ConflictingInitialization";
    }
}

/**
 * Not thrown by bulk imports: a sample outside the grid becomes `null`.
 * Thrown only by the strict single-sample lookup.
 */
export class InterpolationOutOfDomain extends TrackError {
    constructor(public readonly variable: string, message = `Sample is outside the "${variable}" grid`) {
        super(message, "INTERPOLATION_OUT_OF_DOMAIN");
        this.name = "InterpolationOutOfDomain";
    }
}

export class RoleInferenceError extends TrackError {
    constructor(message: string) {
        super(message, "ROLE_INFERENCE");
        this.name = "RoleInferenceError";
    }
}

export class ConfigError extends TrackError {
    constructor(message: string) {
        super(message, "CONFIG");
        this.name = "ConfigError";
    }
}

export class ImmutableField extends TrackError {
    constructor(public readonly field: string) {
        super(`Field "${field}" is part of the point's position/time and cannot change`, "IMMUTABLE_FIELD");
        this.name = "ImmutableField";
    }
}

export class FieldConflict extends TrackError {
    constructor(public readonly field: string, message = `Field "${field}" is already a sensor column`) {
        super(message, "FIELD_CONFLICT");
        this.name = "FieldConflict";
    }
}
