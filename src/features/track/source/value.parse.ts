import type { FieldValue, Instant, RawValue } from "../track.types";

// YYYY-MM-DD or YYYY/MM/DD, optional HH:MM[:SS[.fff]], no zone => UTC
const NAIVE_DATE_TIME =
    /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?:[ T](\d{1,2}):(\d{2})(?::(\d{2})(\.\d+)?)?)?$/;

const NUMERIC = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

/**
 * Parse a raw cell into an Instant.
 *
 * - Date cells keep their time.
 * - Numbers (and numeric strings) are read as epoch milliseconds.
 * - Timestamps without a zone are read as UTC.
 * - Anything else goes through Date.parse; failures give null.
 */
export function parseInstant(raw: RawValue): Instant | null {
    if (raw === null || typeof raw === "boolean") return null;

    if (raw instanceof Date) {
        const t = raw.getTime();
        return Number.isFinite(t) ? t : null;
    }

    if (typeof raw === "number") return Number.isFinite(raw) ? raw : null;

    const s = raw.trim();
    if (!s) return null;

    if (NUMERIC.test(s)) {
        const n = Number(s);
        return Number.isFinite(n) ? n : null;
    }

    const m = NAIVE_DATE_TIME.exec(s);
    if (m) {
        const [, y, mo, d, hh = "0", mm = "0", ss = "0", frac = ""] = m;
        const ms = frac ? Math.round(Number(frac) * 1000) : 0;
        const t = Date.UTC(Number(y), Number(mo) - 1, Number(d), Number(hh), Number(mm), Number(ss), ms);
        return Number.isFinite(t) ? t : null;
    }

    const t = Date.parse(s);
    return Number.isFinite(t) ? t : null;
}

export function formatInstant(t: Instant): string {
    return new Date(t).toISOString();
}

/**
 * Numeric reading of a raw cell; null when the cell holds no number.
 */
export function toNumber(raw: RawValue): FieldValue {
    if (raw === null || typeof raw === "boolean") return null;
    if (raw instanceof Date) {
        const t = raw.getTime();
        return Number.isFinite(t) ? t : null;
    }
    if (typeof raw === "number") return Number.isFinite(raw) ? raw : null;

    const s = raw.trim();
    if (!s || !NUMERIC.test(s)) return null;
    const n = Number(s);
    return Number.isFinite(n) ? n : null;
}

/**
 * Typed value of a role: Instant for `timestamp`, number for everything else.
 */
export function toFieldValue(role: string, raw: RawValue): FieldValue {
    return role === "timestamp" ? parseInstant(raw) : toNumber(raw);
}
