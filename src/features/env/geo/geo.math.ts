// Geodesy + wind vector helpers.
// Keep this file pure (no I/O, no trajectory types).

/** Spherical Earth radius in meters. */
export const EARTH_RADIUS_M = 6371000;

/** Value that may be missing (outside a grid, clipped, unparseable). */
export type Maybe = number | null;

export function clamp(n: number, min: number, max: number) {
    return Math.min(max, Math.max(min, n));
}

export function deg2rad(d: number) {
    return (d * Math.PI) / 180;
}

export function rad2deg(r: number) {
    return (r * 180) / Math.PI;
}

/**
 * Move a position by an east/north offset in meters.
 *
 * Local tangent-plane approximation: fine for displacements that are small
 * against the Earth radius, unstable near the poles (cos(lat) -> 0).
 */
export function displace(
    lat: number,
    lon: number,
    dxEastM: number,
    dyNorthM: number
): { latitude: number; longitude: number } {
    const dLat = rad2deg(dyNorthM / EARTH_RADIUS_M);
    const dLon = rad2deg(dxEastM / (EARTH_RADIUS_M * Math.cos(deg2rad(lat))));
    return { latitude: lat + dLat, longitude: lon + dLon };
}

/**
 * Inverse of `displace`: east/north offset (meters) from one position to another,
 * using the start latitude for the east scale.
 */
export function displacementBetween(
    fromLat: number,
    fromLon: number,
    toLat: number,
    toLon: number
): { dx: number; dy: number } {
    const dy = deg2rad(toLat - fromLat) * EARTH_RADIUS_M;
    const dx = deg2rad(toLon - fromLon) * EARTH_RADIUS_M * Math.cos(deg2rad(fromLat));
    return { dx, dy };
}

/**
 * Haversine distance between two lat/lon points in kilometers.
 */
export function haversineKm(lat1: number, lon1: number, lat2: number, lon2: number): number {
    const dLat = deg2rad(lat2 - lat1);
    const dLon = deg2rad(lon2 - lon1);

    const a =
        Math.sin(dLat / 2) ** 2 +
        Math.cos(deg2rad(lat1)) *
        Math.cos(deg2rad(lat2)) *
        Math.sin(dLon / 2) ** 2;

    return 2 * (EARTH_RADIUS_M / 1000) * Math.asin(Math.sqrt(a));
}

/** sqrt(u² + v²), null-propagating. */
export function vectorSpeed(u: Maybe, v: Maybe): Maybe {
    if (u === null || v === null) return null;
    return Math.hypot(u, v);
}

/**
 * atan2(v, u) in degrees: signed, counter-clockwise from east.
 * Not a compass bearing; see `compassBearing`.
 */
export function vectorAngle(u: Maybe, v: Maybe): Maybe {
    if (u === null || v === null) return null;
    return rad2deg(Math.atan2(v, u));
}

/**
 * Compass bearing of an (east, north) vector: 0° = North, 90° = East, clockwise.
 * Components that are exactly zero resolve to the cardinal directions;
 * the zero vector has no bearing.
 */
export function compassBearing(east: Maybe, north: Maybe): Maybe {
    if (east === null || north === null) return null;
    if (!Number.isFinite(east) || !Number.isFinite(north)) return null;

    if (east === 0 && north === 0) return null;
    if (east === 0) return north > 0 ? 0 : 180;
    if (north === 0) return east > 0 ? 90 : 270;

    const θ = rad2deg(Math.atan(Math.abs(east) / Math.abs(north)));
    if (east > 0 && north > 0) return θ;
    if (east > 0) return 180 - θ;
    if (north < 0) return 180 + θ;
    return 360 - θ;
}

export type ApparentWind = {
    /** East component of the apparent-wind vector c = -(boat + wind) */
    u: number;
    /** North component */
    v: number;
    speed: number;
    /** Sail-relative angle π - ∠(boat, c), radians */
    phiOmega: number;
};

/**
 * Apparent-wind triangle from the boat velocity and the true wind (both east/north, m/s).
 * Null when an input is missing or either the boat vector or c has zero length.
 */
export function apparentWind(boatU: Maybe, boatV: Maybe, windU: Maybe, windV: Maybe): ApparentWind | null {
    if (boatU === null || boatV === null || windU === null || windV === null) return null;

    const cu = -(boatU + windU);
    const cv = -(boatV + windV);

    const boatLen = Math.hypot(boatU, boatV);
    const cLen = Math.hypot(cu, cv);
    if (boatLen <= 1e-9 || cLen <= 1e-9) return null;

    const cosθ = clamp((boatU * cu + boatV * cv) / (boatLen * cLen), -1, 1);

    return {
        u: cu,
        v: cv,
        speed: cLen,
        phiOmega: Math.PI - Math.acos(cosθ),
    };
}

/**
 * Smallest absolute angular difference (0..180).
 */
export function angleDiffDeg(a: number, b: number) {
    const d = Math.abs(((a - b + 540) % 360) - 180);
    return d;
}
