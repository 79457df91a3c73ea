import { describe, expect, it } from "vitest";
import {
    angleDiffDeg,
    apparentWind,
    compassBearing,
    displace,
    displacementBetween,
    haversineKm,
    vectorAngle,
    vectorSpeed,
} from "./geo.math";

describe("displace", () => {
    it("is the identity for a zero offset", () => {
        expect(displace(54.3, 10.1, 0, 0)).toEqual({ latitude: 54.3, longitude: 10.1 });
    });

    it("moves along one axis at a time", () => {
        const north = displace(54.3, 10.1, 0, 500);
        expect(north.longitude).toBe(10.1);
        expect(north.latitude).toBeGreaterThan(54.3);

        const west = displace(54.3, 10.1, -500, 0);
        expect(west.latitude).toBe(54.3);
        expect(west.longitude).toBeLessThan(10.1);
    });

    it("scales linearly with the offset", () => {
        const one = displace(54.3, 10.1, 120, -80);
        const two = displace(54.3, 10.1, 240, -160);

        expect(two.latitude - 54.3).toBeCloseTo(2 * (one.latitude - 54.3), 12);
        expect(two.longitude - 10.1).toBeCloseTo(2 * (one.longitude - 10.1), 12);
    });

    it("moves one degree of latitude per R·π/180 meters", () => {
        expect(displace(0, 0, 0, (6371000 * Math.PI) / 180).latitude).toBeCloseTo(1, 12);
    });

    it("is inverted by displacementBetween", () => {
        const to = displace(54.3, 10.1, 300, -200);
        const { dx, dy } = displacementBetween(54.3, 10.1, to.latitude, to.longitude);

        expect(dx).toBeCloseTo(300, 6);
        expect(dy).toBeCloseTo(-200, 6);
    });
});

describe("haversineKm", () => {
    it("measures one degree on the equator", () => {
        expect(haversineKm(0, 0, 0, 1)).toBeCloseTo(111.19492664, 6);
        expect(haversineKm(10, 10, 10, 10)).toBe(0);
    });
});

describe("vector helpers", () => {
    it("computes speed and signed angle", () => {
        expect(vectorSpeed(3, 4)).toBe(5);
        expect(vectorAngle(0, 1)).toBeCloseTo(90);
        expect(vectorAngle(-1, 0)).toBeCloseTo(180);
    });

    it("propagates missing components", () => {
        expect(vectorSpeed(null, 4)).toBeNull();
        expect(vectorAngle(3, null)).toBeNull();
    });
});

describe("compassBearing", () => {
    it("resolves the cardinal directions", () => {
        expect(compassBearing(0, 1)).toBe(0);
        expect(compassBearing(1, 0)).toBe(90);
        expect(compassBearing(0, -1)).toBe(180);
        expect(compassBearing(-1, 0)).toBe(270);
    });

    it("corrects per quadrant", () => {
        expect(compassBearing(1, 1)).toBeCloseTo(45);
        expect(compassBearing(1, -1)).toBeCloseTo(135);
        expect(compassBearing(-1, -1)).toBeCloseTo(225);
        expect(compassBearing(-1, 1)).toBeCloseTo(315);
    });

    it("has no bearing at the origin or for missing components", () => {
        expect(compassBearing(0, 0)).toBeNull();
        expect(compassBearing(null, 1)).toBeNull();
        expect(compassBearing(Number.NaN, 1)).toBeNull();
    });
});

describe("apparentWind", () => {
    it("returns c = -(boat + wind) and the sail angle", () => {
        const still = apparentWind(1, 0, 0, 0);
        expect(still).toEqual({ u: -1, v: -0, speed: 1, phiOmega: 0 });

        const tail = apparentWind(1, 0, -2, 0);
        expect(tail?.u).toBe(1);
        expect(tail?.phiOmega).toBeCloseTo(Math.PI);

        const beam = apparentWind(1, 0, 0, 3);
        expect(beam?.speed).toBeCloseTo(Math.hypot(1, 3));
        expect(beam?.phiOmega).toBeCloseTo(Math.PI - Math.acos(-1 / Math.hypot(1, 3)));
    });

    it("is null for a zero-length vector or a missing input", () => {
        expect(apparentWind(0, 0, 1, 1)).toBeNull();
        expect(apparentWind(1, 0, -1, 0)).toBeNull();
        expect(apparentWind(1, null, 1, 1)).toBeNull();
    });
});

describe("angleDiffDeg", () => {
    it("returns the smallest difference", () => {
        expect(angleDiffDeg(350, 10)).toBe(20);
        expect(angleDiffDeg(10, 350)).toBe(20);
        expect(angleDiffDeg(0, 180)).toBe(180);
    });
});
