import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SchemaError, TrackError, UnknownField } from "../../track/track.errors";
import { InMemoryGrid, gridInitFromFile, inMemoryGridSource, jsonGridSource, withGrid } from "./grid.source";
import type { GridInit } from "./grid.types";

const T0 = Date.UTC(2024, 0, 1);

const init: GridInit = {
    axes: { latitude: [0, 1], longitude: [10, 11, 12], time: [T0] },
    variables: { u10: [1, 2, 3, 4, 5, Number.NaN] },
};

let dir: string;

beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "grid-source-"));
});

afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
});

describe("InMemoryGrid", () => {
    it("indexes [time][latitude][longitude]", () => {
        const grid = new InMemoryGrid(init);

        expect(grid.variables()).toEqual(["u10"]);
        expect(grid.has("u10")).toBe(true);
        expect(grid.valueAt("u10", 0, 0, 2)).toBe(3);
        expect(grid.valueAt("u10", 0, 1, 0)).toBe(4);
        expect(grid.valueAt("u10", 0, 1, 2)).toBeNull();
    });

    it("checks variable sizes against the axes", () => {
        expect(() => new InMemoryGrid({ ...init, variables: { u10: [1, 2] } })).toThrow(
            'Grid variable "u10" has 2 values, expected 6'
        );
    });

    it("rejects unknown variables and reads after close", () => {
        const grid = new InMemoryGrid(init);
        expect(() => grid.valueAt("v10", 0, 0, 0)).toThrow(UnknownField);

        grid.close();
        expect(grid.isClosed).toBe(true);
        try {
            grid.valueAt("u10", 0, 0, 0);
            expect.unreachable();
        } catch (e) {
            expect(e).toBeInstanceOf(TrackError);
            if (e instanceof TrackError) expect(e.code).toBe("GRID_CLOSED");
        }
    });
});

describe("withGrid", () => {
    it("closes the handle when the callback returns", () => {
        const grid = new InMemoryGrid(init);
        const value = withGrid({ name: "test", open: () => grid }, (ds) => ds.valueAt("u10", 0, 0, 0));

        expect(value).toBe(1);
        expect(grid.isClosed).toBe(true);
    });

    it("closes the handle when the callback throws", () => {
        const grid = new InMemoryGrid(init);

        expect(() =>
            withGrid({ name: "test", open: () => grid }, () => {
                throw new Error("boom");
            })
        ).toThrow("boom");
        expect(grid.isClosed).toBe(true);
    });

    it("opens a fresh handle per call", () => {
        const source = inMemoryGridSource("mem", init);

        withGrid(source, (ds) => ds.close());
        expect(withGrid(source, (ds) => ds.valueAt("u10", 0, 0, 1))).toBe(2);
    });
});

describe("JSON grid files", () => {
    const file = {
        latitude: [0, 1],
        longitude: [10, 11],
        time: ["2024-01-01T00:00:00Z", "2024-01-01T01:00:00Z"],
        variables: {
            u10: [
                [
                    [1, 2],
                    [3, null],
                ],
                [
                    [5, 6],
                    [7, 8],
                ],
            ],
        },
    };

    it("loads and flattens a grid", () => {
        const path = join(dir, "wind.json");
        writeFileSync(path, JSON.stringify(file));

        const source = jsonGridSource(path);
        expect(source.name).toBe("wind.json");

        withGrid(source, (ds) => {
            expect(ds.axes.time).toEqual([T0, T0 + 3_600_000]);
            expect(ds.valueAt("u10", 1, 0, 1)).toBe(6);
            expect(ds.valueAt("u10", 0, 1, 1)).toBeNull();
        });
    });

    it("rejects a cube that does not match the axes", () => {
        const bad = { ...file, variables: { u10: [[[1, 2]]] } };
        expect(() => gridInitFromFile(bad, "bad.json")).toThrow(
            'bad.json: variable "u10" has 1 entries along time, expected 2'
        );
    });

    it("rejects unparseable times", () => {
        expect(() => gridInitFromFile({ ...file, time: ["later", "2024-01-01"] }, "bad.json")).toThrow(SchemaError);
    });

    it("rejects files that are not grids", () => {
        const notJson = join(dir, "broken.json");
        writeFileSync(notJson, "{");
        expect(() => jsonGridSource(notJson).open()).toThrow(SchemaError);

        const wrongShape = join(dir, "shape.json");
        writeFileSync(wrongShape, JSON.stringify({ latitude: [] }));
        expect(() => jsonGridSource(wrongShape).open()).toThrow(SchemaError);
    });
});
