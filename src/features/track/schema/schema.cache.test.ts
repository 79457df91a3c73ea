import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { RoleInferrer } from "../inference/roles.inference";
import { UnsupportedFormat } from "../track.errors";
import type { RoleMap } from "../track.types";
import { SCHEMA_FILE, SchemaCache, cachePathFor } from "./schema.cache";

const CSV = [
    "time,lat,lon,sog",
    "2024-01-01 00:00:00,10.5,20.1,3",
    "2024-01-01 00:00:30,10.6,20.2,4",
    "",
].join("\n");

const ROLES: RoleMap = { timestamp: 0, latitude: 1, longitude: 2, sog: 3 };

let dir: string;
let source: string;

function countingInferrer(roles: RoleMap = ROLES) {
    const inferRoles = vi.fn(async () => ({ ...roles }));
    const inferrer: RoleInferrer = { inferRoles };
    return { inferrer, inferRoles };
}

beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "schema-cache-"));
    source = join(dir, "leg1.csv");
    writeFileSync(source, CSV);
    vi.spyOn(console, "info").mockImplementation(() => {});
});

afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
});

describe("cachePathFor", () => {
    it("is a sibling directory named after the file stem", () => {
        expect(cachePathFor("/data/leg1.csv")).toBe("/data/leg1");
    });
});

describe("SchemaCache", () => {
    it("builds and persists the schema", async () => {
        const { inferrer, inferRoles } = countingInferrer();
        const schema = await new SchemaCache({ inferrer }).loadOrBuild(source);

        expect(inferRoles).toHaveBeenCalledWith(["time", "lat", "lon", "sog"]);
        expect(schema.version).toBe(1);
        expect(schema.filetype).toBe("csv");
        expect(schema.encoding).toBe("utf-8");
        expect(schema.roles).toEqual(ROLES);
        expect(schema.deltaTime).toBe(30);
        expect(schema.ranges.sog).toEqual({ kind: "numeric", min: 3, max: 4 });
        expect(schema.fingerprint.path).toBe(source);

        const file = join(dir, "leg1", SCHEMA_FILE);
        expect(JSON.parse(readFileSync(file, "utf8"))).toEqual(schema);
    });

    it("reuses the cached schema without asking the inferrer again", async () => {
        const { inferrer, inferRoles } = countingInferrer();
        const cache = new SchemaCache({ inferrer });

        const first = await cache.loadOrBuild(source);
        const second = await cache.loadOrBuild(source);

        expect(inferRoles).toHaveBeenCalledTimes(1);
        expect(second).toEqual(first);
    });

    it("writes byte-identical schemas on repeated forced regeneration", async () => {
        const { inferrer, inferRoles } = countingInferrer();
        const cache = new SchemaCache({ inferrer });
        const file = join(dir, "leg1", SCHEMA_FILE);

        await cache.loadOrBuild(source, true);
        const first = readFileSync(file);
        await cache.loadOrBuild(source, true);
        const second = readFileSync(file);

        expect(inferRoles).toHaveBeenCalledTimes(2);
        expect(second.equals(first)).toBe(true);
        expect(console.info).toHaveBeenCalledWith(`Force regeneration: deleting old cache at ${join(dir, "leg1")}`);
    });

    it("rebuilds when the source file changes", async () => {
        const { inferrer, inferRoles } = countingInferrer();
        const cache = new SchemaCache({ inferrer });

        await cache.loadOrBuild(source);
        writeFileSync(source, `${CSV}2024-01-01 00:01:00,10.7,20.3,5\n`);
        const rebuilt = await cache.loadOrBuild(source);

        expect(inferRoles).toHaveBeenCalledTimes(2);
        expect(rebuilt.ranges.sog).toEqual({ kind: "numeric", min: 3, max: 5 });
    });

    it("rebuilds when the encoding changes", async () => {
        const { inferrer, inferRoles } = countingInferrer();

        await new SchemaCache({ inferrer }).loadOrBuild(source);
        const schema = await new SchemaCache({ inferrer, encoding: "latin1" }).loadOrBuild(source);

        expect(inferRoles).toHaveBeenCalledTimes(2);
        expect(schema.encoding).toBe("latin1");
    });

    it("ignores an unreadable cache file", async () => {
        const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
        const { inferrer, inferRoles } = countingInferrer();
        const cache = new SchemaCache({ inferrer });

        await cache.loadOrBuild(source);
        writeFileSync(join(dir, "leg1", SCHEMA_FILE), "{ not json");
        await cache.loadOrBuild(source);

        expect(inferRoles).toHaveBeenCalledTimes(2);
        expect(warn).toHaveBeenCalledWith(`Ignoring unreadable schema cache at ${join(dir, "leg1", SCHEMA_FILE)}`);
    });

    it("rejects unsupported formats before touching the inferrer", async () => {
        const { inferrer, inferRoles } = countingInferrer();
        const txt = join(dir, "notes.txt");
        writeFileSync(txt, "hello");

        await expect(new SchemaCache({ inferrer }).loadOrBuild(txt)).rejects.toThrow(UnsupportedFormat);
        expect(inferRoles).not.toHaveBeenCalled();
    });

    it("clears the cache directory", async () => {
        const { inferrer } = countingInferrer();
        const cache = new SchemaCache({ inferrer });

        await cache.loadOrBuild(source);
        await cache.clear(source);

        expect(existsSync(join(dir, "leg1"))).toBe(false);
    });
});
