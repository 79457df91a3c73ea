// src/features/track/schema/schema.cache.ts
import { mkdir, readFile, rm, stat, writeFile } from "node:fs/promises";
import { dirname, join, parse, resolve } from "node:path";
import type { RoleInferrer } from "../inference/roles.inference";
import { DEFAULT_ENCODING, detectFileType, readTable } from "../source/table.source";
import { deriveRanges, deriveTimeStep } from "./schema.ranges";
import { SCHEMA_VERSION, SchemaDocumentSchema, type Fingerprint, type Schema } from "./schema.types";

export const SCHEMA_FILE = "schema.json";

export type SchemaCacheOptions = {
    inferrer: RoleInferrer;
    /** Text encoding used to read CSV sources */
    encoding?: string;
};

/**
 * Cache directory for a source: a sibling directory named after the file stem.
 * `data/leg1.csv` -> `data/leg1/`
 */
export function cachePathFor(sourcePath: string): string {
    const abs = resolve(sourcePath);
    return join(dirname(abs), parse(abs).name);
}

export async function fingerprintOf(sourcePath: string): Promise<Fingerprint> {
    const abs = resolve(sourcePath);
    const s = await stat(abs);
    return { path: abs, size: s.size, mtimeMs: s.mtimeMs };
}

export function serializeSchema(schema: Schema): string {
    return `${JSON.stringify(schema, null, 2)}\n`;
}

/**
 * Per-source schema cache.
 *
 * No locking: two callers regenerating the same source at once is undefined,
 * callers must serialize access per path.
 */
export class SchemaCache {
    constructor(private readonly options: SchemaCacheOptions) {}

    get encoding(): string {
        return this.options.encoding ?? DEFAULT_ENCODING;
    }

    async loadOrBuild(sourcePath: string, forceRegeneration = false): Promise<Schema> {
        const filetype = detectFileType(sourcePath);
        const fingerprint = await fingerprintOf(sourcePath);
        const dir = cachePathFor(sourcePath);

        if (!forceRegeneration) {
            const cached = await this.readCached(dir, fingerprint);
            if (cached) return cached;
        } else {
            console.info(`Force regeneration: deleting old cache at ${dir}`);
        }

        await rm(dir, { recursive: true, force: true });
        await mkdir(dir, { recursive: true });

        const table = readTable(fingerprint.path, { encoding: this.encoding });
        const roles = await this.options.inferrer.inferRoles(table.headers);

        const schema: Schema = {
            version: SCHEMA_VERSION,
            filetype,
            fingerprint,
            encoding: this.encoding,
            roles,
            deltaTime: deriveTimeStep(table, roles),
            ranges: deriveRanges(table, roles),
        };

        await writeFile(join(dir, SCHEMA_FILE), serializeSchema(schema), "utf8");
        return schema;
    }

    async clear(sourcePath: string): Promise<void> {
        await rm(cachePathFor(sourcePath), { recursive: true, force: true });
    }

    /** The cached schema, or null when it is missing, invalid or stale. */
    private async readCached(dir: string, fingerprint: Fingerprint): Promise<Schema | null> {
        const file = join(dir, SCHEMA_FILE);

        let text: string;
        try {
            text = await readFile(file, "utf8");
        } catch (e) {
            if (isNotFound(e)) return null;
            throw e;
        }

        let json: unknown;
        try {
            json = JSON.parse(text);
        } catch {
            console.warn(`Ignoring unreadable schema cache at ${file}`);
            return null;
        }

        const parsed = SchemaDocumentSchema.safeParse(json);
        if (!parsed.success) {
            console.warn(`Ignoring invalid schema cache at ${file}: ${parsed.error.issues[0]?.message ?? "unknown issue"}`);
            return null;
        }

        const schema = parsed.data;
        const same =
            schema.fingerprint.path === fingerprint.path &&
            schema.fingerprint.size === fingerprint.size &&
            schema.fingerprint.mtimeMs === fingerprint.mtimeMs &&
            schema.encoding === this.encoding;

        if (!same) {
            console.info(`Source changed since ${file} was written, rebuilding`);
            return null;
        }
        return schema;
    }
}

function isNotFound(e: unknown): boolean {
    return e instanceof Error && "code" in e && e.code === "ENOENT";
}
