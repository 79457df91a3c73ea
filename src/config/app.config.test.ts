import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { fusionConfigStore, getFusionConfig } from "../features/env/fusion/fusion.config.store";
import type { RoleInferrer } from "../features/track/inference/roles.inference";
import { ConfigError } from "../features/track/track.errors";
import {
    DEFAULT_PROMPT_PATH,
    applyFusionSettings,
    createRoleInferrer,
    createSchemaCache,
    loadAppConfig,
    openChunk,
} from "./app.config";

let dir: string;

beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "app-config-"));
});

afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    fusionConfigStore.getState().resetConfig();
    vi.restoreAllMocks();
});

function countingInferrer() {
    const inferRoles = vi.fn(async () => ({ timestamp: 0, latitude: 1, longitude: 2 }));
    const inferrer: RoleInferrer = { inferRoles };
    return { inferrer, inferRoles };
}

function writeLeg(): string {
    const path = join(dir, "leg.csv");
    writeFileSync(path, "time,lat,lon\n2024-01-01 00:00:00,1,2\n2024-01-01 00:01:00,1,2\n");
    return path;
}

describe("loadAppConfig", () => {
    it("falls back to defaults", () => {
        expect(loadAppConfig({})).toEqual({
            encoding: "utf-8",
            forceRegeneration: false,
            useEnvWind: false,
            llm: {
                baseURL: "https://api.deepseek.com/",
                model: "deepseek-chat",
                temperature: 0.1,
                topP: 0.95,
                promptPath: DEFAULT_PROMPT_PATH,
            },
        });
    });

    it("reads TRACK_* variables", () => {
        const config = loadAppConfig({
            TRACK_ENCODING: "gbk",
            TRACK_FORCE_REGENERATION: "1",
            TRACK_USE_ENV_WIND: "yes",
            TRACK_LLM_BASE_URL: "https://llm.test/v1",
            TRACK_LLM_MODEL: "test-model",
            TRACK_LLM_TEMPERATURE: "0.3",
            TRACK_LLM_API_KEY: "test-secret",
        });

        expect(config.encoding).toBe("gbk");
        expect(config.forceRegeneration).toBe(true);
        expect(config.useEnvWind).toBe(true);
        expect(config.llm).toMatchObject({
            baseURL: "https://llm.test/v1",
            model: "test-model",
            temperature: 0.3,
            apiKey: "test-secret",
        });
    });

    it("layers the environment over the config file", () => {
        const path = join(dir, "track.json");
        writeFileSync(path, JSON.stringify({ encoding: "latin1", useEnvWind: true, llm: { model: "file-model" } }));

        const config = loadAppConfig({ TRACK_CONFIG: path, TRACK_ENCODING: "utf-16le" });

        expect(config.encoding).toBe("utf-16le");
        expect(config.useEnvWind).toBe(true);
        expect(config.llm.model).toBe("file-model");
        expect(config.llm.topP).toBe(0.95);
    });

    it("rejects malformed values", () => {
        expect(() => loadAppConfig({ TRACK_USE_ENV_WIND: "maybe" })).toThrow(
            'TRACK_USE_ENV_WIND must be a boolean, got "maybe"'
        );
        expect(() => loadAppConfig({ TRACK_LLM_TEMPERATURE: "hot" })).toThrow(ConfigError);
        expect(() => loadAppConfig({ TRACK_LLM_TEMPERATURE: "5" })).toThrow(/^Invalid configuration at llm\.temperature/);
        expect(() => loadAppConfig({ TRACK_LLM_BASE_URL: "not a url" })).toThrow(ConfigError);
    });

    it("rejects unreadable config files", () => {
        const broken = join(dir, "broken.json");
        writeFileSync(broken, "{");
        expect(() => loadAppConfig({}, broken)).toThrow(ConfigError);

        const list = join(dir, "list.json");
        writeFileSync(list, "[]");
        expect(() => loadAppConfig({}, list)).toThrow(`Config file ${list} must hold a JSON object`);

        expect(() => loadAppConfig({}, join(dir, "missing.json"))).toThrow(ConfigError);
    });
});

describe("createRoleInferrer", () => {
    it("sends the headers with the bundled prompt", async () => {
        const fetchMock = vi.fn(async (_url: string, _init: RequestInit) =>
            new Response(
                JSON.stringify({
                    choices: [{ message: { role: "assistant", content: '{"timestamp": 0, "latitude": 1, "longitude": 2}' } }],
                }),
                { status: 200 }
            )
        );
        vi.stubGlobal("fetch", fetchMock);

        const inferrer = createRoleInferrer(loadAppConfig({ TRACK_LLM_API_KEY: "test-secret" }));
        const roles = await inferrer.inferRoles(["Time", "Lat", "Lon"]);

        expect(roles).toEqual({ timestamp: 0, latitude: 1, longitude: 2 });
        const body = JSON.parse(String(fetchMock.mock.calls[0][1].body));
        expect(body.messages[0].content.startsWith('["Time","Lat","Lon"]<<The list above holds')).toBe(true);
        expect(fetchMock.mock.calls[0][0]).toBe("https://api.deepseek.com/chat/completions");
    });

    it("fails when the prompt template is missing", () => {
        const config = loadAppConfig({ TRACK_PROMPT_PATH: join(dir, "nope.txt") });
        expect(() => createRoleInferrer(config)).toThrow(ConfigError);
    });
});

describe("configured pipeline", () => {
    it("builds the schema cache with the configured encoding", () => {
        const { inferrer } = countingInferrer();
        const cache = createSchemaCache(loadAppConfig({ TRACK_ENCODING: "latin1" }), inferrer);

        expect(cache.encoding).toBe("latin1");
    });

    it("applies the wind flag to the fusion config", () => {
        applyFusionSettings(loadAppConfig({ TRACK_USE_ENV_WIND: "true" }));
        expect(getFusionConfig().useEnvWind).toBe(true);

        applyFusionSettings(loadAppConfig({}));
        expect(getFusionConfig().useEnvWind).toBe(false);
    });

    it("reuses the cached schema unless regeneration is forced", async () => {
        const path = writeLeg();
        const config = loadAppConfig({});
        const { inferrer, inferRoles } = countingInferrer();
        const cache = createSchemaCache(config, inferrer);

        await openChunk(path, config, { cache });
        const chunk = await openChunk(path, config, { cache, range: { start: 1 } });

        expect(inferRoles).toHaveBeenCalledTimes(1);
        expect(chunk.length).toBe(1);
        expect(chunk.encoding).toBe("utf-8");
    });

    it("regenerates on every open when forced", async () => {
        const info = vi.spyOn(console, "info").mockImplementation(() => {});
        const path = writeLeg();
        const config = loadAppConfig({ TRACK_FORCE_REGENERATION: "1" });
        const { inferrer, inferRoles } = countingInferrer();
        const cache = createSchemaCache(config, inferrer);

        await openChunk(path, config, { cache });
        await openChunk(path, config, { cache });

        expect(inferRoles).toHaveBeenCalledTimes(2);
        expect(info).toHaveBeenCalledWith(`Force regeneration: deleting old cache at ${join(dir, "leg")}`);
    });
});
