import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { fusionConfigStore } from "../features/env/fusion/fusion.config.store";
import { DataChunk, type DataChunkOptions } from "../features/track/chunk/data.chunk";
import { createChatCompletion } from "../features/track/inference/chat.client";
import { PromptRoleInferrer, type RoleInferrer } from "../features/track/inference/roles.inference";
import { SchemaCache } from "../features/track/schema/schema.cache";
import { DEFAULT_ENCODING } from "../features/track/source/table.source";
import { ConfigError } from "../features/track/track.errors";

export const DEFAULT_PROMPT_PATH = fileURLToPath(new URL("../../prompts/header_roles.txt", import.meta.url));

export const LlmConfigSchema = z.object({
    baseURL: z.string().url().default("https://api.deepseek.com/"),
    model: z.string().min(1).default("deepseek-chat"),
    temperature: z.number().min(0).max(2).default(0.1),
    topP: z.number().gt(0).max(1).default(0.95),
    apiKey: z.string().min(1).optional(),
    promptPath: z.string().min(1).default(DEFAULT_PROMPT_PATH),
});

export const AppConfigSchema = z.object({
    /** CSV text encoding, e.g. "utf-8" or "gbk" */
    encoding: z.string().min(1).default(DEFAULT_ENCODING),
    forceRegeneration: z.boolean().default(false),
    useEnvWind: z.boolean().default(false),
    llm: LlmConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type LlmConfig = z.infer<typeof LlmConfigSchema>;

type Env = Record<string, string | undefined>;

function parseBool(name: string, v: string): boolean {
    const s = v.trim().toLowerCase();
    if (["1", "true", "yes", "on"].includes(s)) return true;
    if (["0", "false", "no", "off", ""].includes(s)) return false;
    throw new ConfigError(`${name} must be a boolean, got "${v}"`);
}

function parseNum(name: string, v: string): number {
    const n = Number(v);
    if (!Number.isFinite(n)) throw new ConfigError(`${name} must be a number, got "${v}"`);
    return n;
}

function readConfigFile(path: string): Record<string, unknown> {
    let json: unknown;
    try {
        json = JSON.parse(readFileSync(path, "utf8"));
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new ConfigError(`Cannot read config file ${path}: ${reason}`);
    }
    if (typeof json !== "object" || json === null || Array.isArray(json)) {
        throw new ConfigError(`Config file ${path} must hold a JSON object`);
    }
    return Object.fromEntries(Object.entries(json));
}

function asRecord(v: unknown): Record<string, unknown> {
    return typeof v === "object" && v !== null && !Array.isArray(v) ? Object.fromEntries(Object.entries(v)) : {};
}

/**
 * Runtime configuration: defaults, then the JSON file (`configPath` or TRACK_CONFIG),
 * then TRACK_* environment variables.
 */
export function loadAppConfig(env: Env = process.env, configPath?: string): AppConfig {
    const path = configPath ?? env.TRACK_CONFIG;
    const file = path ? readConfigFile(path) : {};

    const top: Record<string, unknown> = {};
    if (env.TRACK_ENCODING !== undefined) top.encoding = env.TRACK_ENCODING;
    if (env.TRACK_FORCE_REGENERATION !== undefined) {
        top.forceRegeneration = parseBool("TRACK_FORCE_REGENERATION", env.TRACK_FORCE_REGENERATION);
    }
    if (env.TRACK_USE_ENV_WIND !== undefined) top.useEnvWind = parseBool("TRACK_USE_ENV_WIND", env.TRACK_USE_ENV_WIND);

    const llm: Record<string, unknown> = {};
    if (env.TRACK_LLM_BASE_URL !== undefined) llm.baseURL = env.TRACK_LLM_BASE_URL;
    if (env.TRACK_LLM_MODEL !== undefined) llm.model = env.TRACK_LLM_MODEL;
    if (env.TRACK_LLM_TEMPERATURE !== undefined) llm.temperature = parseNum("TRACK_LLM_TEMPERATURE", env.TRACK_LLM_TEMPERATURE);
    if (env.TRACK_LLM_API_KEY !== undefined) llm.apiKey = env.TRACK_LLM_API_KEY;
    if (env.TRACK_PROMPT_PATH !== undefined) llm.promptPath = env.TRACK_PROMPT_PATH;

    const merged = {
        ...file,
        ...top,
        llm: { ...asRecord(file.llm), ...llm },
    };

    const parsed = AppConfigSchema.safeParse(merged);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue ? issue.path.join(".") : "";
        throw new ConfigError(`Invalid configuration${where ? ` at ${where}` : ""}: ${issue?.message ?? "unknown issue"}`);
    }
    return parsed.data;
}

/**
 * Role inferrer backed by the configured chat endpoint and prompt template.
 */
export function createRoleInferrer(config: AppConfig): PromptRoleInferrer {
    let template: string;
    try {
        template = readFileSync(config.llm.promptPath, "utf8");
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new ConfigError(`Cannot read prompt template ${config.llm.promptPath}: ${reason}`);
    }
    return new PromptRoleInferrer(createChatCompletion(config.llm), template);
}

/**
 * Schema cache reading sources in the configured encoding.
 * The inferrer defaults to the configured chat endpoint.
 */
export function createSchemaCache(config: AppConfig, inferrer: RoleInferrer = createRoleInferrer(config)): SchemaCache {
    return new SchemaCache({ inferrer, encoding: config.encoding });
}

/** Push the fusion settings of `config` into the fusion config store. */
export function applyFusionSettings(config: AppConfig): void {
    fusionConfigStore.getState().setConfig({ useEnvWind: config.useEnvWind });
}

export type OpenChunkOptions = Pick<DataChunkOptions, "range" | "clip"> & {
    cache?: SchemaCache;
};

/**
 * Open a chunk with the configured encoding and regeneration policy.
 */
export function openChunk(path: string, config: AppConfig, options: OpenChunkOptions = {}): Promise<DataChunk> {
    const cache = options.cache ?? createSchemaCache(config);
    return DataChunk.open(path, {
        cache,
        forceRegeneration: config.forceRegeneration,
        encoding: config.encoding,
        range: options.range,
        clip: options.clip,
    });
}
