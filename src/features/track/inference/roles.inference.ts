import { RoleMapSchema } from "../schema/schema.types";
import { RoleInferenceError } from "../track.errors";
import type { RoleMap } from "../track.types";
import type { CompleteFn } from "./chat.client";

/**
 * Maps raw header strings to semantic roles.
 * Implementations may be non-deterministic (a language model); the core only sees the answer.
 */
export interface RoleInferrer {
    inferRoles(headers: string[]): Promise<RoleMap>;
}

/** Answers with a fixed map; for known layouts and tests. */
export function staticRoleInferrer(roles: RoleMap): RoleInferrer {
    return {
        async inferRoles() {
            return { ...roles };
        },
    };
}

export function buildRolePrompt(headers: readonly string[], template: string): string {
    return `${JSON.stringify(headers)}<<${template.trim()}>>`;
}

const FENCED = /^```(?:json)?\s*([\s\S]*?)\s*```$/i;

/**
 * Parse the model's answer into a RoleMap.
 * Accepts a bare JSON object or one wrapped in a ``` fence; anything else is a RoleInferenceError.
 */
export function parseRoleAnswer(text: string): RoleMap {
    const trimmed = text.trim();
    const body = FENCED.exec(trimmed)?.[1] ?? trimmed;

    let json: unknown;
    try {
        json = JSON.parse(body);
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new RoleInferenceError(`Role answer is not JSON (${reason}): ${trimmed.slice(0, 120)}`);
    }

    const parsed = RoleMapSchema.safeParse(json);
    if (!parsed.success) {
        throw new RoleInferenceError(`Role answer has the wrong shape: ${parsed.error.message}`);
    }
    return parsed.data;
}

/**
 * Sends the header list with a prompt template and validates the JSON answer.
 */
export class PromptRoleInferrer implements RoleInferrer {
    constructor(
        private readonly complete: CompleteFn,
        private readonly template: string
    ) {}

    async inferRoles(headers: string[]): Promise<RoleMap> {
        const answer = await this.complete(buildRolePrompt(headers, this.template));
        return parseRoleAnswer(answer);
    }
}
