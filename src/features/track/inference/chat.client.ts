import { RoleInferenceError } from "../track.errors";
import { ChatCompletionResponseSchema } from "./roles.schemas";

export type ChatClientConfig = {
    baseURL: string;
    model: string;
    temperature: number;
    topP: number;
    apiKey?: string;
};

/** Sends one prompt, resolves with the assistant's text. */
export type CompleteFn = (prompt: string) => Promise<string>;

const defaultHeaders: Record<string, string> = {
    "Content-Type": "application/json",
};

const buildURL = (baseURL: string, endpoint: string): string => {
    // new URL("chat/completions", "https://host/v1") would drop "v1"
    const base = baseURL.endsWith("/") ? baseURL : `${baseURL}/`;
    return new URL(endpoint, base).toString();
};

const withAuthHeader = (apiKey: string | undefined) =>
    (headers: Record<string, string>): Record<string, string> => {
        if (!apiKey) return headers;

        return {
            ...headers,
            Authorization: `Bearer ${apiKey}`,
        };
    };

const fetchJSON = async (
    baseURL: string,
    endpoint: string,
    options: RequestInit,
    headers: Record<string, string>
): Promise<unknown> => {
    const response = await fetch(buildURL(baseURL, endpoint), {
        ...options,
        headers,
    });

    if (!response.ok) {
        throw new RoleInferenceError(`HTTP ${response.status}: ${response.statusText}`);
    }

    const body: unknown = await response.json();
    return body;
};

/**
 * Completion function for an OpenAI-compatible `chat/completions` endpoint.
 */
export const createChatCompletion = (config: ChatClientConfig): CompleteFn =>
    async (prompt) => {
        const headers = withAuthHeader(config.apiKey)(defaultHeaders);

        const body = await fetchJSON(
            config.baseURL,
            "chat/completions",
            {
                method: "POST",
                body: JSON.stringify({
                    model: config.model,
                    messages: [{ role: "user", content: prompt }],
                    stream: false,
                    temperature: config.temperature,
                    top_p: config.topP,
                }),
            },
            headers
        );

        const parsed = ChatCompletionResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw new RoleInferenceError(`Unexpected completion response: ${parsed.error.message}`);
        }

        return parsed.data.choices[0]?.message.content ?? "";
    };
