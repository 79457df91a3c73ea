import { z } from "zod";

export const ChatMessageSchema = z.object({
    role: z.string(),
    content: z.string().nullable(),
});

export const ChatCompletionResponseSchema = z.object({
    choices: z.array(
        z.object({
            message: ChatMessageSchema,
        })
    ),
});
