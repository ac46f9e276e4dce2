import { z } from 'zod'

// Shapes of the agent CLI's `--output-format stream-json` records. Unknown fields pass through and
// every field the decoder reads falls back to a neutral value instead of rejecting the record.

const TokenCount = z.number().int().nonnegative().catch(0)

const UsageSchema = z
    .object({
        input_tokens: TokenCount,
        output_tokens: TokenCount,
    })
    .passthrough()

export const TextBlock = z.object({ type: z.literal('text'), text: z.string().catch('') })

export const ThinkingBlock = z.object({ type: z.literal('thinking'), thinking: z.string().catch('') })

export const ToolUseBlock = z.object({
    type: z.literal('tool_use'),
    name: z.string().catch('unknown'),
    input: z.record(z.unknown()).catch({}),
})

export const ToolResultBlock = z.object({
    type: z.literal('tool_result'),
    content: z.unknown(),
    is_error: z.boolean().catch(false),
})

const MessageSchema = z
    .object({
        content: z.union([z.array(z.unknown()), z.string()]).catch([]),
        usage: UsageSchema.nullish().catch(null),
    })
    .passthrough()

export type StreamMessage = z.infer<typeof MessageSchema>

export const AssistantRecord = z.object({
    type: z.literal('assistant'),
    message: MessageSchema.nullish().catch(null),
})

export const UserRecord = z.object({
    type: z.literal('user'),
    message: MessageSchema.nullish().catch(null),
})

export const ResultRecord = z.object({
    type: z.literal('result'),
    is_error: z.boolean().catch(false),
    usage: UsageSchema.nullish().catch(null),
})

export const AnyRecord = z.object({ type: z.string() }).passthrough()
