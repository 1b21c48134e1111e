import { z } from "zod";

// ============================================
// OpenAI Chat Completions request
// ============================================

const textPartSchema = z.object({
  type: z.literal("text"),
  text: z.string(),
});

const imagePartSchema = z.object({
  type: z.literal("image_url"),
  image_url: z.union([
    z.string(),
    z.object({
      url: z.string(),
      detail: z.string().optional(),
    }),
  ]),
});

// Unknown part types are kept so the translator can ignore them
const otherPartSchema = z
  .object({ type: z.string() })
  .passthrough();

export const contentPartSchema = z.union([textPartSchema, imagePartSchema, otherPartSchema]);

const contentSchema = z.union([z.string(), z.array(contentPartSchema)]).nullish();

const toolCallSchema = z.object({
  id: z.string(),
  type: z.literal("function").default("function"),
  function: z.object({
    name: z.string().default(""),
    arguments: z.string().default(""),
  }),
});

export const messageSchema = z.discriminatedUnion("role", [
  z.object({ role: z.literal("system"), content: contentSchema, name: z.string().optional() }),
  z.object({ role: z.literal("developer"), content: contentSchema, name: z.string().optional() }),
  z.object({ role: z.literal("user"), content: contentSchema, name: z.string().optional() }),
  z.object({
    role: z.literal("assistant"),
    content: contentSchema,
    name: z.string().optional(),
    tool_calls: z.array(toolCallSchema).optional(),
  }),
  z.object({
    role: z.literal("tool"),
    content: contentSchema,
    tool_call_id: z.string(),
    name: z.string().optional(),
  }),
]);

export const toolSchema = z.object({
  type: z.literal("function"),
  function: z.object({
    name: z.string(),
    description: z.string().optional(),
    parameters: z.unknown().optional(),
  }),
});

export const toolChoiceSchema = z.union([
  z.enum(["auto", "none", "required"]),
  z.object({
    type: z.literal("function"),
    function: z.object({ name: z.string() }),
  }),
]);

export const chatCompletionRequestSchema = z
  .object({
    model: z.string().optional(),
    messages: z.array(messageSchema).min(1, "messages must contain at least one message"),
    stream: z.boolean().optional().default(false),
    tools: z.array(toolSchema).optional(),
    tool_choice: toolChoiceSchema.optional(),
    temperature: z.number().optional(),
    top_p: z.number().optional(),
    max_tokens: z.number().int().positive().optional(),
    user: z.string().optional(),
    // Extension: planning / coding slots of the upstream model selection
    planning_model: z.string().optional(),
    coding_model: z.string().optional(),
  })
  .passthrough();

export type ChatCompletionRequest = z.infer<typeof chatCompletionRequestSchema>;
export type ChatMessage = z.infer<typeof messageSchema>;
export type ChatContent = z.infer<typeof contentSchema>;
export type ChatTool = z.infer<typeof toolSchema>;
