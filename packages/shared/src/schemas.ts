import { z } from "zod";

export const ConversationStatusSchema = z.enum([
  "idle",
  "running",
  "awaiting_approval",
  "failed",
  "cancelled",
]);
export type ConversationStatus = z.infer<typeof ConversationStatusSchema>;

export const CreateConversationSchema = z.object({
  model: z.string().min(1).optional(),
});
export type CreateConversationInput = z.infer<typeof CreateConversationSchema>;

export const SendMessageSchema = z.object({
  text: z.string().min(1),
  stream: z.boolean().default(false),
});
export type SendMessageInput = z.infer<typeof SendMessageSchema>;

export const SafetyDecisionSchema = z.object({
  decision: z.enum(["approve", "deny"]),
});
export type SafetyDecisionInput = z.infer<typeof SafetyDecisionSchema>;

export const ConversationMetaSchema = z.object({
  conversation_id: z.string(),
  model: z.string(),
  status: ConversationStatusSchema,
  last_response_id: z.string().optional(),
  created_at: z.string(),
  updated_at: z.string(),
  error: z.string().optional(),
});
export type ConversationMeta = z.infer<typeof ConversationMetaSchema>;

export const TurnEventSchema = z.object({
  type: z.string(),
  payload: z.record(z.unknown()),
  ts: z.string().optional(),
});
export type TurnEvent = z.infer<typeof TurnEventSchema>;

// Wire shapes of the Responses API, reduced to what the loop reads.

export const SafetyCheckSchema = z.object({
  id: z.string(),
  code: z.string().default(""),
  message: z.string().default(""),
});
export type SafetyCheck = z.infer<typeof SafetyCheckSchema>;

export const ComputerCallItemSchema = z.object({
  type: z.literal("computer_call"),
  id: z.string(),
  call_id: z.string().min(1).optional(),
  action: z.record(z.unknown()),
  pending_safety_checks: z.array(SafetyCheckSchema).default([]),
  status: z.string().optional(),
});
export type ComputerCallItem = z.infer<typeof ComputerCallItemSchema>;

export const OutputItemSchema = z
  .object({
    type: z.string(),
    id: z.string().optional(),
  })
  .passthrough();
export type OutputItem = z.infer<typeof OutputItemSchema>;

export const ModelResponseSchema = z.object({
  id: z.string(),
  status: z.string().optional(),
  output: z.array(OutputItemSchema).default([]),
  output_text: z.string().optional(),
});
export type ModelResponse = z.infer<typeof ModelResponseSchema>;

const MessageContentSchema = z
  .object({
    type: z.string(),
    text: z.string().optional(),
  })
  .passthrough();

export const MessageItemSchema = z.object({
  type: z.literal("message"),
  content: z.array(MessageContentSchema).default([]),
});
