/**
 * TypeBox schemas for the AgentChat wire format.
 *
 * Entities use the snake_case field names that appear on the HTTP surface,
 * so a stored row, a domain value and a response body share one shape.
 */

import { Type, type Static, type TSchema } from '@sinclair/typebox';

const Nullable = <T extends TSchema>(schema: T) => Type.Union([schema, Type.Null()]);

// ============================================================================
// Shared pieces
// ============================================================================

export const AuthorTypeSchema = Type.Union([
  Type.Literal('agent'),
  Type.Literal('api'),
  Type.Literal('system'),
  Type.Literal('skill'),
  Type.Literal('trigger'),
  Type.Literal('web'),
]);

export const AttachmentSchema = Type.Object({
  type: Type.Union([Type.Literal('link'), Type.Literal('image'), Type.Literal('file')]),
  url: Type.String({ minLength: 1 }),
  name: Type.Optional(Type.String()),
});

export const SkillCallSchema = Type.Object({
  id: Type.String(),
  name: Type.String(),
  parameters: Type.Record(Type.String(), Type.Unknown()),
  success: Type.Boolean(),
  response: Type.Optional(Type.String()),
  error_message: Type.Optional(Type.String()),
});

// ============================================================================
// Entities
// ============================================================================

export const AgentSchema = Type.Object({
  id: Type.String(),
  owner: Type.String(),
  name: Type.String(),
  description: Nullable(Type.String()),
  model: Nullable(Type.String()),
  prompt: Nullable(Type.String()),
  temperature: Nullable(Type.Number()),
  created_at: Type.String(),
  updated_at: Type.String(),
});

export const ChatSchema = Type.Object({
  id: Type.String(),
  agent_id: Type.String(),
  user_id: Type.String(),
  summary: Type.String(),
  rounds: Type.Integer({ minimum: 0 }),
  created_at: Type.String(),
  updated_at: Type.String(),
});

export const ChatMessageSchema = Type.Object({
  id: Type.String(),
  chat_id: Type.String(),
  agent_id: Type.String(),
  user_id: Nullable(Type.String()),
  author_id: Type.String(),
  author_type: AuthorTypeSchema,
  thread_type: Nullable(AuthorTypeSchema),
  message: Type.String(),
  attachments: Nullable(Type.Array(AttachmentSchema)),
  model: Nullable(Type.String()),
  reply_to: Nullable(Type.String()),
  skill_calls: Nullable(Type.Array(SkillCallSchema)),
  input_tokens: Type.Integer({ minimum: 0 }),
  output_tokens: Type.Integer({ minimum: 0 }),
  time_cost: Type.Number({ minimum: 0 }),
  credit_event_id: Nullable(Type.String()),
  credit_cost: Nullable(Type.Number()),
  cold_start_cost: Type.Number({ minimum: 0 }),
  app_id: Nullable(Type.String()),
  search_mode: Nullable(Type.Boolean()),
  super_mode: Nullable(Type.Boolean()),
  created_at: Type.String(),
});

export const MessagePageSchema = Type.Object({
  data: Type.Array(ChatMessageSchema),
  has_more: Type.Boolean(),
  next_cursor: Nullable(Type.String()),
});

// ============================================================================
// Requests
// ============================================================================

export const AgentCreateRequestSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  description: Type.Optional(Nullable(Type.String())),
  model: Type.Optional(Nullable(Type.String({ minLength: 1 }))),
  prompt: Type.Optional(Nullable(Type.String())),
  temperature: Type.Optional(Nullable(Type.Number({ minimum: 0, maximum: 2 }))),
});

export const ChatUpdateRequestSchema = Type.Object({
  summary: Type.Optional(Type.String({ maxLength: 65535 })),
});

export const ChatMessageRequestSchema = Type.Object({
  app_id: Type.Optional(Nullable(Type.String())),
  user_id: Type.String({ minLength: 1 }),
  message: Type.String({ minLength: 1, maxLength: 65535 }),
  stream: Type.Optional(Nullable(Type.Boolean())),
  search_mode: Type.Optional(Nullable(Type.Boolean())),
  super_mode: Type.Optional(Nullable(Type.Boolean())),
  attachments: Type.Optional(Nullable(Type.Array(AttachmentSchema))),
});

export const ListMessagesQuerySchema = Type.Object({
  /** An empty cursor means the first page */
  cursor: Type.Optional(Type.String()),
  limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 100 })),
});

// ============================================================================
// Health
// ============================================================================

export const HealthStatusSchema = Type.Union([
  Type.Literal('healthy'),
  Type.Literal('degraded'),
  Type.Literal('unhealthy'),
]);

export const HealthCheckSchema = Type.Object({
  status: HealthStatusSchema,
  version: Type.String(),
  service: Type.String(),
  uptime: Type.Number({ minimum: 0 }),
  checks: Type.Record(Type.String(), Type.Union([Type.Literal('ok'), Type.Literal('error')])),
});

// ============================================================================
// Static types
// ============================================================================

export type AuthorType = Static<typeof AuthorTypeSchema>;
export type Attachment = Static<typeof AttachmentSchema>;
export type SkillCall = Static<typeof SkillCallSchema>;
export type Agent = Static<typeof AgentSchema>;
export type Chat = Static<typeof ChatSchema>;
export type ChatMessage = Static<typeof ChatMessageSchema>;
export type MessagePage = Static<typeof MessagePageSchema>;
export type AgentCreateRequest = Static<typeof AgentCreateRequestSchema>;
export type ChatUpdateRequest = Static<typeof ChatUpdateRequestSchema>;
export type ChatMessageRequest = Static<typeof ChatMessageRequestSchema>;
export type ListMessagesQuery = Static<typeof ListMessagesQuerySchema>;
export type HealthStatus = Static<typeof HealthStatusSchema>;
export type HealthCheck = Static<typeof HealthCheckSchema>;
