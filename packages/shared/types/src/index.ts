// Shared types for AgentChat

export {
  AuthorTypeSchema,
  AttachmentSchema,
  SkillCallSchema,
  AgentSchema,
  ChatSchema,
  ChatMessageSchema,
  MessagePageSchema,
  AgentCreateRequestSchema,
  ChatUpdateRequestSchema,
  ChatMessageRequestSchema,
  ListMessagesQuerySchema,
  HealthStatusSchema,
  HealthCheckSchema,
} from './schemas.js';

export type {
  AuthorType,
  Attachment,
  SkillCall,
  Agent,
  Chat,
  ChatMessage,
  MessagePage,
  AgentCreateRequest,
  ChatUpdateRequest,
  ChatMessageRequest,
  ListMessagesQuery,
  HealthStatus,
  HealthCheck,
} from './schemas.js';

export type {
  AgentStore,
  ChatPatch,
  ChatStore,
  MessageListQuery,
  ChatMessageStore,
  Store,
  ExecutionChunk,
  ExecutionOptions,
  ExecutionBackend,
} from './state-types.js';

export {
  AgentChatError,
  AgentChatErrorCodes,
  createMissingCredentialError,
  createInvalidCredentialError,
  createNotFoundError,
  createNotImplementedError,
  createValidationError,
  createExecutionFailedError,
  createInternalError,
  isAgentChatError,
  hasErrorCode,
  wrapError,
  extractErrorInfo,
} from './errors.js';

export type { AgentChatErrorCode, AgentChatErrorData, CreateErrorOptions } from './errors.js';

export { validate, validateOrThrow, isValid } from './validation.js';

export type { ValidationIssue, ValidationResult, ValidateOptions } from './validation.js';
