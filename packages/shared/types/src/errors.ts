/**
 * AgentChat Error Types and Factory Functions
 *
 * Every failure that crosses a component boundary is an AgentChatError with a
 * stable code, so the HTTP layer can map it to a status without inspecting
 * messages.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const AgentChatErrorCodes = {
  /** No bearer credential supplied */
  MISSING_CREDENTIAL: 'AGENTCHAT_ERR_MISSING_CREDENTIAL',
  /** Credential rejected for any reason */
  INVALID_CREDENTIAL: 'AGENTCHAT_ERR_INVALID_CREDENTIAL',
  /** Resource absent or not owned by the caller */
  NOT_FOUND: 'AGENTCHAT_ERR_NOT_FOUND',
  /** Operation exists but has no implementation */
  NOT_IMPLEMENTED: 'AGENTCHAT_ERR_NOT_IMPLEMENTED',
  /** Malformed request */
  VALIDATION: 'AGENTCHAT_ERR_VALIDATION',
  /** Execution backend failed */
  EXECUTION_FAILED: 'AGENTCHAT_ERR_EXECUTION_FAILED',
  /** Internal error */
  INTERNAL: 'AGENTCHAT_ERR_INTERNAL',
} as const;

export type AgentChatErrorCode = (typeof AgentChatErrorCodes)[keyof typeof AgentChatErrorCodes];

// ============================================================================
// Error Interface
// ============================================================================

export interface AgentChatErrorData {
  /** Error code */
  code: AgentChatErrorCode;
  /** Human-readable error message */
  message: string;
  /** Component that generated the error */
  component: string;
  /** Additional error details */
  details?: Record<string, unknown>;
  /** ISO 8601 timestamp */
  timestamp: string;
  /** Original error if wrapping another error */
  cause?: Error;
}

// ============================================================================
// AgentChatError Class
// ============================================================================

export class AgentChatError extends Error {
  readonly code: AgentChatErrorCode;
  readonly component: string;
  readonly details?: Record<string, unknown>;
  readonly timestamp: string;

  constructor(data: AgentChatErrorData) {
    super(data.message);
    this.name = 'AgentChatError';
    this.code = data.code;
    this.component = data.component;
    this.details = data.details;
    this.timestamp = data.timestamp;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AgentChatError);
    }

    if (data.cause) {
      this.cause = data.cause;
    }
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      message: this.message,
      component: this.component,
      details: this.details,
      timestamp: this.timestamp,
    };
  }
}

// ============================================================================
// Error Factory Functions
// ============================================================================

export interface CreateErrorOptions {
  /** Component that generated the error */
  component: string;
  /** Additional error details */
  details?: Record<string, unknown>;
  /** Original error if wrapping */
  cause?: Error;
}

function build(
  code: AgentChatErrorCode,
  message: string,
  options: CreateErrorOptions
): AgentChatError {
  return new AgentChatError({
    code,
    message,
    timestamp: new Date().toISOString(),
    ...options,
  });
}

export function createMissingCredentialError(options: CreateErrorOptions): AgentChatError {
  return build(AgentChatErrorCodes.MISSING_CREDENTIAL, 'Missing Authorization header', options);
}

/**
 * Every verification failure collapses into this one error. The cause is kept
 * for logs but never serialized to callers.
 */
export function createInvalidCredentialError(options: CreateErrorOptions): AgentChatError {
  return build(AgentChatErrorCodes.INVALID_CREDENTIAL, 'Invalid or expired token', options);
}

export function createNotFoundError(message: string, options: CreateErrorOptions): AgentChatError {
  return build(AgentChatErrorCodes.NOT_FOUND, message, options);
}

export function createNotImplementedError(options: CreateErrorOptions): AgentChatError {
  return build(AgentChatErrorCodes.NOT_IMPLEMENTED, 'Not implemented', options);
}

export function createValidationError(
  message: string,
  options: CreateErrorOptions
): AgentChatError {
  return build(AgentChatErrorCodes.VALIDATION, message, options);
}

export function createExecutionFailedError(
  message: string,
  options: CreateErrorOptions
): AgentChatError {
  return build(AgentChatErrorCodes.EXECUTION_FAILED, message, options);
}

export function createInternalError(message: string, options: CreateErrorOptions): AgentChatError {
  return build(AgentChatErrorCodes.INTERNAL, message, options);
}

// ============================================================================
// Error Utilities
// ============================================================================

export function isAgentChatError(error: unknown): error is AgentChatError {
  return error instanceof AgentChatError;
}

export function hasErrorCode(error: unknown, code: AgentChatErrorCode): boolean {
  return isAgentChatError(error) && error.code === code;
}

/**
 * Wrap any error as an AgentChatError
 * If already an AgentChatError, returns as-is. Otherwise wraps as internal error.
 */
export function wrapError(error: unknown, options: CreateErrorOptions): AgentChatError {
  if (isAgentChatError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return createInternalError(error.message, {
      ...options,
      cause: error,
    });
  }

  return createInternalError(String(error), options);
}

/**
 * Extract error information suitable for logging
 */
export function extractErrorInfo(error: unknown): Record<string, unknown> {
  if (isAgentChatError(error)) {
    const info = error.toJSON();
    if (error.cause instanceof Error) {
      info.cause = error.cause.message;
    }
    return info;
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    message: String(error),
  };
}
