/**
 * Mapping from AgentChat error codes to HTTP responses
 */

import type { FastifyError, FastifyInstance } from 'fastify';
import {
  AgentChatErrorCodes,
  createValidationError,
  extractErrorInfo,
  isAgentChatError,
  wrapError,
  type AgentChatError,
  type AgentChatErrorCode,
} from '@agentchat/types';
import type { Logger } from '@agentchat/utils';

export interface ErrorBody {
  error: {
    code: AgentChatErrorCode;
    message: string;
  };
}

const STATUS_BY_CODE: Record<AgentChatErrorCode, number> = {
  [AgentChatErrorCodes.MISSING_CREDENTIAL]: 401,
  [AgentChatErrorCodes.INVALID_CREDENTIAL]: 401,
  [AgentChatErrorCodes.NOT_FOUND]: 404,
  [AgentChatErrorCodes.NOT_IMPLEMENTED]: 501,
  [AgentChatErrorCodes.VALIDATION]: 422,
  [AgentChatErrorCodes.EXECUTION_FAILED]: 500,
  [AgentChatErrorCodes.INTERNAL]: 500,
};

/** Internal messages may carry driver or stack details and are replaced */
const INTERNAL_MESSAGE = 'Internal server error';

export function statusForError(error: AgentChatError): number {
  return STATUS_BY_CODE[error.code];
}

export function toErrorBody(error: AgentChatError): ErrorBody {
  return {
    error: {
      code: error.code,
      message: error.code === AgentChatErrorCodes.INTERNAL ? INTERNAL_MESSAGE : error.message,
    },
  };
}

function hasClientStatus(error: unknown): error is FastifyError & { statusCode: number } {
  return (
    error instanceof Error &&
    'statusCode' in error &&
    typeof error.statusCode === 'number' &&
    error.statusCode >= 400 &&
    error.statusCode < 500
  );
}

/**
 * Normalize anything thrown while handling a request. Framework errors with
 * a client status (malformed JSON, wrong content type) become validation
 * errors; everything else unknown is internal.
 */
export function toAgentChatError(error: unknown): { error: AgentChatError; status: number } {
  if (isAgentChatError(error)) {
    return { error, status: statusForError(error) };
  }

  if (hasClientStatus(error)) {
    return {
      error: createValidationError(error.message, { component: 'http', cause: error }),
      status: error.statusCode === 400 ? 422 : error.statusCode,
    };
  }

  return { error: wrapError(error, { component: 'http' }), status: 500 };
}

export function registerErrorHandling(app: FastifyInstance, logger: Logger): void {
  app.setErrorHandler(async (thrown, request, reply) => {
    const { error, status } = toAgentChatError(thrown);

    if (status >= 500) {
      logger.error(`${request.method} ${request.url} failed`, extractErrorInfo(error));
    } else {
      logger.debug(`${request.method} ${request.url} rejected: ${error.code}`);
    }

    if (status === 401) {
      void reply.header('WWW-Authenticate', 'Bearer');
    }
    return reply.status(status).send(toErrorBody(error));
  });

  app.setNotFoundHandler(async (request, reply) => {
    const body: ErrorBody = {
      error: {
        code: AgentChatErrorCodes.NOT_FOUND,
        message: `Route ${request.method} ${request.url} not found`,
      },
    };
    return reply.status(404).send(body);
  });
}
