// Agent execution engine for AgentChat

export { OpenAIExecutionBackend, type OpenAIBackendOptions, type ExecutionStore } from './openai-backend.js';
export { ProviderError, mapProviderError, isRetryableProviderError, type ProviderErrorKind } from './errors.js';
export { buildPrompt } from './prompt.js';
export { getRetryConfig, retryWithBackoff, backoffDelay, type RetryConfig } from './retry.js';
