export type ProviderErrorKind = 'auth' | 'rate_limit' | 'billing' | 'unavailable' | 'unknown';

export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly kind: ProviderErrorKind,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

function statusOf(error: unknown): number | undefined {
  if (error && typeof error === 'object' && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

/**
 * Collapse an SDK error into a ProviderError keyed on the HTTP status
 */
export function mapProviderError(error: unknown): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }

  const status = statusOf(error);
  if (status === 401 || status === 403) {
    return new ProviderError('Authentication failed', 'auth', status);
  }
  if (status === 402) {
    return new ProviderError('Billing issue', 'billing', status);
  }
  if (status === 429) {
    return new ProviderError('Rate limit exceeded', 'rate_limit', status);
  }
  if (status !== undefined && status >= 500) {
    return new ProviderError('Provider unavailable', 'unavailable', status);
  }

  return new ProviderError('OpenAI provider error', 'unknown', status);
}

export function isRetryableProviderError(error: unknown): boolean {
  return error instanceof ProviderError && (error.kind === 'rate_limit' || error.kind === 'unavailable');
}
