import { ProviderError, toError } from '@quarry/shared/src/utils/errors.js';

export function providerErrorFromStatus(provider: string, status: number): ProviderError {
  if (status === 401 || status === 403) {
    return new ProviderError(`${provider} rejected the credentials (${String(status)})`, provider, 'auth');
  }
  // Tavily reports plan and key limits as 432/433.
  if (status === 429 || status === 432 || status === 433) {
    return new ProviderError(`${provider} quota exhausted (${String(status)})`, provider, 'quota');
  }
  return new ProviderError(`${provider} search failed: ${String(status)}`, provider, 'http');
}

export function providerErrorFromFetch(
  provider: string,
  error: unknown,
  signal: AbortSignal | undefined,
): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }
  const cause = toError(error);
  if (signal?.aborted) {
    return new ProviderError(`${provider} request aborted`, provider, 'timeout', cause);
  }
  return new ProviderError(`${provider} request failed: ${cause.message}`, provider, 'transport', cause);
}
