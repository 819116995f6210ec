import { createChildLogger } from '@quarry/shared/src/logger.js';
import { ParseError, ProviderError, QuarryError, toError } from '@quarry/shared/src/utils/errors.js';
import type { RawSearchResult, SearchQuery } from '@quarry/shared/src/types/search.types.js';
import type { WorkerPool } from '../search/worker-pool.js';
import type {
  FallbackSearchProvider,
  GatewayOutcome,
  GatewayState,
  PrimarySearchProvider,
  ProviderGateway,
} from './types.js';

const log = createChildLogger('web-search:gateway');

export interface ProviderGatewayDeps {
  readonly primary: PrimarySearchProvider;
  readonly fallback: FallbackSearchProvider;
  readonly pool: WorkerPool;
}

export interface ProviderGatewayConfig {
  readonly timeoutMs: number;
  readonly fallbackMaxResults: number;
}

function hasContent(result: RawSearchResult): boolean {
  return result.items.length > 0 || Boolean(result.directAnswer?.trim());
}

function asProviderFailure(provider: string, error: unknown): QuarryError {
  if (error instanceof ProviderError || error instanceof ParseError) {
    return error;
  }
  const cause = toError(error);
  return new ProviderError(`${provider} failed: ${cause.message}`, provider, 'transport', cause);
}

/**
 * Primary first, fallback once on any primary failure, no retries of the same
 * provider. An empty primary answer counts as a failure; an empty fallback
 * answer is returned as-is so the caller can report "no results".
 */
export function createProviderGateway(
  deps: ProviderGatewayDeps,
  config: ProviderGatewayConfig,
): ProviderGateway {
  const { primary, fallback, pool } = deps;

  return {
    async fetch(query: SearchQuery): Promise<GatewayOutcome> {
      const transitions: GatewayState[] = ['idle', 'primary_call'];

      try {
        const result = await pool.run(
          (signal) => primary.query(query.text, query.params, { signal, searchType: query.type }),
          { timeoutMs: config.timeoutMs, label: primary.name },
        );
        if (!hasContent(result)) {
          throw new ProviderError(`${primary.name} returned no results`, primary.name, 'empty');
        }
        transitions.push('success');
        return { result, source: 'primary', transitions };
      } catch (error) {
        const failure = asProviderFailure(primary.name, error);
        transitions.push('primary_failed');
        log.warn(
          {
            provider: primary.name,
            code: failure.code,
            kind: failure instanceof ProviderError ? failure.kind : undefined,
            error: failure.message,
          },
          'Primary provider failed, switching to fallback',
        );
      }

      transitions.push('fallback_call');
      try {
        const result = await pool.run(
          (signal) =>
            fallback.query(query.text, { signal, maxResults: config.fallbackMaxResults }),
          { timeoutMs: config.timeoutMs, label: fallback.name },
        );
        transitions.push('success');
        return { result, source: 'fallback', transitions };
      } catch (error) {
        const failure = asProviderFailure(fallback.name, error);
        transitions.push('fallback_failed', 'failed');
        log.error(
          { provider: fallback.name, code: failure.code, error: failure.message, transitions },
          'Fallback provider failed',
        );
        throw new ProviderError(
          `All search providers failed: ${failure.message}`,
          fallback.name,
          failure instanceof ProviderError ? failure.kind : 'transport',
          failure,
        );
      }
    },
  };
}
