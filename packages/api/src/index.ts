import { serve } from '@hono/node-server';
import { loadConfig, loadProviderCredentials } from '@quarry/schemas/src/config-loader.js';
import { createSearchStack } from '@quarry/core/src/services/search/search-stack.js';
import { createChildLogger } from '@quarry/shared/src/logger.js';
import { createApp } from './app.js';

const log = createChildLogger('api:main');

async function main(): Promise<void> {
  const port = parseInt(process.env['PORT'] ?? '3000', 10);

  const config = await loadConfig(process.env['QUARRY_CONFIG']);
  const mockProviders = process.env['QUARRY_MOCK_PROVIDERS'] === 'true';

  const { service } = createSearchStack({
    config,
    credentials: loadProviderCredentials(),
    mockProviders,
  });

  const app = createApp({ searchService: service });

  log.info({ port, mockProviders }, 'Starting Quarry API server');

  serve({ fetch: app.fetch, port }, (info) => {
    log.info({ port: info.port }, 'Quarry API server running');
  });
}

main().catch((error: unknown) => {
  log.error(
    { error: error instanceof Error ? error.message : String(error) },
    'Failed to start API server',
  );
  process.exit(1);
});
