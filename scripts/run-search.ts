import { createInterface } from 'node:readline';
import { loadConfig, loadProviderCredentials } from '@quarry/schemas/src/config-loader.js';
import { MAX_RESULTS_LIMIT } from '@quarry/schemas/src/search-params.schema.js';
import type { SearchParamsInput } from '@quarry/schemas/src/search-params.schema.js';
import { createSearchStack } from '@quarry/core/src/services/search/search-stack.js';
import type { EnhancedSearchResponse } from '@quarry/shared/src/types/search.types.js';

const EXIT_KEYWORDS = ['exit', 'quit', 'bye'];
const SEARCH_TYPES = ['general', 'news', 'image'];
const TIME_FRAMES: Record<string, number | undefined> = {
  auto: undefined,
  day: 1,
  week: 7,
  month: 30,
};

function isExitCommand(input: string): boolean {
  return EXIT_KEYWORDS.includes(input.trim().toLowerCase());
}

function printHelp(): void {
  console.log('\nEnter a query to search the web.');
  console.log('  After the query you can pick a search type and advanced options.');
  console.log('  Press Enter to accept the default shown in brackets.');
  console.log(`  Type ${EXIT_KEYWORDS.map((k) => `"${k}"`).join(', ')} to leave, "help" for this text.\n`);
}

function clampMaxResults(input: string, fallback: number): number {
  const parsed = parseInt(input, 10);
  if (Number.isNaN(parsed)) {
    return fallback;
  }
  return Math.min(Math.max(parsed, 1), MAX_RESULTS_LIMIT);
}

function renderResponse(response: EnhancedSearchResponse): void {
  const { insight } = response;
  console.log(`\n--- ${insight.title} ---`);
  console.log(`Source: ${insight.source} (${insight.status})`);
  if (insight.url) {
    console.log(`URL: ${insight.url}`);
  }
  if (insight.directAnswer) {
    console.log(`\nAnswer: ${insight.directAnswer}`);
  }
  if (response.summary) {
    console.log(`\nSummary: ${response.summary}`);
  }
  if (response.keywords.length > 0) {
    console.log(`Keywords: ${response.keywords.join(', ')}`);
  }

  if (response.rawResults.length > 0) {
    console.log('\nResults:');
    for (let i = 0; i < response.rawResults.length; i++) {
      const item = response.rawResults[i];
      console.log(`  ${String(i + 1)}. ${item.title}`);
      console.log(`     ${item.url}`);
    }
  }
}

async function main(): Promise<void> {
  const configPath = process.argv[2] ?? process.env['QUARRY_CONFIG'];
  const mockProviders = process.env['QUARRY_MOCK_PROVIDERS'] === 'true';

  console.log('=== Quarry Interactive Search ===\n');
  console.log(`Config file: ${configPath ?? '(defaults)'}`);
  console.log(`Mock providers: ${mockProviders ? 'yes' : 'no'}`);

  const config = await loadConfig(configPath);
  const { service } = createSearchStack({
    config,
    credentials: loadProviderCredentials(),
    mockProviders,
  });

  printHelp();

  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  const prompt = (question: string): Promise<string> =>
    new Promise((resolve) => {
      rl.question(question, resolve);
    });

  try {
    const requesterInput = await prompt('Requester id [cli]: ');
    const requesterId = requesterInput.trim() || 'cli';

    for (;;) {
      const query = (await prompt('\nQuery: ')).trim();
      if (isExitCommand(query)) {
        break;
      }
      if (query === 'help') {
        printHelp();
        continue;
      }
      if (query === '') {
        continue;
      }

      const typeInput = (await prompt(`Search type (${SEARCH_TYPES.join('/')}) [general]: `)).trim();
      const searchType = SEARCH_TYPES.includes(typeInput) ? typeInput : 'general';

      const params: SearchParamsInput = {};
      const advanced = (await prompt('Advanced options? (y/N): ')).trim().toLowerCase();
      if (advanced === 'y' || advanced === 'yes') {
        params.maxResults = clampMaxResults(await prompt('Max results (1-20) [10]: '), 10);
        params.depth =
          (await prompt('Depth (basic/advanced) [basic]: ')).trim() === 'advanced' ? 'advanced' : 'basic';
        if (searchType === 'news') {
          const frame = (await prompt('Time frame (auto/day/week/month) [auto]: ')).trim();
          const days = TIME_FRAMES[frame];
          if (days !== undefined) {
            params.days = days;
          }
        }
        params.includeImages = (await prompt('Include images? (y/N): ')).trim().toLowerCase() === 'y';
      }

      try {
        renderResponse(await service.enhancedSearch(query, requesterId, searchType, params));
      } catch (error) {
        console.error(`Search rejected: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  } catch (error) {
    // ERR_USE_AFTER_CLOSE means readline was closed by Ctrl+C.
    if ((error as NodeJS.ErrnoException).code !== 'ERR_USE_AFTER_CLOSE') {
      throw error;
    }
  }

  rl.close();
  console.log('\n=== Goodbye ===');
}

main().catch((error: unknown) => {
  console.error('Search runner failed:', error);
  process.exit(1);
});
