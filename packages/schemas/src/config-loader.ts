import { readFile } from 'node:fs/promises';
import { ConfigurationError } from '@quarry/shared/src/utils/errors.js';
import { validateServiceConfig } from './validators.js';
import type { ServiceConfig } from './service-config.schema.js';

export interface ProviderCredentials {
  readonly tavilyApiKey?: string;
}

async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content) as unknown;
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigurationError(`Invalid JSON in ${filePath}: ${error.message}`);
    }
    const nodeError = error as NodeJS.ErrnoException;
    if (nodeError.code === 'ENOENT') {
      throw new ConfigurationError(`Configuration file not found: ${filePath}`);
    }
    throw new ConfigurationError(
      `Failed to read configuration file ${filePath}: ${nodeError.message}`,
    );
  }
}

/**
 * Loads the service configuration. Without a path every setting takes its
 * default; with one, the file must exist and pass the schema.
 */
export async function loadConfig(configPath?: string): Promise<ServiceConfig> {
  if (!configPath) {
    return validateServiceConfig({});
  }

  const raw = await readJsonFile(configPath);
  return validateServiceConfig(raw);
}

// Credentials never live in the config file.
export function loadProviderCredentials(
  env: NodeJS.ProcessEnv = process.env,
): ProviderCredentials {
  const tavilyApiKey = env['TAVILY_API_KEY']?.trim();
  return tavilyApiKey ? { tavilyApiKey } : {};
}
