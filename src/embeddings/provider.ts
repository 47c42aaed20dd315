/**
 * Embedding provider factory for partlens
 */

import {
  type EmbeddingProvider,
  type EmbeddingProviderConfig,
  EmbeddingError,
  EmbeddingErrorCode,
} from './types.js';
import type { EmbeddingConfig } from '../config/schema.js';
import { HashingEmbeddingProvider } from './hashing.js';
import { RemoteEmbeddingProvider } from './remote.js';

/** Default remote embedding service URL */
const DEFAULT_REMOTE_URL = 'http://localhost:8080/embed';

/**
 * Create and initialise an embedding provider based on configuration
 */
export async function createEmbeddingProvider(
  config: EmbeddingProviderConfig
): Promise<EmbeddingProvider> {
  let provider: EmbeddingProvider;

  switch (config.provider) {
    case 'hashing':
      provider = new HashingEmbeddingProvider(config.dimensions, config.model);
      break;
    case 'remote': {
      const options: ConstructorParameters<typeof RemoteEmbeddingProvider>[0] = {
        url: config.remoteUrl ?? DEFAULT_REMOTE_URL,
        model: config.model,
        dimensions: config.dimensions,
        batchSize: config.batchSize,
      };
      if (config.remoteApiKey !== undefined && config.remoteApiKey !== '') {
        options.apiKey = config.remoteApiKey;
      }
      if (config.requestTimeoutMs !== undefined) {
        options.requestTimeoutMs = config.requestTimeoutMs;
      }
      provider = new RemoteEmbeddingProvider(options);
      break;
    }
    default:
      throw new EmbeddingError(
        `Unknown embedding provider: ${String(config.provider)}`,
        EmbeddingErrorCode.NOT_INITIALIZED
      );
  }

  await provider.initialize();
  return provider;
}

/**
 * Map the validated config section to provider configuration
 */
export function toProviderConfig(config: EmbeddingConfig): EmbeddingProviderConfig {
  const providerConfig: EmbeddingProviderConfig = {
    provider: config.provider,
    model: config.model,
    dimensions: config.dimensions,
    batchSize: config.batchSize,
    requestTimeoutMs: config.requestTimeoutMs,
  };
  if (config.remoteUrl !== undefined && config.remoteUrl !== '') {
    providerConfig.remoteUrl = config.remoteUrl;
  }
  if (config.remoteApiKey !== undefined && config.remoteApiKey !== '') {
    providerConfig.remoteApiKey = config.remoteApiKey;
  }
  return providerConfig;
}
