/**
 * Remote embedding provider for partlens
 *
 * HTTP-based embedding provider that calls a remote API.
 *
 * Expected API format:
 * - POST /embed
 * - Body: { "texts": ["text1", "text2", ...] }
 * - Response: { "embeddings": [[...], [...]], "dimensions": 384, "model": "..." }
 */

import { z } from 'zod';
import {
  type EmbeddingProvider,
  type EmbeddingVector,
  EmbeddingError,
  EmbeddingErrorCode,
} from './types.js';

const EmbedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())).optional(),
  dimensions: z.number().int().optional(),
  model: z.string().optional(),
  error: z.string().optional(),
});

/**
 * Minimal fetch signature, injectable for tests
 */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface RemoteEmbeddingOptions {
  url: string;
  model: string;
  dimensions: number;
  apiKey?: string;
  batchSize?: number;
  maxTokens?: number;
  requestTimeoutMs?: number;
  fetch?: FetchLike;
}

/**
 * Remote embedding provider
 */
export class RemoteEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'remote';
  readonly modelVersion: string;
  readonly dimensions: number;
  readonly maxTokens: number;

  private url: string;
  private apiKey: string | undefined;
  private initialized = false;
  private batchSize: number;
  private requestTimeoutMs: number;
  private fetchFn: FetchLike;

  constructor(options: RemoteEmbeddingOptions) {
    this.url = options.url;
    this.apiKey = options.apiKey;
    this.dimensions = options.dimensions;
    this.maxTokens = options.maxTokens ?? 512;
    this.batchSize = options.batchSize ?? 32;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10000;
    this.modelVersion = `${options.model}-${options.dimensions}`;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async initialize(): Promise<void> {
    if (this.initialized) return;

    // Verify the remote endpoint is reachable by calling /info, then /health
    try {
      const infoUrl = this.url.replace(/\/embed\/?$/, '/info');
      const response = await this.request(infoUrl, { method: 'GET' });

      if (!response.ok) {
        const healthUrl = this.url.replace(/\/embed\/?$/, '/health');
        const healthResponse = await this.request(healthUrl, { method: 'GET' });

        if (!healthResponse.ok) {
          throw new Error(`Health check failed: ${healthResponse.status}`);
        }
      }

      this.initialized = true;
    } catch (error) {
      throw new EmbeddingError(
        `Failed to connect to embedding service at ${this.url}: ${error instanceof Error ? error.message : String(error)}`,
        EmbeddingErrorCode.NETWORK_ERROR,
        error instanceof Error ? error : undefined
      );
    }
  }

  isReady(): boolean {
    return this.initialized;
  }

  private getHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
    };

    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    return headers;
  }

  private request(url: string, init: RequestInit): Promise<Response> {
    return this.fetchFn(url, {
      ...init,
      headers: this.getHeaders(),
      signal: AbortSignal.timeout(this.requestTimeoutMs),
    });
  }

  async embed(text: string): Promise<EmbeddingVector> {
    const results = await this.embedBatch([text]);
    const result = results[0];
    if (result === undefined) {
      throw new EmbeddingError('No embedding result returned', EmbeddingErrorCode.EMBEDDING_FAILED);
    }
    return result;
  }

  async embedBatch(texts: string[]): Promise<EmbeddingVector[]> {
    if (!this.initialized) {
      throw new EmbeddingError('Provider not initialized', EmbeddingErrorCode.NOT_INITIALIZED);
    }

    if (texts.length === 0) {
      return [];
    }

    const results: EmbeddingVector[] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      results.push(...(await this.embedBatchRequest(batch)));
    }
    return results;
  }

  /**
   * Make a single batch request to the embedding API
   */
  private async embedBatchRequest(texts: string[]): Promise<EmbeddingVector[]> {
    let response: Response;
    try {
      response = await this.request(this.url, {
        method: 'POST',
        body: JSON.stringify({ texts }),
      });
    } catch (error) {
      throw new EmbeddingError(
        `Embedding request failed: ${error instanceof Error ? error.message : String(error)}`,
        EmbeddingErrorCode.NETWORK_ERROR,
        error instanceof Error ? error : undefined
      );
    }

    if (!response.ok) {
      const errorText = await response.text();
      throw new EmbeddingError(
        `Embedding API error (${response.status}): ${errorText}`,
        EmbeddingErrorCode.EMBEDDING_FAILED
      );
    }

    const parsed = EmbedResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new EmbeddingError(
        `Invalid response format: ${parsed.error.message}`,
        EmbeddingErrorCode.EMBEDDING_FAILED
      );
    }
    const data = parsed.data;

    if (data.error) {
      throw new EmbeddingError(
        `Embedding API returned error: ${data.error}`,
        EmbeddingErrorCode.EMBEDDING_FAILED
      );
    }

    if (data.embeddings === undefined) {
      throw new EmbeddingError(
        'Invalid response format: missing embeddings array',
        EmbeddingErrorCode.EMBEDDING_FAILED
      );
    }

    if (data.embeddings.length !== texts.length) {
      throw new EmbeddingError(
        `Embedding count mismatch: expected ${texts.length}, got ${data.embeddings.length}`,
        EmbeddingErrorCode.EMBEDDING_FAILED
      );
    }

    for (const embedding of data.embeddings) {
      if (embedding.length !== this.dimensions) {
        throw new EmbeddingError(
          `Embedding service returned ${embedding.length} dimensions, expected ${this.dimensions}`,
          EmbeddingErrorCode.DIMENSION_MISMATCH
        );
      }
    }

    return data.embeddings;
  }
}
