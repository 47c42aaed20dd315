/**
 * Local hashing embedding provider
 *
 * Deterministic, offline feature-hashing embedder: word unigrams and
 * character trigrams are hashed into a fixed number of signed buckets and
 * the result is L2-normalised. Texts sharing vocabulary land close together,
 * which is enough for catalog search without a model download.
 */

import {
  type EmbeddingProvider,
  type EmbeddingVector,
  EmbeddingError,
  EmbeddingErrorCode,
} from './types.js';

/** Weight of a whole-word feature relative to a character trigram */
const WORD_WEIGHT = 1.0;
const TRIGRAM_WEIGHT = 0.35;

/**
 * 32-bit FNV-1a hash
 */
export function fnv1a(input: string, seed = 0x811c9dc5): number {
  let hash = seed >>> 0;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash >>> 0;
}

function tokenize(text: string): string[] {
  return text
    .normalize('NFKC')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_]+/gu, ' ')
    .split(' ')
    .filter((t) => t.length > 0);
}

export class HashingEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'hashing';
  readonly modelVersion: string;
  readonly dimensions: number;
  readonly maxTokens = 8192;

  private initialized = false;

  constructor(dimensions: number = 256, model: string = 'hashing-v1') {
    if (!Number.isInteger(dimensions) || dimensions <= 0) {
      throw new EmbeddingError(
        `Invalid embedding dimensions: ${dimensions}`,
        EmbeddingErrorCode.NOT_INITIALIZED
      );
    }
    this.dimensions = dimensions;
    this.modelVersion = `${model}-${dimensions}`;
  }

  initialize(): Promise<void> {
    this.initialized = true;
    return Promise.resolve();
  }

  isReady(): boolean {
    return this.initialized;
  }

  async embed(text: string): Promise<EmbeddingVector> {
    const [vector] = await this.embedBatch([text]);
    if (vector === undefined) {
      throw new EmbeddingError('No embedding result returned', EmbeddingErrorCode.EMBEDDING_FAILED);
    }
    return vector;
  }

  embedBatch(texts: string[]): Promise<EmbeddingVector[]> {
    if (!this.initialized) {
      return Promise.reject(
        new EmbeddingError('Provider not initialized', EmbeddingErrorCode.NOT_INITIALIZED)
      );
    }
    return Promise.resolve(texts.map((text) => this.hashText(text)));
  }

  private hashText(text: string): EmbeddingVector {
    const vector = new Array<number>(this.dimensions).fill(0);

    for (const token of tokenize(text)) {
      this.addFeature(vector, `w:${token}`, WORD_WEIGHT);

      const padded = `#${token}#`;
      for (let i = 0; i + 3 <= padded.length; i++) {
        this.addFeature(vector, `c:${padded.slice(i, i + 3)}`, TRIGRAM_WEIGHT);
      }
    }

    let norm = 0;
    for (const v of vector) norm += v * v;
    norm = Math.sqrt(norm);
    if (norm === 0) return vector;
    return vector.map((v) => v / norm);
  }

  private addFeature(vector: number[], feature: string, weight: number): void {
    const hash = fnv1a(feature);
    const bucket = hash % this.dimensions;
    // Second hash picks the sign so collisions tend to cancel
    const sign = (fnv1a(feature, 0x9747b28c) & 1) === 0 ? 1 : -1;
    vector[bucket] = (vector[bucket] ?? 0) + sign * weight;
  }
}
