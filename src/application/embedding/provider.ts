/**
 * Embedding provider port: text → fixed-length vector.
 */

import { EmbeddingProviderError } from "../../domain/errors.ts";

export interface EmbeddingProvider {
  readonly model: string;
  readonly dimensions: number;
  generateEmbedding(text: string): Promise<number[]>;
}

/**
 * Run the provider and check the result. Every failure, including a vector
 * of the wrong length, comes out as {@link EmbeddingProviderError}.
 */
export async function embed(provider: EmbeddingProvider, text: string): Promise<number[]> {
  let vector: number[];
  try {
    vector = await provider.generateEmbedding(text);
  } catch (err) {
    if (err instanceof EmbeddingProviderError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new EmbeddingProviderError(`${provider.model}: ${message}`, { cause: err });
  }

  if (vector.length !== provider.dimensions) {
    throw new EmbeddingProviderError(
      `${provider.model}: expected ${provider.dimensions} dimensions, got ${vector.length}`,
    );
  }
  if (!vector.every(Number.isFinite)) {
    throw new EmbeddingProviderError(`${provider.model}: vector contains non-finite values`);
  }
  return vector;
}
