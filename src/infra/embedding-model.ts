/**
 * Embedding model: @huggingface/transformers wrapper.
 *
 * The pipeline is loaded on first use and shared by every provider that
 * asks for the same model.
 */

import type { FeatureExtractionPipeline } from "@huggingface/transformers";
import { z } from "zod";
import type { EmbeddingProvider } from "../application/embedding/provider.ts";

interface KnownModel {
  id: string;
  dimensions: number;
}

const MODEL_MAP: Record<string, KnownModel> = {
  "all-MiniLM-L6-v2": { id: "Xenova/all-MiniLM-L6-v2", dimensions: 384 },
  "all-mpnet-base-v2": { id: "Xenova/all-mpnet-base-v2", dimensions: 768 },
  "paraphrase-multilingual-MiniLM-L12-v2": { id: "Xenova/paraphrase-multilingual-MiniLM-L12-v2", dimensions: 384 },
};

export const DEFAULT_MODEL = "all-MiniLM-L6-v2";
const DEFAULT_DIMENSIONS = 384;

/** Output size of a known model; {@link DEFAULT_DIMENSIONS} for anything else. */
export function modelDimensions(modelName: string): number {
  return MODEL_MAP[modelName]?.dimensions ?? DEFAULT_DIMENSIONS;
}

const vectors = z.array(z.array(z.number()));

const pipelines = new Map<string, Promise<FeatureExtractionPipeline>>();

function getPipeline(modelId: string): Promise<FeatureExtractionPipeline> {
  let loading = pipelines.get(modelId);
  if (!loading) {
    loading = import("@huggingface/transformers").then(({ pipeline }) =>
      pipeline("feature-extraction", modelId, { dtype: "fp32" }),
    );
    // a failed load must not poison later attempts
    void loading.catch(() => pipelines.delete(modelId));
    pipelines.set(modelId, loading);
  }
  return loading;
}

function resolveModelId(modelName: string): string {
  return MODEL_MAP[modelName]?.id ?? (modelName.includes("/") ? modelName : `Xenova/${modelName}`);
}

export function createTransformersProvider(
  modelName: string = DEFAULT_MODEL,
  dimensions: number = modelDimensions(modelName),
): EmbeddingProvider {
  const modelId = resolveModelId(modelName);

  return {
    model: modelName,
    dimensions,
    async generateEmbedding(text: string): Promise<number[]> {
      const pipe = await getPipeline(modelId);
      const output = await pipe([text], { pooling: "mean", normalize: true });
      const [vector] = vectors.parse(output.tolist());
      if (!vector) throw new Error(`no embedding returned for model ${modelId}`);
      return vector;
    },
  };
}
