/**
 * Semantic search across both catalogs (pure vector, no graph expansion).
 */

import { ValidationError } from "../../domain/errors.ts";
import {
  DocumentType,
  snapshot,
  type DocumentMatch,
  type SearchResult,
} from "../../domain/types.ts";
import { VectorIndex } from "../../infra/vector-store.ts";
import type { Logger } from "../../infra/logger.ts";
import type { ConventionStore, DomainStore, EmbeddingService } from "../embedding/embedding-service.ts";

export const DEFAULT_TOP_K = 10;
export const DEFAULT_SIMILARITY_THRESHOLD = 0.3;

export interface SemanticQueryInput {
  query: string;
  topK?: number;
  similarityThreshold?: number;
}

export async function semanticQuery(
  input: SemanticQueryInput,
  deps: {
    embeddings: EmbeddingService;
    domainStore: DomainStore;
    conventionStore: ConventionStore;
    logger?: Logger;
  },
): Promise<SearchResult> {
  const { query, topK = DEFAULT_TOP_K, similarityThreshold = DEFAULT_SIMILARITY_THRESHOLD } = input;

  const issues: string[] = [];
  if (query.trim().length === 0) issues.push("query must not be empty");
  if (!Number.isInteger(topK) || topK < 1) issues.push(`top_k must be a positive integer, got ${topK}`);
  if (!Number.isFinite(similarityThreshold) || similarityThreshold < -1 || similarityThreshold > 1) {
    issues.push(`similarity_threshold must be within [-1, 1], got ${similarityThreshold}`);
  }
  if (issues.length > 0) throw new ValidationError(issues);

  const queryVector = await deps.embeddings.embedText(query);

  // Phase 1: per-catalog candidates, each already best-first
  const domainIndex = new VectorIndex<DocumentMatch>();
  domainIndex.load(
    deps.domainStore.findEmbedded().map((doc) => ({
      item: { document_type: DocumentType.DOMAIN, document_id: doc.identifier, similarity: 0, content: snapshot(doc) },
      vector: doc.embedding ?? [],
    })),
  );
  const conventionIndex = new VectorIndex<DocumentMatch>();
  conventionIndex.load(
    deps.conventionStore.findEmbedded().map((conv) => ({
      item: { document_type: DocumentType.CONVENTION, document_id: conv.identifier, similarity: 0, content: snapshot(conv) },
      vector: conv.embedding ?? [],
    })),
  );

  // Phase 2: merge (domains first), stable global sort, truncate
  const candidates = [
    ...domainIndex.search(queryVector, topK, similarityThreshold),
    ...conventionIndex.search(queryVector, topK, similarityThreshold),
  ];
  candidates.sort((a, b) => b.similarity - a.similarity);

  const matches = candidates.slice(0, topK).map(({ item, similarity }) => ({ ...item, similarity }));

  deps.logger?.info("semantic search", {
    query,
    top_k: topK,
    threshold: similarityThreshold,
    domains: domainIndex.size,
    conventions: conventionIndex.size,
    matches: matches.length,
  });

  return { query, total_count: matches.length, matches };
}
