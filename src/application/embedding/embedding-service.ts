/**
 * Embedding service: owns the lifecycle of the `embedding` column.
 *
 * It computes vectors for saved rows and writes them back through
 * `updateEmbedding`; it never touches any other column.
 */

import { describeError } from "../../domain/errors.ts";
import {
  DocumentType,
  type ConventionKey,
  type ConventionPayload,
  type DomainDocument,
  type DomainKey,
  type DomainPayload,
  type LogicalKey,
  type ProjectConvention,
  type VersionedRecord,
} from "../../domain/types.ts";
import type { Logger } from "../../infra/logger.ts";
import type { VersionedStore } from "../../infra/versioned-store.ts";
import { embed, type EmbeddingProvider } from "./provider.ts";
import { conventionText, domainText } from "./text.ts";

export type DomainStore = VersionedStore<DomainKey, DomainPayload, DomainDocument>;
export type ConventionStore = VersionedStore<ConventionKey, ConventionPayload, ProjectConvention>;

interface EmbeddingTarget<E extends VersionedRecord & LogicalKey> {
  type: DocumentType;
  store: { updateEmbedding(identifier: string, vector: number[]): void; findMissingEmbedding(): E[] };
  textFor(entity: E): string;
}

export interface BackfillFailure {
  document_type: DocumentType;
  document_id: string;
  error: string;
}

export interface BackfillReport {
  processed: number;
  succeeded: number;
  failed: BackfillFailure[];
}

export class EmbeddingService {
  private readonly domains: EmbeddingTarget<DomainDocument>;
  private readonly conventions: EmbeddingTarget<ProjectConvention>;

  constructor(
    private readonly provider: EmbeddingProvider,
    domainStore: DomainStore,
    conventionStore: ConventionStore,
    private readonly logger: Logger,
  ) {
    this.domains = { type: DocumentType.DOMAIN, store: domainStore, textFor: domainText };
    this.conventions = { type: DocumentType.CONVENTION, store: conventionStore, textFor: conventionText };
  }

  embedText(text: string): Promise<number[]> {
    return embed(this.provider, text);
  }

  /** Compute and store the vector for one domain document. Throws on failure. */
  embedDomainDocument(doc: DomainDocument): Promise<void> {
    return this.embedInto(this.domains, doc);
  }

  /** Compute and store the vector for one convention. Throws on failure. */
  embedConvention(conv: ProjectConvention): Promise<void> {
    return this.embedInto(this.conventions, conv);
  }

  /**
   * Embed every live row that has no vector yet. One failure does not stop
   * the batch; failures are collected in the report.
   */
  async backfill(): Promise<BackfillReport> {
    const report: BackfillReport = { processed: 0, succeeded: 0, failed: [] };
    await this.backfillTarget(this.domains, report);
    await this.backfillTarget(this.conventions, report);
    this.logger.info("backfill finished", {
      processed: report.processed,
      succeeded: report.succeeded,
      failed: report.failed.length,
    });
    return report;
  }

  private async backfillTarget<E extends VersionedRecord & LogicalKey>(
    target: EmbeddingTarget<E>,
    report: BackfillReport,
  ): Promise<void> {
    const rows = target.store.findMissingEmbedding();
    this.logger.info("backfilling embeddings", { type: target.type, rows: rows.length });

    for (const row of rows) {
      report.processed++;
      try {
        await this.embedInto(target, row);
        report.succeeded++;
      } catch (err) {
        this.logger.warn("backfill entry failed", { type: target.type, id: row.identifier, error: err });
        report.failed.push({
          document_type: target.type,
          document_id: row.identifier,
          error: describeError(err),
        });
      }
    }
  }

  private async embedInto<E extends VersionedRecord & LogicalKey>(
    target: EmbeddingTarget<E>,
    entity: E,
  ): Promise<void> {
    const vector = await embed(this.provider, target.textFor(entity));
    target.store.updateEmbedding(entity.identifier, vector);
    this.logger.debug("stored embedding", {
      type: target.type,
      id: entity.identifier,
      project: entity.project,
      dimensions: vector.length,
    });
  }
}
