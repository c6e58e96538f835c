/**
 * Domain catalog: validation and lifecycle for domain documents.
 */

import { NotFoundError } from "../../domain/errors.ts";
import { assertVersion, validateDomainSubmission, type DomainSubmission } from "../../domain/rules.ts";
import type { DomainDocument, DomainKey } from "../../domain/types.ts";
import type { Logger } from "../../infra/logger.ts";
import type { DomainStore, EmbeddingService } from "../embedding/embedding-service.ts";
import type { PostCommitDispatcher } from "../embedding/post-commit.ts";

export class DomainCatalogService {
  constructor(
    private readonly store: DomainStore,
    private readonly embeddings: EmbeddingService,
    private readonly dispatcher: PostCommitDispatcher,
    private readonly logger: Logger,
  ) {}

  /**
   * Save a new version of a domain document. The embedding is computed after
   * the save commits; its failure is logged and the saved document is still
   * returned, with `embedding` left null.
   */
  async createOrUpdate(input: DomainSubmission): Promise<DomainDocument> {
    const { key, payload } = validateDomainSubmission(input);
    const saved = this.store.save(key, payload);
    this.logger.info("saved domain document", {
      project: saved.project,
      service: saved.service,
      domain: saved.domain,
      version: saved.version,
      id: saved.identifier,
    });

    await this.dispatcher.dispatch({
      label: `embed ${this.store.tableName} ${saved.identifier}`,
      run: () => this.embeddings.embedDomainDocument(saved),
    });
    // inline mode has written the vector by now
    return this.store.findByIdentifier(saved.identifier) ?? saved;
  }

  /** Latest live version, or the given live version when `version` is set. */
  getByIdentity(project: string, service: string, domain: string, version?: number): DomainDocument | undefined {
    const key: DomainKey = { project, service, domain };
    if (version === undefined) return this.store.findLatest(key);
    assertVersion(version);
    return this.store.findVersion(key, version);
  }

  getByIdentifier(identifier: string): DomainDocument {
    const doc = this.store.findByIdentifier(identifier);
    if (!doc) throw new NotFoundError(`domain document ${identifier} not found`);
    return doc;
  }

  listProjects(): string[] {
    return this.store.listProjects();
  }

  listLatest(project: string): DomainDocument[] {
    return this.store.findAllLatestForProject(project);
  }

  /** Every version, oldest first, soft-deleted ones included. */
  listVersions(project: string, service: string, domain: string): DomainDocument[] {
    return this.store.findAllVersions({ project, service, domain });
  }

  softDelete(project: string, service: string, domain: string): number {
    const count = this.store.softDelete({ project, service, domain });
    this.logger.info("soft-deleted domain document", { project, service, domain, count });
    return count;
  }
}
