/**
 * Convention catalog: validation and lifecycle for project conventions.
 */

import { DEFAULT_CONVENTION_CATEGORIES, type ConventionKey, type ProjectConvention } from "../../domain/types.ts";
import {
  assertVersion,
  normalizeCategory,
  validateConventionSubmission,
  type ConventionSubmission,
} from "../../domain/rules.ts";
import type { Logger } from "../../infra/logger.ts";
import type { ConventionStore, EmbeddingService } from "../embedding/embedding-service.ts";
import type { PostCommitDispatcher } from "../embedding/post-commit.ts";

export class ConventionCatalogService {
  readonly categories: readonly string[];

  constructor(
    private readonly store: ConventionStore,
    private readonly embeddings: EmbeddingService,
    private readonly dispatcher: PostCommitDispatcher,
    private readonly logger: Logger,
    categories: readonly string[] = DEFAULT_CONVENTION_CATEGORIES,
  ) {
    this.categories = categories.map(normalizeCategory);
  }

  async createOrUpdate(input: ConventionSubmission): Promise<ProjectConvention> {
    const { key, payload } = validateConventionSubmission(input, this.categories);
    const saved = this.store.save(key, payload);
    this.logger.info("saved project convention", {
      project: saved.project,
      category: saved.category,
      title: saved.title,
      version: saved.version,
      id: saved.identifier,
    });

    await this.dispatcher.dispatch({
      label: `embed ${this.store.tableName} ${saved.identifier}`,
      run: () => this.embeddings.embedConvention(saved),
    });
    return this.store.findByIdentifier(saved.identifier) ?? saved;
  }

  getByIdentity(project: string, category: string, title: string, version?: number): ProjectConvention | undefined {
    const key = this.key(project, category, title);
    if (version === undefined) return this.store.findLatest(key);
    assertVersion(version);
    return this.store.findVersion(key, version);
  }

  /** Latest live version of each convention in `project`, narrowed to one category when given. */
  listByCategory(project: string, category?: string): ProjectConvention[] {
    const latest = this.store.findAllLatestForProject(project);
    if (category === undefined) return latest;
    const wanted = normalizeCategory(category);
    return latest.filter((c) => c.category === wanted);
  }

  listProjects(): string[] {
    return this.store.listProjects();
  }

  listVersions(project: string, category: string, title: string): ProjectConvention[] {
    return this.store.findAllVersions(this.key(project, category, title));
  }

  softDelete(project: string, category: string, title: string): number {
    const key = this.key(project, category, title);
    const count = this.store.softDelete(key);
    this.logger.info("soft-deleted project convention", { ...key, count });
    return count;
  }

  private key(project: string, category: string, title: string): ConventionKey {
    return { project, category: normalizeCategory(category), title };
  }
}
