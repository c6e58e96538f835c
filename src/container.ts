/**
 * Container: builds the database, provider, stores and services once.
 *
 * Expensive or stateful resources (database handle, embedding provider)
 * are created here and passed explicitly into each service.
 */

import type { CatalogConfig } from "./config.ts";
import { ConventionCatalogService } from "./application/catalogs/convention-catalog.ts";
import { DomainCatalogService } from "./application/catalogs/domain-catalog.ts";
import {
  EmbeddingService,
  type ConventionStore,
  type DomainStore,
} from "./application/embedding/embedding-service.ts";
import { PostCommitDispatcher } from "./application/embedding/post-commit.ts";
import type { EmbeddingProvider } from "./application/embedding/provider.ts";
import { openDatabase, type CatalogDatabase } from "./infra/database.ts";
import { createTransformersProvider } from "./infra/embedding-model.ts";
import { createLogger, type Logger } from "./infra/logger.ts";
import { conventionTable, domainTable } from "./infra/tables.ts";
import { VersionedStore, type VersionedStoreOptions } from "./infra/versioned-store.ts";

export interface Container {
  config: CatalogConfig;
  logger: Logger;
  db: CatalogDatabase;
  provider: EmbeddingProvider;
  domainStore: DomainStore;
  conventionStore: ConventionStore;
  dispatcher: PostCommitDispatcher;
  embeddings: EmbeddingService;
  domains: DomainCatalogService;
  conventions: ConventionCatalogService;
  /** Wait for background embedding work, then close the database. */
  close(): Promise<void>;
}

export interface ContainerOverrides {
  provider?: EmbeddingProvider;
  logger?: Logger;
  store?: VersionedStoreOptions;
}

export function createContainer(config: CatalogConfig, overrides: ContainerOverrides = {}): Container {
  const logger = overrides.logger ?? createLogger("catalog", { level: config.logLevel });
  const db = openDatabase(config.databasePath);
  const provider =
    overrides.provider ?? createTransformersProvider(config.embeddingModel, config.embeddingDimensions);

  const domainStore: DomainStore = new VersionedStore(db, domainTable, overrides.store);
  const conventionStore: ConventionStore = new VersionedStore(db, conventionTable, overrides.store);

  const dispatcher = new PostCommitDispatcher(config.embeddingDispatch, logger.child("post-commit"));
  const embeddings = new EmbeddingService(provider, domainStore, conventionStore, logger.child("embedding"));

  const domains = new DomainCatalogService(domainStore, embeddings, dispatcher, logger.child("domain"));
  const conventions = new ConventionCatalogService(
    conventionStore,
    embeddings,
    dispatcher,
    logger.child("convention"),
    config.conventionCategories,
  );

  logger.debug("container ready", {
    db: config.databasePath,
    model: provider.model,
    dispatch: dispatcher.mode,
  });

  return {
    config,
    logger,
    db,
    provider,
    domainStore,
    conventionStore,
    dispatcher,
    embeddings,
    domains,
    conventions,
    async close() {
      await dispatcher.idle();
      db.close();
    },
  };
}
