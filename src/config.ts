/**
 * Configuration: environment variables with defaults.
 */

import { resolve } from "node:path";
import { z } from "zod";
import { ValidationError } from "./domain/errors.ts";
import { DEFAULT_CONVENTION_CATEGORIES } from "./domain/types.ts";
import { LOG_LEVELS, type LogLevel } from "./infra/logger.ts";
import { DEFAULT_MODEL, modelDimensions } from "./infra/embedding-model.ts";
import type { DispatchMode } from "./application/embedding/post-commit.ts";

export interface CatalogConfig {
  databasePath: string;
  embeddingModel: string;
  embeddingDimensions: number;
  embeddingDispatch: DispatchMode;
  logLevel: LogLevel;
  conventionCategories: string[];
}

const envSchema = z.object({
  CATALOG_DB_PATH: z.string().min(1).default(".catalog/catalog.db"),
  CATALOG_EMBEDDING_MODEL: z.string().min(1).default(DEFAULT_MODEL),
  // defaults to the size the chosen model produces
  CATALOG_EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().optional(),
  CATALOG_EMBEDDING_DISPATCH: z.enum(["inline", "background"]).default("inline"),
  CATALOG_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  CATALOG_CONVENTION_CATEGORIES: z.string().optional(),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CatalogConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ValidationError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  const vars = parsed.data;

  const categories = vars.CATALOG_CONVENTION_CATEGORIES
    ?.split(",")
    .map((c) => c.trim().toUpperCase())
    .filter((c) => c.length > 0);

  return {
    databasePath: vars.CATALOG_DB_PATH === ":memory:" ? ":memory:" : resolve(vars.CATALOG_DB_PATH),
    embeddingModel: vars.CATALOG_EMBEDDING_MODEL,
    embeddingDimensions: vars.CATALOG_EMBEDDING_DIMENSIONS ?? modelDimensions(vars.CATALOG_EMBEDDING_MODEL),
    embeddingDispatch: vars.CATALOG_EMBEDDING_DISPATCH,
    logLevel: vars.CATALOG_LOG_LEVEL,
    conventionCategories: categories && categories.length > 0 ? categories : [...DEFAULT_CONVENTION_CATEGORIES],
  };
}
