/**
 * Error taxonomy shared by stores, services and the agent surface.
 */

export type CatalogErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "EMBEDDING_PROVIDER_ERROR"
  | "PERSISTENCE_ERROR";

export abstract class CatalogError extends Error {
  abstract readonly code: CatalogErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed input. Raised before any storage call is attempted. */
export class ValidationError extends CatalogError {
  readonly code = "VALIDATION_ERROR";

  constructor(readonly issues: string[]) {
    super(issues.join("; "));
  }
}

/** A lookup where the caller asserted existence came back empty. */
export class NotFoundError extends CatalogError {
  readonly code = "NOT_FOUND";
}

export class EmbeddingProviderError extends CatalogError {
  readonly code = "EMBEDDING_PROVIDER_ERROR";
}

export class PersistenceError extends CatalogError {
  readonly code = "PERSISTENCE_ERROR";
}

export function isCatalogError(err: unknown): err is CatalogError {
  return err instanceof CatalogError;
}

export function describeError(err: unknown): string {
  if (err instanceof CatalogError) return `${err.code}: ${err.message}`;
  if (err instanceof Error) return err.message;
  return String(err);
}
