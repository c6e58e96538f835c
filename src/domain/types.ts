/**
 * Domain types for the domain/convention catalog.
 */

// ── Enums (as const objects for runtime + type safety) ──────────────

export const PolicyCategory = {
  PERMISSION: "PERMISSION",
  VALIDATION: "VALIDATION",
  BUSINESS_RULE: "BUSINESS_RULE",
  LIFECYCLE: "LIFECYCLE",
} as const;
export type PolicyCategory = (typeof PolicyCategory)[keyof typeof PolicyCategory];

/**
 * Default convention categories. Conventions store the category as a plain
 * string so the accepted set can grow through configuration alone.
 */
export const DEFAULT_CONVENTION_CATEGORIES: readonly string[] = [
  "NAMING",
  "ARCHITECTURE",
  "TESTING",
  "DOCUMENTATION",
  "ERROR_HANDLING",
  "PERMISSION",
  "VALIDATION",
  "BUSINESS_RULE",
];

export const DocumentType = {
  DOMAIN: "DOMAIN",
  CONVENTION: "CONVENTION",
} as const;
export type DocumentType = (typeof DocumentType)[keyof typeof DocumentType];

// ── Versioned record machinery ──────────────────────────────────────

/** Every logical key is scoped to a project. */
export interface LogicalKey {
  project: string;
}

/** Columns every catalog row carries regardless of its payload. */
export interface VersionedRecord {
  identifier: string;
  version: number;
  embedding: number[] | null;
  created_at: string;
  updated_at: string;
  deleted_at: string | null;
}

// ── Domain documents ────────────────────────────────────────────────

export interface DomainProperty {
  name: string;
  type: string;
  description: string;
  is_required: boolean;
  is_immutable: boolean;
}

export interface DomainPolicy {
  category: PolicyCategory;
  subject: string | null;
  content: string;
}

/** A declared edge from the owning document to another domain of the same project. */
export interface DomainDependency {
  /** `null` means the declaring document's own service. */
  target_service: string | null;
  target_domain: string;
  relation_type: string;
  description: string;
}

export interface DomainKey extends LogicalKey {
  service: string;
  domain: string;
}

export interface DomainPayload {
  summary: string;
  properties: DomainProperty[];
  policies: DomainPolicy[];
  dependencies: DomainDependency[];
}

export type DomainDocument = DomainKey & DomainPayload & VersionedRecord;

// ── Project conventions ─────────────────────────────────────────────

export interface ConventionKey extends LogicalKey {
  category: string;
  title: string;
}

export interface ConventionPayload {
  content: string;
  example_correct: string | null;
  example_incorrect: string | null;
}

export type ProjectConvention = ConventionKey & ConventionPayload & VersionedRecord;

// ── Search ──────────────────────────────────────────────────────────

/** Entity snapshot returned to callers: everything but the vector. */
export type Snapshot<E extends VersionedRecord> = Omit<E, "embedding"> & { has_embedding: boolean };

export type DocumentMatch =
  | {
      document_type: typeof DocumentType.DOMAIN;
      document_id: string;
      similarity: number;
      content: Snapshot<DomainDocument>;
    }
  | {
      document_type: typeof DocumentType.CONVENTION;
      document_id: string;
      similarity: number;
      content: Snapshot<ProjectConvention>;
    };

export interface SearchResult {
  query: string;
  total_count: number;
  matches: DocumentMatch[];
}

export function snapshot<E extends VersionedRecord>(entity: E): Snapshot<E> {
  const { embedding, ...rest } = entity;
  return { ...rest, has_embedding: embedding !== null };
}
