/**
 * Table definitions for the two catalogs: key columns plus payload codecs.
 */

import { z } from "zod";
import {
  PolicyCategory,
  type ConventionKey,
  type ConventionPayload,
  type DomainDocument,
  type DomainKey,
  type DomainPayload,
  type ProjectConvention,
} from "../domain/types.ts";
import type { CatalogTable } from "./versioned-store.ts";

function jsonColumn<T extends z.ZodTypeAny>(schema: T) {
  return z
    .string()
    .transform((text): unknown => JSON.parse(text))
    .pipe(schema);
}

const embeddingColumn = z
  .string()
  .nullable()
  .transform((text): unknown => (text === null ? null : JSON.parse(text)))
  .pipe(z.array(z.number()).nullable());

const recordColumns = {
  identifier: z.string(),
  version: z.number().int().positive(),
  embedding: embeddingColumn,
  created_at: z.string(),
  updated_at: z.string(),
  deleted_at: z.string().nullable(),
};

// ── domain_document ─────────────────────────────────────────────────

const domainRow = z.object({
  ...recordColumns,
  project: z.string(),
  service: z.string(),
  domain: z.string(),
  summary: z.string(),
  properties: jsonColumn(
    z.array(
      z.object({
        name: z.string(),
        type: z.string(),
        description: z.string(),
        is_required: z.boolean(),
        is_immutable: z.boolean(),
      }),
    ),
  ),
  policies: jsonColumn(
    z.array(
      z.object({
        category: z.nativeEnum(PolicyCategory),
        subject: z.string().nullable(),
        content: z.string(),
      }),
    ),
  ),
  dependencies: jsonColumn(
    z.array(
      z.object({
        target_service: z.string().nullable(),
        target_domain: z.string(),
        relation_type: z.string(),
        description: z.string(),
      }),
    ),
  ),
});

export const domainTable: CatalogTable<DomainKey, DomainPayload, DomainDocument> = {
  name: "domain_document",
  keyColumns: ["project", "service", "domain"],
  keyValues: (key) => [key.project, key.service, key.domain],
  encodePayload: (payload) => ({
    summary: payload.summary,
    properties: JSON.stringify(payload.properties),
    policies: JSON.stringify(payload.policies),
    dependencies: JSON.stringify(payload.dependencies),
  }),
  decode: (row) => domainRow.parse(row),
};

// ── project_convention ──────────────────────────────────────────────

const conventionRow = z.object({
  ...recordColumns,
  project: z.string(),
  category: z.string(),
  title: z.string(),
  content: z.string(),
  example_correct: z.string().nullable(),
  example_incorrect: z.string().nullable(),
});

export const conventionTable: CatalogTable<ConventionKey, ConventionPayload, ProjectConvention> = {
  name: "project_convention",
  keyColumns: ["project", "category", "title"],
  keyValues: (key) => [key.project, key.category, key.title],
  encodePayload: (payload) => ({
    content: payload.content,
    example_correct: payload.example_correct,
    example_incorrect: payload.example_incorrect,
  }),
  decode: (row) => conventionRow.parse(row),
};
