/**
 * Business rules as pure functions.
 *
 * Submission validation for both catalogs. Each validator collects every
 * problem before failing so the caller sees the whole list at once.
 */

import { ValidationError } from "./errors.ts";
import {
  PolicyCategory,
  type ConventionKey,
  type ConventionPayload,
  type DomainDependency,
  type DomainKey,
  type DomainPayload,
  type DomainPolicy,
  type DomainProperty,
} from "./types.ts";

// ── Category normalization ───────────────────────────────────────────

const POLICY_CATEGORY_LOOKUP: Record<string, PolicyCategory> = Object.fromEntries(
  Object.values(PolicyCategory).map((c) => [c, c]),
);

export function normalizeCategory(raw: string): string {
  return raw.trim().toUpperCase();
}

function isBlank(value: string | null | undefined): boolean {
  return value == null || value.trim().length === 0;
}

/** Version numbers start at 1. */
export function assertVersion(version: number): void {
  if (!Number.isInteger(version) || version < 1) {
    throw new ValidationError([`version must be a positive integer, got ${version}`]);
  }
}

// ── Domain submissions ───────────────────────────────────────────────

export interface PolicyInput {
  category: string;
  subject?: string | null;
  content: string;
}

export interface DependencyInput {
  target_service?: string | null;
  target_domain: string;
  relation_type?: string;
  description?: string;
}

export interface DomainSubmission extends DomainKey {
  summary: string;
  properties: DomainProperty[];
  policies: PolicyInput[];
  dependencies?: DependencyInput[];
}

/**
 * Validate and normalize a domain submission into the stored key and payload.
 * Throws {@link ValidationError} listing every violation.
 */
export function validateDomainSubmission(
  input: DomainSubmission,
): { key: DomainKey; payload: DomainPayload } {
  const issues: string[] = [];

  if (isBlank(input.project)) issues.push("project must not be empty");
  if (isBlank(input.service)) issues.push("service must not be empty");
  if (isBlank(input.domain)) issues.push("domain_name must not be empty");
  if (isBlank(input.summary)) issues.push("summary must not be empty");

  const seenProperties = new Set<string>();
  input.properties.forEach((prop, i) => {
    if (isBlank(prop.name)) {
      issues.push(`properties[${i}].name must not be empty`);
      return;
    }
    if (isBlank(prop.type)) issues.push(`properties[${i}].type must not be empty`);
    if (seenProperties.has(prop.name)) {
      issues.push(`duplicate property name '${prop.name}'`);
    }
    seenProperties.add(prop.name);
  });

  const policies: DomainPolicy[] = [];
  input.policies.forEach((policy, i) => {
    const category = POLICY_CATEGORY_LOOKUP[normalizeCategory(policy.category)];
    if (!category) {
      issues.push(
        `policies[${i}].category '${policy.category}' is not one of ${Object.values(PolicyCategory).join(", ")}`,
      );
    }
    if (isBlank(policy.content)) issues.push(`policies[${i}].content must not be empty`);
    if (category) {
      policies.push({
        category,
        subject: isBlank(policy.subject) ? null : (policy.subject ?? null),
        content: policy.content,
      });
    }
  });

  const dependencies = normalizeDependencies(input, issues);

  if (issues.length > 0) throw new ValidationError(issues);

  return {
    key: { project: input.project, service: input.service, domain: input.domain },
    payload: {
      summary: input.summary,
      properties: input.properties.map((p) => ({
        name: p.name,
        type: p.type,
        description: p.description,
        is_required: p.is_required,
        is_immutable: p.is_immutable,
      })),
      policies,
      dependencies,
    },
  };
}

function normalizeDependencies(input: DomainSubmission, issues: string[]): DomainDependency[] {
  const result: DomainDependency[] = [];
  const seen = new Set<string>();

  (input.dependencies ?? []).forEach((dep, i) => {
    if (isBlank(dep.target_domain)) {
      issues.push(`dependencies[${i}].target_domain must not be empty`);
      return;
    }
    const targetService = isBlank(dep.target_service) ? null : (dep.target_service ?? null);
    const resolvedService = targetService ?? input.service;

    if (resolvedService === input.service && dep.target_domain === input.domain) {
      issues.push(`dependencies[${i}] must not reference the document itself`);
      return;
    }
    const edgeKey = `${resolvedService}/${dep.target_domain}`;
    if (seen.has(edgeKey)) {
      issues.push(`duplicate dependency on '${edgeKey}'`);
      return;
    }
    seen.add(edgeKey);

    result.push({
      target_service: targetService,
      target_domain: dep.target_domain,
      relation_type: isBlank(dep.relation_type) ? "DEPENDENCY" : normalizeCategory(dep.relation_type ?? ""),
      description: dep.description ?? "",
    });
  });

  return result;
}

// ── Convention submissions ───────────────────────────────────────────

export interface ConventionSubmission extends ConventionKey {
  content: string;
  example_correct?: string | null;
  example_incorrect?: string | null;
}

export function validateConventionSubmission(
  input: ConventionSubmission,
  allowedCategories: readonly string[],
): { key: ConventionKey; payload: ConventionPayload } {
  const issues: string[] = [];
  const category = normalizeCategory(input.category);

  if (isBlank(input.project)) issues.push("project must not be empty");
  if (isBlank(input.title)) issues.push("title must not be empty");
  if (isBlank(input.content)) issues.push("content must not be empty");
  if (!allowedCategories.includes(category)) {
    issues.push(`category '${input.category}' is not one of ${allowedCategories.join(", ")}`);
  }

  if (issues.length > 0) throw new ValidationError(issues);

  return {
    key: { project: input.project, category, title: input.title },
    payload: {
      content: input.content,
      example_correct: isBlank(input.example_correct) ? null : (input.example_correct ?? null),
      example_incorrect: isBlank(input.example_incorrect) ? null : (input.example_incorrect ?? null),
    },
  };
}
