/**
 * Searchable text for each catalog entry. Deterministic: the same entity
 * always yields the same string.
 */

import type { DomainDocument, ProjectConvention } from "../../domain/types.ts";

const SECTION_DELIMITER = " | ";
const ITEM_DELIMITER = ", ";

export function domainText(doc: DomainDocument): string {
  const parts = [
    `Domain: ${doc.domain}`,
    `Project: ${doc.project}`,
    `Service: ${doc.service}`,
    `Summary: ${doc.summary}`,
  ];

  if (doc.properties.length > 0) {
    const props = doc.properties.map((p) => `${p.name}(${p.type}): ${p.description}`);
    parts.push(`Properties: ${props.join(ITEM_DELIMITER)}`);
  }

  if (doc.policies.length > 0) {
    const policies = doc.policies.map((p) => `${p.category} - ${p.content}`);
    parts.push(`Policies: ${policies.join(ITEM_DELIMITER)}`);
  }

  return parts.join(SECTION_DELIMITER);
}

export function conventionText(conv: ProjectConvention): string {
  const parts = [
    `Convention: ${conv.title}`,
    `Category: ${conv.category}`,
    `Content: ${conv.content}`,
  ];

  if (conv.example_correct) parts.push(`Correct example: ${conv.example_correct}`);
  if (conv.example_incorrect) parts.push(`Incorrect example: ${conv.example_incorrect}`);

  return parts.join(SECTION_DELIMITER);
}
