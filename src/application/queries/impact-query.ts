/**
 * Impact analysis: which domains declare a dependency on the given one.
 *
 * One linear pass over the latest live documents of the project. Only
 * direct referrers are reported; there is no transitive expansion.
 */

import type { DomainStore } from "../embedding/embedding-service.ts";

export interface ImpactQueryInput {
  project: string;
  service: string;
  domain: string;
}

export interface Dependent {
  identifier: string;
  service: string;
  domain: string;
  version: number;
  relation_type: string;
  description: string;
}

export interface ImpactQueryResult {
  project: string;
  service: string;
  domain: string;
  /** Latest version of the analyzed domain, `null` when it is not in the catalog. */
  analyzed: { identifier: string; version: number } | null;
  dependents: Dependent[];
  total: number;
  message: string;
}

export function impactQuery(input: ImpactQueryInput, store: DomainStore): ImpactQueryResult {
  const { project, service, domain } = input;
  const documents = store.findAllLatestForProject(project);

  let analyzed: ImpactQueryResult["analyzed"] = null;
  const dependents: Dependent[] = [];

  for (const doc of documents) {
    if (doc.service === service && doc.domain === domain) {
      analyzed = { identifier: doc.identifier, version: doc.version };
      continue;
    }
    const edge = doc.dependencies.find(
      (dep) => dep.target_domain === domain && (dep.target_service ?? doc.service) === service,
    );
    if (!edge) continue;
    dependents.push({
      identifier: doc.identifier,
      service: doc.service,
      domain: doc.domain,
      version: doc.version,
      relation_type: edge.relation_type,
      description: edge.description,
    });
  }

  return {
    project,
    service,
    domain,
    analyzed,
    dependents,
    total: dependents.length,
    message: describeImpact(domain, dependents),
  };
}

function describeImpact(domain: string, dependents: Dependent[]): string {
  if (dependents.length === 0) {
    return `No dependents: no domain references '${domain}'.`;
  }
  const names = dependents.map((d) => `${d.domain} (${d.service})`).join(", ");
  return `'${domain}' is referenced by ${dependents.length} domain(s): ${names}.`;
}
