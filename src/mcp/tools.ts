/**
 * Agent-facing tools: definitions and dispatch.
 *
 * Kept apart from the stdio entry point so the dispatch can be exercised
 * without a transport.
 */

import type { CallToolResult, Tool } from "@modelcontextprotocol/sdk/types.js";
import { z, ZodError } from "zod";
import { semanticQuery } from "../application/queries/semantic-query.ts";
import { impactQuery } from "../application/queries/impact-query.ts";
import { ValidationError, isCatalogError } from "../domain/errors.ts";
import { snapshot } from "../domain/types.ts";
import type { Container } from "../container.ts";

// ── Definitions ─────────────────────────────────────────────────────

const projectName = { type: "string", description: "Project name (e.g. my-project)" };
const serviceName = { type: "string", description: "Service name (e.g. Auth)" };
const domainName = { type: "string", description: "Domain name (e.g. User)" };
const conventionCategory = {
  type: "string",
  description: "Convention category (e.g. NAMING, ARCHITECTURE, TESTING, DOCUMENTATION, ERROR_HANDLING)",
};
const conventionTitle = { type: "string", description: "Convention title" };

export const TOOL_DEFINITIONS: Tool[] = [
  {
    name: "read_domain_spec",
    description: "Read the properties, policies and dependencies of a domain. Returns the latest version unless a version is given.",
    inputSchema: {
      type: "object" as const,
      properties: {
        project_name: projectName,
        service_name: serviceName,
        domain_name: domainName,
        version: { type: "number", description: "Specific version (default: latest)" },
      },
      required: ["project_name", "service_name", "domain_name"],
    },
  },
  {
    name: "read_project_conventions",
    description: "Read the latest version of each project convention, optionally for one category.",
    inputSchema: {
      type: "object" as const,
      properties: {
        project_name: projectName,
        category: { ...conventionCategory, description: "Category filter (default: all categories)" },
      },
      required: ["project_name"],
    },
  },
  {
    name: "analyze_impact",
    description: "Impact analysis: which domains of the project declare a dependency on this domain? Direct referrers only.",
    inputSchema: {
      type: "object" as const,
      properties: { project_name: projectName, service_name: serviceName, domain_name: domainName },
      required: ["project_name", "service_name", "domain_name"],
    },
  },
  {
    name: "semantic_search",
    description: "Search domain documents and project conventions by meaning. Returns matches ranked by cosine similarity.",
    inputSchema: {
      type: "object" as const,
      properties: {
        query: { type: "string", description: "Natural language query" },
        top_k: { type: "number", description: "Max results (default: 10)" },
        similarity_threshold: { type: "number", description: "Keep matches scoring above this (default: 0.3)" },
      },
      required: ["query"],
    },
  },
  {
    name: "create_or_update_domain_document",
    description: "Create a domain document, or save a new version of an existing one. Earlier versions are kept.",
    inputSchema: {
      type: "object" as const,
      properties: {
        project_name: projectName,
        service_name: serviceName,
        domain_name: domainName,
        summary: { type: "string", description: "What the domain is for" },
        properties: {
          type: "array",
          description: "Domain properties; names must be unique",
          items: {
            type: "object",
            properties: {
              name: { type: "string" },
              type: { type: "string", description: "Data type (e.g. String, UUID, Enum)" },
              description: { type: "string" },
              is_required: { type: "boolean" },
              is_immutable: { type: "boolean" },
            },
            required: ["name", "type"],
          },
        },
        policies: {
          type: "array",
          description: "Domain policies",
          items: {
            type: "object",
            properties: {
              category: { type: "string", description: "PERMISSION, VALIDATION, BUSINESS_RULE or LIFECYCLE" },
              subject: { type: "string", description: "Who the policy applies to (e.g. ADMIN)" },
              content: { type: "string" },
            },
            required: ["category", "content"],
          },
        },
        dependencies: {
          type: "array",
          description: "Domains this one depends on",
          items: {
            type: "object",
            properties: {
              target_domain: { type: "string" },
              target_service: { type: "string", description: "Default: this document's service" },
              relation_type: { type: "string", description: "Default: DEPENDENCY" },
              description: { type: "string" },
            },
            required: ["target_domain"],
          },
        },
      },
      required: ["project_name", "service_name", "domain_name", "summary"],
    },
  },
  {
    name: "create_or_update_project_convention",
    description: "Create a project convention, or save a new version of an existing one. Earlier versions are kept.",
    inputSchema: {
      type: "object" as const,
      properties: {
        project_name: projectName,
        category: conventionCategory,
        title: conventionTitle,
        content: { type: "string", description: "The rule itself" },
        example_correct: { type: "string", description: "Example that follows the rule" },
        example_incorrect: { type: "string", description: "Example that breaks the rule" },
      },
      required: ["project_name", "category", "title", "content"],
    },
  },
  {
    name: "soft_delete_domain_document",
    description: "Soft-delete every version of a domain document. History stays readable.",
    inputSchema: {
      type: "object" as const,
      properties: { project_name: projectName, service_name: serviceName, domain_name: domainName },
      required: ["project_name", "service_name", "domain_name"],
    },
  },
  {
    name: "soft_delete_project_convention",
    description: "Soft-delete every version of a project convention. History stays readable.",
    inputSchema: {
      type: "object" as const,
      properties: { project_name: projectName, category: conventionCategory, title: conventionTitle },
      required: ["project_name", "category", "title"],
    },
  },
  {
    name: "list_projects",
    description: "List projects that have at least one live domain document or convention.",
    inputSchema: { type: "object" as const, properties: {} },
  },
  {
    name: "list_domain_versions",
    description: "List every version of a domain document, oldest first, including soft-deleted ones.",
    inputSchema: {
      type: "object" as const,
      properties: { project_name: projectName, service_name: serviceName, domain_name: domainName },
      required: ["project_name", "service_name", "domain_name"],
    },
  },
  {
    name: "list_convention_versions",
    description: "List every version of a project convention, oldest first, including soft-deleted ones.",
    inputSchema: {
      type: "object" as const,
      properties: { project_name: projectName, category: conventionCategory, title: conventionTitle },
      required: ["project_name", "category", "title"],
    },
  },
];

// ── Argument schemas ────────────────────────────────────────────────

const domainIdentity = z.object({
  project_name: z.string(),
  service_name: z.string(),
  domain_name: z.string(),
});

const conventionIdentity = z.object({
  project_name: z.string(),
  category: z.string(),
  title: z.string(),
});

const readDomainArgs = domainIdentity.extend({ version: z.number().int().positive().optional() });

const readConventionsArgs = z.object({
  project_name: z.string(),
  category: z.string().optional(),
});

const searchArgs = z.object({
  query: z.string(),
  top_k: z.number().int().positive().default(10),
  similarity_threshold: z.number().default(0.3),
});

const domainDocumentArgs = domainIdentity.extend({
  summary: z.string(),
  properties: z
    .array(
      z.object({
        name: z.string(),
        type: z.string(),
        description: z.string().default(""),
        is_required: z.boolean().default(false),
        is_immutable: z.boolean().default(false),
      }),
    )
    .default([]),
  policies: z
    .array(
      z.object({
        category: z.string(),
        subject: z.string().nullable().optional(),
        content: z.string(),
      }),
    )
    .default([]),
  dependencies: z
    .array(
      z.object({
        target_domain: z.string(),
        target_service: z.string().nullable().optional(),
        relation_type: z.string().optional(),
        description: z.string().optional(),
      }),
    )
    .default([]),
});

const conventionArgs = conventionIdentity.extend({
  content: z.string(),
  example_correct: z.string().nullable().optional(),
  example_incorrect: z.string().nullable().optional(),
});

// ── Dispatch ────────────────────────────────────────────────────────

export async function callTool(name: string, args: unknown, c: Container): Promise<CallToolResult> {
  const log = c.logger.child("mcp");
  log.info("tool call", { tool: name });

  try {
    switch (name) {
      case "read_domain_spec": {
        const a = readDomainArgs.parse(args ?? {});
        const doc = c.domains.getByIdentity(a.project_name, a.service_name, a.domain_name, a.version);
        if (!doc) {
          const version = a.version === undefined ? "latest" : `version ${a.version}`;
          return json({
            found: false,
            message: `Domain '${a.domain_name}' (${version}) not found in ${a.project_name}/${a.service_name}.`,
          });
        }
        return json({ found: true, document: snapshot(doc) });
      }

      case "read_project_conventions": {
        const a = readConventionsArgs.parse(args ?? {});
        return json(c.conventions.listByCategory(a.project_name, a.category).map(snapshot));
      }

      case "analyze_impact": {
        const a = domainIdentity.parse(args ?? {});
        return json(
          impactQuery(
            { project: a.project_name, service: a.service_name, domain: a.domain_name },
            c.domainStore,
          ),
        );
      }

      case "semantic_search": {
        const a = searchArgs.parse(args ?? {});
        const result = await semanticQuery(
          { query: a.query, topK: a.top_k, similarityThreshold: a.similarity_threshold },
          {
            embeddings: c.embeddings,
            domainStore: c.domainStore,
            conventionStore: c.conventionStore,
            logger: log,
          },
        );
        return json(result);
      }

      case "create_or_update_domain_document": {
        const a = domainDocumentArgs.parse(args ?? {});
        const saved = await c.domains.createOrUpdate({
          project: a.project_name,
          service: a.service_name,
          domain: a.domain_name,
          summary: a.summary,
          properties: a.properties,
          policies: a.policies,
          dependencies: a.dependencies,
        });
        return json(snapshot(saved));
      }

      case "create_or_update_project_convention": {
        const a = conventionArgs.parse(args ?? {});
        const saved = await c.conventions.createOrUpdate({
          project: a.project_name,
          category: a.category,
          title: a.title,
          content: a.content,
          example_correct: a.example_correct,
          example_incorrect: a.example_incorrect,
        });
        return json(snapshot(saved));
      }

      case "soft_delete_domain_document": {
        const a = domainIdentity.parse(args ?? {});
        const count = c.domains.softDelete(a.project_name, a.service_name, a.domain_name);
        return text(`${count} records soft-deleted for domain '${a.domain_name}'.`);
      }

      case "soft_delete_project_convention": {
        const a = conventionIdentity.parse(args ?? {});
        const count = c.conventions.softDelete(a.project_name, a.category, a.title);
        return text(`${count} records soft-deleted for convention '${a.title}'.`);
      }

      case "list_projects": {
        const projects = new Set([...c.domains.listProjects(), ...c.conventions.listProjects()]);
        return json({ projects: [...projects].sort() });
      }

      case "list_domain_versions": {
        const a = domainIdentity.parse(args ?? {});
        return json(c.domains.listVersions(a.project_name, a.service_name, a.domain_name).map(snapshot));
      }

      case "list_convention_versions": {
        const a = conventionIdentity.parse(args ?? {});
        return json(c.conventions.listVersions(a.project_name, a.category, a.title).map(snapshot));
      }

      default:
        return invalidInput(`Unknown tool: ${name}`);
    }
  } catch (err) {
    if (err instanceof ZodError) {
      return invalidInput(err.issues.map((i) => `${i.path.join(".") || "arguments"}: ${i.message}`).join("; "));
    }
    if (err instanceof ValidationError) {
      return invalidInput(err.message);
    }
    log.error("tool failed", { tool: name, code: isCatalogError(err) ? err.code : "UNEXPECTED", error: err });
    return errorResult({ type: "internal", message: `${name} failed due to an internal error.` });
  }
}

// ── Result helpers ──────────────────────────────────────────────────

function text(value: string): CallToolResult {
  return { content: [{ type: "text", text: value }] };
}

function json(value: unknown): CallToolResult {
  return text(JSON.stringify(value, null, 2));
}

function invalidInput(message: string): CallToolResult {
  return errorResult({ type: "invalid_input", message });
}

function errorResult(error: { type: "invalid_input" | "internal"; message: string }): CallToolResult {
  return { content: [{ type: "text", text: JSON.stringify({ error }, null, 2) }], isError: true };
}
