/**
 * domain-catalog CLI.
 *
 * Subcommands: backfill, search, impact, projects
 */

import { defineCommand, runMain } from "citty";
import { loadConfig } from "./config.ts";
import { createContainer, type Container } from "./container.ts";
import { semanticQuery } from "./application/queries/semantic-query.ts";
import { impactQuery } from "./application/queries/impact-query.ts";
import { describeError } from "./domain/errors.ts";

const dbArg = {
  db: { type: "string", description: "Path to the catalog database (default: $CATALOG_DB_PATH or .catalog/catalog.db)" },
} as const;

async function withContainer<T>(db: string | undefined, fn: (c: Container) => Promise<T>): Promise<T> {
  const env = db ? { ...process.env, CATALOG_DB_PATH: db } : process.env;
  const container = createContainer(loadConfig(env));
  try {
    return await fn(container);
  } finally {
    await container.close();
  }
}

function print(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

// ── Embedding backfill ──────────────────────────────────────────────

const backfillCmd = defineCommand({
  meta: { name: "backfill", description: "Compute embeddings for every live entry that has none" },
  args: { ...dbArg },
  async run({ args }) {
    const report = await withContainer(args.db, (c) => c.embeddings.backfill());
    print(report);
    if (report.failed.length > 0) process.exitCode = 1;
  },
});

// ── Queries ─────────────────────────────────────────────────────────

const searchCmd = defineCommand({
  meta: { name: "search", description: "Semantic search across domains and conventions" },
  args: {
    query: { type: "positional", description: "Search query text", required: true },
    n: { type: "string", description: "Max results", default: "10" },
    threshold: { type: "string", description: "Similarity threshold", default: "0.3" },
    ...dbArg,
  },
  async run({ args }) {
    const result = await withContainer(args.db, (c) =>
      semanticQuery(
        { query: args.query, topK: parseInt(args.n, 10), similarityThreshold: parseFloat(args.threshold) },
        { embeddings: c.embeddings, domainStore: c.domainStore, conventionStore: c.conventionStore, logger: c.logger },
      ),
    );
    print(result);
  },
});

const impactCmd = defineCommand({
  meta: { name: "impact", description: "List domains that declare a dependency on a domain" },
  args: {
    project: { type: "positional", description: "Project name", required: true },
    service: { type: "positional", description: "Service name", required: true },
    domain: { type: "positional", description: "Domain name", required: true },
    ...dbArg,
  },
  async run({ args }) {
    const result = await withContainer(args.db, async (c) =>
      impactQuery({ project: args.project, service: args.service, domain: args.domain }, c.domainStore),
    );
    print(result);
  },
});

const projectsCmd = defineCommand({
  meta: { name: "projects", description: "List projects with live entries" },
  args: { ...dbArg },
  async run({ args }) {
    const projects = await withContainer(args.db, async (c) => ({
      domains: c.domains.listProjects(),
      conventions: c.conventions.listProjects(),
    }));
    print(projects);
  },
});

// ── Main ────────────────────────────────────────────────────────────

const main = defineCommand({
  meta: { name: "domain-catalog", version: "1.0.0", description: "Domain and convention catalog toolkit" },
  subCommands: {
    backfill: backfillCmd,
    search: searchCmd,
    impact: impactCmd,
    projects: projectsCmd,
  },
});

runMain(main).catch((err: unknown) => {
  console.error(describeError(err));
  process.exit(1);
});
