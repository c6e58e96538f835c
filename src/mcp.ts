/**
 * MCP server: exposes the domain and convention catalogs to agents.
 *
 * Tools: read_domain_spec, read_project_conventions, analyze_impact,
 *        semantic_search, create_or_update_domain_document,
 *        create_or_update_project_convention, soft_delete_domain_document,
 *        soft_delete_project_convention, list_projects,
 *        list_domain_versions, list_convention_versions
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { loadConfig } from "./config.ts";
import { createContainer } from "./container.ts";
import { TOOL_DEFINITIONS, callTool } from "./mcp/tools.ts";

const container = createContainer(loadConfig());
const log = container.logger.child("server");

const server = new Server(
  { name: "domain-catalog", version: "1.0.0" },
  { capabilities: { tools: {} } },
);

server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOL_DEFINITIONS }));

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;
  return callTool(name, args, container);
});

async function shutdown(signal: string): Promise<void> {
  log.info("shutting down", { signal });
  await server.close();
  await container.close();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      log.error("shutdown failed", { error: err });
      process.exit(1);
    });
  });
}

const transport = new StdioServerTransport();
await server.connect(transport);
log.info("serving over stdio", { db: container.config.databasePath, model: container.provider.model });
