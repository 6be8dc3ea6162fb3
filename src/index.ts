#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./lib/config.js";
import type { Config } from "./lib/config.js";
import { configure } from "./lib/state.js";
import { registerAuditStructureHtml } from "./tools/audit-structure-html.js";
import { registerAuditStructureFile } from "./tools/audit-structure-file.js";
import { registerAuditStructureUrl } from "./tools/audit-structure-url.js";
import { registerDiffStructure } from "./tools/diff-structure.js";
import { registerListStructureRules } from "./tools/list-structure-rules.js";

function readConfig(): Config {
  try {
    return loadConfig();
  } catch (err) {
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
  }
}

configure(readConfig());

const server = new McpServer(
  {
    name: "structure-audit",
    version: "0.1.0",
  },
  {
    instructions: "Audits page markup for heading hierarchy and landmark region defects. Findings come with rule ids, counts and the offending elements. After editing markup, use diff_structure against a named audit to confirm fixes. Use audit_structure_url with refresh=true when the page at a URL has changed since the last fetch.",
  },
);

registerAuditStructureHtml(server);
registerAuditStructureFile(server);
registerAuditStructureUrl(server);
registerDiffStructure(server);
registerListStructureRules(server);

const transport = new StdioServerTransport();
await server.connect(transport);
