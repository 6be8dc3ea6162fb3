import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { auditUrl } from "../lib/state.js";
import { formatResult } from "../lib/format.js";
import {
  errorResult,
  localeOption,
  nameOption,
  resolveLocale,
  showTreeOption,
  textResult,
  typesOption,
} from "./options.js";

export const auditStructureUrlSchema = {
  url: z.string().url().describe("URL to fetch and audit"),
  types: typesOption,
  refresh: z
    .boolean()
    .optional()
    .describe("Drop the cached body for this URL and fetch it again"),
  name: nameOption,
  locale: localeOption,
  show_tree: showTreeOption,
};

export function registerAuditStructureUrl(server: McpServer): void {
  server.tool(
    "audit_structure_url",
    "Fetch a URL and audit the returned HTML for heading and landmark structure. Bodies are cached per URL; pass refresh after the page changed.",
    auditStructureUrlSchema,
    async ({ url, types, refresh, name, locale, show_tree }) => {
      try {
        const result = await auditUrl(url, { types, refresh, name });
        return textResult(formatResult(result, { locale: resolveLocale(locale), showTree: show_tree }));
      } catch (err) {
        const message = err instanceof Error ? err.message : "Unknown network error";
        return errorResult(`Error fetching URL: ${message}`);
      }
    }
  );
}
