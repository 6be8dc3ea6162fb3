import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { audit } from "../lib/state.js";
import { formatResult } from "../lib/format.js";
import { localeOption, nameOption, resolveLocale, showTreeOption, textResult, typesOption } from "./options.js";

export const auditStructureHtmlSchema = {
  html: z.string().describe("HTML to audit for heading and landmark structure"),
  types: typesOption,
  name: nameOption,
  locale: localeOption,
  show_tree: showTreeOption,
};

export function registerAuditStructureHtml(server: McpServer): void {
  server.tool(
    "audit_structure_html",
    "Audit an HTML string for heading hierarchy and landmark region defects. Fragments are wrapped in a document shell.",
    auditStructureHtmlSchema,
    async ({ html, types, name, locale, show_tree }) => {
      const result = audit(html, { types, name });
      return textResult(formatResult(result, { locale: resolveLocale(locale), showTree: show_tree }));
    }
  );
}
