import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { RULES } from "../lib/rules.js";
import type { Rule } from "../lib/rules.js";
import { formatRuleTable } from "../lib/format.js";
import { localeOption, resolveLocale, textResult } from "./options.js";

export const listStructureRulesSchema = {
  tag: z
    .enum(["headings", "landmarks"])
    .optional()
    .describe("Filter by structure type"),
  severity: z
    .enum(["error", "warning"])
    .optional()
    .describe("Filter by severity"),
  locale: localeOption,
};

export function filterRules(
  rules: readonly Rule[],
  filters: { tag?: Rule["tag"]; severity?: Rule["severity"] }
): Rule[] {
  let filtered = [...rules];
  if (filters.tag) {
    filtered = filtered.filter((r) => r.tag === filters.tag);
  }
  if (filters.severity) {
    filtered = filtered.filter((r) => r.severity === filters.severity);
  }
  return filtered;
}

export function registerListStructureRules(server: McpServer): void {
  server.tool(
    "list_structure_rules",
    "List the heading and landmark structure rules, optionally filtered by structure type or severity.",
    listStructureRulesSchema,
    async ({ tag, severity, locale }) => {
      const rules = filterRules(RULES, { tag, severity });
      return textResult(formatRuleTable(rules, resolveLocale(locale)));
    }
  );
}
