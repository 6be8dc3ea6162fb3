import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { audit, getStoredAudit } from "../lib/state.js";
import { diffResults } from "../lib/diff.js";
import { formatDiff } from "../lib/format.js";
import { errorResult, localeOption, resolveLocale, textResult, typesOption } from "./options.js";

export const diffStructureSchema = {
  html: z.string().describe("Updated HTML to audit and compare"),
  before: z
    .string()
    .describe("Name passed to a prior audit call (run audit_structure_html with this name first)"),
  types: typesOption,
  locale: localeOption,
};

export function registerDiffStructure(server: McpServer): void {
  server.tool(
    "diff_structure",
    "Audit new HTML and compare its structure findings against a previously named audit. Use after an edit to verify fixes.",
    diffStructureSchema,
    async ({ html, before, types, locale }) => {
      const beforeResult = getStoredAudit(before);
      if (!beforeResult) {
        return errorResult(
          `No stored audit named "${before}". Run audit_structure_html with name="${before}" first.`
        );
      }

      const afterResult = audit(html, { types });
      const diff = diffResults(beforeResult, afterResult);
      return textResult(formatDiff(diff, { locale: resolveLocale(locale) }));
    }
  );
}
