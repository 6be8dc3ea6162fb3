import { z } from "zod";
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { audit } from "../lib/state.js";
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

export const auditStructureFileSchema = {
  path: z
    .string()
    .describe("Path to HTML file (absolute, or relative to cwd)"),
  types: typesOption,
  name: nameOption,
  locale: localeOption,
  show_tree: showTreeOption,
};

export function registerAuditStructureFile(server: McpServer): void {
  server.tool(
    "audit_structure_file",
    "Read an HTML file from disk and audit its heading and landmark structure.",
    auditStructureFileSchema,
    async ({ path, types, name, locale, show_tree }) => {
      let html: string;
      try {
        html = await readFile(resolve(path), "utf-8");
      } catch (err) {
        const message =
          err instanceof Error ? err.message : "Unknown error reading file";
        return errorResult(`Error reading file: ${message}`);
      }

      const result = audit(html, { types, name });
      return textResult(formatResult(result, { locale: resolveLocale(locale), showTree: show_tree }));
    }
  );
}
