import { z } from "zod";
import { getConfig } from "../lib/state.js";
import type { Locale } from "../lib/rules.js";

export const typesOption = z
  .array(z.enum(["headings", "landmarks"]))
  .min(1)
  .optional()
  .describe('Structure types to analyze (default: ["headings", "landmarks"])');

export const localeOption = z
  .enum(["en", "de"])
  .optional()
  .describe("Language of rule titles and descriptions");

export const showTreeOption = z
  .boolean()
  .optional()
  .describe("Include the heading outline and landmark tree");

export const nameOption = z
  .string()
  .optional()
  .describe('Store result for later diffing (e.g. "before")');

export function resolveLocale(locale: Locale | undefined): Locale {
  return locale ?? getConfig().locale;
}

export function errorResult(text: string) {
  return {
    content: [{ type: "text" as const, text }],
    isError: true,
  };
}

export function textResult(text: string) {
  return {
    content: [{ type: "text" as const, text }],
  };
}
