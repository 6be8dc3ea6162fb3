import { z } from "zod";

const flag = z
  .enum(["1", "0", "true", "false", ""])
  .default("")
  .transform((v) => v === "1" || v === "true");

export const configSchema = z.object({
  STRUCTURE_AUDIT_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  STRUCTURE_AUDIT_USER_AGENT: z.string().min(1).default("structure-audit-mcp/0.1.0"),
  STRUCTURE_AUDIT_LOCALE: z.enum(["en", "de"]).default("en"),
  STRUCTURE_AUDIT_DEBUG: flag,
});

export interface Config {
  fetchTimeoutMs: number;
  userAgent: string;
  locale: "en" | "de";
  debug: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const c = parsed.data;
  return {
    fetchTimeoutMs: c.STRUCTURE_AUDIT_FETCH_TIMEOUT_MS,
    userAgent: c.STRUCTURE_AUDIT_USER_AGENT,
    locale: c.STRUCTURE_AUDIT_LOCALE,
    debug: c.STRUCTURE_AUDIT_DEBUG,
  };
}

let debugEnabled = false;

export function setDebug(enabled: boolean): void {
  debugEnabled = enabled;
}

/** stdout carries the MCP protocol, so diagnostics go to stderr. */
export function debug(message: string, ...details: unknown[]): void {
  if (debugEnabled) {
    console.error(`[structure-audit] ${message}`, ...details);
  }
}
