import { analyzeHtml } from "./analyze.js";
import type { AnalysisResult } from "./analyze.js";
import type { Config } from "./config.js";
import { loadConfig, setDebug } from "./config.js";
import { ContentCache, createHttpFetcher } from "./content-cache.js";
import type { FetchBody } from "./content-cache.js";
import { MapErrorRegistry } from "./error-registry.js";
import type { ErrorRegistry } from "./error-registry.js";
import { STRUCTURE_TAGS } from "./types.js";
import type { StructureTag } from "./types.js";

const MAX_STORED_AUDITS = 10;
const storedAudits = new Map<string, AnalysisResult>();

let config: Config = loadConfig({});
const registry: ErrorRegistry = new MapErrorRegistry();
let cache = new ContentCache(fetcherFor(config));

function fetcherFor(c: Config): FetchBody {
  return createHttpFetcher({ timeoutMs: c.fetchTimeoutMs, userAgent: c.userAgent });
}

/** Apply configuration; replaces the content cache, dropping cached bodies. */
export function configure(next: Config, fetchBody?: FetchBody): void {
  config = next;
  setDebug(next.debug);
  cache = new ContentCache(fetchBody ?? fetcherFor(next));
}

export function getConfig(): Config {
  return config;
}

export function getRegistry(): ErrorRegistry {
  return registry;
}

export interface AuditOptions {
  types?: readonly StructureTag[];
  name?: string;
}

/**
 * One pass over a single document. The shared registry is emptied first
 * and only ever holds the document audited last.
 */
export function audit(html: string, options?: AuditOptions): AnalysisResult {
  registry.clearAll();
  const result = analyzeHtml(html, options?.types ?? STRUCTURE_TAGS, registry);

  if (options?.name) {
    storeAudit(options.name, result);
  }

  return result;
}

export async function auditUrl(
  url: string,
  options?: AuditOptions & { refresh?: boolean }
): Promise<AnalysisResult> {
  if (options?.refresh) {
    cache.clearCache(url);
  }
  const html = await cache.fetchContent(url);
  return audit(html, options);
}

export function storeAudit(name: string, result: AnalysisResult): void {
  // Evict oldest entry if at capacity
  if (storedAudits.size >= MAX_STORED_AUDITS && !storedAudits.has(name)) {
    const oldest = storedAudits.keys().next().value;
    if (oldest !== undefined) {
      storedAudits.delete(oldest);
    }
  }
  storedAudits.set(name, result);
}

export function getStoredAudit(name: string): AnalysisResult | undefined {
  return storedAudits.get(name);
}

export function clearStoredAudits(): void {
  storedAudits.clear();
}
