import { debug } from "./config.js";

export type FetchBody = (url: string) => Promise<string>;

export class ContentFetchError extends Error {
  readonly url: string;

  constructor(url: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to fetch content from ${url}: ${reason}`, { cause });
    this.name = "ContentFetchError";
    this.url = url;
  }
}

/**
 * Holds either the pending fetch or the resolved body for each URL, so
 * concurrent callers for one URL share a single request.
 */
export class ContentCache {
  private readonly entries = new Map<string, Promise<string> | string>();

  constructor(private readonly fetchBody: FetchBody) {}

  fetchContent(url: string): Promise<string> {
    if (typeof url !== "string" || url.length === 0) {
      return Promise.reject(new Error("Invalid URL provided to fetchContent"));
    }

    const cached = this.entries.get(url);
    if (cached !== undefined) {
      return typeof cached === "string" ? Promise.resolve(cached) : cached;
    }

    debug(`fetching ${url}`);
    // Settling only touches the entry while it is still this fetch, so a
    // clearCache() followed by a new request is never overwritten.
    const pending: Promise<string> = this.load(url).then(
      (body) => {
        if (this.entries.get(url) === pending) {
          this.entries.set(url, body);
        }
        return body;
      },
      (err: unknown) => {
        if (this.entries.get(url) === pending) {
          this.entries.delete(url);
        }
        debug(`fetch failed for ${url}`, err);
        throw new ContentFetchError(url, err);
      }
    );
    this.entries.set(url, pending);
    return pending;
  }

  clearCache(url: string): void {
    this.entries.delete(url);
  }

  clearAll(): void {
    this.entries.clear();
  }

  has(url: string): boolean {
    return this.entries.has(url);
  }

  private async load(url: string): Promise<string> {
    const body = await this.fetchBody(url);
    if (!body) {
      throw new Error(`Invalid response received for URL: ${url}`);
    }
    return body;
  }
}

export interface HttpFetcherOptions {
  timeoutMs: number;
  userAgent: string;
}

export function createHttpFetcher(options: HttpFetcherOptions): FetchBody {
  return async (url) => {
    const response = await fetch(url, {
      headers: {
        "user-agent": options.userAgent,
        "x-structure-analysis": "1",
      },
      signal: AbortSignal.timeout(options.timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`HTTP ${response.status} ${response.statusText}`);
    }

    const contentType = response.headers.get("content-type") ?? "";
    if (!contentType.includes("text/html")) {
      throw new Error(`Expected HTML but received content-type "${contentType}"`);
    }

    return response.text();
  };
}
