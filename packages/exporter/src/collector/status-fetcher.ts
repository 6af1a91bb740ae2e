/**
 * Status page fetcher.
 *
 * Issues one GET per target per cycle, routed through the target's proxy when
 * one is configured for the URL's protocol. Proxies are passed to each request
 * as an undici dispatcher; the process environment is left alone so that
 * concurrent fetches cannot see each other's settings.
 */

import { fetch, ProxyAgent, type Dispatcher } from "undici";
import type { Target } from "@modstatus-exporter/shared";
import { TransportError } from "../errors.js";

// ---------------------------------------------------------------------------
// URL helpers
// ---------------------------------------------------------------------------

const AUTO_PARAM = "auto";

/**
 * Make sure the status URL asks for the machine-readable page.
 *
 * Returns the URL unchanged when any query parameter is already named `auto`
 * (case-insensitive, with or without a value). Otherwise `auto` is appended
 * to the query string, leaving the rest of the URL as written.
 */
export function ensureAutoParameter(url: string): string {
  const hashIndex = url.indexOf("#");
  const base = hashIndex === -1 ? url : url.slice(0, hashIndex);
  const fragment = hashIndex === -1 ? "" : url.slice(hashIndex);

  const queryIndex = base.indexOf("?");
  if (queryIndex === -1) {
    return `${base}?${AUTO_PARAM}${fragment}`;
  }

  const query = base.slice(queryIndex + 1);
  for (const key of new URLSearchParams(query).keys()) {
    if (key.toLowerCase() === AUTO_PARAM) return url;
  }

  const joiner = query === "" || query.endsWith("&") ? "" : "&";
  return `${base}${joiner}${AUTO_PARAM}${fragment}`;
}

/** Proxy URL to use for `url`, picked by protocol, or undefined for none */
export function resolveProxy(target: Target, url: string): string | undefined {
  return new URL(url).protocol === "https:"
    ? target.proxy.httpsProxy
    : target.proxy.httpProxy;
}

// ---------------------------------------------------------------------------
// StatusFetcher
// ---------------------------------------------------------------------------

const DEFAULT_TIMEOUT_MS = 10_000;

export interface StatusFetcherOptions {
  /** Per-request timeout in ms (default: 10000) */
  timeoutMs?: number;
  /** Dispatcher for requests without a proxy (default: undici's global one) */
  dispatcher?: Dispatcher;
  /** Builds the dispatcher for a proxy URL (default: undici ProxyAgent) */
  createProxyAgent?: (proxyUrl: string) => Dispatcher;
}

/** Read side of the fetcher, so the collector can be tested without HTTP */
export interface StatusSource {
  fetch(target: Target): Promise<string>;
}

export class StatusFetcher implements StatusSource {
  private timeoutMs: number;
  private dispatcher: Dispatcher | undefined;
  private createProxyAgent: (proxyUrl: string) => Dispatcher;

  /** One agent per distinct proxy URL, kept for the life of the process */
  private proxyAgents = new Map<string, Dispatcher>();

  constructor(options?: StatusFetcherOptions) {
    this.timeoutMs = options?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.dispatcher = options?.dispatcher;
    this.createProxyAgent =
      options?.createProxyAgent ?? ((proxyUrl) => new ProxyAgent(proxyUrl));
  }

  /**
   * Fetch the raw status text for a target.
   *
   * @throws {TransportError} on network failure, timeout or a non-2xx status
   */
  async fetch(target: Target): Promise<string> {
    const url = ensureAutoParameter(target.url);

    let res;
    try {
      const proxyUrl = resolveProxy(target, url);
      const dispatcher = proxyUrl ? this.proxyAgent(proxyUrl) : this.dispatcher;
      res = await fetch(url, {
        dispatcher,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw this.toTransportError(url, err);
    }

    if (!res.ok) {
      // Drain the body so the connection can be reused
      await res.body?.cancel();
      throw new TransportError(url, `HTTP ${res.status} from ${url}`, res.status);
    }

    try {
      return await res.text();
    } catch (err) {
      throw this.toTransportError(url, err);
    }
  }

  /** Release pooled proxy connections */
  async close(): Promise<void> {
    const agents = Array.from(this.proxyAgents.values());
    this.proxyAgents.clear();
    await Promise.all(agents.map((agent) => agent.close()));
  }

  private proxyAgent(proxyUrl: string): Dispatcher {
    let agent = this.proxyAgents.get(proxyUrl);
    if (!agent) {
      agent = this.createProxyAgent(proxyUrl);
      this.proxyAgents.set(proxyUrl, agent);
    }
    return agent;
  }

  private toTransportError(url: string, err: unknown): TransportError {
    if (err instanceof Error && err.name === "TimeoutError") {
      return new TransportError(
        url,
        `request to ${url} timed out after ${this.timeoutMs}ms`,
        undefined,
        { cause: err },
      );
    }
    // undici reports network failures as TypeError("fetch failed") with the
    // real reason in `cause`
    const reason =
      err instanceof Error && err.cause instanceof Error ? err.cause : err;
    const message = reason instanceof Error ? reason.message : String(reason);
    return new TransportError(url, `request to ${url} failed: ${message}`, undefined, {
      cause: err,
    });
  }
}
