import { ProxyAgent, fetch as undiciFetch } from "undici";
import type { FetchFn, ProxyConfig } from "./types.js";

/** A fetch bound to one proxy connection pool; `close()` releases the pool. */
export type ProxyFetch = {
  fetch: FetchFn;
  close: () => Promise<void>;
};

/** Pick the endpoint used for YouTube's https URLs. */
export function proxyUrlFor(proxies: ProxyConfig | undefined): string | undefined {
  return proxies?.https || proxies?.http || undefined;
}

/** Build a fetch that tunnels every request through `proxyUrl`. */
export function createProxyFetch(proxyUrl: string): ProxyFetch {
  const dispatcher = new ProxyAgent(proxyUrl);
  return {
    fetch: (url, init) => undiciFetch(url, { headers: init?.headers, dispatcher }),
    close: () => dispatcher.close(),
  };
}
