import { Agent, fetch as undiciFetch } from "undici";
import { AppConfig } from "../config";
import { FetchedPage } from "../types";
import { RetrievalError } from "./errors";
import { createRateLimitPolicy, RateLimitPolicy } from "./rateLimit";

let insecureAgent: Agent | undefined;

function getInsecureAgent(): Agent {
  if (!insecureAgent) {
    insecureAgent = new Agent({
      connect: {
        rejectUnauthorized: false,
      },
    });
  }
  return insecureAgent;
}

export function getFetchDispatcher(ignoreHttpsErrors: boolean): Agent | undefined {
  if (!ignoreHttpsErrors) {
    return undefined;
  }
  return getInsecureAgent();
}

export interface HttpResponseLike {
  ok: boolean;
  status: number;
  url: string;
  headers: { get(name: string): string | null };
  text(): Promise<string>;
}

export interface FetchInit {
  method: "GET";
  headers: Record<string, string>;
  dispatcher?: Agent;
  signal: AbortSignal;
  redirect: "follow";
}

export type FetchLike = (url: string, init: FetchInit) => Promise<HttpResponseLike>;

export type PageFetcher = (url: string) => Promise<FetchedPage>;

export interface PageFetcherOptions {
  config: AppConfig;
  rateLimit?: RateLimitPolicy;
  fetchFn?: FetchLike;
  accept?: string;
}

const defaultFetch: FetchLike = (url, init) => undiciFetch(url, init);

async function fetchOnce(url: string, options: PageFetcherOptions, fetchFn: FetchLike): Promise<FetchedPage> {
  const { config } = options;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), config.requestTimeoutMs);

  try {
    const response = await fetchFn(url, {
      method: "GET",
      headers: {
        "user-agent": config.userAgent,
        accept: options.accept ?? "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
      },
      dispatcher: getFetchDispatcher(config.ignoreHttpsErrors),
      signal: controller.signal,
      redirect: "follow",
    });

    if (!response.ok) {
      throw new RetrievalError(url, response.status);
    }

    return {
      url: response.url || url,
      status: response.status,
      contentType: response.headers.get("content-type") ?? undefined,
      body: await response.text(),
    };
  } finally {
    clearTimeout(timeout);
  }
}

export function createPageFetcher(options: PageFetcherOptions): PageFetcher {
  const rateLimit = options.rateLimit ?? createRateLimitPolicy(options.config.throttle);
  const fetchFn = options.fetchFn ?? defaultFetch;
  return (url) => rateLimit.schedule(() => fetchOnce(url, options, fetchFn));
}
