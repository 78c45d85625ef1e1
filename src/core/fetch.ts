import { Agent, fetch as undiciFetch } from "undici";
import type { Dispatcher } from "undici";
import type { AppConfig } from "../config";

export interface HttpResponse {
  ok: boolean;
  status: number;
  text(): Promise<string>;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export interface HttpRequestInit {
  headers: Record<string, string>;
  dispatcher?: Dispatcher;
  signal?: AbortSignal;
}

export type FetchFn = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;

export const defaultFetch: FetchFn = (url, init) => undiciFetch(url, init);

interface DispatcherOptions {
  connectTimeoutMs?: number;
  readTimeoutMs?: number;
  ignoreHttpsErrors: boolean;
}

const dispatchers = new Map<string, Agent>();

function getDispatcher(options: DispatcherOptions): Agent {
  const key = JSON.stringify([options.connectTimeoutMs, options.readTimeoutMs, options.ignoreHttpsErrors]);
  let agent = dispatchers.get(key);
  if (!agent) {
    agent = new Agent({
      connect: {
        timeout: options.connectTimeoutMs,
        rejectUnauthorized: !options.ignoreHttpsErrors,
      },
      headersTimeout: options.readTimeoutMs,
      bodyTimeout: options.readTimeoutMs,
    });
    dispatchers.set(key, agent);
  }
  return agent;
}

/** Listing and measure pages: TLS options only, bounded by an overall request ceiling. */
export function getPageDispatcher(config: AppConfig): Agent {
  return getDispatcher({ ignoreHttpsErrors: config.ignoreHttpsErrors });
}

/** Document files: separate connect and read timeouts. */
export function getDocumentDispatcher(config: AppConfig): Agent {
  return getDispatcher({
    connectTimeoutMs: config.connectTimeoutMs,
    readTimeoutMs: config.readTimeoutMs,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
  });
}

export async function closeDispatchers(): Promise<void> {
  const agents = [...dispatchers.values()];
  dispatchers.clear();
  await Promise.all(agents.map((agent) => agent.close()));
}

const TIMEOUT_CODES = new Set([
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
  "ETIMEDOUT",
]);

export function isTimeoutError(error: unknown): boolean {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current instanceof Error; depth += 1) {
    if (current.name === "AbortError" || current.name === "TimeoutError") {
      return true;
    }
    const code: unknown = Reflect.get(current, "code");
    if (typeof code === "string" && TIMEOUT_CODES.has(code)) {
      return true;
    }
    current = current.cause;
  }
  return false;
}

export interface PageResponse {
  ok: boolean;
  status: number;
  body: string;
}

interface PageRequestOptions {
  config: AppConfig;
  fetchFn: FetchFn;
  accept: string;
}

/**
 * GET a page and read its body, aborting the whole exchange once
 * `requestTimeoutMs` has elapsed.
 */
export async function fetchPage(url: string, options: PageRequestOptions): Promise<PageResponse> {
  const { config, fetchFn, accept } = options;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), config.requestTimeoutMs);

  try {
    const response = await fetchFn(url, {
      headers: {
        "user-agent": config.userAgent,
        accept,
      },
      dispatcher: getPageDispatcher(config),
      signal: controller.signal,
    });
    const body = response.ok ? await response.text() : "";
    return { ok: response.ok, status: response.status, body };
  } finally {
    clearTimeout(timeout);
  }
}
