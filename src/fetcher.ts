import axios, { type AxiosInstance, type AxiosResponse, isAxiosError } from "axios";
import pLimit from "p-limit";
import type { AppConfig } from "./config.js";
import { FetchError, ParseError, describeError } from "./errors.js";
import { decodeBody, looksLikeFeed, normalize } from "./normalize.js";
import type { FetchOutcome, SourceItem } from "./types.js";
import { delay, fingerprint } from "./utils.js";

export const USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36 PageWatch/1.0";

export const RETRY_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

export interface RetryPolicy {
  /** Extra attempts after the first one. */
  retries: number;
  /** Delay before the n-th retry is `backoffMs * 2^(n-1)`. */
  backoffMs: number;
  retryStatuses: ReadonlySet<number>;
  /** Upper bound for a server-requested Retry-After delay. */
  maxRetryAfterMs: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface FetchOptions {
  concurrency: number;
  maxChars: number;
  policy: RetryPolicy;
}

export interface FetchedPage {
  url: string;
  status: number;
  contentType: string;
  body: Buffer;
  attempts: number;
}

export interface HttpClientOptions {
  timeoutMs: number;
  acceptLanguage: string;
}

export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  return axios.create({
    timeout: options.timeoutMs,
    maxRedirects: 5,
    responseType: "arraybuffer",
    validateStatus: () => true,
    headers: {
      "User-Agent": USER_AGENT,
      Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
      "Accept-Language": options.acceptLanguage,
      "Cache-Control": "no-cache",
      Pragma: "no-cache",
    },
  });
}

export function fetchOptionsFromConfig(config: AppConfig): FetchOptions {
  return {
    concurrency: config.FETCH_CONCURRENCY,
    maxChars: config.NORMALIZE_MAX_CHARS,
    policy: {
      retries: config.FETCH_RETRIES,
      backoffMs: config.FETCH_BACKOFF_MS,
      retryStatuses: RETRY_STATUSES,
      maxRetryAfterMs: 30000,
    },
  };
}

export async function fetchPage(client: AxiosInstance, url: string, policy: RetryPolicy): Promise<FetchedPage> {
  const sleep = policy.sleep ?? delay;

  for (let attempt = 1; ; attempt++) {
    let response: AxiosResponse<ArrayBuffer>;
    try {
      response = await client.get<ArrayBuffer>(url, { responseType: "arraybuffer" });
    } catch (err) {
      // No response at all: connection reset, DNS failure, timeout
      if (attempt <= policy.retries && isAxiosError(err) && !err.response) {
        const wait = backoff(policy, attempt);
        console.warn(`[FETCH] ${url}: ${describeError(err)}; retry ${attempt}/${policy.retries} in ${wait}ms`);
        await sleep(wait);
        continue;
      }
      throw new FetchError(url, describeError(err), attempt);
    }

    const { status } = response;
    if (status >= 200 && status < 300) {
      return {
        url,
        status,
        contentType: headerValue(response, "content-type"),
        body: Buffer.from(response.data),
        attempts: attempt,
      };
    }

    if (policy.retryStatuses.has(status) && attempt <= policy.retries) {
      const wait = retryAfter(headerValue(response, "retry-after"), policy) ?? backoff(policy, attempt);
      console.warn(`[FETCH] ${url} returned ${status}; retry ${attempt}/${policy.retries} in ${wait}ms`);
      await sleep(wait);
      continue;
    }

    throw new FetchError(url, `HTTP ${status}`, attempt, status);
  }
}

function backoff(policy: RetryPolicy, retry: number): number {
  return policy.backoffMs * 2 ** (retry - 1);
}

function retryAfter(value: string, policy: RetryPolicy): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  const ms = Number.isFinite(seconds) ? seconds * 1000 : Date.parse(value) - Date.now();
  if (Number.isNaN(ms)) return undefined;
  return Math.min(Math.max(0, ms), policy.maxRetryAfterMs);
}

function headerValue(response: AxiosResponse, name: string): string {
  const value: unknown = response.headers[name];
  if (typeof value === "string" || typeof value === "number") return String(value);
  return "";
}

export async function checkSource(
  client: AxiosInstance,
  source: SourceItem,
  options: FetchOptions
): Promise<FetchOutcome> {
  try {
    const page = await fetchPage(client, source.url, options.policy);
    const body = decodeBody(page.body, page.contentType);
    const text = normalize(body, looksLikeFeed(page.contentType, body), {
      baseUrl: source.url,
      maxChars: options.maxChars,
    });
    if (!text) {
      throw new ParseError(source.url, "Document has no extractable content");
    }
    return { kind: "ok", source, fingerprint: fingerprint(text) };
  } catch (err) {
    const error = describeError(err);
    console.error(`[FETCH] Failed for ${source.label || source.url}: ${error}`);
    return { kind: "error", source, error };
  }
}

export async function fetchAll(
  client: AxiosInstance,
  sources: SourceItem[],
  options: FetchOptions
): Promise<FetchOutcome[]> {
  const limiter = pLimit(options.concurrency);
  return Promise.all(sources.map((source) => limiter(() => checkSource(client, source, options))));
}
