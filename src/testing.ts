import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { AxiosError, type AxiosInstance, type AxiosResponse, type InternalAxiosRequestConfig } from "axios";
import { createHttpClient } from "./fetcher.js";
import type { Mailer } from "./mailer.js";
import type { OutgoingMessage } from "./types.js";

export interface StubReply {
  status?: number;
  body?: string | Buffer;
  headers?: Record<string, string>;
  /** Fail without a response, the way a timeout or reset does. */
  networkError?: string;
}

export type StubRoute = StubReply | StubReply[] | ((url: string) => StubReply);

export interface StubbedClient {
  client: AxiosInstance;
  calls: string[];
  requests: InternalAxiosRequestConfig[];
  /** Highest number of requests in flight at once. */
  peak: () => number;
}

/**
 * Real axios instance from createHttpClient with its adapter replaced, so requests go
 * through the configured defaults and never leave the process. A list of replies is
 * consumed in order and its last entry repeats; unknown URLs get a 404.
 */
export function stubHttpClient(routes: Record<string, StubRoute>, latencyMs = 0): StubbedClient {
  const client = createHttpClient({ timeoutMs: 5000, acceptLanguage: "en-US,en;q=0.9" });
  const calls: string[] = [];
  const requests: InternalAxiosRequestConfig[] = [];
  const served = new Map<string, number>();
  let inFlight = 0;
  let peak = 0;

  client.defaults.adapter = async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    const url = config.url ?? "";
    calls.push(url);
    requests.push(config);
    inFlight++;
    peak = Math.max(peak, inFlight);
    try {
      if (latencyMs > 0) await new Promise((resolve) => setTimeout(resolve, latencyMs));
      return respond(url, config);
    } finally {
      inFlight--;
    }
  };

  function respond(url: string, config: InternalAxiosRequestConfig): AxiosResponse {
    const route = routes[url];
    let stub: StubReply;
    if (route === undefined) {
      stub = { status: 404, body: "not found" };
    } else if (typeof route === "function") {
      stub = route(url);
    } else if (Array.isArray(route)) {
      const n = served.get(url) ?? 0;
      served.set(url, n + 1);
      stub = route[Math.min(n, route.length - 1)];
    } else {
      stub = route;
    }

    if (stub.networkError) {
      throw new AxiosError(stub.networkError, "ECONNABORTED", config);
    }
    const status = stub.status ?? 200;
    const body = stub.body ?? "";
    return {
      data: typeof body === "string" ? Buffer.from(body, "utf8") : body,
      status,
      statusText: String(status),
      headers: { "content-type": "text/html; charset=utf-8", ...stub.headers },
      config,
    };
  }

  return { client, calls, requests, peak: () => peak };
}

export interface RecordingMailer extends Mailer {
  sent: OutgoingMessage[];
  closed: number;
}

/** Mailer that records messages; addresses in `failFor` make `send` reject. */
export function recordingMailer(failFor: string[] = []): RecordingMailer {
  const mailer: RecordingMailer = {
    sent: [],
    closed: 0,
    async send(message: OutgoingMessage): Promise<void> {
      if (failFor.includes(message.to)) {
        throw new Error("550 mailbox unavailable");
      }
      mailer.sent.push(message);
    },
    close(): void {
      mailer.closed++;
    },
  };
  return mailer;
}

export function makeTempDir(prefix = "pagewatch-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
