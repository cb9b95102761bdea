import crypto from "node:crypto";

export function sha256(input: string): string {
  return crypto.createHash("sha256").update(input, "utf8").digest("hex");
}

export function fingerprint(text: string): string {
  return sha256(text);
}

// Query parameters that change between fetches without the target changing
const VOLATILE_PARAMS = new Set([
  "_",
  "t",
  "v",
  "ts",
  "time",
  "timestamp",
  "rand",
  "random",
  "nocache",
  "sesskey",
  "sessionid",
  "jsessionid",
  "phpsessid",
  "sid",
  "utm_source",
  "utm_medium",
  "utm_campaign",
  "utm_term",
  "utm_content",
]);

export function normalizeUrl(href: string, base?: string): string {
  try {
    const url = new URL(href, base);
    for (const key of Array.from(url.searchParams.keys())) {
      if (VOLATILE_PARAMS.has(key.toLowerCase())) url.searchParams.delete(key);
    }
    // Path parameters such as ";jsessionid=..." are appended by some servlet containers
    url.pathname = url.pathname.replace(/;jsessionid=[^/]*/i, "");
    url.hash = "";
    return url.toString();
  } catch {
    return href;
  }
}

export function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return (url.protocol === "http:" || url.protocol === "https:") && url.hostname.length > 0;
  } catch {
    return false;
  }
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
