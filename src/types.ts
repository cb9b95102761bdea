export interface SourceItem {
  label: string; // institution name, may repeat across URLs
  url: string;
}

export interface FingerprintRecord {
  url: string;
  fingerprint?: string; // sha256 of normalized content, kept across failures
  lastCheckedAt: string; // ISO
  lastError?: string;
}

export type FingerprintState = Map<string, FingerprintRecord>;

export type FetchOutcome =
  | { kind: "ok"; source: SourceItem; fingerprint: string }
  | { kind: "error"; source: SourceItem; error: string };

export type SourceStatus = "BASELINE" | "UNCHANGED" | "CHANGED" | "FAILED";

export interface ChangeEvent {
  label: string;
  url: string;
}

export interface FailureEntry {
  label: string;
  url: string;
  error: string;
}

export interface RunReport {
  startedAt: string; // ISO
  finishedAt: string; // ISO
  total: number;
  baseline: number;
  unchanged: number;
  changed: number;
  failed: number;
  changes: ChangeEvent[];
  failures: FailureEntry[];
}

/** label -> recipient addresses */
export type SubscriptionMap = Map<string, Set<string>>;

export interface OutgoingMessage {
  to: string;
  subject: string;
  text: string;
}
