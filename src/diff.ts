import type {
  ChangeEvent,
  FetchOutcome,
  FingerprintRecord,
  FingerprintState,
  RunReport,
  SourceStatus,
} from "./types.js";

export type Classification =
  | { status: "CHANGED"; record: FingerprintRecord; change: ChangeEvent }
  | { status: "FAILED"; record: FingerprintRecord; error: string }
  | { status: Exclude<SourceStatus, "CHANGED" | "FAILED">; record: FingerprintRecord };

export function classifyOutcome(
  stored: FingerprintRecord | undefined,
  outcome: FetchOutcome,
  checkedAt: string
): Classification {
  const { url, label } = outcome.source;

  // Failures keep the stored fingerprint so a recovery is never read as a first sighting
  if (outcome.kind === "error") {
    return {
      status: "FAILED",
      record: { url, fingerprint: stored?.fingerprint, lastCheckedAt: checkedAt, lastError: outcome.error },
      error: outcome.error,
    };
  }

  const record: FingerprintRecord = { url, fingerprint: outcome.fingerprint, lastCheckedAt: checkedAt };
  if (!stored?.fingerprint) return { status: "BASELINE", record };
  if (stored.fingerprint === outcome.fingerprint) return { status: "UNCHANGED", record };
  return { status: "CHANGED", record, change: { label, url } };
}

export type DetectionReport = Omit<RunReport, "startedAt" | "finishedAt">;

export function applyOutcomes(
  state: FingerprintState,
  outcomes: FetchOutcome[],
  checkedAt: string
): DetectionReport {
  const report: DetectionReport = {
    total: outcomes.length,
    baseline: 0,
    unchanged: 0,
    changed: 0,
    failed: 0,
    changes: [],
    failures: [],
  };

  for (const outcome of outcomes) {
    const result = classifyOutcome(state.get(outcome.source.url), outcome, checkedAt);
    state.set(result.record.url, result.record);

    switch (result.status) {
      case "BASELINE":
        report.baseline++;
        break;
      case "UNCHANGED":
        report.unchanged++;
        break;
      case "CHANGED":
        report.changed++;
        report.changes.push(result.change);
        break;
      case "FAILED":
        report.failed++;
        report.failures.push({ label: outcome.source.label, url: outcome.source.url, error: result.error });
        break;
    }
  }

  return report;
}
