import { SendError, describeError } from "./errors.js";
import type { Mailer } from "./mailer.js";
import type { ChangeEvent, OutgoingMessage, RunReport, SubscriptionMap } from "./types.js";

export const SUBJECT_PREFIX = "[PageWatch]";
export const FAILURE_PREVIEW = 20;

export interface SummaryPolicy {
  /** Send even when nothing changed. */
  alwaysSend: boolean;
  /** Send when the only news is failed fetches. */
  notifyOnFailure: boolean;
}

export interface DispatchResult {
  sent: string[];
  failed: SendError[];
}

export function formatStamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 16)} UTC`;
}

function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return url;
  }
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? "" : "s"}`;
}

function groupByLabel(changes: ChangeEvent[]): Map<string, string[]> {
  const groups = new Map<string, string[]>();
  for (const change of changes) {
    const urls = groups.get(change.label) ?? [];
    if (!urls.includes(change.url)) urls.push(change.url);
    groups.set(change.label, urls);
  }
  return groups;
}

export function planSubscriberMessages(
  changes: ChangeEvent[],
  subscriptions: SubscriptionMap,
  now: Date
): OutgoingMessage[] {
  const byRecipient = new Map<string, ChangeEvent[]>();
  for (const change of changes) {
    for (const email of subscriptions.get(change.label) ?? []) {
      const list = byRecipient.get(email) ?? [];
      list.push(change);
      byRecipient.set(email, list);
    }
  }

  const messages: OutgoingMessage[] = [];
  for (const [email, own] of byRecipient) {
    const groups = groupByLabel(own);
    const lines = [`Updates detected on pages you follow (${formatStamp(now)}):`, ""];
    for (const [label, urls] of groups) {
      lines.push(label);
      for (const url of urls) {
        lines.push(`- ${hostOf(url)}`, `  ${url}`);
      }
      lines.push("");
    }
    lines.push("Please confirm details on the official site. Reply to this email to pause or unsubscribe.");

    messages.push({
      to: email,
      subject: `${SUBJECT_PREFIX} ${plural(groups.size, "subscribed source")} updated`,
      text: lines.join("\n"),
    });
  }
  return messages;
}

export function planSummaryMessage(
  report: RunReport,
  to: string,
  policy: SummaryPolicy,
  now: Date
): OutgoingMessage | null {
  const worthSending =
    report.changed > 0 || policy.alwaysSend || (policy.notifyOnFailure && report.failed > 0);
  if (!worthSending) return null;

  const lines = [
    `PageWatch run at ${formatStamp(now)}`,
    `Sources checked: ${report.total} | changed: ${report.changed} | new baseline: ${report.baseline} | unchanged: ${report.unchanged} | failed: ${report.failed}`,
    "",
  ];

  if (report.changes.length === 0) {
    lines.push("No changes detected.", "");
  } else {
    lines.push("Changed:");
    for (const [label, urls] of groupByLabel(report.changes)) {
      lines.push(label || "(unlabelled)");
      for (const url of urls) lines.push(`- ${url}`);
    }
    lines.push("");
  }

  if (report.failures.length > 0) {
    lines.push(`Failed (${report.failures.length}):`);
    for (const f of report.failures.slice(0, FAILURE_PREVIEW)) {
      lines.push(`- ${f.label ? `${f.label} ` : ""}${f.url}: ${f.error}`);
    }
    if (report.failures.length > FAILURE_PREVIEW) {
      lines.push(`... and ${report.failures.length - FAILURE_PREVIEW} more`);
    }
  }

  return {
    to,
    subject: `${SUBJECT_PREFIX} ${report.changed} changed, ${report.failed} failed of ${report.total}`,
    text: lines.join("\n").trim(),
  };
}

export async function dispatch(messages: OutgoingMessage[], mailer: Mailer): Promise<DispatchResult> {
  const result: DispatchResult = { sent: [], failed: [] };

  for (const message of messages) {
    try {
      await mailer.send(message);
      result.sent.push(message.to);
      console.log(`[MAIL] Sent to ${message.to}: ${message.subject}`);
    } catch (err) {
      const error = err instanceof SendError ? err : new SendError(message.to, describeError(err));
      result.failed.push(error);
      console.error(`[MAIL] Failed to send to ${message.to}: ${error.message}`);
    }
  }

  return result;
}
