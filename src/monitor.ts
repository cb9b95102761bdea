import type { AxiosInstance } from "axios";
import type { AppConfig } from "./config.js";
import { applyOutcomes } from "./diff.js";
import { ConfigError } from "./errors.js";
import { createHttpClient, fetchAll, fetchOptionsFromConfig, type FetchOptions } from "./fetcher.js";
import { createSmtpMailer, type Mailer, smtpSettingsFromConfig } from "./mailer.js";
import { type DispatchResult, dispatch, planSubscriberMessages, planSummaryMessage } from "./notifier.js";
import { loadSources } from "./sources.js";
import { createStateStore, type StateStore } from "./store.js";
import { readSubscriptionRows, resolveSubscriptions } from "./subscriptions.js";
import type { OutgoingMessage, RunReport, SubscriptionMap } from "./types.js";

export interface MonitorDeps {
  config: AppConfig;
  client: AxiosInstance;
  store: StateStore;
  /** Called only when at least one message is due. */
  createMailer: () => Mailer;
  fetchOptions?: FetchOptions;
  now?: () => Date;
}

export interface RunResult {
  report: RunReport;
  delivery: DispatchResult;
}

export function createMonitorDeps(config: AppConfig): MonitorDeps {
  return {
    config,
    client: createHttpClient({ timeoutMs: config.FETCH_TIMEOUT_MS, acceptLanguage: config.ACCEPT_LANGUAGE }),
    store: createStateStore(config),
    createMailer: () => createSmtpMailer(smtpSettingsFromConfig(config)),
  };
}

function broadcastRecipient(config: AppConfig): string {
  const to = config.MAIL_TO ?? config.SMTP_USER;
  if (!to) {
    throw new ConfigError("Broadcast mode needs MAIL_TO or SMTP_USER as the recipient");
  }
  return to;
}

export async function runMonitorOnce(deps: MonitorDeps): Promise<RunResult> {
  const { config, client, store } = deps;
  const now = deps.now ?? (() => new Date());
  const startedAt = now();

  // Configuration is checked before any network work
  const sources = loadSources(config.SOURCES_FILE);
  let subscriptions: SubscriptionMap | null = null;
  let operator: string | null = null;
  if (config.NOTIFY_MODE === "subscriber") {
    subscriptions = resolveSubscriptions(readSubscriptionRows(config.SUBSCRIPTIONS_FILE));
  } else {
    operator = broadcastRecipient(config);
  }

  const state = await store.load();
  console.log(`[RUN] Checking ${sources.length} sources (state: ${store.description}, ${state.size} known)`);

  const outcomes = await fetchAll(client, sources, deps.fetchOptions ?? fetchOptionsFromConfig(config));
  const detection = applyOutcomes(state, outcomes, startedAt.toISOString());

  await store.save(state);
  console.log(`[STORE] Saved ${state.size} records to ${store.description}`);
  const report: RunReport = { startedAt: startedAt.toISOString(), finishedAt: now().toISOString(), ...detection };
  console.log(
    `[RUN] ${report.total} checked: ${report.changed} changed, ${report.baseline} baseline, ` +
      `${report.unchanged} unchanged, ${report.failed} failed`
  );
  for (const change of report.changes) {
    console.log(`[RUN] Changed: ${change.label} ${change.url}`);
  }

  let messages: OutgoingMessage[] = [];
  if (subscriptions) {
    messages = planSubscriberMessages(report.changes, subscriptions, startedAt);
    if (report.changes.length > 0 && messages.length === 0) {
      console.log("[RUN] Updates exist, but no subscribers matched.");
    }
  } else if (operator) {
    const summary = planSummaryMessage(
      report,
      operator,
      { alwaysSend: config.ALWAYS_SEND_SUMMARY, notifyOnFailure: config.NOTIFY_ON_FAILURE },
      startedAt
    );
    if (summary) messages = [summary];
  }

  if (messages.length === 0) {
    console.log("[RUN] No email to send.");
    return { report, delivery: { sent: [], failed: [] } };
  }

  const mailer = deps.createMailer();
  try {
    const delivery = await dispatch(messages, mailer);
    console.log(`[MAIL] ${delivery.sent.length} sent, ${delivery.failed.length} failed`);
    return { report, delivery };
  } finally {
    mailer.close();
  }
}
