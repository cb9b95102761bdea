import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { SendError } from "./errors.js";
import { dispatch, formatStamp, planSubscriberMessages, planSummaryMessage } from "./notifier.js";
import { recordingMailer } from "./testing.js";
import type { ChangeEvent, RunReport, SubscriptionMap } from "./types.js";

const NOW = new Date("2026-03-01T08:00:00.000Z");

const alphaNews: ChangeEvent = { label: "Alpha University", url: "https://example.edu/news" };
const alphaGrad: ChangeEvent = { label: "Alpha University", url: "https://grad.example.edu/notices" };
const beta: ChangeEvent = { label: "Beta College", url: "https://beta.example.org/list" };

function report(overrides: Partial<RunReport> = {}): RunReport {
  return {
    startedAt: NOW.toISOString(),
    finishedAt: NOW.toISOString(),
    total: 0,
    baseline: 0,
    unchanged: 0,
    changed: 0,
    failed: 0,
    changes: [],
    failures: [],
    ...overrides,
  };
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("formatStamp", () => {
  it("renders minutes in UTC", () => {
    expect(formatStamp(NOW)).toBe("2026-03-01 08:00 UTC");
  });
});

describe("planSubscriberMessages", () => {
  it("builds one message for one subscriber", () => {
    const subs: SubscriptionMap = new Map([["Alpha University", new Set(["ann@example.com"])]]);
    expect(planSubscriberMessages([alphaNews], subs, NOW)).toEqual([
      {
        to: "ann@example.com",
        subject: "[PageWatch] 1 subscribed source updated",
        text: [
          "Updates detected on pages you follow (2026-03-01 08:00 UTC):",
          "",
          "Alpha University",
          "- example.edu",
          "  https://example.edu/news",
          "",
          "Please confirm details on the official site. Reply to this email to pause or unsubscribe.",
        ].join("\n"),
      },
    ]);
  });

  it("gives each recipient only their own labels, one address per message", () => {
    const subs: SubscriptionMap = new Map([
      ["Alpha University", new Set(["ann@example.com", "bob@example.com"])],
      ["Beta College", new Set(["bob@example.com", "carol@example.com"])],
    ]);
    const messages = planSubscriberMessages([alphaNews, beta, alphaGrad], subs, NOW);

    expect(messages.map((m) => m.to)).toEqual(["ann@example.com", "bob@example.com", "carol@example.com"]);

    const [ann, bob, carol] = messages;
    expect(ann.subject).toBe("[PageWatch] 1 subscribed source updated");
    expect(ann.text).toContain("https://grad.example.edu/notices");
    expect(ann.text).not.toContain("Beta College");

    expect(bob.subject).toBe("[PageWatch] 2 subscribed sources updated");
    expect(bob.text.split("\n").slice(2, 11)).toEqual([
      "Alpha University",
      "- example.edu",
      "  https://example.edu/news",
      "- grad.example.edu",
      "  https://grad.example.edu/notices",
      "",
      "Beta College",
      "- beta.example.org",
      "  https://beta.example.org/list",
    ]);

    expect(carol.text).not.toContain("Alpha University");
    for (const m of messages) {
      const others = messages.filter((o) => o.to !== m.to).map((o) => o.to);
      for (const other of others) expect(m.text).not.toContain(other);
    }
  });

  it("sends nothing for labels without subscribers", () => {
    const subs: SubscriptionMap = new Map([["Gamma Institute", new Set(["dan@example.com"])]]);
    expect(planSubscriberMessages([alphaNews, beta], subs, NOW)).toEqual([]);
  });

  it("sends nothing when there are no changes", () => {
    const subs: SubscriptionMap = new Map([["Alpha University", new Set(["ann@example.com"])]]);
    expect(planSubscriberMessages([], subs, NOW)).toEqual([]);
  });
});

describe("planSummaryMessage", () => {
  const quiet = { alwaysSend: false, notifyOnFailure: false };

  it("stays quiet with no changes and always-send off", () => {
    expect(planSummaryMessage(report({ total: 4, unchanged: 4 }), "ops@example.com", quiet, NOW)).toBeNull();
  });

  it("stays quiet on failures alone unless asked", () => {
    const r = report({ total: 1, failed: 1, failures: [{ label: "Beta College", url: beta.url, error: "HTTP 503" }] });
    expect(planSummaryMessage(r, "ops@example.com", quiet, NOW)).toBeNull();
    expect(planSummaryMessage(r, "ops@example.com", { alwaysSend: false, notifyOnFailure: true }, NOW)).not.toBeNull();
  });

  it("summarises changes and failures", () => {
    const r = report({
      total: 3,
      baseline: 1,
      changed: 1,
      failed: 1,
      changes: [alphaNews],
      failures: [{ label: "Beta College", url: "https://beta.example.org/", error: "HTTP 503" }],
    });
    expect(planSummaryMessage(r, "ops@example.com", quiet, NOW)).toEqual({
      to: "ops@example.com",
      subject: "[PageWatch] 1 changed, 1 failed of 3",
      text: [
        "PageWatch run at 2026-03-01 08:00 UTC",
        "Sources checked: 3 | changed: 1 | new baseline: 1 | unchanged: 0 | failed: 1",
        "",
        "Changed:",
        "Alpha University",
        "- https://example.edu/news",
        "",
        "Failed (1):",
        "- Beta College https://beta.example.org/: HTTP 503",
      ].join("\n"),
    });
  });

  it("sends a no-change summary when always-send is on", () => {
    const message = planSummaryMessage(report({ total: 2, unchanged: 2 }), "ops@example.com", {
      alwaysSend: true,
      notifyOnFailure: false,
    }, NOW);
    expect(message?.subject).toBe("[PageWatch] 0 changed, 0 failed of 2");
    expect(message?.text.split("\n").slice(-1)).toEqual(["No changes detected."]);
  });

  it("previews at most twenty failures", () => {
    const failures = Array.from({ length: 25 }, (_, i) => ({
      label: "",
      url: `https://f${i}.example.org/`,
      error: "ECONNABORTED: timeout of 20000ms exceeded",
    }));
    const message = planSummaryMessage(
      report({ total: 25, failed: 25, failures }),
      "ops@example.com",
      { alwaysSend: true, notifyOnFailure: false },
      NOW
    );
    const lines = message?.text.split("\n") ?? [];
    expect(lines.filter((l) => l.startsWith("- https://f"))).toHaveLength(20);
    expect(lines[lines.length - 1]).toBe("... and 5 more");
  });
});

describe("dispatch", () => {
  it("keeps going after a failed send", async () => {
    const mailer = recordingMailer(["bob@example.com"]);
    const messages = ["ann@example.com", "bob@example.com", "carol@example.com"].map((to) => ({
      to,
      subject: "s",
      text: "t",
    }));

    const result = await dispatch(messages, mailer);

    expect(result.sent).toEqual(["ann@example.com", "carol@example.com"]);
    expect(result.failed).toHaveLength(1);
    expect(result.failed[0]).toBeInstanceOf(SendError);
    expect(result.failed[0].recipient).toBe("bob@example.com");
    expect(result.failed[0].message).toBe("550 mailbox unavailable");
    expect(mailer.sent.map((m) => m.to)).toEqual(["ann@example.com", "carol@example.com"]);
  });
});
