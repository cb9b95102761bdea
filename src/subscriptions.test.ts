import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { ConfigError } from "./errors.js";
import { parseSubscriptionRows, readSubscriptionRows, resolveSubscriptions } from "./subscriptions.js";
import { makeTempDir, removeDir } from "./testing.js";

describe("parseSubscriptionRows", () => {
  it("maps columns by header name in any order and case", () => {
    const csv = [
      "Name,Status,Email,Schools",
      'Ann,ACTIVE,ann@example.com,"Alpha University,Beta College"',
      "Bob,paused,bob@example.com,Gamma Institute",
    ].join("\n");

    expect(parseSubscriptionRows(csv)).toEqual([
      { email: "ann@example.com", schools: "Alpha University,Beta College", status: "ACTIVE" },
      { email: "bob@example.com", schools: "Gamma Institute", status: "paused" },
    ]);
  });

  it("tolerates a byte-order mark and short rows", () => {
    const csv = "\uFEFFemail,schools,status\ncarol@example.com,Alpha University\n";
    expect(parseSubscriptionRows(csv)).toEqual([
      { email: "carol@example.com", schools: "Alpha University", status: "" },
    ]);
  });

  it("throws ConfigError naming the missing columns", () => {
    const csv = "email,school\nann@example.com,Alpha University\n";
    expect(() => parseSubscriptionRows(csv, "subs.csv")).toThrow(
      new ConfigError("subs.csv is missing column(s): schools, status")
    );
  });

  it("throws ConfigError for an empty file", () => {
    expect(() => parseSubscriptionRows("")).toThrow(ConfigError);
  });
});

describe("readSubscriptionRows", () => {
  it("throws ConfigError when the file is missing", () => {
    expect(() => readSubscriptionRows("/nonexistent/pagewatch/subscriptions.csv")).toThrow(ConfigError);
  });

  it("reads rows from disk", () => {
    const dir = makeTempDir();
    try {
      const file = path.join(dir, "subscriptions.csv");
      fs.writeFileSync(file, "email,schools,status\nann@example.com,Alpha University,ACTIVE\n", "utf8");
      expect(readSubscriptionRows(file)).toHaveLength(1);
    } finally {
      removeDir(dir);
    }
  });
});

describe("resolveSubscriptions", () => {
  it("keeps active rows and splits label lists on either comma", () => {
    const map = resolveSubscriptions([
      { email: "ann@example.com", schools: "Alpha University，Beta College", status: "active" },
      { email: "bob@example.com", schools: " Alpha University , ,Gamma Institute", status: " ACTIVE " },
      { email: "carol@example.com", schools: "Alpha University", status: "CANCELLED" },
      { email: "", schools: "Alpha University", status: "ACTIVE" },
      { email: "dan@example.com", schools: "", status: "ACTIVE" },
    ]);

    expect(Array.from(map.keys())).toEqual(["Alpha University", "Beta College", "Gamma Institute"]);
    expect(Array.from(map.get("Alpha University") ?? [])).toEqual(["ann@example.com", "bob@example.com"]);
    expect(Array.from(map.get("Beta College") ?? [])).toEqual(["ann@example.com"]);
    expect(Array.from(map.get("Gamma Institute") ?? [])).toEqual(["bob@example.com"]);
  });

  it("collapses repeated subscriptions of one address", () => {
    const map = resolveSubscriptions([
      { email: "ann@example.com", schools: "Alpha University", status: "ACTIVE" },
      { email: "ann@example.com", schools: "Alpha University,Alpha University", status: "ACTIVE" },
    ]);
    expect(map.get("Alpha University")?.size).toBe(1);
  });
});
