import fs from "node:fs";
import { parse as parseCSV } from "csv-parse/sync";
import { ConfigError, describeError } from "./errors.js";
import type { SubscriptionMap } from "./types.js";

export const REQUIRED_COLUMNS = ["email", "schools", "status"] as const;

export interface SubscriptionRow {
  email: string;
  schools: string; // comma-separated labels
  status: string;
}

export function parseSubscriptionRows(content: string, origin = "subscriptions"): SubscriptionRow[] {
  let rows: string[][];
  try {
    rows = parseCSV(content, {
      bom: true,
      skip_empty_lines: true,
      trim: true,
      relax_column_count: true,
    });
  } catch (err) {
    throw new ConfigError(`${origin} is not valid CSV: ${describeError(err)}`);
  }

  const header = (rows[0] ?? []).map((h) => h.trim().toLowerCase());
  const index = new Map<string, number>();
  header.forEach((name, i) => {
    if (name && !index.has(name)) index.set(name, i);
  });

  const missing = REQUIRED_COLUMNS.filter((col) => !index.has(col));
  if (missing.length > 0) {
    throw new ConfigError(`${origin} is missing column(s): ${missing.join(", ")}`);
  }

  const cell = (row: string[], col: (typeof REQUIRED_COLUMNS)[number]): string =>
    row[index.get(col) ?? -1] ?? "";

  return rows.slice(1).map((row) => ({
    email: cell(row, "email"),
    schools: cell(row, "schools"),
    status: cell(row, "status"),
  }));
}

export function readSubscriptionRows(path: string): SubscriptionRow[] {
  if (!fs.existsSync(path)) {
    throw new ConfigError(`Subscriptions file not found: ${path}`);
  }
  return parseSubscriptionRows(fs.readFileSync(path, "utf8"), path);
}

export function resolveSubscriptions(rows: SubscriptionRow[]): SubscriptionMap {
  const byLabel: SubscriptionMap = new Map();

  for (const row of rows) {
    const email = row.email.trim();
    const schools = row.schools.trim();
    if (!email || !schools) continue;
    if (row.status.trim().toUpperCase() !== "ACTIVE") continue;

    const labels = schools
      .replace(/，/g, ",")
      .split(",")
      .map((s) => s.trim())
      .filter(Boolean);

    for (const label of labels) {
      let recipients = byLabel.get(label);
      if (!recipients) {
        recipients = new Set();
        byLabel.set(label, recipients);
      }
      recipients.add(email);
    }
  }

  return byLabel;
}
