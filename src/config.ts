import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors.js";

loadDotenv();

const optionalString = z.string().trim().optional();

const flag = (fallback: "true" | "false") =>
  z
    .string()
    .default(fallback)
    .transform((v) => v.trim().toLowerCase() === "true");

const count = (fallback: number, min: number) =>
  z
    .string()
    .default(String(fallback))
    .transform((v) => {
      const n = parseInt(v, 10);
      return Number.isNaN(n) ? fallback : Math.max(min, n);
    });

const schema = z.object({
  SOURCES_FILE: z.string().default("sources.txt"),
  STATE_FILE: z.string().default("data/state.json"),
  SUBSCRIPTIONS_FILE: z.string().default("subscriptions.csv"),
  NOTIFY_MODE: z.enum(["subscriber", "broadcast"]).default("subscriber"),
  ALWAYS_SEND_SUMMARY: flag("false"),
  NOTIFY_ON_FAILURE: flag("false"),
  SMTP_HOST: optionalString,
  SMTP_PORT: count(465, 1),
  SMTP_USER: optionalString,
  SMTP_PASS: optionalString,
  MAIL_FROM: optionalString,
  MAIL_TO: z.string().trim().email().optional(),
  FETCH_CONCURRENCY: count(6, 1),
  FETCH_TIMEOUT_MS: count(20000, 1000),
  FETCH_RETRIES: count(3, 0),
  FETCH_BACKOFF_MS: count(1200, 0),
  ACCEPT_LANGUAGE: z.string().default("zh-CN,zh;q=0.9,en;q=0.8"),
  NORMALIZE_MAX_CHARS: count(12000, 100),
  CRON_SCHEDULE: optionalString,
  FIRESTORE_COLLECTION: z.string().default("pagewatch"),
  FIRESTORE_DOCUMENT: z.string().default("state"),
  GOOGLE_APPLICATION_CREDENTIALS: optionalString,
  FIREBASE_SERVICE_ACCOUNT_JSON: optionalString,
});

export type AppConfig = z.infer<typeof schema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Blank variables count as unset so defaults still apply
  const present = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== "")
  );
  const parsed = schema.safeParse(present);
  if (!parsed.success) {
    // Show concise errors without values
    const errs = parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
    throw new ConfigError(`Invalid configuration: ${errs}`);
  }
  return parsed.data;
}
