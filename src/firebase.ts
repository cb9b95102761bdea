import { type Credential, type ServiceAccount, cert, getApp, getApps, initializeApp } from "firebase-admin/app";
import { type Firestore, getFirestore } from "firebase-admin/firestore";
import fs from "node:fs";
import { z } from "zod";
import type { AppConfig } from "./config.js";
import { ConfigError } from "./errors.js";

const serviceAccountSchema = z.object({
  project_id: z.string(),
  client_email: z.string(),
  private_key: z.string(),
});

function readServiceAccount(json: string): ServiceAccount {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    throw new ConfigError("FIREBASE_SERVICE_ACCOUNT_JSON is not valid JSON");
  }
  const parsed = serviceAccountSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError("FIREBASE_SERVICE_ACCOUNT_JSON lacks project_id, client_email or private_key");
  }
  return {
    projectId: parsed.data.project_id,
    clientEmail: parsed.data.client_email,
    privateKey: parsed.data.private_key,
  };
}

export function initializeFirestore(config: AppConfig): Firestore | null {
  let credential: Credential;

  if (config.FIREBASE_SERVICE_ACCOUNT_JSON) {
    credential = cert(readServiceAccount(config.FIREBASE_SERVICE_ACCOUNT_JSON));
  } else if (config.GOOGLE_APPLICATION_CREDENTIALS) {
    const p = config.GOOGLE_APPLICATION_CREDENTIALS;
    if (!fs.existsSync(p)) {
      throw new ConfigError(`GOOGLE_APPLICATION_CREDENTIALS not found at: ${p}`);
    }
    credential = cert(p);
  } else {
    // No Firebase configured; the JSON state file is used instead
    return null;
  }

  const app = getApps().length ? getApp() : initializeApp({ credential });
  return getFirestore(app);
}
