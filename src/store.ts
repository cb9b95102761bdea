import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { AppConfig } from "./config.js";
import { ConfigError, describeError } from "./errors.js";
import { initializeFirestore } from "./firebase.js";
import type { FingerprintRecord, FingerprintState } from "./types.js";

const persistedRecordSchema = z.object({
  fingerprint: z.string().optional(),
  lastCheckedAt: z.string(),
  lastError: z.string().optional(),
});

const persistedStateSchema = z.record(persistedRecordSchema);

export type PersistedRecord = z.infer<typeof persistedRecordSchema>;
export type PersistedState = Record<string, PersistedRecord>;

export interface StateStore {
  readonly description: string;
  load(): Promise<FingerprintState>;
  save(state: FingerprintState): Promise<void>;
}

export function serializeState(state: FingerprintState): PersistedState {
  const out: PersistedState = {};
  for (const url of Array.from(state.keys()).sort()) {
    const record = state.get(url);
    if (!record) continue;
    const entry: PersistedRecord = { lastCheckedAt: record.lastCheckedAt };
    if (record.fingerprint) entry.fingerprint = record.fingerprint;
    if (record.lastError) entry.lastError = record.lastError;
    out[url] = entry;
  }
  return out;
}

export function deserializeState(raw: unknown, origin: string): FingerprintState {
  const parsed = persistedStateSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.errors[0];
    throw new ConfigError(`Invalid state in ${origin}: ${first.path.join(".")}: ${first.message}`);
  }

  const state: FingerprintState = new Map();
  for (const [url, entry] of Object.entries(parsed.data)) {
    const record: FingerprintRecord = { url, lastCheckedAt: entry.lastCheckedAt };
    if (entry.fingerprint) record.fingerprint = entry.fingerprint;
    if (entry.lastError) record.lastError = entry.lastError;
    state.set(url, record);
  }
  return state;
}

export class JsonFileStore implements StateStore {
  readonly description: string;

  constructor(private readonly filePath: string) {
    this.description = `file ${filePath}`;
  }

  async load(): Promise<FingerprintState> {
    if (!fs.existsSync(this.filePath)) return new Map();

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, "utf8"));
    } catch (err) {
      throw new ConfigError(`State file ${this.filePath} is unreadable: ${describeError(err)}`);
    }
    return deserializeState(raw, this.filePath);
  }

  async save(state: FingerprintState): Promise<void> {
    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });

    // Write beside the target then rename, so readers see the old file or the new one
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    fs.writeFileSync(tmp, JSON.stringify(serializeState(state), null, 2) + "\n", "utf8");
    fs.renameSync(tmp, this.filePath);
  }
}

export interface StateDocument {
  get(): Promise<{ readonly exists: boolean; data(): Record<string, unknown> | undefined }>;
  set(data: { records: PersistedState; updatedAt: string }): Promise<unknown>;
}

export class FirestoreStore implements StateStore {
  constructor(
    private readonly ref: StateDocument,
    readonly description: string
  ) {}

  async load(): Promise<FingerprintState> {
    const snap = await this.ref.get();
    if (!snap.exists) return new Map();
    return deserializeState(snap.data()?.["records"] ?? {}, this.description);
  }

  async save(state: FingerprintState): Promise<void> {
    await this.ref.set({ records: serializeState(state), updatedAt: new Date().toISOString() });
  }
}

export function createStateStore(config: AppConfig): StateStore {
  const db = initializeFirestore(config);
  if (!db) return new JsonFileStore(config.STATE_FILE);
  const ref = db.collection(config.FIRESTORE_COLLECTION).doc(config.FIRESTORE_DOCUMENT);
  return new FirestoreStore(ref, `firestore ${config.FIRESTORE_COLLECTION}/${config.FIRESTORE_DOCUMENT}`);
}
