/**
 * Preference memory: a JSON document `namespace -> key -> { value, updated_at }`.
 *
 * Every write replaces the whole file through temp file + fsync + rename, so a crash
 * leaves either the old or the new document. Reads never touch the file.
 */

import { closeSync, existsSync, fsyncSync, mkdirSync, openSync, readFileSync, renameSync, writeSync } from "node:fs";
import { dirname } from "node:path";
import type { PreferenceEntry, PreferenceValue } from "../types/memory.js";
import { isoNow } from "../utils/dates.js";

export class PreferenceStoreError extends Error {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(message);
    this.name = "PreferenceStoreError";
  }
}

/** Maps, so keys such as `constructor` or `__proto__` are plain keys. */
type PreferenceDocument = Map<string, Map<string, PreferenceEntry>>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isPreferenceValue(value: unknown): value is PreferenceValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") return true;
  if (typeof value === "number") return Number.isFinite(value);
  if (Array.isArray(value)) return value.every(isPreferenceValue);
  if (isRecord(value)) return Object.values(value).every(isPreferenceValue);
  return false;
}

function parseDocument(raw: string, path: string): PreferenceDocument {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new PreferenceStoreError(`preferences file is not valid JSON: ${String(err)}`, path);
  }
  if (!isRecord(parsed)) throw new PreferenceStoreError("preferences file must hold a JSON object", path);

  const doc: PreferenceDocument = new Map();
  for (const [namespace, entries] of Object.entries(parsed)) {
    if (!isRecord(entries)) throw new PreferenceStoreError(`namespace "${namespace}" is not an object`, path);
    const ns = new Map<string, PreferenceEntry>();
    for (const [key, entry] of Object.entries(entries)) {
      if (!isRecord(entry) || typeof entry.updated_at !== "string" || !isPreferenceValue(entry.value)) {
        throw new PreferenceStoreError(`entry "${namespace}.${key}" is malformed`, path);
      }
      ns.set(key, { value: entry.value, updated_at: entry.updated_at });
    }
    doc.set(namespace, ns);
  }
  return doc;
}

/** `Object.fromEntries` defines own properties, so a `__proto__` key serializes like any other. */
function serializeDocument(doc: PreferenceDocument): string {
  const plain = Object.fromEntries(
    [...doc].map(([namespace, ns]): [string, Record<string, PreferenceEntry>] => [namespace, Object.fromEntries(ns)]),
  );
  return JSON.stringify(plain, null, 2);
}

function copyEntry(entry: PreferenceEntry): PreferenceEntry {
  return { value: cloneValue(entry.value), updated_at: entry.updated_at };
}

function cloneValue(value: PreferenceValue): PreferenceValue {
  return structuredClone(value);
}

export class PreferenceStore {
  private doc: PreferenceDocument;

  constructor(private readonly path: string) {
    this.doc = existsSync(path) ? parseDocument(readFileSync(path, "utf-8"), path) : new Map();
  }

  get(namespace: string, key: string): PreferenceValue | undefined {
    const entry = this.doc.get(namespace)?.get(key);
    return entry ? cloneValue(entry.value) : undefined;
  }

  getEntry(namespace: string, key: string): PreferenceEntry | undefined {
    const entry = this.doc.get(namespace)?.get(key);
    return entry ? copyEntry(entry) : undefined;
  }

  /** Copy of the namespace's entries; `{}` when the namespace does not exist. */
  getAll(namespace: string): Record<string, PreferenceEntry> {
    const ns = this.doc.get(namespace);
    if (!ns) return {};
    return Object.fromEntries([...ns].map(([key, entry]): [string, PreferenceEntry] => [key, copyEntry(entry)]));
  }

  put(namespace: string, key: string, value: PreferenceValue): PreferenceEntry {
    if (!namespace.trim() || !key.trim()) throw new PreferenceStoreError("namespace and key must not be empty", this.path);
    if (!isPreferenceValue(value)) throw new PreferenceStoreError(`value for "${key}" is not JSON-serializable`, this.path);
    const entry: PreferenceEntry = { value: cloneValue(value), updated_at: isoNow() };
    const next: PreferenceDocument = new Map(this.doc);
    next.set(namespace, new Map(this.doc.get(namespace)).set(key, entry));
    this.persist(next);
    return copyEntry(entry);
  }

  /** Remove one key; drops the namespace when it becomes empty. False when the key was absent. */
  delete(namespace: string, key: string): boolean {
    const ns = this.doc.get(namespace);
    if (!ns?.has(key)) return false;
    const rest = new Map(ns);
    rest.delete(key);
    const next: PreferenceDocument = new Map(this.doc);
    if (rest.size === 0) next.delete(namespace);
    else next.set(namespace, rest);
    this.persist(next);
    return true;
  }

  namespaces(): string[] {
    return [...this.doc.keys()];
  }

  /** Write the document durably, then swap it in. On failure the in-memory state is unchanged. */
  private persist(next: PreferenceDocument): void {
    mkdirSync(dirname(this.path), { recursive: true });
    const tmpPath = `${this.path}.tmp`;
    const fd = openSync(tmpPath, "w");
    try {
      writeSync(fd, serializeDocument(next));
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
    renameSync(tmpPath, this.path);
    this.doc = next;
  }
}

/** Read-phase rendering: one `key: value` line per preference. */
export function formatPreferences(entries: Record<string, PreferenceEntry>): string {
  const lines = Object.entries(entries).map(([key, entry]) => `- ${key}: ${JSON.stringify(entry.value)}`);
  return lines.length > 0 ? lines.join("\n") : "(none)";
}
