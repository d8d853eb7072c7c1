/**
 * LanceDB vector backend. One table per store; rows carry the namespace as a column so
 * every search is pre-filtered, and metadata as a JSON string column.
 */

import * as lancedb from "@lancedb/lancedb";
import type { MemoryMetadata, MetadataValue } from "../types/memory.js";
import { captureMemoryError, toError } from "../services/error-reporter.js";
import type { MemoryLogger } from "../utils/logger.js";
import { matchesFilter, rankHits, type MetadataFilter, type VectorHit, type VectorIndex, type VectorRow } from "./vector-index.js";

const SCHEMA_ROW_ID = "__schema__";

/** LanceDB has no bound parameters; string literals are quoted by doubling single quotes. */
export function sqlString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isMetadataValue(value: unknown): value is MetadataValue {
  return value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

function parseMetadata(raw: unknown): MemoryMetadata {
  if (typeof raw !== "string" || !raw) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return {};
  }
  if (!isRecord(parsed)) return {};
  const out: MemoryMetadata = {};
  for (const [k, v] of Object.entries(parsed)) {
    if (isMetadataValue(v)) out[k] = v;
  }
  return out;
}

/** Lance returns vectors as arrays, typed arrays or Arrow vectors depending on the path. */
function toNumberArray(value: unknown): number[] {
  if (Array.isArray(value)) return value.filter((v): v is number => typeof v === "number");
  if (value instanceof Float32Array || value instanceof Float64Array) return Array.from(value);
  if (isRecord(value) && typeof value.toArray === "function") {
    const arr: unknown = value.toArray();
    return toNumberArray(arr);
  }
  return [];
}

function toRow(raw: unknown): VectorRow | null {
  if (!isRecord(raw) || typeof raw.id !== "string" || typeof raw.namespace !== "string") return null;
  return {
    id: raw.id,
    namespace: raw.namespace,
    document: typeof raw.document === "string" ? raw.document : "",
    embedding: toNumberArray(raw.vector),
    metadata: parseMetadata(raw.metadata),
  };
}

export class VectorDB implements VectorIndex {
  private db: lancedb.Connection | null = null;
  private table: lancedb.Table | null = null;
  private initPromise: Promise<void> | null = null;
  private closed = false;

  constructor(
    private readonly dbPath: string,
    private readonly tableName: string,
    private readonly vectorDim: number,
    private readonly logger?: MemoryLogger,
  ) {}

  private logWarn(msg: string): void {
    if (this.logger) this.logger.warn(msg);
    else console.warn(msg);
  }

  private async ensureInitialized(): Promise<lancedb.Table> {
    if (this.closed) {
      this.logWarn(`support-memory: VectorDB(${this.tableName}) was closed; reconnecting...`);
      this.closed = false;
      this.table = null;
      this.initPromise = null;
    }
    if (this.table) return this.table;
    if (!this.initPromise) {
      this.initPromise = this.doInitialize().catch((err: unknown) => {
        const error = toError(err);
        captureMemoryError(error, { subsystem: "vector", operation: "vector-db-init" });
        this.initPromise = null;
        throw error;
      });
    }
    await this.initPromise;
    return this.getTable();
  }

  private async doInitialize(): Promise<void> {
    this.db = await lancedb.connect(this.dbPath);
    const tables = await this.db.tableNames();

    if (tables.includes(this.tableName)) {
      this.table = await this.db.openTable(this.tableName);
    } else {
      this.table = await this.db.createTable(this.tableName, [
        {
          id: SCHEMA_ROW_ID,
          namespace: "",
          document: "",
          metadata: "{}",
          timestamp: "",
          vector: new Array<number>(this.vectorDim).fill(0),
        },
      ]);
      await this.table.delete(`id = ${sqlString(SCHEMA_ROW_ID)}`);
    }
  }

  private getTable(): lancedb.Table {
    if (!this.table) throw new Error(`VectorDB(${this.tableName}) not initialized`);
    return this.table;
  }

  /** Run a table operation; failures are reported, logged and re-thrown. */
  private async run<T>(operation: string, fn: (table: lancedb.Table) => Promise<T>): Promise<T> {
    try {
      const table = await this.ensureInitialized();
      return await fn(table);
    } catch (err) {
      const error = toError(err);
      captureMemoryError(error, { subsystem: "vector", operation });
      this.logWarn(`support-memory: LanceDB ${operation} failed: ${error.message}`);
      throw error;
    }
  }

  async upsert(row: VectorRow): Promise<void> {
    if (row.embedding.length !== this.vectorDim) {
      throw new Error(`vector dimension ${row.embedding.length} does not match table dimension ${this.vectorDim}`);
    }
    const timestamp = row.metadata.timestamp;
    await this.run("vector-upsert", async (table) => {
      await table
        .mergeInsert("id")
        .whenMatchedUpdateAll()
        .whenNotMatchedInsertAll()
        .execute([
          {
            id: row.id,
            namespace: row.namespace,
            document: row.document,
            metadata: JSON.stringify(row.metadata),
            timestamp: typeof timestamp === "string" ? timestamp : "",
            vector: row.embedding,
          },
        ]);
    });
  }

  async get(id: string): Promise<VectorRow | null> {
    return this.run("vector-get", async (table) => {
      const rows: unknown[] = await table.query().where(`id = ${sqlString(id)}`).limit(1).toArray();
      return rows.length > 0 ? toRow(rows[0]) : null;
    });
  }

  async query(namespace: string, vector: number[], limit: number, filter?: MetadataFilter): Promise<VectorHit[]> {
    if (limit <= 0) return [];
    return this.run("vector-search", async (table) => {
      const where = `namespace = ${sqlString(namespace)}`;
      // With a metadata filter every namespace row is a candidate; truncate only after filtering.
      const fetchLimit = filter ? await table.countRows(where) : limit;
      if (fetchLimit === 0) return [];
      const results: unknown[] = await table
        .vectorSearch(vector)
        .distanceType("cosine")
        .where(where)
        .limit(fetchLimit)
        .toArray();

      const hits: VectorHit[] = [];
      for (const raw of results) {
        const row = toRow(raw);
        if (!row || !matchesFilter(row.metadata, filter)) continue;
        const distance = isRecord(raw) && typeof raw._distance === "number" ? raw._distance : 1;
        hits.push({ ...row, similarity: 1 - distance });
      }
      return rankHits(hits, limit);
    });
  }

  async delete(id: string): Promise<boolean> {
    return this.run("vector-delete", async (table) => {
      const predicate = `id = ${sqlString(id)}`;
      const before = await table.countRows(predicate);
      if (before === 0) return false;
      await table.delete(predicate);
      return true;
    });
  }

  async deleteNamespace(namespace: string): Promise<number> {
    return this.run("vector-delete-namespace", async (table) => {
      const predicate = `namespace = ${sqlString(namespace)}`;
      const before = await table.countRows(predicate);
      if (before > 0) await table.delete(predicate);
      return before;
    });
  }

  async reset(): Promise<void> {
    await this.run("vector-reset", async (table) => {
      await table.delete("id IS NOT NULL");
    });
  }

  async count(namespace?: string): Promise<number> {
    return this.run("vector-count", (table) =>
      namespace === undefined ? table.countRows() : table.countRows(`namespace = ${sqlString(namespace)}`),
    );
  }

  close(): void {
    this.closed = true;
    this.table?.close();
    this.table = null;
    this.db?.close();
    this.db = null;
  }
}
