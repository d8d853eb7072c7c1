import { homedir } from "node:os";
import { join } from "node:path";
import {
  DEFAULT_CONVERSATION_WINDOW,
  DEFAULT_MIN_CANDIDATE_CHARS,
  DEFAULT_RECENCY_WEIGHT,
  DEFAULT_SALIENCE_THRESHOLD,
} from "./utils/constants.js";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export const VECTOR_BACKENDS = ["lancedb", "memory"] as const;
export type VectorBackend = (typeof VECTOR_BACKENDS)[number];

export type MemoryConfig = {
  embedding: {
    provider: "openai";
    model: string;
    apiKey: string;
    baseURL?: string;
  };
  llm: {
    model: string;
    fallbackModels: string[];
    temperature: number;
    timeoutMs: number;
  };
  storage: {
    vectorBackend: VectorBackend;
    dataDir: string;
    lanceDbPath: string;
    preferencesPath: string;
    ticketsPath: string;
  };
  salience: {
    threshold: number;
  };
  retrieval: {
    semanticTopK: number;
    episodicTopK: number;
    recencyWeight: number;
    conflictScanTopK: number;
  };
  extraction: {
    minCandidateChars: number;
    conversationWindow: number;
  };
  errorReporting: {
    enabled: boolean;
    consent: boolean;
    dsn?: string;
    environment: string;
    sampleRate: number;
  };
};

const DEFAULT_EMBEDDING_MODEL = "text-embedding-3-small";
const DEFAULT_CHAT_MODEL = "gpt-4o-mini";
const DEFAULT_DATA_DIR = join(homedir(), ".support-memory");

const EMBEDDING_DIMENSIONS: Record<string, number> = {
  "text-embedding-3-small": 1536,
  "text-embedding-3-large": 3072,
};

export function vectorDimsForModel(model: string): number {
  const dims = EMBEDDING_DIMENSIONS[model];
  if (!dims) throw new ConfigError(`Unsupported embedding model: ${model}`);
  return dims;
}

function resolveEnvVars(value: string): string {
  return value.replace(/\$\{([^}]+)\}/g, (_, envVar: string) => {
    const envValue = process.env[envVar];
    if (!envValue) throw new ConfigError(`Environment variable ${envVar} is not set`);
    return envValue;
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(cfg: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = cfg[name];
  if (value === undefined) return {};
  if (!isRecord(value)) throw new ConfigError(`${name} must be an object`);
  return value;
}

function str(obj: Record<string, unknown>, key: string, path: string, fallback: string): string {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value !== "string" || !value.trim()) throw new ConfigError(`${path}.${key} must be a non-empty string`);
  return resolveEnvVars(value.trim());
}

function optionalStr(obj: Record<string, unknown>, key: string, path: string): string | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  return str(obj, key, path, "");
}

function num(
  obj: Record<string, unknown>,
  key: string,
  path: string,
  fallback: number,
  range: { min: number; max: number; integer?: boolean },
): number {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value !== "number" || !Number.isFinite(value)) throw new ConfigError(`${path}.${key} must be a number`);
  if (range.integer && !Number.isInteger(value)) throw new ConfigError(`${path}.${key} must be an integer`);
  if (value < range.min || value > range.max) {
    throw new ConfigError(`${path}.${key} must be between ${range.min} and ${range.max}`);
  }
  return value;
}

function bool(obj: Record<string, unknown>, key: string, path: string, fallback: boolean): boolean {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value !== "boolean") throw new ConfigError(`${path}.${key} must be a boolean`);
  return value;
}

function strList(obj: Record<string, unknown>, key: string, path: string): string[] {
  const value = obj[key];
  if (value === undefined) return [];
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string" && v.trim().length > 0)) {
    throw new ConfigError(`${path}.${key} must be an array of non-empty strings`);
  }
  return value.map((v) => v.trim());
}

function parseApiKey(embedding: Record<string, unknown>): string {
  if (typeof embedding.apiKey !== "string") {
    throw new ConfigError("embedding.apiKey is required. Set it directly or as ${OPENAI_API_KEY}.");
  }
  const key = resolveEnvVars(embedding.apiKey.trim());
  if (key.length < 10 || key === "YOUR_OPENAI_API_KEY" || key === "<OPENAI_API_KEY>") {
    throw new ConfigError("embedding.apiKey is missing or a placeholder. Set a valid OpenAI API key.");
  }
  return key;
}

export const memoryConfigSchema = {
  parse(value: unknown): MemoryConfig {
    if (!isRecord(value)) throw new ConfigError("support-memory config required");

    const embedding = section(value, "embedding");
    if (embedding.provider !== undefined && embedding.provider !== "openai") {
      throw new ConfigError(`embedding.provider must be "openai"`);
    }
    const model = str(embedding, "model", "embedding", DEFAULT_EMBEDDING_MODEL);
    vectorDimsForModel(model);
    const apiKey = parseApiKey(embedding);
    const baseURL = optionalStr(embedding, "baseURL", "embedding");

    const llm = section(value, "llm");
    const storage = section(value, "storage");
    const requestedBackend = storage.vectorBackend ?? "lancedb";
    const vectorBackend = VECTOR_BACKENDS.find((b) => b === requestedBackend);
    if (!vectorBackend) {
      throw new ConfigError(`storage.vectorBackend must be one of ${VECTOR_BACKENDS.join(", ")}`);
    }
    const dataDir = str(storage, "dataDir", "storage", DEFAULT_DATA_DIR);

    const salience = section(value, "salience");
    const retrieval = section(value, "retrieval");
    const extraction = section(value, "extraction");
    const errorReporting = section(value, "errorReporting");
    const dsn = optionalStr(errorReporting, "dsn", "errorReporting");

    return {
      embedding: { provider: "openai", model, apiKey, ...(baseURL ? { baseURL } : {}) },
      llm: {
        model: str(llm, "model", "llm", DEFAULT_CHAT_MODEL),
        fallbackModels: strList(llm, "fallbackModels", "llm"),
        temperature: num(llm, "temperature", "llm", 0.2, { min: 0, max: 2 }),
        timeoutMs: num(llm, "timeoutMs", "llm", 45_000, { min: 1000, max: 600_000, integer: true }),
      },
      storage: {
        vectorBackend,
        dataDir,
        lanceDbPath: str(storage, "lanceDbPath", "storage", join(dataDir, "lancedb")),
        preferencesPath: str(storage, "preferencesPath", "storage", join(dataDir, "preferences.json")),
        ticketsPath: str(storage, "ticketsPath", "storage", join(dataDir, "tickets.db")),
      },
      salience: {
        threshold: num(salience, "threshold", "salience", DEFAULT_SALIENCE_THRESHOLD, { min: 0, max: 1 }),
      },
      retrieval: {
        semanticTopK: num(retrieval, "semanticTopK", "retrieval", 3, { min: 1, max: 100, integer: true }),
        episodicTopK: num(retrieval, "episodicTopK", "retrieval", 3, { min: 1, max: 100, integer: true }),
        recencyWeight: num(retrieval, "recencyWeight", "retrieval", DEFAULT_RECENCY_WEIGHT, { min: 0, max: 1 }),
        conflictScanTopK: num(retrieval, "conflictScanTopK", "retrieval", 5, { min: 1, max: 100, integer: true }),
      },
      extraction: {
        minCandidateChars: num(extraction, "minCandidateChars", "extraction", DEFAULT_MIN_CANDIDATE_CHARS, {
          min: 0,
          max: 1000,
          integer: true,
        }),
        conversationWindow: num(extraction, "conversationWindow", "extraction", DEFAULT_CONVERSATION_WINDOW, {
          min: 1,
          max: 100,
          integer: true,
        }),
      },
      errorReporting: {
        enabled: bool(errorReporting, "enabled", "errorReporting", false),
        consent: bool(errorReporting, "consent", "errorReporting", false),
        ...(dsn ? { dsn } : {}),
        environment: str(errorReporting, "environment", "errorReporting", "production"),
        sampleRate: num(errorReporting, "sampleRate", "errorReporting", 1, { min: 0, max: 1 }),
      },
    };
  },
};
