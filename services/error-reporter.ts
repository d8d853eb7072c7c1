/**
 * Opt-in error reporting to a self-hosted Sentry/GlitchTip DSN.
 *
 * PRIVACY REQUIREMENTS:
 * - disabled unless `enabled`, `consent` and a DSN are all present
 * - sendDefaultPii: false always
 * - only plugin-style breadcrumbs (category `memory.*`), message/data stripped
 * - beforeSend rebuilds the event from an allowlist
 * - NEVER include: memory text, prompts, ticket notes, API keys, home paths, IPs, emails
 * - identical errors are reported at most once per 60s
 */

import type * as SentryType from "@sentry/node";
import type { MemoryLogger } from "../utils/logger.js";
import { consoleLogger } from "../utils/logger.js";

export interface ErrorReporterConfig {
  enabled: boolean;
  consent: boolean;
  dsn?: string;
  environment?: string;
  /** 0.0–1.0 */
  sampleRate: number;
}

type NodeOptions = NonNullable<Parameters<typeof SentryType.init>[0]>;
type BeforeSend = NonNullable<NodeOptions["beforeSend"]>;
type ReportedEvent = Parameters<BeforeSend>[0];

const DEDUP_WINDOW_MS = 60_000;
const DEDUP_MAX_ENTRIES = 50;

const KEPT_INTEGRATIONS = new Set(["LinkedErrors", "InboundFilters", "FunctionToString"]);

let Sentry: typeof SentryType | null = null;
let initialized = false;
let logger: MemoryLogger = consoleLogger;
/** Fingerprint -> last report time. */
const recentErrors = new Map<string, number>();

export async function initErrorReporter(
  config: ErrorReporterConfig,
  version: string,
  loggerInstance?: MemoryLogger,
): Promise<boolean> {
  if (loggerInstance) logger = loggerInstance;

  if (!config.enabled || !config.consent) {
    logger.info(`error reporting disabled (enabled=${config.enabled}, consent=${config.consent})`);
    return false;
  }
  if (!config.dsn) {
    logger.warn("error reporting enabled but no DSN configured; reporting disabled");
    return false;
  }

  try {
    Sentry = await import("@sentry/node");
  } catch {
    logger.warn("@sentry/node could not be loaded; error reporting disabled");
    return false;
  }

  Sentry.init({
    dsn: config.dsn,
    release: `support-memory@${version}`,
    environment: config.environment ?? "production",
    sampleRate: config.sampleRate,
    maxBreadcrumbs: 10,
    sendDefaultPii: false,
    integrations: (defaults) => defaults.filter((integration) => KEPT_INTEGRATIONS.has(integration.name)),
    beforeSend: (event) => sanitizeEvent(event),
    beforeBreadcrumb: (breadcrumb) =>
      breadcrumb.category?.startsWith("memory.") ? { ...breadcrumb, message: undefined, data: undefined } : null,
  });

  initialized = true;
  logger.info(`error reporting initialized (DSN host: ${config.dsn.split("@")[1] ?? "***"})`);
  return true;
}

/** Rebuild the event from an allowlist of fields; anything not listed is dropped. */
export function sanitizeEvent(event: ReportedEvent): ReportedEvent {
  return {
    type: event.type,
    event_id: event.event_id,
    timestamp: event.timestamp,
    platform: "node",
    level: event.level,
    release: event.release,
    environment: event.environment,
    fingerprint: event.fingerprint,
    exception: event.exception
      ? {
          values: event.exception.values?.map((v) => ({
            type: v.type,
            value: scrubString(v.value ?? ""),
            stacktrace: v.stacktrace
              ? {
                  frames: v.stacktrace.frames?.map((f) => ({
                    filename: sanitizePath(f.filename ?? ""),
                    function: f.function,
                    lineno: f.lineno,
                    colno: f.colno,
                    in_app: f.in_app,
                  })),
                }
              : undefined,
          })),
        }
      : undefined,
    tags: allowedTags(event.tags),
  };
}

const ALLOWED_TAGS = ["subsystem", "operation", "phase", "retryAttempt"] as const;

function allowedTags(tags: ReportedEvent["tags"]): Record<string, string> {
  const kept: Record<string, string> = {};
  for (const name of ALLOWED_TAGS) {
    const value = tags?.[name];
    if (value !== undefined && value !== null && value !== "") kept[name] = scrubString(String(value));
  }
  return kept;
}

const MAX_SCRUBBED_LENGTH = 500;

/** Applied in order: credentials first, so a URL's userinfo is gone before the email rule runs. */
const SCRUB_RULES: ReadonlyArray<readonly [RegExp, string]> = [
  [/sk-(?:proj-|ant-)?[A-Za-z0-9_-]{20,}/g, "[REDACTED]"],
  [/Bearer\s+[\w.-]+/gi, "[REDACTED]"],
  [/eyJ[A-Za-z0-9_-]+\.eyJ[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+/g, "[REDACTED]"],
  [/AKIA[0-9A-Z]{16}/g, "[REDACTED]"],
  [/:\/\/[^\s:@]+:[^\s@]+@[^\s/]+/g, "://[REDACTED]@"],
  [/\/(?:home|Users)\/[^/\s]+/g, "$HOME"],
  [/C:\\Users\\[^\\\s]+/g, "%USERPROFILE%"],
  [/\b[\w.-]+@[\w.-]+\.\w{2,}\b/g, "[EMAIL]"],
  [/\b\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}\b/g, "[IP]"],
];

/** Scrub secrets and PII from free text before it leaves the process. */
export function scrubString(input: string): string {
  let out = input;
  for (const [pattern, replacement] of SCRUB_RULES) {
    out = out.replace(pattern, () => replacement);
  }
  return out.slice(0, MAX_SCRUBBED_LENGTH);
}

const PROJECT_DIR_MARKER = "support-memory/";

/** Keep only the package-relative part of a stack frame path. */
export function sanitizePath(path: string): string {
  const projectStart = path.indexOf(PROJECT_DIR_MARKER);
  if (projectStart >= 0) return path.slice(projectStart);
  if (path.includes("node_modules")) return path.split("/").pop() || path;
  return path.replace(/\/(?:home|Users)\/[^/]+/g, () => "$HOME").replace(/C:\\Users\\[^\\]+/g, "%USERPROFILE%");
}

export type ErrorContext = {
  subsystem: string;
  operation: string;
  phase?: string;
  retryAttempt?: number;
  severity?: "info" | "error";
};

/** Report an error with its subsystem/operation tags. No-op unless the reporter was initialized. */
export function captureMemoryError(error: Error, context: ErrorContext): string | undefined {
  const sentry = Sentry;
  if (!initialized || !sentry) return undefined;

  if (seenRecently(`${error.name}:${scrubString(error.message).slice(0, 100)}`, Date.now())) return undefined;

  let eventId: string | undefined;
  sentry.withScope((scope) => {
    scope.setTag("subsystem", context.subsystem);
    scope.setTag("operation", context.operation);
    if (context.phase) scope.setTag("phase", context.phase);
    if (context.retryAttempt !== undefined) scope.setTag("retryAttempt", String(context.retryAttempt));
    if (context.severity) scope.setLevel(context.severity);
    eventId = sentry.captureException(error);
  });
  return eventId;
}

function seenRecently(fingerprint: string, now: number): boolean {
  const last = recentErrors.get(fingerprint);
  if (last !== undefined && now - last < DEDUP_WINDOW_MS) return true;
  recentErrors.set(fingerprint, now);
  if (recentErrors.size > DEDUP_MAX_ENTRIES) {
    for (const [key, at] of recentErrors) {
      if (now - at >= DEDUP_WINDOW_MS) recentErrors.delete(key);
    }
  }
  return false;
}

export function addOperationBreadcrumb(subsystem: string, operation: string): void {
  if (!Sentry || !initialized) return;
  Sentry.addBreadcrumb({ category: `memory.${subsystem}`, message: operation, level: "info" });
}

export function isErrorReporterActive(): boolean {
  return initialized;
}

export async function flushErrorReporter(timeoutMs = 2000): Promise<boolean> {
  if (!initialized || !Sentry) return false;
  try {
    return await Sentry.flush(timeoutMs);
  } catch (err) {
    logger.warn(`error reporter flush failed: ${err}`);
    return false;
  }
}

/** Wrap a non-Error throw value so it can be reported and rethrown. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
