/**
 * LLM collaborator: `invoke(prompt | messages) -> text`, backed by OpenAI chat completions
 * with retry and model fallback. Scorer, extractor and planner only see `LlmClient`.
 */

import OpenAI from "openai";
import type { ChatMessage } from "../types/memory.js";
import { captureMemoryError, toError } from "./error-reporter.js";

export interface LlmClient {
  invoke(input: string | ChatMessage[]): Promise<string>;
}

const CHAT_TIMEOUT_MS = 45_000;
const CHAT_MAX_TOKENS = 2000;
const RETRY_BASE_MS = 1000;

/** Provider hiccups that retries usually clear; not worth an error report. */
const TRANSIENT_PATTERNS: readonly RegExp[] = [/request was aborted/, /timed out/, /^\d+\s*internal\s*error$/, /^5\d{2}\s/];

function isTransient(error: Error): boolean {
  const text = error.message.toLowerCase().trim();
  return TRANSIENT_PATTERNS.some((pattern) => pattern.test(text));
}

function asMessages(input: string | ChatMessage[]): ChatMessage[] {
  if (typeof input !== "string") return input;
  return [{ role: "user", content: input }];
}

function toCompletionMessage(message: ChatMessage): OpenAI.ChatCompletionMessageParam {
  if (message.role === "system") return { role: "system", content: message.content };
  if (message.role === "assistant") return { role: "assistant", content: message.content };
  return { role: "user", content: message.content };
}

/** 1s, 3s, 9s, ... */
function backoffMs(attempt: number): number {
  return RETRY_BASE_MS * 3 ** attempt;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export type ChatRequest = {
  model: string;
  messages: ChatMessage[];
  openai: OpenAI;
  temperature?: number;
  maxTokens?: number;
  /** The call is aborted after this many ms. */
  timeoutMs?: number;
};

/** One completion, trimmed. An empty answer comes back as "". */
export async function chatComplete(request: ChatRequest): Promise<string> {
  const timeoutMs = request.timeoutMs ?? CHAT_TIMEOUT_MS;
  const abort = new AbortController();
  const timer = setTimeout(() => abort.abort(), timeoutMs);

  try {
    const completion = await request.openai.chat.completions.create(
      {
        model: request.model,
        messages: request.messages.map(toCompletionMessage),
        temperature: request.temperature ?? 0.2,
        max_tokens: request.maxTokens ?? CHAT_MAX_TOKENS,
      },
      { signal: abort.signal },
    );
    const content = completion.choices[0]?.message?.content;
    return content ? content.trim() : "";
  } catch (err) {
    const aborted = err instanceof Error && err.name === "AbortError";
    const failure = aborted ? new Error(`LLM timeout after ${timeoutMs}ms (model: ${request.model})`) : toError(err);
    if (!isTransient(failure)) {
      captureMemoryError(failure, { subsystem: "chat", operation: "chat-complete" });
    }
    throw failure;
  } finally {
    clearTimeout(timer);
  }
}

/** Raised once every retry of a call has failed. */
export class LLMRetryError extends Error {
  constructor(
    message: string,
    public readonly cause: Error,
    public readonly attemptNumber: number,
  ) {
    super(message);
    this.name = "LLMRetryError";
  }
}

export type RetryOptions = { maxRetries?: number; label?: string };

/** Runs `fn` up to `maxRetries + 1` times with exponential backoff between attempts. */
export async function withLLMRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const attempts = (options.maxRetries ?? 3) + 1;
  const prefix = options.label ? `${options.label}: ` : "";

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      const failure = toError(err);
      if (attempt + 1 >= attempts) {
        const exhausted = new LLMRetryError(`${prefix}failed after ${attempts} attempts: ${failure.message}`, failure, attempts);
        if (!isTransient(failure)) {
          captureMemoryError(exhausted, { subsystem: "chat", operation: "llm-retry", retryAttempt: attempts });
        }
        throw exhausted;
      }
      await sleep(backoffMs(attempt));
    }
  }
}

export type FallbackChatRequest = ChatRequest &
  RetryOptions & {
    fallbackModels?: string[];
    logWarn?: (msg: string) => void;
  };

/** Retries the primary model, then walks `fallbackModels` in order; rethrows the last failure. */
export async function chatCompleteWithRetry(request: FallbackChatRequest): Promise<string> {
  const { fallbackModels = [], label = "LLM call", maxRetries = 3, logWarn, ...base } = request;
  const models = [request.model, ...fallbackModels];
  let failure: Error = new Error("no model configured");

  for (const [index, model] of models.entries()) {
    try {
      const attemptLabel = index === 0 ? label : `${label} (fallback: ${model})`;
      return await withLLMRetry(() => chatComplete({ ...base, model }), { maxRetries, label: attemptLabel });
    } catch (err) {
      failure = toError(err);
      const next = models[index + 1];
      if (next !== undefined) logWarn?.(`${label}: model ${model} failed after retries, trying ${next}`);
    }
  }

  captureMemoryError(failure, { subsystem: "chat", operation: "chat-fallback", phase: "exhausted" });
  throw failure;
}

export type OpenAIChatOptions = Omit<FallbackChatRequest, "messages" | "openai" | "label">;

/** `LlmClient` over OpenAI chat completions with retry and model fallback. */
export class OpenAIChatClient implements LlmClient {
  constructor(
    private readonly openai: OpenAI,
    private readonly options: OpenAIChatOptions,
  ) {}

  invoke(input: string | ChatMessage[]): Promise<string> {
    return chatCompleteWithRetry({ ...this.options, openai: this.openai, messages: asMessages(input) });
  }
}
