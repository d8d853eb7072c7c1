import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type OpenAI from "openai";
import {
  chatComplete,
  chatCompleteWithRetry,
  LLMRetryError,
  OpenAIChatClient,
  withLLMRetry,
} from "../services/chat.js";

function reply(content: string | null) {
  return { choices: [{ message: { content } }] };
}

describe("chatComplete", () => {
  const create = vi.fn();
  const mockOpenai = { chat: { completions: { create } } } as unknown as OpenAI;

  beforeEach(() => {
    create.mockReset();
  });

  it("sends the messages and returns trimmed content", async () => {
    create.mockResolvedValue(reply("  Hello from OpenAI \n"));

    const result = await chatComplete({
      model: "gpt-4o-mini",
      messages: [
        { role: "system", content: "be brief" },
        { role: "user", content: "hi" },
      ],
      openai: mockOpenai,
    });

    expect(result).toBe("Hello from OpenAI");
    expect(create).toHaveBeenCalledWith(
      {
        model: "gpt-4o-mini",
        messages: [
          { role: "system", content: "be brief" },
          { role: "user", content: "hi" },
        ],
        temperature: 0.2,
        max_tokens: 2000,
      },
      expect.objectContaining({ signal: expect.any(AbortSignal) }),
    );
  });

  it("returns an empty string when the model says nothing", async () => {
    create.mockResolvedValue(reply(null));
    expect(await chatComplete({ model: "m", messages: [{ role: "user", content: "hi" }], openai: mockOpenai })).toBe("");

    create.mockResolvedValue({ choices: [] });
    expect(await chatComplete({ model: "m", messages: [{ role: "user", content: "hi" }], openai: mockOpenai })).toBe("");
  });

  it("turns an abort into a timeout error", async () => {
    create.mockImplementation(
      (_body: unknown, opts: { signal: AbortSignal }) =>
        new Promise((_resolve, reject) => {
          opts.signal.addEventListener("abort", () => {
            const err = new Error("Request was aborted.");
            err.name = "AbortError";
            reject(err);
          });
        }),
    );

    await expect(
      chatComplete({ model: "m", messages: [{ role: "user", content: "hi" }], openai: mockOpenai, timeoutMs: 20 }),
    ).rejects.toThrow("LLM timeout after 20ms (model: m)");
  });
});

describe("withLLMRetry", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("retries with 1s then 3s backoff", async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("503 Service Unavailable"))
      .mockRejectedValueOnce(new Error("503 Service Unavailable"))
      .mockResolvedValueOnce("ok");

    const result = withLLMRetry(fn, { maxRetries: 3 });
    await vi.advanceTimersByTimeAsync(1000);
    expect(fn).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(3000);

    await expect(result).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("throws LLMRetryError with the attempt count", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("nope"));

    const caught = withLLMRetry(fn, { maxRetries: 1, label: "salience" }).catch((err: unknown) => err);
    await vi.advanceTimersByTimeAsync(1000);
    const err = await caught;

    expect(err).toBeInstanceOf(LLMRetryError);
    if (err instanceof LLMRetryError) {
      expect(err.message).toBe("salience: failed after 2 attempts: nope");
      expect(err.attemptNumber).toBe(2);
      expect(err.cause.message).toBe("nope");
    }
  });

  it("does not wait when retries are off", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue("plain string failure");

    await expect(withLLMRetry(fn, { maxRetries: 0 })).rejects.toThrow("failed after 1 attempts: plain string failure");
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe("chatCompleteWithRetry", () => {
  const create = vi.fn();
  const mockOpenai = { chat: { completions: { create } } } as unknown as OpenAI;

  beforeEach(() => {
    create.mockReset();
  });

  it("falls back to the next model", async () => {
    create.mockImplementation(async (body: { model: string }) => {
      if (body.model === "primary") throw new Error("model overloaded");
      return reply("from backup");
    });
    const logWarn = vi.fn();

    const result = await chatCompleteWithRetry({
      model: "primary",
      fallbackModels: ["backup"],
      messages: [{ role: "user", content: "hi" }],
      openai: mockOpenai,
      maxRetries: 0,
      logWarn,
    });

    expect(result).toBe("from backup");
    expect(logWarn).toHaveBeenCalledWith("LLM call: model primary failed after retries, trying backup");
  });

  it("throws the last error when every model fails", async () => {
    create.mockRejectedValue(new Error("down"));

    await expect(
      chatCompleteWithRetry({
        model: "primary",
        fallbackModels: ["backup"],
        messages: [{ role: "user", content: "hi" }],
        openai: mockOpenai,
        maxRetries: 0,
      }),
    ).rejects.toThrow("LLM call (fallback: backup): failed after 1 attempts: down");
    expect(create).toHaveBeenCalledTimes(2);
  });
});

describe("OpenAIChatClient", () => {
  it("wraps a string prompt as one user message", async () => {
    const create = vi.fn().mockResolvedValue(reply('{"procedure": "quick_resolution"}'));
    const client = new OpenAIChatClient({ chat: { completions: { create } } } as unknown as OpenAI, {
      model: "gpt-4o-mini",
      temperature: 0,
      maxRetries: 0,
    });

    expect(await client.invoke("pick one")).toBe('{"procedure": "quick_resolution"}');
    expect(create).toHaveBeenCalledWith(
      expect.objectContaining({ model: "gpt-4o-mini", temperature: 0, messages: [{ role: "user", content: "pick one" }] }),
      expect.anything(),
    );
  });
});
