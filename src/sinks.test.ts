import { describe, expect, it, vi } from "vitest";
import { CircuitBreaker } from "./circuitBreaker";
import type { LoggerLike } from "./logger";
import { LogSink, TelegramSink } from "./sinks";

const recordingLogger = (): LoggerLike & { lines: string[] } => {
  const lines: string[] = [];
  const record = (message: string) => {
    lines.push(message);
  };
  return { lines, info: record, warn: record, error: record, debug: record };
};

describe("TelegramSink", () => {
  it("sends markdown messages to the user's chat", async () => {
    const fetchImpl = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>(
      async () => new Response(JSON.stringify({ ok: true }), { status: 200 }),
    );
    const sink = new TelegramSink("test-token", 1000, fetchImpl, recordingLogger());

    await expect(sink.deliver(42, "*hello*")).resolves.toBe(true);

    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(String(url)).toBe("https://api.telegram.org/bottest-token/sendMessage");
    expect(init?.method).toBe("POST");
    expect(typeof init?.body === "string" ? JSON.parse(init.body) : null).toEqual({
      chat_id: 42,
      text: "*hello*",
      parse_mode: "Markdown",
    });
  });

  it("reports refusals as undelivered", async () => {
    const logger = recordingLogger();
    const fetchImpl: typeof fetch = async () =>
      new Response(JSON.stringify({ ok: false, description: "chat not found" }), {
        status: 400,
      });
    const sink = new TelegramSink("test-token", 1000, fetchImpl, logger);

    await expect(sink.deliver(42, "hi")).resolves.toBe(false);
    expect(logger.lines).toEqual(["Telegram rejected message"]);
  });

  it.each([429, 502, 503])(
    "raises a transient failure for status %i",
    async (status) => {
      const logger = recordingLogger();
      const fetchImpl: typeof fetch = async () =>
        new Response("unavailable", { status });
      const sink = new TelegramSink("test-token", 1000, fetchImpl, logger);

      await expect(sink.deliver(42, "hi")).rejects.toMatchObject({
        kind: "TransientNetwork",
        message: `Telegram request failed with status ${status}`,
      });
      expect(logger.lines).toEqual([]);
    },
  );

  it("trips the messaging circuit on repeated gateway errors", async () => {
    const fetchImpl = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>(
      async () => new Response("bad gateway", { status: 502 }),
    );
    const sink = new TelegramSink("test-token", 1000, fetchImpl, recordingLogger());
    const breaker = new CircuitBreaker({
      name: "messaging",
      failureThreshold: 2,
      recoveryTimeoutMs: 30_000,
      logger: recordingLogger(),
    });

    for (let call = 0; call < 6; call += 1) {
      await expect(
        breaker.execute(() => sink.deliver(42, "hi")),
      ).rejects.toMatchObject({
        kind: call < 2 ? "TransientNetwork" : "CircuitOpen",
      });
    }

    expect(breaker.getState()).toBe("open");
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it("lets transport failures propagate", async () => {
    const fetchImpl: typeof fetch = async () => {
      throw new TypeError("fetch failed");
    };
    const sink = new TelegramSink("test-token", 1000, fetchImpl, recordingLogger());

    await expect(sink.deliver(42, "hi")).rejects.toThrow("fetch failed");
  });
});

describe("LogSink", () => {
  it("logs the message and reports it delivered", async () => {
    const logger = recordingLogger();
    const sink = new LogSink(logger);

    await expect(sink.deliver(7, "line one")).resolves.toBe(true);
    expect(logger.lines).toEqual(["Notification for 7\nline one"]);
  });
});
