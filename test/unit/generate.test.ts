import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { generateReview } from "../../src/llm/generate";
import { RetryError } from "../../src/core/retry";
import { ScriptedGenerator, httpError, recordingSleep, reply } from "../helpers/fakes";

const request = { prompt: "Review this", model: "gemini-2.5-flash", temperature: 0.2, maxOutputTokens: 1024 };

describe("generateReview", () => {
  it("returns the first answer without waiting", async () => {
    const generator = new ScriptedGenerator([reply("LGTM")]);
    const { sleep, delays } = recordingSleep();

    const review = await generateReview(generator, request, { sleep });

    assert.deepEqual(review, { text: "LGTM", tokenUsage: { input: 12, output: 3 }, attempts: 1 });
    assert.deepEqual(generator.requests, [request]);
    assert.deepEqual(delays, []);
  });

  it("retries transient failures and logs each one", async () => {
    const generator = new ScriptedGenerator([
      httpError(503, "Service Unavailable"),
      httpError(429, "Too Many Requests"),
      reply("Found two bugs."),
    ]);
    const { sleep, delays } = recordingSleep();
    const logged: string[] = [];
    const seen: number[] = [];

    const review = await generateReview(
      generator,
      request,
      { maxAttempts: 3, initialDelayMs: 1000, sleep, onRetry: (info) => seen.push(info.attempt) },
      (message) => logged.push(message),
    );

    assert.equal(review.text, "Found two bugs.");
    assert.equal(review.attempts, 3);
    assert.deepEqual(delays, [1000, 2000]);
    assert.deepEqual(seen, [1, 2]);
    assert.deepEqual(logged, [
      "gemini attempt 1 failed (Service Unavailable). Retrying in 1.0s...",
      "gemini attempt 2 failed (Too Many Requests). Retrying in 2.0s...",
    ]);
  });

  it("stops at the first fatal failure", async () => {
    const unauthorized = httpError(401, "Incorrect API key provided");
    const generator = new ScriptedGenerator([unauthorized, reply("unreachable")], "openai");
    const { sleep } = recordingSleep();

    await assert.rejects(generateReview(generator, request, { maxAttempts: 5, initialDelayMs: 10, sleep }), (err: unknown) => {
      assert.ok(err instanceof RetryError);
      assert.equal(err.exhausted, false);
      assert.equal(err.attempts, 1);
      assert.equal(err.cause, unauthorized);
      return true;
    });
    assert.equal(generator.requests.length, 1);
  });

  it("gives up after the configured attempts", async () => {
    const generator = new ScriptedGenerator([
      httpError(500, "Internal error"),
      httpError(500, "Internal error"),
    ]);
    const { sleep, delays } = recordingSleep();

    await assert.rejects(generateReview(generator, request, { maxAttempts: 2, initialDelayMs: 10, sleep }), {
      name: "RetryError",
      message: "Gave up after 2 attempts: Internal error",
    });
    assert.deepEqual(delays, [10]);
  });
});
