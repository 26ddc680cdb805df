import { describe, expect, it } from "vitest";

import { ExponentialBackoff } from "../backoff";

describe("ExponentialBackoff", () => {
  it("produces doubling delays without jitter when disabled", () => {
    const backoff = new ExponentialBackoff({
      initialDelayMs: 200,
      jitterRatio: 0,
    });

    expect(backoff.nextDelay()).toBe(200);
    expect(backoff.nextDelay()).toBe(400);
    expect(backoff.nextDelay()).toBe(800);

    backoff.reset();
    expect(backoff.nextDelay()).toBe(200);
  });

  it("caps the delay before applying jitter", () => {
    const backoff = new ExponentialBackoff({
      initialDelayMs: 1_000,
      maxDelayMs: 3_000,
      jitterRatio: 0,
    });

    expect([1, 2, 3, 4, 5].map((retry) => backoff.computeDelayForAttempt(retry))).toEqual([
      1_000, 2_000, 3_000, 3_000, 3_000,
    ]);
  });

  it("spreads jitter uniformly across ±25%", () => {
    const randomValues = [0, 0.5, 0.75];
    const backoff = new ExponentialBackoff({
      initialDelayMs: 200,
      maxDelayMs: 1_600,
      random: () => {
        const value = randomValues.shift();
        return value === undefined ? 0.5 : value;
      },
    });

    expect(backoff.nextDelay()).toBe(150);
    expect(backoff.nextDelay()).toBe(400);
    expect(backoff.nextDelay()).toBe(1_000);
  });

  it("never exceeds the cap plus 25% and never drops below 1ms", () => {
    const high = new ExponentialBackoff({
      initialDelayMs: 1_000,
      maxDelayMs: 4_000,
      random: () => 0.999999,
    });
    for (let retry = 1; retry <= 10; retry += 1) {
      expect(high.computeDelayForAttempt(retry)).toBeLessThanOrEqual(5_000);
    }

    const tiny = new ExponentialBackoff({ initialDelayMs: 1, random: () => 0 });
    expect(tiny.computeDelayForAttempt(1)).toBe(1);
  });

  it("rejects invalid options", () => {
    expect(() => new ExponentialBackoff({ initialDelayMs: 0 })).toThrow(TypeError);
    expect(() => new ExponentialBackoff({ initialDelayMs: 100, maxDelayMs: 50 })).toThrow(
      "maxDelayMs must be greater than or equal to initialDelayMs",
    );
    expect(() => new ExponentialBackoff({ initialDelayMs: 100, jitterRatio: 1 })).toThrow(
      "Invalid jitter ratio: require 0 <= ratio < 1",
    );
  });
});
