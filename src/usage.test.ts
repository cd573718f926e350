import { describe, expect, it } from "vitest";
import {
  accumulateUsage,
  energyGigajoules,
  formatUsage,
  gigajoulesToKilowattHours,
  readEvaluationCount,
  summarizeUsage,
} from "./usage.js";

describe("energyGigajoules", () => {
  it("is zero for zero tokens", () => {
    expect(energyGigajoules(0)).toBe(0);
  });

  it("multiplies tokens by seconds per token and watts", () => {
    expect(energyGigajoules(1_000)).toBeCloseTo(7e-7, 15);
    expect(energyGigajoules(10, { wattsUnderLoad: 100, secondsPerToken: 0.5 })).toBeCloseTo(5e-7, 15);
  });

  it("never decreases as the token count grows", () => {
    const counts = [0, 1, 2, 7, 100, 1_234, 50_000, 1_000_000];
    const values = counts.map((count) => energyGigajoules(count));
    for (let index = 1; index < values.length; index += 1) {
      expect(values[index]).toBeGreaterThanOrEqual(values[index - 1] ?? 0);
    }
  });

  it("rejects negative and non-finite counts", () => {
    expect(() => energyGigajoules(-1)).toThrow(RangeError);
    expect(() => energyGigajoules(Number.NaN)).toThrow(RangeError);
  });
});

describe("gigajoulesToKilowattHours", () => {
  it("converts with the display factor", () => {
    expect(gigajoulesToKilowattHours(1)).toBe(277.778);
    expect(gigajoulesToKilowattHours(0)).toBe(0);
  });
});

describe("accumulateUsage", () => {
  it("adds the evaluation count from the terminal record", () => {
    expect(accumulateUsage(10, { done: true, prompt_eval_count: 7 })).toBe(17);
  });

  it("leaves the total unchanged when the count is absent or unusable", () => {
    expect(accumulateUsage(10, { done: true })).toBe(10);
    expect(accumulateUsage(10, { done: true, prompt_eval_count: "7" })).toBe(10);
    expect(accumulateUsage(10, { done: true, prompt_eval_count: -1 })).toBe(10);
    expect(accumulateUsage(10, { done: true, prompt_eval_count: 2.5 })).toBe(10);
  });

  it("reads zero as a valid count", () => {
    expect(readEvaluationCount({ prompt_eval_count: 0 })).toBe(0);
    expect(readEvaluationCount({})).toBeNull();
  });
});

describe("formatUsage", () => {
  it("renders tokens, gigajoules and kilowatt-hours", () => {
    expect(formatUsage(summarizeUsage(1_234))).toBe("1,234 tokens · 8.638e-7 GJ · 2.399e-4 kWh");
  });

  it("renders an empty session", () => {
    expect(formatUsage(summarizeUsage(0))).toBe("0 tokens · 0.000e+0 GJ · 0.000e+0 kWh");
  });
});
