import { DEFAULT_ENERGY_MODEL, type EnergyModel } from "./config.js";
import type { StreamStats, UsageSummary } from "./chat-types.js";

export const KILOWATT_HOURS_PER_GIGAJOULE = 277.778;

export function energyGigajoules(tokenCount: number, model: EnergyModel = DEFAULT_ENERGY_MODEL): number {
  if (!Number.isFinite(tokenCount) || tokenCount < 0) {
    throw new RangeError(`token count must be a non-negative number, got ${tokenCount}`);
  }
  return (tokenCount * model.secondsPerToken * model.wattsUnderLoad) / 1e9;
}

export function gigajoulesToKilowattHours(gigajoules: number): number {
  return gigajoules * KILOWATT_HOURS_PER_GIGAJOULE;
}

/** Evaluation count reported on the terminal chunk, or null when absent or unusable. */
export function readEvaluationCount(stats: StreamStats): number | null {
  const value = stats.prompt_eval_count;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    return null;
  }
  return value;
}

export function accumulateUsage(tokenCount: number, stats: StreamStats): number {
  const count = readEvaluationCount(stats);
  return count === null ? tokenCount : tokenCount + count;
}

export function summarizeUsage(tokenCount: number, model: EnergyModel = DEFAULT_ENERGY_MODEL): UsageSummary {
  const gigajoules = energyGigajoules(tokenCount, model);
  return {
    tokenCount,
    gigajoules,
    kilowattHours: gigajoulesToKilowattHours(gigajoules),
  };
}

export function formatUsage(summary: UsageSummary): string {
  return [
    `${summary.tokenCount.toLocaleString("en-US")} tokens`,
    `${summary.gigajoules.toExponential(3)} GJ`,
    `${summary.kilowattHours.toExponential(3)} kWh`,
  ].join(" · ");
}
