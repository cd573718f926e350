export type EnergyModel = {
  wattsUnderLoad: number;
  secondsPerToken: number;
};

export type PonderConfig = {
  host: string;
  model: string;
  requestTimeoutMs: number;
  energy: EnergyModel;
  debug: boolean;
};

export type ResolvedPonderConfig = {
  config: PonderConfig;
  warnings: string[];
};

type Env = Record<string, string | undefined>;

export const DEFAULT_OLLAMA_HOST = "http://localhost:11434";
export const DEFAULT_MODEL = "deepseek-r1";
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

// Presentational estimate, not a measurement.
export const DEFAULT_ENERGY_MODEL: EnergyModel = {
  wattsUnderLoad: 35,
  secondsPerToken: 0.02,
};

export function resolvePonderConfig(env: Env): ResolvedPonderConfig {
  const warnings: string[] = [];

  const readPositiveNumber = (key: string, fallback: number): number => {
    const raw = readTrimmedEnv(env, key);
    if (!raw) {
      return fallback;
    }
    const value = Number(raw);
    if (!Number.isFinite(value) || value <= 0) {
      warnings.push(`${key}=${raw} is not a positive number; using ${fallback}`);
      return fallback;
    }
    return value;
  };

  return {
    config: {
      host: normalizeHost(readTrimmedEnv(env, "PONDER_OLLAMA_HOST") || readTrimmedEnv(env, "OLLAMA_HOST") || DEFAULT_OLLAMA_HOST),
      model: readTrimmedEnv(env, "PONDER_MODEL") || DEFAULT_MODEL,
      requestTimeoutMs: Math.floor(readPositiveNumber("PONDER_REQUEST_TIMEOUT_MS", DEFAULT_REQUEST_TIMEOUT_MS)),
      energy: {
        wattsUnderLoad: readPositiveNumber("PONDER_WATTS_UNDER_LOAD", DEFAULT_ENERGY_MODEL.wattsUnderLoad),
        secondsPerToken: readPositiveNumber("PONDER_SECONDS_PER_TOKEN", DEFAULT_ENERGY_MODEL.secondsPerToken),
      },
      debug: isTruthyFlag(readTrimmedEnv(env, "PONDER_DEBUG")),
    },
    warnings,
  };
}

export function normalizeHost(value: string): string {
  const trimmed = value.trim().replace(/\/+$/g, "");
  if (!trimmed) {
    return DEFAULT_OLLAMA_HOST;
  }
  return /^https?:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
}

function readTrimmedEnv(env: Env, key: string): string {
  const value = env[key];
  return typeof value === "string" ? value.trim() : "";
}

function isTruthyFlag(value: string): boolean {
  return ["1", "true", "yes", "on"].includes(value.toLowerCase());
}

const resolved = resolvePonderConfig(process.env);

export const ponderConfig: PonderConfig = resolved.config;
export const ponderConfigWarnings: readonly string[] = resolved.warnings;
