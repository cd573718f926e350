import { describe, expect, it } from "vitest";
import { DEFAULT_ENERGY_MODEL, normalizeHost, resolvePonderConfig } from "./config.js";

describe("resolvePonderConfig", () => {
  it("uses defaults for an empty environment", () => {
    const { config, warnings } = resolvePonderConfig({});
    expect(config).toEqual({
      host: "http://localhost:11434",
      model: "deepseek-r1",
      requestTimeoutMs: 30_000,
      energy: DEFAULT_ENERGY_MODEL,
      debug: false,
    });
    expect(warnings).toEqual([]);
  });

  it("reads overrides", () => {
    const { config } = resolvePonderConfig({
      PONDER_OLLAMA_HOST: "gpu-box:11500/",
      PONDER_MODEL: " qwq ",
      PONDER_REQUEST_TIMEOUT_MS: "1500.7",
      PONDER_WATTS_UNDER_LOAD: "120",
      PONDER_SECONDS_PER_TOKEN: "0.05",
      PONDER_DEBUG: "true",
    });
    expect(config).toEqual({
      host: "http://gpu-box:11500",
      model: "qwq",
      requestTimeoutMs: 1500,
      energy: { wattsUnderLoad: 120, secondsPerToken: 0.05 },
      debug: true,
    });
  });

  it("falls back to OLLAMA_HOST", () => {
    expect(resolvePonderConfig({ OLLAMA_HOST: "https://models.internal" }).config.host).toBe("https://models.internal");
    expect(
      resolvePonderConfig({ OLLAMA_HOST: "ignored:1", PONDER_OLLAMA_HOST: "used:2" }).config.host,
    ).toBe("http://used:2");
  });

  it("reports invalid numbers and keeps the default", () => {
    const { config, warnings } = resolvePonderConfig({
      PONDER_WATTS_UNDER_LOAD: "abc",
      PONDER_SECONDS_PER_TOKEN: "-1",
    });
    expect(config.energy).toEqual(DEFAULT_ENERGY_MODEL);
    expect(warnings).toEqual([
      "PONDER_WATTS_UNDER_LOAD=abc is not a positive number; using 35",
      "PONDER_SECONDS_PER_TOKEN=-1 is not a positive number; using 0.02",
    ]);
  });
});

describe("normalizeHost", () => {
  it("adds a scheme and strips trailing slashes", () => {
    expect(normalizeHost("127.0.0.1:11434")).toBe("http://127.0.0.1:11434");
    expect(normalizeHost("http://localhost:11434///")).toBe("http://localhost:11434");
    expect(normalizeHost("   ")).toBe("http://localhost:11434");
  });
});
