import OpenAI from "openai";
import { normalizeHost, ponderConfig } from "./config.js";
import { BackendUnavailableError, describeError } from "./errors.js";

export type ModelOption = {
  id: string;
  label: string;
  ownedBy: string;
};

export type ListLocalModelsRequest = {
  host?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
};

// The server ignores the key, but the SDK refuses to start without one.
const PLACEHOLDER_API_KEY = "ollama";

/** Lists installed models through the server's OpenAI-compatible catalog endpoint. */
export async function listLocalModels(request: ListLocalModelsRequest = {}): Promise<ModelOption[]> {
  const host = normalizeHost(request.host ?? ponderConfig.host);
  const client = new OpenAI({
    apiKey: PLACEHOLDER_API_KEY,
    baseURL: `${host}/v1`,
    maxRetries: 0,
    timeout: request.timeoutMs ?? ponderConfig.requestTimeoutMs,
  });

  const byId = new Map<string, ModelOption>();
  try {
    for await (const model of client.models.list(request.signal ? { signal: request.signal } : undefined)) {
      const id = model.id.trim();
      if (!id) {
        continue;
      }
      byId.set(id, {
        id,
        label: modelIdToLabel(id),
        ownedBy: typeof model.owned_by === "string" ? model.owned_by : "",
      });
    }
  } catch (error) {
    const status = readStatus(error);
    throw new BackendUnavailableError(
      status === undefined
        ? `cannot list models on ${host}: ${describeError(error)}`
        : `model list on ${host} failed (${status}): ${describeError(error)}`,
      { status, cause: error },
    );
  }

  return Array.from(byId.values()).sort((a, b) => a.id.localeCompare(b.id));
}

export function modelIdToLabel(modelId: string): string {
  const [name = "", tag = ""] = modelId.trim().split(":", 2);
  const base = name.replace(/[-_]+/g, " ").trim() || modelId.trim();
  return tag && tag !== "latest" ? `${base} (${tag})` : base;
}

function readStatus(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}
