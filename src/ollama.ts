import { normalizeHost, ponderConfig } from "./config.js";
import type { DebugEvent, DecodedPart, StreamStats } from "./chat-types.js";
import {
  BackendUnavailableError,
  MalformedChunkError,
  createAbortError,
  describeError,
} from "./errors.js";

export type OllamaGenerateRequest = {
  prompt: string;
  model?: string;
  host?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
  onDebug?: (event: DebugEvent) => void;
};

const GENERATE_PATH = "/api/generate";

/**
 * Posts one generation request and yields its decoded parts as they arrive.
 *
 * Nothing is read from the connection until the caller pulls the next part. Closing the
 * generator early cancels the response body.
 */
export async function* streamOllamaGenerate(request: OllamaGenerateRequest): AsyncGenerator<DecodedPart> {
  const body = await openGenerateStream(request);
  const startedAt = Date.now();
  let partCount = 0;
  let textChars = 0;
  let terminal = false;

  try {
    for await (const part of decodeGenerateLines(readLines(body, request.signal))) {
      partCount += 1;
      textChars += part.text.length;
      terminal = part.stats.done === true;
      yield part;
    }
  } finally {
    request.onDebug?.({
      stage: "stream_summary",
      data: {
        partCount,
        textChars,
        terminal,
        durationMs: Date.now() - startedAt,
      },
    });
  }
}

export async function* decodeGenerateLines(
  lines: AsyncIterable<string> | Iterable<string>,
): AsyncGenerator<DecodedPart> {
  let lineNumber = 0;
  for await (const rawLine of lines) {
    lineNumber += 1;
    const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;
    if (line === "") {
      continue;
    }

    const record = parseChunkLine(line, lineNumber);
    if (record.done === true) {
      yield { text: "", stats: record };
      return;
    }

    yield {
      text: typeof record.response === "string" ? record.response : "",
      stats: {},
    };
  }
}

export async function* readLines(body: ReadableStream<Uint8Array>, signal?: AbortSignal): AsyncGenerator<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = "";
  let finished = false;

  try {
    while (true) {
      const chunk = await readChunk(() => reader.read(), signal);
      if (chunk.done) {
        finished = true;
        break;
      }

      buffer += decoder.decode(chunk.value, { stream: true });
      let newlineIndex = buffer.indexOf("\n");
      while (newlineIndex >= 0) {
        yield buffer.slice(0, newlineIndex);
        buffer = buffer.slice(newlineIndex + 1);
        newlineIndex = buffer.indexOf("\n");
      }
    }

    buffer += decoder.decode();
    if (buffer) {
      yield buffer;
    }
  } finally {
    if (!finished) {
      await reader.cancel().catch(() => undefined);
    }
    reader.releaseLock();
  }
}

async function openGenerateStream(request: OllamaGenerateRequest): Promise<ReadableStream<Uint8Array>> {
  if (request.signal?.aborted) {
    throw createAbortError();
  }

  const host = normalizeHost(request.host ?? ponderConfig.host);
  const timeoutMs = request.timeoutMs ?? ponderConfig.requestTimeoutMs;
  const payload = {
    model: request.model ?? ponderConfig.model,
    prompt: request.prompt,
    stream: true,
  };

  request.onDebug?.({
    stage: "request",
    data: {
      url: `${host}${GENERATE_PATH}`,
      payload,
      timeoutMs,
    },
  });

  const timeoutController = new AbortController();
  let timedOut = false;
  const timeoutHandle = setTimeout(() => {
    timedOut = true;
    timeoutController.abort();
  }, timeoutMs);

  const signal = request.signal
    ? AbortSignal.any([request.signal, timeoutController.signal])
    : timeoutController.signal;

  let response: Response;
  try {
    response = await fetch(`${host}${GENERATE_PATH}`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Accept: "application/x-ndjson",
      },
      body: JSON.stringify(payload),
      signal,
    });
  } catch (error) {
    if (request.signal?.aborted) {
      throw createAbortError();
    }
    if (timedOut) {
      throw new BackendUnavailableError(`no response from ${host} within ${timeoutMs}ms`, { cause: error });
    }
    throw new BackendUnavailableError(`cannot reach ${host}: ${describeFetchFailure(error)}`, { cause: error });
  } finally {
    clearTimeout(timeoutHandle);
  }

  request.onDebug?.({
    stage: "response_headers",
    data: {
      status: response.status,
      contentType: response.headers.get("content-type"),
    },
  });

  if (!response.ok) {
    const bodyText = await response.text().catch(() => "");
    throw new BackendUnavailableError(
      `${host} responded ${response.status}: ${summarizeHttpError(bodyText)}`,
      { status: response.status },
    );
  }

  if (!response.body) {
    throw new BackendUnavailableError(`${host} returned an empty response body`, { status: response.status });
  }

  return response.body;
}

async function readChunk<T>(read: () => Promise<T>, signal?: AbortSignal): Promise<T> {
  if (signal?.aborted) {
    throw createAbortError();
  }
  try {
    return await read();
  } catch (error) {
    if (signal?.aborted) {
      throw createAbortError();
    }
    throw new BackendUnavailableError(`connection lost mid-stream: ${describeError(error)}`, { cause: error });
  }
}

function parseChunkLine(line: string, lineNumber: number): StreamStats {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line) as unknown;
  } catch (error) {
    throw new MalformedChunkError(line, lineNumber, error);
  }
  if (!isRecord(parsed)) {
    throw new MalformedChunkError(line, lineNumber);
  }
  return parsed;
}

function describeFetchFailure(error: unknown): string {
  const message = describeError(error);
  const cause = error instanceof Error ? error.cause : undefined;
  if (isRecord(cause) && typeof cause.code === "string") {
    return `${message} (${cause.code})`;
  }
  return message;
}

function summarizeHttpError(payload: string): string {
  const text = payload.trim();
  if (!text) {
    return "empty response body";
  }

  const parsed = safeParseJson(text);
  if (isRecord(parsed) && typeof parsed.error === "string" && parsed.error.trim()) {
    return parsed.error.trim();
  }
  return text.length <= 180 ? text : `${text.slice(0, 177)}...`;
}

function safeParseJson(text: string): unknown {
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return null;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
