import { randomUUID } from "node:crypto";
import type { EnergyModel } from "../config.js";
import type { ChatMessage, DebugEvent, DecodedPart, StreamStats, UsageSummary } from "../chat-types.js";
import { BackendUnavailableError, MalformedChunkError, isAbortError } from "../errors.js";
import { streamOllamaGenerate, type OllamaGenerateRequest } from "../ollama.js";
import { extractThinking, isThinkingOpen, type ThinkingMarkers } from "../thinking.js";
import { accumulateUsage, summarizeUsage } from "../usage.js";

export type ChatSessionState = {
  id: string;
  messages: ChatMessage[];
  tokenCount: number;
  pending: boolean;
};

export type ChatTurnStatus = "completed" | "malformed" | "interrupted" | "unavailable";

export type ChatTurnResult = {
  status: ChatTurnStatus;
  message: ChatMessage | null;
  stats: StreamStats | null;
  error?: Error;
};

export type ChatStreamSource = (request: OllamaGenerateRequest) => AsyncIterable<DecodedPart>;

export type ChatTurnOptions = {
  model?: string;
  host?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
  markers?: ThinkingMarkers;
  energy?: EnergyModel;
  stream?: ChatStreamSource;
};

export type ChatTurnHandlers = {
  onUserMessage?: (message: ChatMessage) => void;
  /** Fires once per turn, when the reasoning block first closes with content. */
  onThinking?: (thinking: string) => void;
  onVisible?: (visible: string, progress: { thinkingOpen: boolean }) => void;
  onCompleted?: (message: ChatMessage) => void;
  onUsage?: (summary: UsageSummary) => void;
  onError?: (error: Error) => void;
  onDebug?: (event: DebugEvent) => void;
};

export function createChatSessionState(id: string = randomUUID()): ChatSessionState {
  return {
    id,
    messages: [],
    tokenCount: 0,
    pending: false,
  };
}

export async function runChatTurn(
  session: ChatSessionState,
  prompt: string,
  options: ChatTurnOptions = {},
  handlers: ChatTurnHandlers = {},
): Promise<ChatTurnResult> {
  const cleanPrompt = prompt.trim();
  if (!cleanPrompt) {
    throw new Error("prompt must not be empty");
  }
  if (session.pending) {
    throw new Error("session is busy");
  }

  const userMessage: ChatMessage = { role: "user", text: cleanPrompt };
  session.messages.push(userMessage);
  session.pending = true;
  handlers.onUserMessage?.(userMessage);

  const stream = options.stream ?? streamOllamaGenerate;
  let accumulated = "";
  let thinkingShown = false;
  let stats: StreamStats | null = null;

  try {
    const parts = stream({
      prompt: cleanPrompt,
      model: options.model,
      host: options.host,
      timeoutMs: options.timeoutMs,
      signal: options.signal,
      onDebug: handlers.onDebug,
    });

    for await (const part of parts) {
      if (part.stats.done === true) {
        stats = part.stats;
        session.tokenCount = accumulateUsage(session.tokenCount, part.stats);
        continue;
      }
      if (!part.text) {
        continue;
      }

      accumulated += part.text;
      const split = extractThinking(accumulated, options.markers);
      if (split.thinking && !thinkingShown) {
        thinkingShown = true;
        handlers.onThinking?.(split.thinking);
      }
      handlers.onVisible?.(split.visible, { thinkingOpen: isThinkingOpen(accumulated, options.markers) });
    }

    const message = appendAssistantMessage(session, accumulated, options.markers, false);
    handlers.onCompleted?.(message);
    handlers.onUsage?.(summarizeUsage(session.tokenCount, options.energy));
    handlers.onDebug?.({
      stage: "turn_completed",
      data: {
        sessionId: session.id,
        answerLength: message.text.length,
        thinkingLength: message.thinking?.length ?? 0,
        tokenCount: session.tokenCount,
      },
    });

    return { status: "completed", message, stats };
  } catch (error) {
    const status = classifyTurnFailure(error);
    if (!status || !(error instanceof Error)) {
      throw error;
    }

    const partial = accumulated.trim()
      ? appendAssistantMessage(session, accumulated, options.markers, true)
      : null;
    if (partial) {
      handlers.onCompleted?.(partial);
    }
    if (status !== "interrupted") {
      handlers.onError?.(error);
    }

    return { status, message: partial, stats, error };
  } finally {
    session.pending = false;
  }
}

function appendAssistantMessage(
  session: ChatSessionState,
  accumulated: string,
  markers: ThinkingMarkers | undefined,
  incomplete: boolean,
): ChatMessage {
  const split = extractThinking(accumulated, markers);
  const message: ChatMessage = {
    role: "assistant",
    text: split.visible,
  };
  if (split.thinking) {
    message.thinking = split.thinking;
  }
  if (incomplete) {
    message.incomplete = true;
  }
  session.messages.push(message);
  return message;
}

function classifyTurnFailure(error: unknown): Exclude<ChatTurnStatus, "completed"> | null {
  if (isAbortError(error)) {
    return "interrupted";
  }
  if (error instanceof MalformedChunkError) {
    return "malformed";
  }
  if (error instanceof BackendUnavailableError) {
    return "unavailable";
  }
  return null;
}
