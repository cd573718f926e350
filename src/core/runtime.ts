import { ponderConfig, type PonderConfig } from "../config.js";
import type { ChatMessage, DebugEvent, UsageSummary } from "../chat-types.js";
import { listLocalModels, type ModelOption } from "../models.js";
import { summarizeUsage } from "../usage.js";
import {
  createChatSessionState,
  runChatTurn,
  type ChatSessionState,
  type ChatStreamSource,
  type ChatTurnResult,
} from "./turn.js";

export type RuntimeEvent = {
  type: string;
  payload: Record<string, unknown>;
};

export type RuntimeSnapshot = {
  sessionId: string;
  model: string;
  host: string;
  pending: boolean;
  statusLabel: string;
  messages: ChatMessage[];
  usage: UsageSummary;
  debug: boolean;
};

export type RuntimeInitOptions = {
  config?: PonderConfig;
  stream?: ChatStreamSource;
  listModels?: (request: { host: string; timeoutMs: number }) => Promise<ModelOption[]>;
};

export class PonderRuntime {
  private readonly config: PonderConfig;
  private readonly stream: ChatStreamSource | undefined;
  private readonly listModelsImpl: NonNullable<RuntimeInitOptions["listModels"]>;
  private readonly session: ChatSessionState;
  private model: string;
  private statusLabel = "ready";
  private activeAbortController: AbortController | null = null;
  private listeners = new Set<(event: RuntimeEvent) => void>();

  constructor(options: RuntimeInitOptions = {}) {
    this.config = options.config ?? ponderConfig;
    this.stream = options.stream;
    this.listModelsImpl = options.listModels ?? listLocalModels;
    this.session = createChatSessionState();
    this.model = this.config.model;
  }

  onEvent(listener: (event: RuntimeEvent) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(type: string, payload: Record<string, unknown>): void {
    const event: RuntimeEvent = {
      type,
      payload,
    };
    for (const listener of this.listeners) {
      listener(event);
    }
  }

  getState(): RuntimeSnapshot {
    return {
      sessionId: this.session.id,
      model: this.model,
      host: this.config.host,
      pending: this.session.pending,
      statusLabel: this.statusLabel,
      messages: [...this.session.messages],
      usage: summarizeUsage(this.session.tokenCount, this.config.energy),
      debug: this.config.debug,
    };
  }

  async sendPrompt(text: string): Promise<ChatTurnResult> {
    if (this.activeAbortController) {
      throw new Error("session is busy");
    }

    const controller = new AbortController();
    this.activeAbortController = controller;
    const sessionId = this.session.id;

    try {
      const result = await runChatTurn(
        this.session,
        text,
        {
          model: this.model,
          host: this.config.host,
          timeoutMs: this.config.requestTimeoutMs,
          signal: controller.signal,
          energy: this.config.energy,
          stream: this.stream,
        },
        {
          onUserMessage: (message) => {
            this.emit("session.message.appended", { session_id: sessionId, message });
            this.setStatus("waiting for model...");
          },
          onThinking: (thinking) => {
            this.emit("session.thinking", { session_id: sessionId, thinking });
          },
          onVisible: (visible, progress) => {
            this.setStatus(progress.thinkingOpen ? "thinking..." : "drafting response...");
            this.emit("session.stream.chunk", {
              session_id: sessionId,
              visible,
              thinking_open: progress.thinkingOpen,
            });
          },
          onCompleted: (message) => {
            this.emit("session.message.appended", { session_id: sessionId, message });
            this.emit("session.completed", {
              session_id: sessionId,
              answer_length: message.text.length,
              incomplete: message.incomplete === true,
            });
          },
          onUsage: (usage) => {
            this.emit("session.usage", { session_id: sessionId, usage });
          },
          onError: (error) => {
            this.emit("session.error", {
              session_id: sessionId,
              kind: error.name,
              message: error.message,
            });
          },
          onDebug: this.config.debug ? (event) => this.emitDebug(event) : undefined,
        },
      );

      if (result.status === "interrupted") {
        this.emit("session.interrupted", {
          session_id: sessionId,
          partial_output: result.message !== null,
        });
      }
      return result;
    } finally {
      this.activeAbortController = null;
      this.setStatus("ready");
    }
  }

  interrupt(): boolean {
    const controller = this.activeAbortController;
    if (!controller || controller.signal.aborted) {
      return false;
    }
    controller.abort();
    this.setStatus("interrupting...");
    return true;
  }

  clearConversation(): void {
    if (this.session.pending) {
      throw new Error("cannot clear while a response is streaming");
    }
    this.session.messages = [];
    this.emit("state.changed", { reason: "conversation_cleared", snapshot: this.getState() });
  }

  setModel(model: string): string {
    const next = model.trim();
    if (!next) {
      throw new Error("model name must not be empty");
    }
    this.model = next;
    this.emit("state.changed", { reason: "model_selected", snapshot: this.getState() });
    return next;
  }

  listModels(): Promise<ModelOption[]> {
    return this.listModelsImpl({ host: this.config.host, timeoutMs: this.config.requestTimeoutMs });
  }

  private emitDebug(event: DebugEvent): void {
    this.emit("session.debug", {
      session_id: this.session.id,
      stage: event.stage,
      data: event.data,
    });
  }

  private setStatus(label: string): void {
    if (label === this.statusLabel) {
      return;
    }
    this.statusLabel = label;
    this.emit("session.status", {
      session_id: this.session.id,
      pending: this.session.pending,
      status_label: label,
    });
  }
}
