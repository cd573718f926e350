import React, { useEffect, useRef, useState } from "react";
import { Box, render, Text, useApp, useInput } from "ink";
import TextInput from "ink-text-input";
import { ponderConfig, ponderConfigWarnings } from "./config.js";
import type { ChatMessage, UsageSummary } from "./chat-types.js";
import { PonderRuntime, type RuntimeEvent } from "./core/runtime.js";
import { describeError } from "./errors.js";
import { summarizeThought } from "./thinking.js";
import { formatUsage } from "./usage.js";

type UiMessage = {
  id: number;
  kind: "user" | "assistant" | "system";
  text: string;
  thinking?: string;
  incomplete?: boolean;
};

type DraftState = {
  visible: string;
  thinking: string | null;
  thinkingOpen: boolean;
};

type CommandOption = {
  name: string;
  description: string;
};

const COMMAND_OPTIONS: CommandOption[] = [
  { name: "/help", description: "show commands and keys" },
  { name: "/clear", description: "clear the conversation (usage totals are kept)" },
  { name: "/model", description: "switch model, e.g. /model deepseek-r1:14b" },
  { name: "/models", description: "list models installed on the server" },
  { name: "/thinking", description: "show or hide reasoning blocks" },
  { name: "/exit", description: "quit" },
];

const MAX_VISIBLE_MESSAGES = 14;
const STREAM_CURSOR = "▌";
const GLYPH_USER = "> ";
const GLYPH_ASSISTANT = "⟣ ";
const GLYPH_SYSTEM = "⌁ ";
const EMPTY_DRAFT: DraftState = { visible: "", thinking: null, thinkingOpen: false };

function App({ runtime }: { runtime: PonderRuntime }) {
  const { exit } = useApp();
  const initial = runtime.getState();
  const nextMessageIdRef = useRef(1);
  const [messages, setMessages] = useState<UiMessage[]>([]);
  const [draft, setDraft] = useState<DraftState>(EMPTY_DRAFT);
  const [pending, setPending] = useState(initial.pending);
  const [statusLabel, setStatusLabel] = useState(initial.statusLabel);
  const [usage, setUsage] = useState<UsageSummary>(initial.usage);
  const [model, setModel] = useState(initial.model);
  const [showThinking, setShowThinking] = useState(false);
  const [input, setInput] = useState("");

  const nextId = () => {
    const id = nextMessageIdRef.current;
    nextMessageIdRef.current += 1;
    return id;
  };

  const appendMessage = (message: Omit<UiMessage, "id">) => {
    setMessages((current) => [...current, { ...message, id: nextId() }]);
  };

  const appendSystemMessage = (text: string) => {
    appendMessage({ kind: "system", text });
  };

  useEffect(() => {
    return runtime.onEvent((event: RuntimeEvent) => {
      const payload = event.payload;
      switch (event.type) {
        case "session.status": {
          setPending(payload.pending === true);
          setStatusLabel(readString(payload.status_label) || "ready");
          return;
        }
        case "session.message.appended": {
          const message = readChatMessage(payload.message);
          if (!message) {
            return;
          }
          if (message.role === "assistant") {
            setDraft(EMPTY_DRAFT);
          }
          appendMessage({
            kind: message.role,
            text: message.text,
            thinking: message.thinking,
            incomplete: message.incomplete,
          });
          return;
        }
        case "session.thinking": {
          const thinking = readString(payload.thinking);
          setDraft((current) => ({ ...current, thinking }));
          return;
        }
        case "session.stream.chunk": {
          const visible = readString(payload.visible);
          const thinkingOpen = payload.thinking_open === true;
          setDraft((current) => ({ ...current, visible, thinkingOpen }));
          return;
        }
        case "session.usage": {
          const next = readUsage(payload.usage);
          if (next) {
            setUsage(next);
          }
          return;
        }
        case "session.error": {
          const kind = readString(payload.kind);
          const message = readString(payload.message);
          setDraft(EMPTY_DRAFT);
          appendSystemMessage(formatErrorRow(kind, message));
          return;
        }
        case "session.interrupted": {
          setDraft(EMPTY_DRAFT);
          appendSystemMessage(
            payload.partial_output === true
              ? "response interrupted. partial output kept."
              : "response interrupted.",
          );
          return;
        }
        case "session.debug": {
          appendSystemMessage(`debug ${readString(payload.stage)}: ${safeJsonStringify(payload.data)}`);
          return;
        }
        case "state.changed": {
          const snapshot = runtime.getState();
          setModel(snapshot.model);
          if (payload.reason === "conversation_cleared") {
            setMessages([]);
          }
          return;
        }
        default:
          return;
      }
    });
  }, [runtime]);

  useInput((inputKey, key) => {
    if (key.escape && pending) {
      runtime.interrupt();
      return;
    }
    if (key.ctrl && inputKey === "t") {
      setShowThinking((current) => !current);
    }
  });

  const runCommand = (rawInput: string) => {
    const [command = "", ...args] = rawInput.trim().split(/\s+/);
    switch (command.toLowerCase()) {
      case "/help": {
        appendSystemMessage(
          [
            ...COMMAND_OPTIONS.map((option) => `${option.name}  ${option.description}`),
            "esc  interrupt a streaming response",
            "ctrl+t  show or hide reasoning",
          ].join("\n"),
        );
        return;
      }
      case "/clear": {
        try {
          runtime.clearConversation();
          setDraft(EMPTY_DRAFT);
        } catch (error) {
          appendSystemMessage(describeError(error));
        }
        return;
      }
      case "/model": {
        const name = args.join(" ");
        if (!name) {
          appendSystemMessage(`current model: ${model}`);
          return;
        }
        try {
          appendSystemMessage(`model set to ${runtime.setModel(name)}`);
        } catch (error) {
          appendSystemMessage(describeError(error));
        }
        return;
      }
      case "/models": {
        void runtime.listModels().then(
          (models) => {
            appendSystemMessage(
              models.length > 0
                ? models.map((option) => `${option.id === model ? "*" : "-"} ${option.id}  (${option.label})`).join("\n")
                : "no models installed on the server",
            );
          },
          (error: unknown) => {
            appendSystemMessage(formatErrorRow(error instanceof Error ? error.name : "", describeError(error)));
          },
        );
        return;
      }
      case "/thinking": {
        setShowThinking((current) => !current);
        return;
      }
      case "/exit":
      case "/quit": {
        exit();
        return;
      }
      default:
        appendSystemMessage(`unknown command: ${command}. try /help`);
    }
  };

  const onSubmit = (value: string) => {
    const text = value.trim();
    setInput("");
    if (!text) {
      return;
    }
    if (text.startsWith("/")) {
      runCommand(text);
      return;
    }
    if (pending) {
      appendSystemMessage("still streaming; press esc to interrupt first.");
      return;
    }
    void runtime.sendPrompt(text).catch((error: unknown) => {
      appendSystemMessage(describeError(error));
    });
  };

  const visibleMessages = messages.slice(-MAX_VISIBLE_MESSAGES);

  return (
    <Box flexDirection="column" paddingX={1}>
      <Box marginBottom={1}>
        <Text bold color="cyan">ponder</Text>
        <Text color="gray"> · {model} @ {initial.host}</Text>
      </Box>

      {visibleMessages.map((message) => (
        <MemoizedMessageRow key={message.id} message={message} showThinking={showThinking} />
      ))}

      {pending && (
        <Box flexDirection="column" marginBottom={1}>
          {draft.thinking && (
            <ThinkingBlock thinking={draft.thinking} expanded={showThinking} />
          )}
          {draft.thinkingOpen ? (
            <Text color="gray">{GLYPH_ASSISTANT}{draft.visible}{STREAM_CURSOR}</Text>
          ) : (
            <MarkdownText text={`${draft.visible}${STREAM_CURSOR}`} prefix={GLYPH_ASSISTANT} />
          )}
        </Box>
      )}

      <Box>
        <Text color={pending ? "yellow" : "gray"}>{statusLabel}</Text>
        <Text color="gray"> · {formatUsage(usage)}</Text>
      </Box>
      <Box borderStyle="round" borderColor={pending ? "gray" : "blue"} paddingX={1}>
        <Text color="blueBright">{GLYPH_USER}</Text>
        <TextInput
          value={input}
          onChange={setInput}
          onSubmit={onSubmit}
          placeholder={pending ? "esc to interrupt" : "send a message, /help for commands"}
        />
      </Box>
    </Box>
  );
}

function MessageRow({ message, showThinking }: { message: UiMessage; showThinking: boolean }) {
  if (message.kind === "user") {
    return (
      <Box marginBottom={1}>
        <Text color="blueBright">{GLYPH_USER}{message.text}</Text>
      </Box>
    );
  }
  if (message.kind === "assistant") {
    return (
      <Box flexDirection="column" marginBottom={1}>
        {message.thinking && <ThinkingBlock thinking={message.thinking} expanded={showThinking} />}
        <MarkdownText text={message.text || "(empty response)"} prefix={GLYPH_ASSISTANT} />
        {message.incomplete && <Text color="yellow">  [incomplete]</Text>}
      </Box>
    );
  }
  return (
    <Box marginBottom={1}>
      <Text color="gray">{GLYPH_SYSTEM}{message.text}</Text>
    </Box>
  );
}

const MemoizedMessageRow = React.memo(MessageRow);

function ThinkingBlock({ thinking, expanded }: { thinking: string; expanded: boolean }) {
  if (!expanded) {
    return (
      <Text color="gray" italic>
        {"▸"} thinking: {summarizeThought(thinking)} (ctrl+t to expand)
      </Text>
    );
  }
  return (
    <Box flexDirection="column" borderStyle="single" borderColor="gray" paddingX={1}>
      <Text color="gray" italic>
        {"▾"} thinking process
      </Text>
      <Text color="gray">{thinking}</Text>
    </Box>
  );
}

function MarkdownText({ text, prefix }: { text: string; prefix: string }) {
  const lines = text.split("\n");
  return (
    <Box flexDirection="column">
      {lines.map((line, index) => {
        const linePrefix = index === 0 ? prefix : " ".repeat(prefix.length);

        const headingMatch = line.match(/^\s*#{1,6}\s+(.+)$/);
        if (headingMatch?.[1]) {
          return (
            <Text key={`line-${index}`} bold color="cyan">
              {linePrefix}
              {headingMatch[1]}
            </Text>
          );
        }

        const bulletMatch = line.match(/^(\s*)[-*]\s+(.+)$/);
        if (bulletMatch?.[2]) {
          return (
            <Text key={`line-${index}`} color="white">
              {linePrefix}
              {" ".repeat(bulletMatch[1]?.length ?? 0)}* {renderInlineMarkdown(bulletMatch[2], `b-${index}`)}
            </Text>
          );
        }

        return (
          <Text key={`line-${index}`} color="white">
            {linePrefix}
            {renderInlineMarkdown(line, `p-${index}`)}
          </Text>
        );
      })}
    </Box>
  );
}

function renderInlineMarkdown(input: string, keyPrefix: string): React.ReactNode[] {
  const tokens = input.split(/(\*\*[^*]+\*\*|`[^`]+`)/g);
  const nodes: React.ReactNode[] = [];
  let index = 0;
  for (const token of tokens) {
    if (!token) {
      continue;
    }
    if (token.startsWith("**") && token.endsWith("**")) {
      nodes.push(
        <Text key={`${keyPrefix}-${index++}`} bold>
          {token.slice(2, -2)}
        </Text>,
      );
      continue;
    }
    if (token.startsWith("`") && token.endsWith("`")) {
      nodes.push(
        <Text key={`${keyPrefix}-${index++}`} color="yellow">
          {token.slice(1, -1)}
        </Text>,
      );
      continue;
    }
    nodes.push(<Text key={`${keyPrefix}-${index++}`}>{token}</Text>);
  }
  return nodes;
}

function formatErrorRow(kind: string, message: string): string {
  if (kind === "BackendUnavailableError") {
    return `backend unavailable: ${message}`;
  }
  if (kind === "MalformedChunkError") {
    return `stream interrupted: ${message}. partial output kept.`;
  }
  return `error: ${message}`;
}

function readChatMessage(value: unknown): ChatMessage | null {
  if (!isRecord(value)) {
    return null;
  }
  const role = value.role;
  if ((role !== "user" && role !== "assistant") || typeof value.text !== "string") {
    return null;
  }
  return {
    role,
    text: value.text,
    thinking: typeof value.thinking === "string" ? value.thinking : undefined,
    incomplete: value.incomplete === true ? true : undefined,
  };
}

function readUsage(value: unknown): UsageSummary | null {
  if (!isRecord(value)) {
    return null;
  }
  const { tokenCount, gigajoules, kilowattHours } = value;
  if (typeof tokenCount !== "number" || typeof gigajoules !== "number" || typeof kilowattHours !== "number") {
    return null;
  }
  return { tokenCount, gigajoules, kilowattHours };
}

function readString(value: unknown): string {
  return typeof value === "string" ? value : "";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function safeJsonStringify(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

export async function startTuiApp(): Promise<void> {
  for (const warning of ponderConfigWarnings) {
    console.warn(`[ponder] config warning: ${warning}`);
  }

  const runtime = new PonderRuntime({ config: ponderConfig });
  const instance = render(<App runtime={runtime} />);
  await instance.waitUntilExit();
  runtime.interrupt();
}
