export type ChatMessage = {
  role: "user" | "assistant";
  text: string;
  thinking?: string;
  incomplete?: boolean;
};

export type ThinkingSplit = {
  thinking: string | null;
  visible: string;
};

/** Full terminal record as sent by the server; `{}` on non-terminal parts. */
export type StreamStats = Record<string, unknown>;

export type DecodedPart = {
  text: string;
  stats: StreamStats;
};

export type DebugEvent = {
  stage: string;
  data: unknown;
};

export type UsageSummary = {
  tokenCount: number;
  gigajoules: number;
  kilowattHours: number;
};
