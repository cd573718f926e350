import type { ThinkingSplit } from "./chat-types.js";

export type ThinkingMarkers = {
  open: string;
  close: string;
};

export const DEFAULT_THINKING_MARKERS: ThinkingMarkers = {
  open: "<think>",
  close: "</think>",
};

const MAX_THOUGHT_TITLE_LENGTH = 60;

const patternCache = new Map<string, { first: RegExp; all: RegExp }>();

/**
 * Splits model output into its reasoning segment and the text meant for the reader.
 *
 * `thinking` is the content of the first complete marker pair; every complete pair is
 * removed from `visible`. Until a closing marker arrives the input is returned
 * untouched, so a partially streamed answer renders as-is.
 */
export function extractThinking(text: string, markers: ThinkingMarkers = DEFAULT_THINKING_MARKERS): ThinkingSplit {
  const patterns = getPairPatterns(markers);
  const match = patterns.first.exec(text);
  if (!match) {
    return { thinking: null, visible: text };
  }

  return {
    thinking: (match[1] ?? "").trim(),
    visible: text.replace(patterns.all, "").trim(),
  };
}

/** True while the last opening marker has no closing marker after it. */
export function isThinkingOpen(text: string, markers: ThinkingMarkers = DEFAULT_THINKING_MARKERS): boolean {
  const openIndex = text.lastIndexOf(markers.open);
  if (openIndex < 0) {
    return false;
  }
  return text.indexOf(markers.close, openIndex + markers.open.length) < 0;
}

export function summarizeThought(thinking: string): string {
  const text = thinking.trim();
  if (!text) {
    return "reasoning";
  }

  const titleMatch = text.match(/^\*\*(.+?)\*\*/s);
  const firstLine = titleMatch?.[1] ?? text.split("\n").find((line) => line.trim()) ?? "";
  const title = firstLine.replace(/[*_`]+/g, "").replace(/\s+/g, " ").trim().toLowerCase() || "reasoning";
  return title.length <= MAX_THOUGHT_TITLE_LENGTH ? title : `${title.slice(0, MAX_THOUGHT_TITLE_LENGTH - 3)}...`;
}

function getPairPatterns(markers: ThinkingMarkers): { first: RegExp; all: RegExp } {
  const key = `${markers.open}\u0000${markers.close}`;
  let patterns = patternCache.get(key);
  if (!patterns) {
    const source = `${escapeRegExp(markers.open)}([\\s\\S]*?)${escapeRegExp(markers.close)}`;
    patterns = { first: new RegExp(source), all: new RegExp(source, "g") };
    patternCache.set(key, patterns);
  }
  return patterns;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
