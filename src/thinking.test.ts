import { describe, expect, it } from "vitest";
import { extractThinking, isThinkingOpen, summarizeThought } from "./thinking.js";

describe("extractThinking", () => {
  it("separates the reasoning block from the answer", () => {
    expect(extractThinking("<think>plan A</think>answer text")).toEqual({
      thinking: "plan A",
      visible: "answer text",
    });
  });

  it("returns text untouched when no markers are present", () => {
    const text = "  hello there \n";
    expect(extractThinking(text)).toEqual({ thinking: null, visible: text });
  });

  it("returns text untouched while the closing marker has not arrived", () => {
    const text = "<think>still working on it\n";
    expect(extractThinking(text)).toEqual({ thinking: null, visible: text });
  });

  it("matches across line breaks and trims both parts", () => {
    const result = extractThinking("<think>\nstep 1\nstep 2\n</think>\n\nThe answer is 4.");
    expect(result.thinking).toBe("step 1\nstep 2");
    expect(result.visible).toBe("The answer is 4.");
  });

  it("keeps text on both sides of the block", () => {
    expect(extractThinking("Intro <think>x</think> outro").visible).toBe("Intro  outro");
  });

  it("keeps the first pair as thinking and removes every pair from the answer", () => {
    expect(extractThinking("<think>a</think>mid<think>b</think>end")).toEqual({
      thinking: "a",
      visible: "midend",
    });
  });

  it("leaves an unclosed later block in the answer until it closes", () => {
    expect(extractThinking("<think>a</think>mid<think>b")).toEqual({
      thinking: "a",
      visible: "mid<think>b",
    });
  });

  it("ignores a closing marker that precedes the opening one", () => {
    const text = "</think>x<think>y";
    expect(extractThinking(text)).toEqual({ thinking: null, visible: text });
  });

  it("reports an empty reasoning block as an empty string", () => {
    expect(extractThinking("<think>\n\n</think>\n\nHi")).toEqual({ thinking: "", visible: "Hi" });
  });

  it("treats custom markers literally", () => {
    const markers = { open: "[[reason]]", close: "[[/reason]]" };
    expect(extractThinking("[[reason]] a+b? [[/reason]]ok", markers)).toEqual({
      thinking: "a+b?",
      visible: "ok",
    });
    expect(extractThinking("<think>x</think>y", markers)).toEqual({ thinking: null, visible: "<think>x</think>y" });
  });

  it("recomputes from scratch on every growing prefix", () => {
    const full = "<think>plan</think>done";
    const closeEnd = full.indexOf("</think>") + "</think>".length;

    for (let length = 0; length <= full.length; length += 1) {
      const prefix = full.slice(0, length);
      const result = extractThinking(prefix);
      if (length < closeEnd) {
        expect(result).toEqual({ thinking: null, visible: prefix });
      } else {
        expect(result.thinking).toBe("plan");
        expect(result.visible).toBe(full.slice(closeEnd));
        expect(result.visible).not.toContain("<think>");
        expect(result.visible).not.toContain("</think>");
      }
    }

    expect(extractThinking(full)).toEqual(extractThinking(full));
  });
});

describe("isThinkingOpen", () => {
  it("is true only between the opening and closing markers", () => {
    expect(isThinkingOpen("")).toBe(false);
    expect(isThinkingOpen("plain answer")).toBe(false);
    expect(isThinkingOpen("<think>hmm")).toBe(true);
    expect(isThinkingOpen("<think>hmm</think>")).toBe(false);
    expect(isThinkingOpen("<think>hmm</thi")).toBe(true);
  });

  it("follows the most recent reasoning block", () => {
    expect(isThinkingOpen("<think>a</think>mid<think>b")).toBe(true);
    expect(isThinkingOpen("<think>a</think>mid<think>b</think>end")).toBe(false);
  });
});

describe("summarizeThought", () => {
  it("uses a leading bold title when present", () => {
    expect(summarizeThought("**Planning the Reply**\nmore detail")).toBe("planning the reply");
  });

  it("falls back to the first non-empty line", () => {
    expect(summarizeThought("\n\nFirst line `here`\nsecond")).toBe("first line here");
  });

  it("returns a placeholder for empty reasoning", () => {
    expect(summarizeThought("  \n ")).toBe("reasoning");
  });

  it("clips long titles", () => {
    expect(summarizeThought("a".repeat(80))).toBe(`${"a".repeat(57)}...`);
  });
});
