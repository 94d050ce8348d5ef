import { describe, it, expect } from "vitest";
import { parseTranscript, requireConversation } from "../src/transcript/parser.js";
import { messageStatistics } from "../src/analysis/stats.js";
import { ParseError } from "../src/errors.js";

describe("parseTranscript", () => {
  // ── Labels ─────────────────────────────────────────────

  it("splits a two-line exchange into User and AI messages", () => {
    const { messages } = parseTranscript("User: Hello!\nAI: Hi!\n");
    expect(messages).toEqual([
      { speaker: "User", text: "Hello!" },
      { speaker: "AI", text: "Hi!" },
    ]);
  });

  it("matches labels case-insensitively", () => {
    const { messages } = parseTranscript("user: a1\nai: b1\nUSER: c1");
    expect(messages.map((m) => m.speaker)).toEqual(["User", "AI", "User"]);
  });

  it("accepts leading whitespace before a label", () => {
    const { messages } = parseTranscript("   AI: indented");
    expect(messages).toEqual([{ speaker: "AI", text: "indented" }]);
  });

  it("treats a label in the middle of a line as message content", () => {
    const { messages } = parseTranscript("User: my note says AI: maybe");
    expect(messages).toEqual([
      { speaker: "User", text: "my note says AI: maybe" },
    ]);
  });

  // ── Continuation & discarded lines ─────────────────────

  it("appends unlabeled lines to the current message", () => {
    const { messages } = parseTranscript(
      "User: first line\ncontinues   here\n\nAI: reply",
    );
    expect(messages[0]).toEqual({
      speaker: "User",
      text: "first line continues here",
    });
    expect(messages[1]).toEqual({ speaker: "AI", text: "reply" });
  });

  it("discards lines before the first label", () => {
    const { messages } = parseTranscript("Preamble\nnotes\nUser: hi");
    expect(messages).toEqual([{ speaker: "User", text: "hi" }]);
  });

  it("drops messages that are empty after trimming", () => {
    const { messages } = parseTranscript("User:\n   \nAI: answer");
    expect(messages).toEqual([{ speaker: "AI", text: "answer" }]);
  });

  // ── Encodings & line endings ───────────────────────────

  it("handles CRLF line endings", () => {
    const { messages } = parseTranscript("User: hi\r\nAI: hello\r\n");
    expect(messages.map((m) => m.text)).toEqual(["hi", "hello"]);
  });

  it("ignores a leading byte-order mark", () => {
    const { messages } = parseTranscript("\uFEFFUser: hi");
    expect(messages).toEqual([{ speaker: "User", text: "hi" }]);
  });

  // ── No labels ──────────────────────────────────────────

  it("returns an empty conversation when no line is labeled", () => {
    expect(parseTranscript("just some notes\nnothing else").messages).toEqual([]);
    expect(parseTranscript("").messages).toEqual([]);
  });
});

describe("requireConversation", () => {
  it("returns the conversation when the user spoke", () => {
    const conversation = parseTranscript("User: Hello!\nAI: Hi!");
    expect(requireConversation(conversation, "a.txt")).toBe(conversation);
  });

  it("throws ParseError when there are no messages", () => {
    const run = () => requireConversation(parseTranscript(""), "empty.txt");
    expect(run).toThrow(ParseError);
    expect(run).toThrow("no speaker-labeled messages found");
  });

  it("throws ParseError for an AI-only transcript", () => {
    const conversation = parseTranscript("AI: Hello there\nAI: Anyone?");
    expect(() => requireConversation(conversation, "ai-only.txt")).toThrow(
      "no User messages found",
    );
  });

  it("records the file name on the error", () => {
    try {
      requireConversation(parseTranscript(""), "empty.txt");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ParseError);
      expect(err).toMatchObject({ file: "empty.txt", code: "PARSE_ERROR" });
    }
  });
});

describe("messageStatistics", () => {
  it("counts each message as one exchange", () => {
    const stats = messageStatistics(parseTranscript("User: Hello!\nAI: Hi!\n"));
    expect(stats).toEqual({ total: 2, user: 1, ai: 1 });
  });

  it("keeps total equal to user + ai", () => {
    const transcripts = [
      "User: a1\nUser: a2\nAI: b1",
      "AI: only\nAI: the\nAI: bot",
      "User: q1\nAI: r1\nUser: q2\nAI: r2\nUser: q3",
      "",
    ];
    for (const text of transcripts) {
      const stats = messageStatistics(parseTranscript(text));
      expect(stats.total).toBe(stats.user + stats.ai);
    }
  });

  it("counts per speaker", () => {
    const stats = messageStatistics(
      parseTranscript("User: q1\nAI: r1\nUser: q2\nAI: r2\nUser: q3"),
    );
    expect(stats).toEqual({ total: 5, user: 3, ai: 2 });
  });
});
