import { ParseError } from "../errors.js";
import type { Conversation, Message, Speaker } from "./types.js";

// ── Transcript Parser — line-driven state machine ────────
//
//   AwaitingLabel ──label──▶ AccumulatingMessage ──label──▶ (flush, restart)
//        │ unlabeled line: discarded        │ unlabeled line: appended
//
// Lines before the first label never reach a message.

const LABEL_PATTERN = /^\s*(user|ai):(.*)$/i;

type ParserState =
  | { kind: "awaiting-label" }
  | { kind: "accumulating"; speaker: Speaker; lines: string[] };

/**
 * Split raw transcript text into ordered speaker messages.
 * Never throws: a transcript without labels yields no messages.
 */
export function parseTranscript(text: string): Conversation {
  const messages: Message[] = [];
  let state: ParserState = { kind: "awaiting-label" };

  const flush = (): void => {
    if (state.kind !== "accumulating") return;
    const body = normalizeWhitespace(state.lines.join("\n"));
    if (body) messages.push({ speaker: state.speaker, text: body });
  };

  const lines = text.replace(/^\uFEFF/, "").split(/\r?\n/);

  for (const line of lines) {
    const match = LABEL_PATTERN.exec(line);
    if (match) {
      const [, label = "", rest = ""] = match;
      flush();
      state = { kind: "accumulating", speaker: toSpeaker(label), lines: [rest] };
    } else if (state.kind === "accumulating") {
      state.lines.push(line);
    }
  }
  flush();

  return { messages };
}

/**
 * Reject conversations the summary cannot describe: no messages at all,
 * or nothing said by the user.
 */
export function requireConversation(
  conversation: Conversation,
  file: string,
): Conversation {
  if (conversation.messages.length === 0) {
    throw new ParseError(file, "no speaker-labeled messages found");
  }
  if (!conversation.messages.some((m) => m.speaker === "User")) {
    throw new ParseError(file, "no User messages found");
  }
  return conversation;
}

// ── Helpers ──────────────────────────────────────────────

function toSpeaker(label: string): Speaker {
  return label.toLowerCase() === "user" ? "User" : "AI";
}

function normalizeWhitespace(text: string): string {
  return text.split(/\s+/).filter(Boolean).join(" ");
}
