import type { SpeakerScope } from "../config.js";
import type { Conversation, Message } from "../transcript/types.js";

// ── Text Preprocessing ───────────────────────────────────
// Lowercase → split on anything but letters/digits → stopwords out.
// Apostrophes split too: "don't" → "don" + "t". No stemming.

const NON_WORD = /[^\p{L}\p{N}]+/gu;
const MIN_TOKEN_LENGTH = 2;

/**
 * What contractions leave behind once split on the apostrophe
 * ("t", "s", "m", "d" fall under the minimum token length).
 */
export const CONTRACTION_FRAGMENTS: readonly string[] = [
  "ain", "aren", "couldn", "didn", "doesn", "don", "hadn", "hasn",
  "haven", "isn", "ll", "mightn", "mustn", "needn", "re", "shan",
  "shouldn", "ve", "wasn", "weren", "won", "wouldn",
];

/**
 * The token pipeline without stopword removal. Stopword entries go
 * through it too, so both sides compare in the same form.
 */
export function normalizeTerms(text: string): string[] {
  return text
    .toLowerCase()
    .replace(NON_WORD, " ")
    .split(" ")
    .filter((word) => word.length >= MIN_TOKEN_LENGTH);
}

export function tokenize(text: string, stopwords: ReadonlySet<string>): string[] {
  return normalizeTerms(text).filter((word) => !stopwords.has(word));
}

export function selectMessages(
  conversation: Conversation,
  scope: SpeakerScope,
): readonly Message[] {
  if (scope === "all") return conversation.messages;
  return conversation.messages.filter((m) => m.speaker === "User");
}

/** One token stream per message in scope, so word pairs never cross messages. */
export function messageTokenStreams(
  conversation: Conversation,
  scope: SpeakerScope,
  stopwords: ReadonlySet<string>,
): string[][] {
  return selectMessages(conversation, scope).map((m) =>
    tokenize(m.text, stopwords),
  );
}

/** The whole scope concatenated into the single document that gets scored. */
export function buildDocument(
  conversation: Conversation,
  scope: SpeakerScope,
  stopwords: ReadonlySet<string>,
): string[] {
  return messageTokenStreams(conversation, scope, stopwords).flat();
}
