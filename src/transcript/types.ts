// ── Transcript Module — Shared Types ─────────────────────

export type Speaker = "User" | "AI";

export interface Message {
  readonly speaker: Speaker;
  /** Whitespace-normalized message body, never empty */
  readonly text: string;
}

export interface Conversation {
  /** Messages in transcript order */
  readonly messages: readonly Message[];
}
