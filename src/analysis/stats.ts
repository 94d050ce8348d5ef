import type { Conversation } from "../transcript/types.js";

export interface ConversationStats {
  /** Every message counts as one exchange */
  total: number;
  user: number;
  ai: number;
}

export function messageStatistics(conversation: Conversation): ConversationStats {
  let user = 0;
  let ai = 0;
  for (const message of conversation.messages) {
    if (message.speaker === "User") user++;
    else ai++;
  }
  return { total: user + ai, user, ai };
}
