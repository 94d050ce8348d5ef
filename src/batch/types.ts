import type { ConversationStats } from "../analysis/stats.js";
import type { ParseError, ReadError } from "../errors.js";

// ── Batch Module — Shared Types ──────────────────────────

export interface FileAnalysis {
  /** File name inside the batch folder */
  file: string;
  stats: ConversationStats;
  keywords: string[];
  topic: string | null;
  /** Rendered summary block */
  summary: string;
}

export type FileOutcome =
  | { status: "summarized"; analysis: FileAnalysis }
  | {
      status: "skipped";
      file: string;
      reason: string;
      error: ReadError | ParseError;
    };

export interface BatchReport {
  folder: string;
  /** One entry per .txt file, in listing order */
  outcomes: FileOutcome[];
}
