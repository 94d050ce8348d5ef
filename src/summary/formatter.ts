import type { ConversationStats } from "../analysis/stats.js";
import type { BatchReport } from "../batch/types.js";

// ── Summary Formatter ────────────────────────────────────

export interface SummaryInput {
  file: string;
  stats: ConversationStats;
  keywords: readonly string[];
  topic: string | null;
}

export function formatSummary({ file, stats, keywords, topic }: SummaryInput): string {
  const keywordText =
    keywords.length > 0 ? keywords.join(", ") : "No significant keywords found";

  return [
    `Summary for '${file}':`,
    "Summary:",
    `- The conversation had ${stats.total} exchanges.(user:${stats.user}, AI:${stats.ai})`,
    `- The user asked mainly about ${topic ?? "no recurring topic"}.`,
    `- Most common keywords: ${keywordText}.`,
  ].join("\n");
}

/**
 * Everything the CLI prints to stdout: a header naming the folder, then
 * one summary block per summarized file. Skipped files only show in logs.
 */
export function formatReport(report: BatchReport): string {
  const header = `Processing chat logs in folder: ${report.folder}`;
  if (report.outcomes.length === 0) {
    return `${header}\nNo .txt chat log files found in directory '${report.folder}'.`;
  }

  const blocks = report.outcomes.flatMap((outcome) =>
    outcome.status === "summarized" ? [outcome.analysis.summary] : [],
  );
  return [header, ...blocks].join("\n\n");
}
