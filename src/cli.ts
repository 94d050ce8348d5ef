import { loadConfig } from "./config.js";
import { ConfigError, FolderNotFoundError } from "./errors.js";
import { log } from "./logger.js";
import { summarizeFolder } from "./batch/runner.js";
import { formatReport } from "./summary/formatter.js";

// ── CLI ──────────────────────────────────────────────────

export interface CliIO {
  out: (text: string) => void;
  err: (text: string) => void;
}

const consoleIO: CliIO = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

/**
 * `chatlog-summarizer [folder]`. Returns the process exit code:
 * 0 even when files were skipped; 1 for a missing folder or bad config.
 */
export function run(
  args: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
  io: CliIO = consoleIO,
): number {
  try {
    const [folder] = args;
    const config = loadConfig(env, folder ? { folder } : {});
    log.debug(
      {
        folder: config.folder,
        topK: config.topK,
        topicScope: config.topicScope,
        keywordScope: config.keywordScope,
        scoringMode: config.scoringMode,
      },
      "⚙️ Configuration loaded",
    );

    const report = summarizeFolder(config);
    io.out(formatReport(report));

    const skipped = report.outcomes.filter((o) => o.status === "skipped").length;
    log.info(
      { summarized: report.outcomes.length - skipped, skipped },
      "✅ Done",
    );
    return 0;
  } catch (error) {
    if (error instanceof FolderNotFoundError || error instanceof ConfigError) {
      io.err(`Error: ${error.message}`);
      return 1;
    }
    log.fatal(error, "💀 Fatal error");
    return 1;
  }
}
