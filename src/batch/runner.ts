import { readFileSync, readdirSync, statSync, type Stats } from "fs";
import { join } from "path";
import type { AnalyzerConfig } from "../config.js";
import { FolderNotFoundError, ParseError, ReadError } from "../errors.js";
import { log } from "../logger.js";
import { buildDocument, messageTokenStreams } from "../analysis/preprocess.js";
import { extractKeywords, TfIdfScorer, type KeywordScorer } from "../analysis/keywords.js";
import { messageStatistics } from "../analysis/stats.js";
import { extractTopic } from "../analysis/topic.js";
import { formatSummary } from "../summary/formatter.js";
import { parseTranscript, requireConversation } from "../transcript/parser.js";
import type { Conversation } from "../transcript/types.js";
import type { BatchReport, FileAnalysis, FileOutcome } from "./types.js";

// ── Batch Driver ─────────────────────────────────────────

export interface SummarizeOptions {
  /** Replaces the scorer chosen by `config.scoringMode` */
  scorer?: KeywordScorer;
}

type LoadedTranscript =
  | { status: "loaded"; file: string; conversation: Conversation }
  | Extract<FileOutcome, { status: "skipped" }>;

/**
 * Summarize every .txt transcript in `config.folder`, in sorted order.
 * Unreadable or unparseable files are skipped with a warning; only a
 * missing folder aborts the batch.
 */
export function summarizeFolder(
  config: AnalyzerConfig,
  opts: SummarizeOptions = {},
): BatchReport {
  const files = listTranscripts(config.folder);
  log.info({ folder: config.folder, files: files.length }, "📂 Processing chat logs");

  // Corpus scoring needs every document before the first file is scored.
  const loaded = files.map((file) => loadTranscript(config.folder, file));

  const scorer =
    opts.scorer ??
    createScorer(
      config,
      loaded.flatMap((t) =>
        t.status === "loaded"
          ? [buildDocument(t.conversation, config.keywordScope, config.stopwords)]
          : [],
      ),
    );

  const outcomes = loaded.map((t): FileOutcome =>
    t.status === "loaded"
      ? {
          status: "summarized",
          analysis: analyzeConversation(t.file, t.conversation, config, scorer),
        }
      : t,
  );

  return { folder: config.folder, outcomes };
}

/** Run the pipeline on transcript text already in memory. */
export function analyzeTranscript(
  file: string,
  text: string,
  config: AnalyzerConfig,
  scorer: KeywordScorer = new TfIdfScorer(),
): FileAnalysis {
  const conversation = requireConversation(parseTranscript(text), file);
  return analyzeConversation(file, conversation, config, scorer);
}

/** Sorted names of the regular `.txt` files in `folder`. */
export function listTranscripts(folder: string): string[] {
  let stats: Stats;
  try {
    stats = statSync(folder);
  } catch (err) {
    throw folderError(folder, err);
  }
  if (!stats.isDirectory()) {
    throw new FolderNotFoundError(folder, `The path '${folder}' is not a directory.`);
  }

  try {
    return readdirSync(folder, { withFileTypes: true })
      .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith(".txt"))
      .map((entry) => entry.name)
      .sort();
  } catch (err) {
    throw folderError(folder, err);
  }
}

/** Read a transcript as strict UTF-8 text. */
export function readTranscript(path: string, file: string): string {
  let bytes: Buffer;
  try {
    bytes = readFileSync(path);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ReadError(file, `cannot read file: ${reason}`, { cause: err });
  }

  if (bytes.includes(0)) {
    throw new ReadError(file, "file looks binary (contains NUL bytes)");
  }
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (err) {
    throw new ReadError(file, "file is not valid UTF-8 text", { cause: err });
  }
}

// ── Helpers ──────────────────────────────────────────────

function loadTranscript(folder: string, file: string): LoadedTranscript {
  try {
    const text = readTranscript(join(folder, file), file);
    const conversation = requireConversation(parseTranscript(text), file);
    log.debug({ file, messages: conversation.messages.length }, "Parsed transcript");
    return { status: "loaded", file, conversation };
  } catch (err) {
    if (err instanceof ReadError || err instanceof ParseError) {
      log.warn({ file, code: err.code }, `⚠️ Skipping '${file}': ${err.message}`);
      return { status: "skipped", file, reason: err.message, error: err };
    }
    throw err;
  }
}

/** ENOENT reads as missing; anything else names the system error code. */
function folderError(folder: string, err: unknown): FolderNotFoundError {
  const code =
    err instanceof Error && "code" in err && typeof err.code === "string"
      ? err.code
      : undefined;
  const message =
    code === "ENOENT"
      ? `The folder '${folder}' does not exist.`
      : `The folder '${folder}' cannot be opened (${code ?? String(err)}).`;
  return new FolderNotFoundError(folder, message, { cause: err });
}

function createScorer(
  config: AnalyzerConfig,
  documents: readonly string[][],
): KeywordScorer {
  return config.scoringMode === "corpus"
    ? new TfIdfScorer(documents)
    : new TfIdfScorer();
}

function analyzeConversation(
  file: string,
  conversation: Conversation,
  config: AnalyzerConfig,
  scorer: KeywordScorer,
): FileAnalysis {
  const stats = messageStatistics(conversation);
  const keywords = extractKeywords(
    buildDocument(conversation, config.keywordScope, config.stopwords),
    config.topK,
    scorer,
  );
  const topic = extractTopic(
    messageTokenStreams(conversation, config.topicScope, config.stopwords),
  );

  return {
    file,
    stats,
    keywords,
    topic,
    summary: formatSummary({ file, stats, keywords, topic }),
  };
}
