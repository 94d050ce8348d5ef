import dotenv from "dotenv";
import { eng } from "stopword";
import { z } from "zod";
import { CONTRACTION_FRAGMENTS, normalizeTerms } from "./analysis/preprocess.js";
import { ConfigError } from "./errors.js";

dotenv.config();

// ── Types ────────────────────────────────────────────────

/** Which messages feed an analysis step. */
export type SpeakerScope = "user" | "all";

/** `file` scores each transcript alone; `corpus` scores against the batch. */
export type ScoringMode = "file" | "corpus";

export interface AnalyzerConfig {
  folder: string;
  topK: number;
  topicScope: SpeakerScope;
  keywordScope: SpeakerScope;
  scoringMode: ScoringMode;
  /** Normalized words dropped before scoring */
  stopwords: ReadonlySet<string>;
}

// ── Schema ───────────────────────────────────────────────

const ScopeSchema = z.enum(["user", "all"]);

const EnvSchema = z.object({
  CHAT_LOGS_FOLDER: z.string().default("./chat_logs"),
  TOP_K: z.coerce.number().int().min(0).default(5),
  TOPIC_SCOPE: ScopeSchema.default("user"),
  KEYWORD_SCOPE: ScopeSchema.default("all"),
  SCORING_MODE: z.enum(["file", "corpus"]).default("file"),
  EXTRA_STOPWORDS: z.string().default(""),
});

const ConfigSchema = z.object({
  folder: z.string().trim().min(1),
  topK: z.number().int().min(0),
  topicScope: ScopeSchema,
  keywordScope: ScopeSchema,
  scoringMode: z.enum(["file", "corpus"]),
  stopwords: z.set(z.string()),
});

// ── Loader ───────────────────────────────────────────────

/**
 * Build the analyzer configuration from environment variables.
 * Blank variables count as unset. `overrides` win over the environment
 * (the CLI passes the folder argument this way) and are validated with it.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<AnalyzerConfig> = {},
): AnalyzerConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(
      (entry): entry is [string, string] =>
        entry[1] !== undefined && entry[1].trim() !== "",
    ),
  );

  const vars = validate(EnvSchema, present);
  return validate(ConfigSchema, {
    folder: vars.CHAT_LOGS_FOLDER,
    topK: vars.TOP_K,
    topicScope: vars.TOPIC_SCOPE,
    keywordScope: vars.KEYWORD_SCOPE,
    scoringMode: vars.SCORING_MODE,
    stopwords: buildStopwords(vars.EXTRA_STOPWORDS),
    ...overrides,
  });
}

/**
 * English stopwords from the `stopword` package, contraction fragments and
 * comma-separated operator extras, all normalized the way tokens are.
 * An extra like "follow-up" adds each of its tokens.
 */
export function buildStopwords(extra: string): Set<string> {
  const entries = [...eng, ...CONTRACTION_FRAGMENTS, ...extra.split(",")];
  return new Set(entries.flatMap((entry) => normalizeTerms(entry)));
}

// ── Helpers ──────────────────────────────────────────────

function validate<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  return parsed.data;
}
