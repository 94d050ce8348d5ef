// ── Error Taxonomy ───────────────────────────────────────
// ReadError / ParseError skip a single file; FolderNotFoundError and
// ConfigError abort the run.

export type ErrorCode =
  | "READ_ERROR"
  | "PARSE_ERROR"
  | "FOLDER_NOT_FOUND"
  | "CONFIG_ERROR";

export class SummarizerError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The transcript file could not be read or is not UTF-8 text. */
export class ReadError extends SummarizerError {
  readonly file: string;

  constructor(file: string, reason: string, options?: ErrorOptions) {
    super("READ_ERROR", reason, options);
    this.file = file;
  }
}

/** The transcript held no usable speaker-labeled messages. */
export class ParseError extends SummarizerError {
  readonly file: string;

  constructor(file: string, reason: string) {
    super("PARSE_ERROR", reason);
    this.file = file;
  }
}

/** The batch folder is missing, not a directory, or cannot be listed. */
export class FolderNotFoundError extends SummarizerError {
  readonly folder: string;

  constructor(
    folder: string,
    message = `The folder '${folder}' does not exist.`,
    options?: ErrorOptions,
  ) {
    super("FOLDER_NOT_FOUND", message, options);
    this.folder = folder;
  }
}

export class ConfigError extends SummarizerError {
  constructor(message: string) {
    super("CONFIG_ERROR", message);
  }
}
