import pino from "pino";

// ── Structured Logger — pino ─────────────────────────────
// Logs go to stderr so stdout carries only the summaries.
// Pretty output outside production; LOG_PRETTY=true|false overrides.

const isProduction = process.env.NODE_ENV === "production";
const isPretty = process.env.LOG_PRETTY
  ? process.env.LOG_PRETTY === "true"
  : !isProduction;
const level = process.env.LOG_LEVEL || "info";

export const log = isPretty
  ? pino({
      level,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss",
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    })
  : pino({ level }, pino.destination(2));
