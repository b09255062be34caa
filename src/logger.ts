import pino from "pino";

// ── Structured Logger: pino ─────────────────────────────
// JSON output in production, pretty output otherwise (or LOG_PRETTY=true).
// The terminal chat shares stdout with the logger, so keep LOG_LEVEL at
// "warn" or above there if the log lines get in the way.

const isProduction = process.env.NODE_ENV === "production";
const isPretty = process.env.LOG_PRETTY === "true" || !isProduction;

export const log = pino({
  name: "parley",
  level: process.env.LOG_LEVEL || "info",
  ...(isPretty
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss",
            ignore: "pid,hostname,name",
          },
        },
      }
    : {}),
});
