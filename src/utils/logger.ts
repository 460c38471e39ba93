import pino from "pino";
import { LogLevelSchema, type LogLevel } from "../config.js";

// stdout carries the result; every log line goes to stderr.
const STDERR_FD = 2;

/**
 * pino-pretty runs in a worker thread, so it is only started when something
 * below `warn` can actually be logged to a terminal.
 */
export function prettyTransportFor(params: { level: LogLevel; nodeEnv?: string; isTTY: boolean }) {
  const verbose = params.level === "info" || params.level === "debug" || params.level === "trace";
  if (!verbose || params.nodeEnv === "production" || !params.isTTY) return undefined;
  return {
    target: "pino-pretty",
    options: {
      destination: STDERR_FD,
      colorize: true,
      translateTime: "SYS:standard",
      ignore: "pid,hostname"
    }
  };
}

const level = LogLevelSchema.parse(process.env.LOG_LEVEL);
const pretty = prettyTransportFor({ level, nodeEnv: process.env.NODE_ENV, isTTY: process.stderr.isTTY });

export const logger = pino(
  {
    name: "dewpoint",
    level
  },
  pretty ? pino.transport(pretty) : pino.destination(STDERR_FD)
);
