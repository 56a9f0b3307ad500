/** One JSON line per event (`reservation.*`, `vehicle.*`, `availability.*`); bearer tokens and secrets are masked. */
import { createLogger, format, transports } from "winston";

import { env } from "./env.js";

export const redact = (obj: Record<string, unknown>) => {
  const clone = { ...obj };
  for (const key of Object.keys(clone)) {
    if (/authorization|cookie|password|token|secret/i.test(key)) {
      clone[key] = "[redacted]";
    }
  }
  return clone;
};

export const logger = createLogger({
  level: env.LOG_LEVEL,
  silent: env.NODE_ENV === "test",
  format: format.combine(
    format.timestamp(),
    format.errors({ stack: true }),
    format.printf((info) => {
      const { timestamp, level, message, ...rest } = info;
      const payload = { timestamp, level, message, ...redact(rest) };
      return JSON.stringify(payload);
    })
  ),
  transports: [new transports.Console()],
});

export const httpLogStream = {
  write: (line: string) => logger.info(line.trim(), { source: "http" }),
};
