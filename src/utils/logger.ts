import pino, { type LoggerOptions } from "pino";

// LOG_LEVEL: minimum level (default "info"); "silent" turns logging off.
// LOG_PRETTY=true routes through pino-pretty for local use; JSON otherwise.
const LEVEL = process.env.LOG_LEVEL || "info";
const PRETTY = (process.env.LOG_PRETTY || "").toLowerCase() === "true";

const options: LoggerOptions = {
  name: "pii-risk-scanner",
  level: LEVEL,
  formatters: { level: (label: string) => ({ level: label }) },
};

export const logger = PRETTY
  ? pino(
      options,
      pino.transport({
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
          singleLine: true,
        },
      })
    )
  : pino(options);
