import pino from "pino";

const environment = process.env.NODE_ENV;
const usePrettyTransport = environment !== "production" && environment !== "test";

const transport = usePrettyTransport
  ? {
      target: "pino-pretty",
      options: {
        colorize: true,
        ignore: "pid,hostname",
        translateTime: "SYS:standard",
      },
    }
  : undefined;

/** Application logger. */
export const logger = pino({
  level: process.env.LOG_LEVEL || "info",
  transport,
});

export type Logger = typeof logger;
