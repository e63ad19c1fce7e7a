import pino from "pino";

const env = process.env.NODE_ENV || "development";
const isDev = env !== "production" && env !== "test";
const logLevel =
  process.env.LOG_LEVEL ||
  (env === "test" ? "silent" : isDev ? "debug" : "info");

export const logger = pino(
  isDev
    ? {
        level: logLevel,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        },
      }
    : {
        level: logLevel,
      },
);

export type Logger = typeof logger;

export default logger;
