import { destination, pino, Logger, LoggerOptions } from "pino";

export type { Logger };

const VALID_LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export function getLogLevel(env: NodeJS.ProcessEnv = process.env): string {
  const envLogLevel = env.LOG_LEVEL?.toLowerCase();

  if (envLogLevel && VALID_LOG_LEVELS.includes(envLogLevel)) {
    return envLogLevel;
  }

  if (env.NODE_ENV === "test") {
    return "silent";
  }

  return env.NODE_ENV === "production" ? "info" : "debug";
}

export function getLoggerOptions(env: NodeJS.ProcessEnv = process.env): LoggerOptions {
  const level = getLogLevel(env);

  if (env.NODE_ENV === "production" || env.NODE_ENV === "test") {
    return { level };
  }

  return {
    transport: {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "HH:MM:ss.l",
        ignore: "pid,hostname",
        destination: 2,
      },
    },
    base: null, // avoid adding pid, hostname and name properties to each log.
    level,
  };
}

/**
 * Creates the root logger. Pretty output goes to stderr so that commands
 * writing data to stdout stay pipeable.
 */
export function createLogger(env: NodeJS.ProcessEnv = process.env): Logger {
  const options = getLoggerOptions(env);
  if (options.transport) {
    return pino(options);
  }
  return pino(options, destination(2));
}
