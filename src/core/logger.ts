import pino, { type Logger, type LoggerOptions } from "pino";

export const REDACTED_PATHS = ["password", "config.password"];

/**
 * Creates a Pino logger instance with optional pretty printing and verbosity.
 * Pretty output goes to stderr so rendered tables on stdout are left untouched.
 * Cluster passwords are redacted wherever the configuration is logged.
 * @param options Logger options, including pretty and verbose flags.
 * @returns A configured Pino Logger instance.
 */
export function createLogger(
  options?: LoggerOptions & { pretty?: boolean; verbose?: boolean },
): Logger {
  const { pretty = true, verbose = false, ...pinoOptions } = options ?? {};
  const level = verbose ? "debug" : "info";
  const transport = pretty
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          singleLine: true,
          destination: 2,
        },
      }
    : undefined;
  return pino({
    name: "cql-labs",
    level,
    transport,
    redact: { paths: REDACTED_PATHS, censor: "[redacted]" },
    ...pinoOptions,
  });
}
