import pino from "pino";
import type { PersistedConfig } from "./persisted-config.js";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";
export type LogFormat = "pretty" | "json";

export interface ResolvedLogConfig {
  level: LogLevel;
  format: LogFormat;
}

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isLogFormat(value: string | undefined): value is LogFormat {
  return value === "pretty" || value === "json";
}

// Environment maps and credentials must never reach a log line.
export const REDACTED_PATHS = [
  "env",
  "*.env",
  "apiKey",
  "*.apiKey",
  "authorization",
  "*.authorization",
];

export function resolveLogConfig(
  persistedConfig: PersistedConfig | undefined,
  env: NodeJS.ProcessEnv = process.env
): ResolvedLogConfig {
  const envLevel = env.USBIDE_LOG?.trim().toLowerCase();
  const envFormat = env.USBIDE_LOG_FORMAT?.trim().toLowerCase();

  const level: LogLevel = isLogLevel(envLevel)
    ? envLevel
    : persistedConfig?.log?.level ?? "info";
  const format: LogFormat = isLogFormat(envFormat)
    ? envFormat
    : persistedConfig?.log?.format ?? "pretty";

  return { level, format };
}

export function createRootLogger(
  persistedConfig: PersistedConfig | undefined,
  env: NodeJS.ProcessEnv = process.env
): pino.Logger {
  const config = resolveLogConfig(persistedConfig, env);

  const transport =
    config.format === "pretty"
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            singleLine: true,
            ignore: "pid,hostname",
            destination: 2,
          },
        }
      : undefined;

  return pino(
    {
      level: config.level,
      transport,
      redact: { paths: REDACTED_PATHS, censor: "[redacted]" },
    },
    transport ? undefined : pino.destination(2)
  );
}

export function createChildLogger(parent: pino.Logger, name: string): pino.Logger {
  return parent.child({ module: name });
}

/**
 * Logger for library callers that do not configure one.
 */
export function createSilentLogger(): pino.Logger {
  return pino({ level: "silent" });
}
