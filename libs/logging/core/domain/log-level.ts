/**
 * Severity levels understood by the structured logger, lowest first.
 * The names match pino's level methods.
 */
export const LOG_LEVELS = ["debug", "info", "warn", "error", "fatal"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export enum LogFormat {
  JSON = "json",
  PLAIN = "plain",
}

const LEVEL_ALIASES: Record<string, LogLevel> = {
  warning: "warn",
  critical: "fatal",
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Accepts any casing plus the `warning` / `critical` spellings.
 * Returns undefined for anything else.
 */
export function normalizeLogLevel(value: string): LogLevel | undefined {
  const lowered = value.trim().toLowerCase();
  if (isLogLevel(lowered)) return lowered;
  return LEVEL_ALIASES[lowered];
}

export function isLogFormat(value: string): value is LogFormat {
  return value === LogFormat.JSON || value === LogFormat.PLAIN;
}
