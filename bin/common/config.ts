import { LogLevel } from "./services/logger.service";

export interface AppConfig {
  port: number;
  defaultShift: number;
  maxInputLength: number;
  logLevel: LogLevel;
  logDir: string | null;
  logToConsole: boolean;
}

export const DEFAULT_CONFIG: AppConfig = {
  port: 3000,
  defaultShift: 3,
  maxInputLength: 1_048_576,
  logLevel: LogLevel.INFO,
  logDir: null,
  logToConsole: true,
};

function readInteger(value: string | undefined, fallback: number, predicate: (n: number) => boolean): number {
  if (value === undefined || !/^[+-]?\d+$/.test(value.trim())) return fallback;
  const parsed = Number(value.trim());
  return Number.isSafeInteger(parsed) && predicate(parsed) ? parsed : fallback;
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = DEFAULT_CONFIG.logLevel): LogLevel {
  const upper = value?.trim().toUpperCase();
  const match = Object.values(LogLevel).find((level) => level === upper);
  return match ?? fallback;
}

/**
 * Builds the runtime configuration from environment variables.
 * Invalid values fall back to their defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const logDir = env.LOG_DIR?.trim();

  return Object.freeze({
    port: readInteger(env.PORT, DEFAULT_CONFIG.port, (n) => n > 0 && n < 65536),
    defaultShift: readInteger(env.DEFAULT_SHIFT, DEFAULT_CONFIG.defaultShift, () => true),
    maxInputLength: readInteger(env.MAX_INPUT_LENGTH, DEFAULT_CONFIG.maxInputLength, (n) => n > 0),
    logLevel: parseLogLevel(env.LOG_LEVEL),
    logDir: logDir ? logDir : null,
    logToConsole: env.LOG_TO_CONSOLE !== "false",
  });
}
