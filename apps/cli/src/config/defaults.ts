import type { LogLevelString } from "bunyan";

export interface ConfigData {
  rows: number;
  columns: number;
  /** Moves into full columns allowed per turn before an agent forfeits */
  maxAttempts: number;
  logLevel: LogLevelString;
}

export const CONFIG_KEYS: (keyof ConfigData)[] = [
  "rows",
  "columns",
  "maxAttempts",
  "logLevel",
];

export const DEFAULTS: ConfigData = {
  rows: 6,
  columns: 7,
  maxAttempts: 3,
  logLevel: "info",
};

export const ENV_MAP: Record<keyof ConfigData, string> = {
  rows: "DROPFOUR_ROWS",
  columns: "DROPFOUR_COLUMNS",
  maxAttempts: "DROPFOUR_MAX_ATTEMPTS",
  logLevel: "LOG_LEVEL",
};

const LOG_LEVELS: readonly LogLevelString[] = ["trace", "debug", "info", "warn", "error", "fatal"];

export function isLogLevel(value: string): value is LogLevelString {
  return LOG_LEVELS.some((level) => level === value);
}

export function isConfigKey(key: string): key is keyof ConfigData {
  return CONFIG_KEYS.some((k) => k === key);
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function positiveInt(key: keyof ConfigData) {
  return (raw: string): number => {
    const trimmed = raw.trim();
    const value = Number(trimmed);
    if (trimmed === "" || !Number.isInteger(value) || value < 1) {
      throw new ConfigError(`${key} must be a strictly positive integer, got "${raw}"`);
    }
    return value;
  };
}

const PARSERS: { [K in keyof ConfigData]: (raw: string) => ConfigData[K] } = {
  rows: positiveInt("rows"),
  columns: positiveInt("columns"),
  maxAttempts: positiveInt("maxAttempts"),
  logLevel: (raw) => {
    const level = raw.trim().toLowerCase();
    if (!isLogLevel(level)) {
      throw new ConfigError(`logLevel must be one of ${LOG_LEVELS.join(", ")}, got "${raw}"`);
    }
    return level;
  },
};

export function parseConfigValue<K extends keyof ConfigData>(key: K, raw: string): ConfigData[K] {
  return PARSERS[key](raw);
}
