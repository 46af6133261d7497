export const LOG_LEVELS = ["error", "warn", "info", "http", "verbose", "debug", "silly"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface ConfigType {
  LOG_LEVEL: LogLevel;
  NODE_ENV: string;
  SERVICE_NAME: string;
}

export const DEFAULT_LOG_LEVEL: LogLevel = "warn";
export const DEFAULT_SERVICE_NAME = "node-api-json-codec";

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Builds the package configuration from environment variables:
 * - JSON_CODEC_LOG_LEVEL: one of the npm log levels, falls back to "warn"
 * - JSON_CODEC_SERVICE_NAME: the `service` field on every log entry
 * - NODE_ENV: "production" switches console output to JSON
 */
export function loadConfig(env: NodeJS.ProcessEnv): ConfigType {
  const level = env.JSON_CODEC_LOG_LEVEL?.trim().toLowerCase();

  return {
    LOG_LEVEL: level !== undefined && isLogLevel(level) ? level : DEFAULT_LOG_LEVEL,
    NODE_ENV: env.NODE_ENV ?? "development",
    SERVICE_NAME: env.JSON_CODEC_SERVICE_NAME || DEFAULT_SERVICE_NAME,
  };
}

const config: ConfigType = loadConfig(process.env);

export default config;
