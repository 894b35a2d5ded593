import dotenv from "dotenv";

dotenv.config();

const DEFAULT_PORT = 4000;
const DEFAULT_MAX_SESSIONS = 16;

export type LogLevel = "info" | "warn" | "error" | "debug";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const optional = (value?: string | null) => {
  if (!value) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const optionalInteger = (value?: string | null) => {
  const raw = optional(value);
  if (raw === undefined) return undefined;
  const parsed = Number.parseInt(raw, 10);
  return Number.isInteger(parsed) ? parsed : undefined;
};

const parseLogLevel = (value: string | undefined, fallback: LogLevel): LogLevel => {
  const normalized = optional(value)?.toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
};

const nodeEnv = process.env.NODE_ENV ?? "development";

/** Quiet under test runners, chatty in development. */
export const defaultLogLevel = (environment: string): LogLevel => {
  if (environment === "production") return "info";
  if (environment === "test") return "warn";
  return "debug";
};

export const resolveLogLevel = (value: string | undefined, environment: string): LogLevel =>
  parseLogLevel(value, defaultLogLevel(environment));

export const env = {
  nodeEnv,
  port: optionalInteger(process.env.PORT) ?? DEFAULT_PORT,
  logLevel: resolveLogLevel(process.env.LOG_LEVEL, nodeEnv),
  maxSessions: optionalInteger(process.env.DRIVE_MAX_SESSIONS) ?? DEFAULT_MAX_SESSIONS,
  defaultSeed: optionalInteger(process.env.DRIVE_SEED),
};
