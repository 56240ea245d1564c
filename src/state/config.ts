import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { readFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";

export const LogLevelSchema = Type.Union([
  Type.Literal("silent"),
  Type.Literal("error"),
  Type.Literal("warn"),
  Type.Literal("info"),
  Type.Literal("debug"),
]);

export type LogLevel = Static<typeof LogLevelSchema>;

export const DrillDataConfigSchema = Type.Object({
  hostname: Type.Union([Type.String(), Type.Null()]),
  port: Type.Integer({ minimum: 1, maximum: 65535 }),
  protocol: Type.Union([Type.Literal("https"), Type.Literal("http")]),
  username: Type.Union([Type.String(), Type.Null()]),
  password: Type.Union([Type.String(), Type.Null()]),
  verifyTls: Type.Boolean(),
  loginTimeoutMs: Type.Integer({ minimum: 0 }),
  queryTimeoutMs: Type.Integer({ minimum: 0 }),
  logLevel: LogLevelSchema,
});

export type DrillDataConfig = Static<typeof DrillDataConfigSchema>;

const FileConfigSchema = Type.Partial(DrillDataConfigSchema);

const DEFAULT_CONFIG: DrillDataConfig = {
  hostname: null,
  port: 8047,
  protocol: "https",
  username: null,
  password: null,
  verifyTls: false,
  loginTimeoutMs: 10_000,
  queryTimeoutMs: 120_000,
  logLevel: "warn",
};

let cachedConfig: DrillDataConfig | null = null;

export function configFilePath(): string {
  return join(homedir(), ".drill-data", "config.json");
}

function readConfigFile(): Partial<DrillDataConfig> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configFilePath(), "utf-8"));
  } catch {
    return {};
  }
  return Value.Check(FileConfigSchema, parsed) ? parsed : {};
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : fallback;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  return value.toLowerCase() === "true";
}

function parseProtocol(value: string | undefined, fallback: DrillDataConfig["protocol"]): DrillDataConfig["protocol"] {
  const lower = value?.toLowerCase();
  return lower === "http" || lower === "https" ? lower : fallback;
}

function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  const lower = value?.toLowerCase();
  return Value.Check(LogLevelSchema, lower) ? lower : fallback;
}

export function getConfig(): DrillDataConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const fileConfig = readConfigFile();
  const config: DrillDataConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
  };

  cachedConfig = {
    ...config,
    hostname: process.env.DRILL_HOST ?? config.hostname,
    port: parseNumber(process.env.DRILL_PORT, config.port),
    protocol: parseProtocol(process.env.DRILL_PROTOCOL, config.protocol),
    username: process.env.DRILL_USER ?? config.username,
    password: process.env.DRILL_PASSWORD ?? config.password,
    verifyTls: parseBoolean(process.env.DRILL_VERIFY_TLS, config.verifyTls),
    loginTimeoutMs: parseNumber(process.env.DRILL_LOGIN_TIMEOUT_MS, config.loginTimeoutMs),
    queryTimeoutMs: parseNumber(process.env.DRILL_QUERY_TIMEOUT_MS, config.queryTimeoutMs),
    logLevel: parseLogLevel(process.env.DRILL_LOG_LEVEL, config.logLevel),
  };

  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
