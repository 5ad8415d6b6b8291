import { AppError } from "./app-error.js";

function invalidConfig(name: string, expectation: string): AppError {
  return new AppError(
    "internal",
    "invalid_runtime_config",
    `Environment variable '${name}' ${expectation}.`,
  );
}

function parseIntegerEnv(name: string, defaultValue: number, min: number, max: number): number {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw invalidConfig(name, "must be an integer");
  }
  if (parsed < min || parsed > max) {
    throw invalidConfig(name, `must be between ${min} and ${max}`);
  }
  return parsed;
}

function parseStringEnv(name: string, defaultValue: string, minLength: number): string {
  const raw = process.env[name] ?? defaultValue;
  const value = raw.trim();
  if (value.length < minLength) {
    throw invalidConfig(name, `must contain at least ${minLength} characters`);
  }
  return value;
}

function parseBooleanEnv(name: string, defaultValue: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") {
    return true;
  }
  if (normalized === "false" || normalized === "0") {
    return false;
  }
  throw invalidConfig(name, "must be a boolean (true/false/1/0)");
}

function parseOptionalStringEnv(name: string, minLength: number): string | undefined {
  const raw = process.env[name];
  if (raw === undefined) {
    return undefined;
  }
  const value = raw.trim();
  if (value.length < minLength) {
    throw invalidConfig(name, `must contain at least ${minLength} characters`);
  }
  return value;
}

function parseEnumEnv<TValue extends string>(
  name: string,
  allowedValues: readonly TValue[],
  defaultValue: TValue,
): TValue {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim();
  const match = allowedValues.find((value) => value === normalized);
  if (match === undefined) {
    throw invalidConfig(name, `must be one of: ${allowedValues.join(", ")}`);
  }
  return match;
}

function parseUrlEnv(name: string): string | undefined {
  const value = parseOptionalStringEnv(name, 8);
  if (value === undefined) {
    return undefined;
  }
  if (!/^https?:\/\/[^\s]+$/.test(value)) {
    throw invalidConfig(name, "must be an http(s) URL");
  }
  return value;
}

export type LogLevel = "silent" | "fatal" | "error" | "warn" | "info" | "debug" | "trace";

export interface RuntimeConfig {
  host: string;
  port: number;
  logLevel: LogLevel;
  serviceName: string;
  storeBackend: "memory" | "http";
  storeBaseUrl?: string;
  storeConnectTimeoutMs: number;
  storeReadTimeoutMs: number;
  idempotencyBackend: "memory" | "postgres";
  postgresUrl?: string;
  idempotencyKeyMaxLength: number;
  defaultCurrency: string;
  syncResolution: boolean;
  orderAnnotationEnabled: boolean;
  metricsEnabled: boolean;
}

export function loadRuntimeConfig(): RuntimeConfig {
  const host = parseStringEnv("HOST", "0.0.0.0", 1);
  const port = parseIntegerEnv("PORT", 8080, 1, 65535);
  const logLevel = parseEnumEnv(
    "LOG_LEVEL",
    ["silent", "fatal", "error", "warn", "info", "debug", "trace"] as const,
    "info",
  );
  const serviceName = parseStringEnv("PAYMENTS_SERVICE_NAME", "Payment Service", 1);
  const storeBackend = parseEnumEnv("PAYMENTS_STORE_BACKEND", ["memory", "http"] as const, "memory");
  const storeBaseUrl = parseUrlEnv("PAYMENTS_STORE_BASE_URL");
  const storeConnectTimeoutMs = parseIntegerEnv("PAYMENTS_STORE_CONNECT_TIMEOUT_MS", 2000, 50, 60000);
  const storeReadTimeoutMs = parseIntegerEnv("PAYMENTS_STORE_READ_TIMEOUT_MS", 5000, 50, 120000);
  const idempotencyBackend = parseEnumEnv(
    "PAYMENTS_IDEMPOTENCY_BACKEND",
    ["memory", "postgres"] as const,
    "memory",
  );
  const postgresUrl = parseOptionalStringEnv("PAYMENTS_POSTGRES_URL", 12);
  // Keys up to 128 chars are always accepted; deployments may allow longer ones.
  const idempotencyKeyMaxLength = parseIntegerEnv("PAYMENTS_IDEMPOTENCY_KEY_MAX_LENGTH", 128, 128, 1024);
  const defaultCurrency = parseStringEnv("PAYMENTS_DEFAULT_CURRENCY", "INR", 3).toUpperCase();
  const syncResolution = parseBooleanEnv("PAYMENTS_SYNC_RESOLUTION", false);
  const orderAnnotationEnabled = parseBooleanEnv("PAYMENTS_ORDER_ANNOTATION_ENABLED", true);
  const metricsEnabled = parseBooleanEnv("PAYMENTS_METRICS_ENABLED", true);

  if (storeBackend === "http" && !storeBaseUrl) {
    throw invalidConfig("PAYMENTS_STORE_BASE_URL", "is required when PAYMENTS_STORE_BACKEND is http");
  }
  if (idempotencyBackend === "postgres" && !postgresUrl) {
    throw invalidConfig("PAYMENTS_POSTGRES_URL", "is required when PAYMENTS_IDEMPOTENCY_BACKEND is postgres");
  }

  return {
    host,
    port,
    logLevel,
    serviceName,
    storeBackend,
    storeConnectTimeoutMs,
    storeReadTimeoutMs,
    idempotencyBackend,
    idempotencyKeyMaxLength,
    defaultCurrency,
    syncResolution,
    orderAnnotationEnabled,
    metricsEnabled,
    ...(storeBaseUrl ? { storeBaseUrl } : {}),
    ...(postgresUrl ? { postgresUrl } : {}),
  };
}
