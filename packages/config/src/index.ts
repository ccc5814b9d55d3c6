import {
  Config,
  ConfigError,
  Duration,
  Effect,
  Either,
  Layer,
  Logger,
  LogLevel,
  Redacted,
} from "effect";

// ============================================================================
// Helpers
// ============================================================================

const isDevOrTest =
  process.env.NODE_ENV === "development" || process.env.NODE_ENV === "test";

/**
 * Creates a redacted configuration value with a fallback for development/test.
 */
export const secret = (name: string, mock?: string) => {
  const config = Config.redacted(name);
  if (isDevOrTest && mock) {
    return config.pipe(Config.withDefault(Redacted.make(mock)));
  }
  return config;
};

const SENSITIVE_PATTERNS = [
  "password",
  "secret",
  "token",
  "apikey",
  "api_key",
  "url",
] as const;

/**
 * Helper to redact sensitive values in logs
 */
export function redactSensitiveConfig(config: unknown): unknown {
  if (config === null || config === undefined) {
    return config;
  }

  if (Redacted.isRedacted(config)) {
    return "<redacted>";
  }

  if (Array.isArray(config)) {
    return config.map(redactSensitiveConfig);
  }

  if (typeof config === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(config)) {
      const lowerKey = key.toLowerCase();
      result[key] = SENSITIVE_PATTERNS.some((p) => lowerKey.includes(p))
        ? "<redacted>"
        : redactSensitiveConfig(value);
    }
    return result;
  }

  return config;
}

const atLeast = (minimum: number, name: string) =>
  Config.mapOrFail((value: number) =>
    value >= minimum
      ? Either.right(value)
      : Either.left(
          ConfigError.InvalidData([name], `${name} must be at least ${minimum}`),
        ),
  );

// ============================================================================
// Shared Configs
// ============================================================================

const nodeEnv = Config.literal(
  "development",
  "test",
  "production",
)("NODE_ENV").pipe(Config.withDefault("development"));

// ============================================================================
// Database Config
// ============================================================================

export const DatabaseConfig = Config.all({
  host: Config.string("DB_HOST").pipe(Config.withDefault("localhost")),
  port: Config.integer("DB_PORT").pipe(Config.withDefault(5432)),
  database: Config.string("DB_NAME").pipe(Config.withDefault("ledger")),
  user: Config.string("DB_USER").pipe(Config.withDefault("postgres")),
  password: secret("DB_PASSWORD", "postgres"),
  poolMax: Config.integer("DB_POOL_MAX").pipe(
    Config.withDefault(10),
    atLeast(1, "DB_POOL_MAX"),
  ),
  statementTimeoutMs: Config.integer("DB_STATEMENT_TIMEOUT_MS").pipe(
    Config.withDefault(5000),
    atLeast(0, "DB_STATEMENT_TIMEOUT_MS"),
  ),
  url: Config.redacted("DATABASE_URL").pipe(Config.option),
});

export type DatabaseConfig = Config.Config.Success<typeof DatabaseConfig>;

// ============================================================================
// Operation Policy Config
// ============================================================================

/**
 * Retry and timeout settings applied to every wrapped operation.
 */
export const OperationPolicyConfig = Config.all({
  retry: Config.all({
    maxRetries: Config.integer("RETRY_MAX_RETRIES").pipe(
      Config.withDefault(3),
      atLeast(0, "RETRY_MAX_RETRIES"),
    ),
    baseDelay: Config.integer("RETRY_BASE_DELAY_MS").pipe(
      Config.withDefault(50),
      atLeast(0, "RETRY_BASE_DELAY_MS"),
      Config.map(Duration.millis),
    ),
    jitter: Config.boolean("RETRY_JITTER").pipe(Config.withDefault(true)),
  }),
  timeout: Config.integer("OPERATION_TIMEOUT_MS").pipe(
    Config.withDefault(10_000),
    atLeast(1, "OPERATION_TIMEOUT_MS"),
    Config.map(Duration.millis),
  ),
});

export type OperationPolicyConfig = Config.Config.Success<
  typeof OperationPolicyConfig
>;

// ============================================================================
// Logging Config
// ============================================================================

export const LoggingConfig = Config.all({
  level: Config.logLevel("LOG_LEVEL").pipe(Config.withDefault(LogLevel.Info)),
  nodeEnv,
});

export type LoggingConfig = Config.Config.Success<typeof LoggingConfig>;

// ============================================================================
// Store Config
// ============================================================================

export const StoreDriverConfig = Config.literal(
  "postgres",
  "memory",
)("STORE_DRIVER").pipe(Config.withDefault("postgres"));

export type StoreDriver = Config.Config.Success<typeof StoreDriverConfig>;

// ============================================================================
// API Config
// ============================================================================

export const ApiConfig = Config.all({
  port: Config.integer("PORT").pipe(Config.withDefault(3000)),
  nodeEnv,
});

export type ApiConfig = Config.Config.Success<typeof ApiConfig>;

// ============================================================================
// Combined Configs
// ============================================================================

/**
 * Everything the API process reads at startup. The database section is only
 * loaded for the postgres driver.
 */
export const AppConfig = Config.all({
  api: ApiConfig,
  policy: OperationPolicyConfig,
  logging: LoggingConfig,
  driver: StoreDriverConfig,
});

export type AppConfig = Config.Config.Success<typeof AppConfig>;

// ============================================================================
// Logging
// ============================================================================

/**
 * JSON lines in production, pretty output elsewhere, filtered at `level`.
 */
export const makeLoggingLayer = ({ level, nodeEnv }: LoggingConfig) =>
  Layer.merge(
    nodeEnv === "production" ? Logger.json : Logger.pretty,
    Logger.minimumLogLevel(level),
  );

export const LoggingLive = Layer.unwrapEffect(
  Effect.map(LoggingConfig, makeLoggingLayer),
);
