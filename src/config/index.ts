/**
 * Centralized Configuration Module
 *
 * Type-safe, validated access to all environment variables. Invalid
 * configuration fails fast on first access.
 */

import { env } from "node:process";
import { z } from "zod";
import { RedirectPolicySchema, RenderStrategySchema } from "../render/types.js";

/**
 * Boolean coercion that understands "true"/"false"/"1"/"0"
 */
const booleanString = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    if (typeof val === "number") return val !== 0;
    const lower = val.toLowerCase().trim();
    if (lower === "false" || lower === "0" || lower === "") return false;
    return true;
  });

const Environment = z.enum(["development", "test", "production"]);

const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal"]);

const BufferStoreKind = z.enum(["memory", "redis"]);

/**
 * Configuration Schema
 */
const ConfigSchema = z.object({
  server: z.object({
    port: z.coerce.number().int().positive().default(3000),
    nodeEnv: Environment.default("development"),
    logLevel: LogLevel.default("info"),
    bodyLimitBytes: z.coerce.number().int().positive().default(1024 * 1024),
  }),

  // Response strategy settings handed to the engine
  rendering: z.object({
    strategy: RenderStrategySchema.default("REDIRECT_TO_BUFFER"),
    redirectStatelessPages: booleanString.default(true),
    defaultRedirectPolicy: RedirectPolicySchema.default("AUTO_REDIRECT"),
  }),

  bufferStore: z.object({
    kind: BufferStoreKind.default("memory"),
    maxEntries: z.coerce.number().int().positive().default(1000),
    ttlMs: z.coerce.number().int().positive().default(60000), // 1 minute
  }),

  sessions: z.object({
    maxEntries: z.coerce.number().int().positive().default(10000),
    ttlMs: z.coerce.number().int().positive().default(1800000), // 30 minutes
  }),

  redis: z.object({
    url: z.string().optional(),
    tls: booleanString.default(false),
    namespace: z.string().default("pages"),
    connectTimeout: z.coerce.number().int().positive().default(10000),
    commandTimeout: z.coerce.number().int().positive().default(5000),
  }),

  rateLimits: z.object({
    globalRpm: z.coerce.number().int().positive().default(120),
  }),

  observability: z.object({
    infoSampleRate: z.coerce.number().min(0).max(1).default(0.1),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse and validate configuration from environment variables
 */
function parseConfig(): Config {
  // Empty strings count as unset so that "FOO=" falls back to the default
  const read = (name: string): string | undefined => {
    const value = env[name];
    return value === undefined || value.trim() === "" ? undefined : value.trim();
  };

  const rawConfig = {
    server: {
      port: read("PORT"),
      nodeEnv: read("NODE_ENV"),
      logLevel: read("LOG_LEVEL"),
      bodyLimitBytes: read("BODY_LIMIT_BYTES"),
    },
    rendering: {
      strategy: read("RENDER_STRATEGY"),
      redirectStatelessPages: read("REDIRECT_STATELESS_PAGES"),
      defaultRedirectPolicy: read("DEFAULT_REDIRECT_POLICY"),
    },
    bufferStore: {
      kind: read("BUFFER_STORE"),
      maxEntries: read("BUFFER_MAX_ENTRIES"),
      ttlMs: read("BUFFER_TTL_MS"),
    },
    sessions: {
      maxEntries: read("SESSION_MAX_ENTRIES"),
      ttlMs: read("SESSION_TTL_MS"),
    },
    redis: {
      url: read("REDIS_URL"),
      tls: read("REDIS_TLS"),
      namespace: read("REDIS_NAMESPACE"),
      connectTimeout: read("REDIS_CONNECT_TIMEOUT"),
      commandTimeout: read("REDIS_COMMAND_TIMEOUT"),
    },
    rateLimits: {
      globalRpm: read("GLOBAL_RATE_LIMIT_RPM"),
    },
    observability: {
      infoSampleRate: read("INFO_SAMPLE_RATE"),
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration. Please check environment variables. ${issues}`);
  }

  if (result.data.bufferStore.kind === "redis" && !result.data.redis.url) {
    throw new Error("Invalid configuration. BUFFER_STORE=redis requires REDIS_URL");
  }

  return result.data;
}

let _cachedConfig: Config | null = null;

function loadConfig(): Config {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

/**
 * Lazy configuration. Parsing is deferred to the first property access so
 * tests can stub environment variables before anything reads them.
 *
 * ```
 * import { config } from "./config/index.js";
 * const strategy = config.rendering.strategy;
 * ```
 */
export const config: Config = {
  get server() {
    return loadConfig().server;
  },
  get rendering() {
    return loadConfig().rendering;
  },
  get bufferStore() {
    return loadConfig().bufferStore;
  },
  get sessions() {
    return loadConfig().sessions;
  },
  get redis() {
    return loadConfig().redis;
  },
  get rateLimits() {
    return loadConfig().rateLimits;
  },
  get observability() {
    return loadConfig().observability;
  },
};

export function getConfig(): Config {
  return loadConfig();
}

/**
 * Reset cached configuration (for testing only)
 *
 * @internal
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}

export function isProduction(): boolean {
  return config.server.nodeEnv === "production";
}
