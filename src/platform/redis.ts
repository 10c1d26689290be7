/**
 * Redis Client Platform Layer
 *
 * Lazy singleton with health probe and graceful fallback.
 * Configured through the `redis` config section (REDIS_URL, REDIS_TLS,
 * REDIS_NAMESPACE, REDIS_CONNECT_TIMEOUT, REDIS_COMMAND_TIMEOUT).
 */

import { Redis, type RedisOptions } from "ioredis";
import { log } from "../utils/telemetry.js";
import { config, isProduction } from "../config/index.js";

let redisClient: Redis | null = null;
let isInitialized = false;

// Rate limit reconnect logging to prevent log storms
let lastReconnectLogTime = 0;
let reconnectAttemptsSinceLastLog = 0;
const RECONNECT_LOG_INTERVAL_MS = 30000;

function getRedisOptions(redisUrl: string): RedisOptions {
  const enableTLS = config.redis.tls || redisUrl.startsWith("rediss://");

  return {
    connectTimeout: config.redis.connectTimeout,
    commandTimeout: config.redis.commandTimeout,

    // Jittered exponential backoff, capped at 30s
    retryStrategy(times: number) {
      const baseDelay = Math.min(times * 100, 30000);
      const delay = baseDelay + Math.random() * 1000;

      reconnectAttemptsSinceLastLog++;
      const now = Date.now();
      if (now - lastReconnectLogTime >= RECONNECT_LOG_INTERVAL_MS || times === 1) {
        log.warn(
          {
            attempt: times,
            delay_ms: Math.round(delay),
            attempts_since_last_log: reconnectAttemptsSinceLastLog,
          },
          "Redis reconnecting"
        );
        lastReconnectLogTime = now;
        reconnectAttemptsSinceLastLog = 0;
      }

      return delay;
    },

    lazyConnect: true,

    ...(enableTLS && {
      tls: {
        rejectUnauthorized: isProduction(),
      },
    }),

    keyPrefix: `${config.redis.namespace}:`,
  };
}

async function initializeRedis(): Promise<Redis | null> {
  const redisUrl = config.redis.url;
  isInitialized = true;

  if (!redisUrl) {
    log.info("Redis not configured (REDIS_URL not set)");
    return null;
  }

  const options = getRedisOptions(redisUrl);
  const client = new Redis(redisUrl, options);

  client.on("error", (error: Error) => {
    log.error({ error }, "Redis error");
  });
  client.on("ready", () => {
    log.info({ namespace: options.keyPrefix }, "Redis ready");
  });
  client.on("close", () => {
    log.warn("Redis connection closed");
  });

  try {
    await client.connect();
    await client.ping();
  } catch (error) {
    log.error({ error }, "Redis initialization failed");
    client.disconnect();
    return null;
  }

  redisClient = client;
  log.info(
    {
      namespace: options.keyPrefix,
      tls: Boolean(options.tls),
      connect_timeout: options.connectTimeout,
      command_timeout: options.commandTimeout,
    },
    "Redis initialized successfully"
  );
  return client;
}

/**
 * Get Redis client (lazy). Null when not configured or unreachable.
 */
export async function getRedis(): Promise<Redis | null> {
  if (!isInitialized) {
    return initializeRedis();
  }
  return redisClient;
}

export async function closeRedis(): Promise<void> {
  if (!redisClient) {
    return;
  }
  try {
    await redisClient.quit();
    log.info("Redis connection closed gracefully");
  } catch (error) {
    log.error({ error }, "Error closing Redis connection");
  } finally {
    redisClient = null;
    isInitialized = false;
  }
}
