// Load environment variables from .env file (local development only)
import "dotenv/config";

import Fastify from "fastify";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import compress from "@fastify/compress";
import { config } from "./config/index.js";
import { MemoryBufferedResponseStore } from "./cache/buffered-response-store.js";
import { RedisBufferedResponseStore } from "./cache/redis-buffered-response-store.js";
import { BUILTIN_PAGES } from "./pages/builtin.js";
import type { PageDefinition } from "./pages/types.js";
import { closeRedis, getRedis } from "./platform/redis.js";
import observabilityPlugin from "./plugins/observability.js";
import pageRenderingPlugin from "./plugins/page-rendering.js";
import { PageUrl } from "./render/page-url.js";
import type { BufferedResponseStore } from "./render/types.js";
import { incrementErrorCount, incrementRequestCount, statusRoutes } from "./routes/v1.status.js";
import { PageNotFoundError, RateLimitedError, getStatusCodeForErrorCode, toErrorV1 } from "./utils/errors.js";
import { createLoggerConfig } from "./utils/logger-config.js";
import { attachRequestId, getRequestId, REQUEST_ID_HEADER } from "./utils/request-id.js";
import { log } from "./utils/telemetry.js";
import { SERVICE_NAME, SERVICE_VERSION } from "./version.js";

export interface BuildOptions {
  /** Pages to mount instead of the built-in set */
  pages?: PageDefinition[];
  /** Store to use instead of the configured one */
  store?: BufferedResponseStore;
}

/**
 * Buffer store from BUFFER_STORE. Falls back to memory when Redis is unreachable.
 */
async function createBufferStore(): Promise<BufferedResponseStore> {
  const { kind, maxEntries, ttlMs } = config.bufferStore;

  if (kind === "redis") {
    const redis = await getRedis();
    if (redis) {
      return new RedisBufferedResponseStore(redis, ttlMs);
    }
    log.warn({ fallback: "memory" }, "Redis unavailable, buffering responses in memory");
  }

  return new MemoryBufferedResponseStore(maxEntries, ttlMs);
}

/**
 * Build and configure Fastify server instance
 * (Can be imported for testing or run directly)
 */
export async function build(options: BuildOptions = {}) {
  const app = Fastify({
    logger: createLoggerConfig(config.server.logLevel),
    bodyLimit: config.server.bodyLimitBytes,
  });

  await app.register(helmet, {
    strictTransportSecurity: {
      maxAge: 31536000, // 1 year
      includeSubDomains: true,
    },
  });

  await app.register(compress, {
    threshold: 1024,
    encodings: ["gzip", "deflate"],
    customTypes: /^(text\/html|application\/json)/,
  });

  await app.register(rateLimit, {
    global: true,
    max: config.rateLimits.globalRpm,
    timeWindow: "1 minute",
    addHeaders: {
      "x-ratelimit-limit": true,
      "x-ratelimit-remaining": true,
      "x-ratelimit-reset": true,
      "retry-after": true,
    },
    errorResponseBuilder: (req, context) => {
      app.log.warn(
        { event: "rate_limit_hit", max: context.max, request_id: getRequestId(req) },
        "Rate limit exceeded"
      );
      return new RateLimitedError(Math.max(1, Math.ceil(context.ttl / 1000)));
    },
  });

  await app.register(observabilityPlugin);

  // Request ID first, so every later hook and log line sees it
  app.addHook("onRequest", async (request) => {
    attachRequestId(request);
    incrementRequestCount();
  });

  app.addHook("onSend", async (request, reply, payload) => {
    reply.header(REQUEST_ID_HEADER, getRequestId(request));
    return payload;
  });

  // Centralized error handler: structured error.v1 responses with request_id
  app.setErrorHandler((error, request, reply) => {
    const errorV1 = toErrorV1(error, request);
    const statusCode = getStatusCodeForErrorCode(errorV1.code);

    incrementErrorCount(statusCode);

    if (statusCode >= 500) {
      app.log.error(
        { error, request_id: errorV1.request_id, method: request.method, url: request.url },
        `[${errorV1.code}] ${errorV1.message}`
      );
    } else {
      app.log.warn(
        { request_id: errorV1.request_id, code: errorV1.code, method: request.method, url: request.url },
        `[${errorV1.code}] ${errorV1.message}`
      );
    }

    const retryAfter = errorV1.details?.retry_after_seconds;
    if (errorV1.code === "RATE_LIMITED" && typeof retryAfter === "number") {
      reply.header("Retry-After", retryAfter);
    }

    return reply.status(statusCode).send(errorV1);
  });

  app.setNotFoundHandler(async (request) => {
    throw new PageNotFoundError(PageUrl.parse(request.url).path);
  });

  const store = options.store ?? (await createBufferStore());
  if (store instanceof RedisBufferedResponseStore) {
    app.addHook("onClose", async () => {
      await closeRedis();
    });
  } else if (store instanceof MemoryBufferedResponseStore) {
    const stopSweeper = store.startSweeper(config.bufferStore.ttlMs);
    app.addHook("onClose", async () => {
      stopSweeper();
    });
  }

  await app.register(pageRenderingPlugin, {
    pages: options.pages ?? BUILTIN_PAGES,
    store,
    settings: {
      strategy: config.rendering.strategy,
      enableRedirectForStatelessPage: config.rendering.redirectStatelessPages,
    },
    defaultRedirectPolicy: config.rendering.defaultRedirectPolicy,
    sessions: config.sessions,
  });

  app.get("/healthz", async () => ({
    ok: true,
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
    render_strategy: config.rendering.strategy,
    buffer_store: store.stats().kind,
  }));

  await statusRoutes(app);

  return app;
}

// If running directly (not imported), start the server
if (import.meta.url === `file://${process.argv[1]}`) {
  build()
    .then(async (app) => {
      app.log.info(
        {
          service: SERVICE_NAME,
          version: SERVICE_VERSION,
          render_strategy: config.rendering.strategy,
          redirect_stateless_pages: config.rendering.redirectStatelessPages,
          default_redirect_policy: config.rendering.defaultRedirectPolicy,
          buffer_store: config.bufferStore.kind,
          global_rate_limit_rpm: config.rateLimits.globalRpm,
          body_limit_mb: (config.server.bodyLimitBytes / 1024 / 1024).toFixed(1),
        },
        "Page response service starting"
      );

      await app.listen({ port: config.server.port, host: "0.0.0.0" });
    })
    .catch((err: unknown) => {
      log.fatal({ err }, "Failed to start server");
      process.exit(1);
    });
}
