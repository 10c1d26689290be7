/**
 * /v1/status - Service Diagnostics
 *
 * Runtime counters beyond the liveness check:
 * - /healthz: service, version, strategy, store kind
 * - /v1/status: uptime, request counters, respond outcomes, buffer and session stats
 *
 * No authentication (counters only, no session or page data).
 */

import type { FastifyInstance } from "fastify";
import type { RespondOutcomeCounts } from "../plugins/page-rendering.js";
import type { BufferedResponseStoreStats, RenderStrategy } from "../render/types.js";
import { SERVICE_NAME, SERVICE_VERSION } from "../version.js";

const SERVICE_START_TIME = Date.now();

// in-memory, reset on restart
let totalRequests = 0;
let client4xxErrors = 0;
let server5xxErrors = 0;

export function incrementRequestCount(): void {
  totalRequests++;
}

/**
 * Called by the error handler
 */
export function incrementErrorCount(statusCode: number): void {
  if (statusCode >= 500) {
    server5xxErrors++;
  } else if (statusCode >= 400) {
    client4xxErrors++;
  }
}

export interface StatusResponse {
  service: string;
  version: string;
  uptime_seconds: number;
  timestamp: string;

  requests: {
    total: number;
    client_errors_4xx: number;
    server_errors_5xx: number;
    /** Percentage, two decimals */
    error_rate_5xx: number;
  };

  rendering: {
    strategy: RenderStrategy;
    redirect_stateless_pages: boolean;
    pages: string[];
    outcomes: RespondOutcomeCounts;
  };

  buffer_store: BufferedResponseStoreStats;

  sessions: {
    size: number;
    capacity: number;
    ttl_ms: number;
  };
}

export async function statusRoutes(app: FastifyInstance): Promise<void> {
  app.get("/v1/status", async (_request, reply) => {
    const uptimeSeconds = Math.floor((Date.now() - SERVICE_START_TIME) / 1000);
    const errorRate5xx = totalRequests > 0 ? server5xxErrors / totalRequests : 0;
    const settings = app.responseStrategy.getSettings();
    const sessionStats = app.pageSessions.stats();

    const status: StatusResponse = {
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      uptime_seconds: uptimeSeconds,
      timestamp: new Date().toISOString(),

      requests: {
        total: totalRequests,
        client_errors_4xx: client4xxErrors,
        server_errors_5xx: server5xxErrors,
        error_rate_5xx: Math.round(errorRate5xx * 10000) / 100,
      },

      rendering: {
        strategy: settings.strategy,
        redirect_stateless_pages: settings.enableRedirectForStatelessPage,
        pages: app.pageRegistry.list().map((page) => page.name),
        outcomes: app.respondOutcomes(),
      },

      buffer_store: app.bufferedResponses.stats(),

      sessions: {
        size: sessionStats.size,
        capacity: sessionStats.capacity,
        ttl_ms: sessionStats.ttlMs,
      },
    };

    return reply.status(200).send(status);
  });
}
