import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import fp from "fastify-plugin";
import { env } from "node:process";
import { config } from "../config/index.js";
import { getRequestId } from "../utils/request-id.js";

/**
 * Observability Plugin
 *
 * Request completion logging with sampling (INFO_SAMPLE_RATE, default 0.1).
 * Errors are always logged. Redaction is configured on the logger itself.
 */

declare module "fastify" {
  interface FastifyRequest {
    startTime?: number;
  }
}

/**
 * Always log errors (4xx, 5xx), sample successful requests.
 */
export function shouldSampleInfoLog(statusCode: number, sampleRate: number, roll = Math.random()): boolean {
  if (statusCode >= 400) return true;
  return roll < sampleRate;
}

function durationOf(request: FastifyRequest): number {
  return Date.now() - (request.startTime ?? Date.now());
}

async function observabilityPlugin(fastify: FastifyInstance) {
  const sampleRate = config.observability.infoSampleRate;

  fastify.addHook("onRequest", async (request: FastifyRequest) => {
    request.startTime ??= Date.now();
  });

  fastify.addHook("onResponse", async (request: FastifyRequest, reply: FastifyReply) => {
    const statusCode = reply.statusCode;
    if (!shouldSampleInfoLog(statusCode, sampleRate)) {
      return;
    }

    const logData = {
      request_id: getRequestId(request),
      method: request.method,
      url: request.url,
      status: statusCode,
      duration_ms: durationOf(request),
      user_agent: request.headers["user-agent"],
    };

    if (statusCode >= 500) {
      fastify.log.error(logData, "Request completed with server error");
    } else if (statusCode >= 400) {
      fastify.log.warn(logData, "Request completed with client error");
    } else {
      fastify.log.info(logData, "Request completed");
    }
  });

  fastify.addHook("onError", async (request: FastifyRequest, _reply: FastifyReply, error: Error) => {
    fastify.log.error(
      {
        request_id: getRequestId(request),
        method: request.method,
        url: request.url,
        duration_ms: durationOf(request),
        error: {
          name: error.name,
          message: error.message,
          // stacks stay out of production logs unless asked for
          ...(env.LOG_STACK === "1" ? { stack: error.stack } : {}),
        },
      },
      "Request error"
    );
  });
}

export default fp(observabilityPlugin, {
  name: "observability",
  fastify: "5.x",
});
