import { randomUUID } from "node:crypto";
import type { FastifyRequest } from "fastify";

declare module "fastify" {
  interface FastifyRequest {
    requestId?: string;
  }
}

/**
 * Request ID header name (standard X-Request-Id)
 */
export const REQUEST_ID_HEADER = "X-Request-Id";
export const REQUEST_ID_HEADER_LOWER = "x-request-id";

// Echoed back in a response header, so only short token-like ids are taken
const ACCEPTED_REQUEST_ID = /^[A-Za-z0-9._:-]{1,128}$/;

/**
 * Incoming X-Request-Id when it looks like an id, else a fresh UUID
 */
export function getOrGenerateRequestId(request: FastifyRequest): string {
  const incomingId = request.headers[REQUEST_ID_HEADER_LOWER];
  const trimmed = typeof incomingId === "string" ? incomingId.trim() : "";

  return ACCEPTED_REQUEST_ID.test(trimmed) ? trimmed : randomUUID();
}

export function attachRequestId(request: FastifyRequest): void {
  request.requestId = getOrGenerateRequestId(request);
}

/**
 * Request ID attached by the onRequest hook, falling back to Fastify's own id
 */
export function getRequestId(request?: FastifyRequest): string {
  if (!request) {
    return "unknown";
  }
  return request.requestId ?? request.id;
}
