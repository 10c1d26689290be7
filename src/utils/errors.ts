import { ZodError } from "zod";
import type { FastifyRequest } from "fastify";
import { getRequestId } from "./request-id.js";

/**
 * Error codes for structured error responses
 */
export type ErrorCode = "BAD_INPUT" | "NOT_FOUND" | "RATE_LIMITED" | "INTERNAL";

/**
 * Structured error response (error.v1 schema)
 */
export interface ErrorV1 {
  schema: "error.v1";
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  request_id?: string;
}

/**
 * Base class for errors that know their error.v1 code
 */
export class PageServiceError extends Error {
  constructor(
    message: string,
    readonly code: ErrorCode,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * No page is mounted for the requested path
 */
export class PageNotFoundError extends PageServiceError {
  constructor(readonly path: string) {
    super("Page not found", "NOT_FOUND", { path });
  }
}

/**
 * Pages kept replacing each other's response during rendering
 */
export class ReplacementLoopError extends PageServiceError {
  constructor(readonly chain: string[]) {
    super(`Response replaced too many times: ${chain.join(" -> ")}`, "INTERNAL");
  }
}

/**
 * A second write or redirect on a response that already has one
 */
export class ResponseCommittedError extends PageServiceError {
  constructor(readonly attempted: "write" | "redirect") {
    super(`Response already committed, cannot ${attempted}`, "INTERNAL");
  }
}

/**
 * Thrown by the rate limiter; statusCode is read by @fastify/rate-limit
 */
export class RateLimitedError extends PageServiceError {
  readonly statusCode = 429;

  constructor(retryAfterSeconds: number) {
    super("Too many requests", "RATE_LIMITED", { retry_after_seconds: retryAfterSeconds });
  }
}

export function buildErrorV1(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  requestId?: string
): ErrorV1 {
  const error: ErrorV1 = {
    schema: "error.v1",
    code,
    message,
  };

  if (details && Object.keys(details).length > 0) {
    error.details = details;
  }

  if (requestId) {
    error.request_id = requestId;
  }

  return error;
}

function statusCodeOf(error: Error): number | undefined {
  const statusCode: unknown = Reflect.get(error, "statusCode");
  return typeof statusCode === "number" ? statusCode : undefined;
}

/**
 * Convert any error to ErrorV1 (never leaks stack traces)
 */
export function toErrorV1(error: unknown, request?: FastifyRequest): ErrorV1 {
  const requestId = request ? getRequestId(request) : undefined;

  if (error instanceof ZodError) {
    return buildErrorV1(
      "BAD_INPUT",
      "Validation failed",
      { validation_errors: error.flatten() },
      requestId
    );
  }

  if (error instanceof PageServiceError) {
    // internal errors keep their detail in the logs only
    if (error.code === "INTERNAL") {
      return buildErrorV1("INTERNAL", "An unexpected error occurred", undefined, requestId);
    }
    return buildErrorV1(error.code, error.message, error.details, requestId);
  }

  if (error instanceof Error) {
    const statusCode = statusCodeOf(error);

    if (statusCode === 429) {
      return buildErrorV1("RATE_LIMITED", "Too many requests", undefined, requestId);
    }
    if (statusCode === 404) {
      return buildErrorV1("NOT_FOUND", "Not found", undefined, requestId);
    }
    if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
      // Fastify client errors (bad content type, body too large, ...)
      return buildErrorV1("BAD_INPUT", error.message, undefined, requestId);
    }
  }

  return buildErrorV1("INTERNAL", "An unexpected error occurred", undefined, requestId);
}

export function getStatusCodeForErrorCode(code: ErrorCode): number {
  switch (code) {
    case "BAD_INPUT":
      return 400;
    case "NOT_FOUND":
      return 404;
    case "RATE_LIMITED":
      return 429;
    case "INTERNAL":
      return 500;
  }
}
