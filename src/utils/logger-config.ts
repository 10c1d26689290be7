/**
 * Centralized Logger Configuration
 *
 * Single source of truth for Pino redaction paths.
 * Used by both server.ts (Fastify) and telemetry.ts (standalone Pino).
 *
 * SECURITY: session identifiers are bearer credentials for page instances;
 * keep every place they can appear listed here.
 */

/**
 * Paths to redact from all log output (Pino path syntax)
 */
export const REDACT_PATHS = [
  // Secrets at any depth
  "*.password",
  "*.secret",
  "*.token",
  "*.apiKey",
  "*.authorization",

  // Session identifiers
  "*.session_id",
  "*.sessionId",
  "*.headers.cookie",
  "*.headers.set-cookie",
  "*.headers.authorization",
] as const;

export const REDACT_CENSOR = "[REDACTED]";

export function createRedactConfig(): { paths: string[]; censor: string } {
  return {
    paths: [...REDACT_PATHS],
    censor: REDACT_CENSOR,
  };
}

export function createLoggerConfig(level: string): {
  level: string;
  redact: { paths: string[]; censor: string };
} {
  return {
    level,
    redact: createRedactConfig(),
  };
}
