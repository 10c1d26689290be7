import { env } from "node:process";
import pino from "pino";
import { StatsD } from "hot-shots";
import { createLoggerConfig } from "./logger-config.js";

/**
 * Pino logger with secret/session redaction
 *
 * Redaction paths are centralized in src/utils/logger-config.ts so the
 * Fastify logger and this standalone logger stay in sync.
 */
export const log = pino(createLoggerConfig(env.LOG_LEVEL || "info"));

export type TelemetryLeaf = string | number | boolean | null;
export type TelemetryShape = {
  [key: string]: TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape>;
};
export type TelemetryValue = TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape>;
export type Event = Record<string, unknown>;

type TestSink = (eventName: string, data: TelemetryShape) => void;

/**
 * Test sink for capturing telemetry events in tests
 */
let testSink: TestSink | null = null;

export function setTestSink(sink: TestSink | null): void {
  // Direct env check: config may not be importable this early
  const isTestEnv = env.NODE_ENV === "test" || Boolean(env.VITEST);
  if (!isTestEnv) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Frozen telemetry event names
 * Dashboards key on these; rename only together with them.
 */
export const TelemetryEvents = {
  RespondCompleted: "page.respond.completed",
  RenderPreempted: "page.render.preempted",

  BufferStored: "page.buffer.stored",
  BufferHit: "page.buffer.hit",
  BufferMiss: "page.buffer.miss",
  BufferEvicted: "page.buffer.evicted",

  SessionBound: "page.session.bound",
} as const;

export type TelemetryEventName = (typeof TelemetryEvents)[keyof typeof TelemetryEvents];

/**
 * Datadog StatsD client (optional, enabled when DD_AGENT_HOST is set)
 */
let datadogClient: StatsD | null = null;

if (env.DD_AGENT_HOST) {
  datadogClient = new StatsD({
    host: env.DD_AGENT_HOST,
    port: Number(env.DD_AGENT_PORT) || 8125,
    prefix: "pages.",
    globalTags: {
      service: env.DD_SERVICE || "page-response-service",
      env: env.DD_ENV || env.NODE_ENV || "development",
    },
    errorHandler: (error: Error) => {
      log.error({ error }, "Datadog StatsD error");
    },
  });
  log.info({ dd_host: env.DD_AGENT_HOST }, "Datadog StatsD client initialized");
}

function sanitizeTelemetryValue(value: unknown): TelemetryValue | undefined {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }

  if (Array.isArray(value)) {
    const items: Array<TelemetryLeaf | TelemetryShape> = [];
    for (const item of value) {
      const sanitized = sanitizeTelemetryValue(item);
      // nested arrays are flattened out of telemetry
      if (sanitized !== undefined && !Array.isArray(sanitized)) {
        items.push(sanitized);
      }
    }
    return items;
  }

  if (typeof value === "object") {
    return sanitizeTelemetryData(Object.fromEntries(Object.entries(value)));
  }

  return undefined;
}

function sanitizeTelemetryData(data: Event): TelemetryShape {
  const result: TelemetryShape = {};
  for (const [key, value] of Object.entries(data)) {
    const sanitized = sanitizeTelemetryValue(value);
    if (sanitized !== undefined) {
      result[key] = sanitized;
    }
  }
  return result;
}

function tagOf(value: TelemetryValue | undefined, fallback: string): string {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean"
    ? String(value)
    : fallback;
}

/**
 * Emit a telemetry event: test sink, structured log line, and StatsD metrics.
 */
export function emit(event: TelemetryEventName, data: Event): void {
  const eventData = sanitizeTelemetryData(data);
  if (testSink) {
    testSink(event, eventData);
  }

  log.info({ event, ...eventData });

  if (!datadogClient) {
    return;
  }

  try {
    switch (event) {
      case TelemetryEvents.RespondCompleted:
        datadogClient.increment("respond.completed", 1, {
          outcome: tagOf(eventData.outcome, "unknown"),
          render_strategy: tagOf(eventData.render_strategy, "unknown"),
        });
        break;
      case TelemetryEvents.RenderPreempted:
        datadogClient.increment("render.preempted", 1);
        break;
      case TelemetryEvents.BufferStored:
        datadogClient.increment("buffer.stored", 1, { store: tagOf(eventData.store, "unknown") });
        if (typeof eventData.bytes === "number") {
          datadogClient.histogram("buffer.bytes", eventData.bytes);
        }
        break;
      case TelemetryEvents.BufferHit:
        datadogClient.increment("buffer.lookup", 1, { hit: "true" });
        break;
      case TelemetryEvents.BufferMiss:
        datadogClient.increment("buffer.lookup", 1, { hit: "false" });
        break;
      case TelemetryEvents.BufferEvicted:
        datadogClient.increment("buffer.evicted", 1, { reason: tagOf(eventData.reason, "unknown") });
        break;
      case TelemetryEvents.SessionBound:
        datadogClient.increment("session.bound", 1);
        break;
    }
  } catch (error) {
    // Never let telemetry break the request
    log.error({ error, event }, "Failed to send Datadog metrics");
  }
}
