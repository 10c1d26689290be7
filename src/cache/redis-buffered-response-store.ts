/**
 * Redis-backed buffered response store
 *
 * For deployments with several instances behind a balancer: the request that
 * follows the redirect may land on another process. GETDEL makes the take
 * atomic across all of them.
 */

import {
  BufferedResponse,
  SerializedBufferedResponseSchema,
} from "../render/buffered-response.js";
import type { PageUrl } from "../render/page-url.js";
import type { BufferedResponseStore, BufferedResponseStoreStats } from "../render/types.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";
import { bufferKey } from "./buffered-response-store.js";

/**
 * The two commands the store needs. ioredis' Redis satisfies this.
 */
export interface BufferedResponseRedisClient {
  getdel(key: string): Promise<string | null>;
  set(key: string, value: string, mode: "PX", ttlMs: number): Promise<unknown>;
}

const KEY_PREFIX = "buffered:";

export class RedisBufferedResponseStore implements BufferedResponseStore {
  constructor(
    private readonly client: BufferedResponseRedisClient,
    private readonly ttlMs: number
  ) {}

  async getAndRemove(sessionId: string, url: PageUrl): Promise<BufferedResponse | undefined> {
    const raw = await this.client.getdel(KEY_PREFIX + bufferKey(sessionId, url));
    if (raw === null) {
      emit(TelemetryEvents.BufferMiss, { store: "redis", url: url.toString() });
      return undefined;
    }

    const response = parseStored(raw);
    if (!response) {
      log.warn({ url: url.toString() }, "Discarding unreadable buffered response");
      emit(TelemetryEvents.BufferMiss, { store: "redis", url: url.toString(), reason: "corrupt" });
      return undefined;
    }

    emit(TelemetryEvents.BufferHit, { store: "redis", url: url.toString() });
    return response;
  }

  async put(sessionId: string, url: PageUrl, response: BufferedResponse): Promise<void> {
    await this.client.set(
      KEY_PREFIX + bufferKey(sessionId, url),
      JSON.stringify(response.toJSON()),
      "PX",
      this.ttlMs
    );
    emit(TelemetryEvents.BufferStored, {
      store: "redis",
      url: url.toString(),
      bytes: response.byteLength,
    });
  }

  stats(): BufferedResponseStoreStats {
    return { kind: "redis", ttlMs: this.ttlMs };
  }
}

function parseStored(raw: string): BufferedResponse | undefined {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return undefined;
  }

  const parsed = SerializedBufferedResponseSchema.safeParse(json);
  return parsed.success ? BufferedResponse.fromJSON(parsed.data) : undefined;
}
