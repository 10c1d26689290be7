/**
 * In-memory buffered response store
 *
 * Holds responses rendered ahead of a redirect until the follow-up request
 * takes them. Entries are keyed by session and canonical url, handed out at
 * most once, and dropped by TTL or LRU when the client never comes back.
 */

import type { BufferedResponse } from "../render/buffered-response.js";
import type { PageUrl } from "../render/page-url.js";
import type { BufferedResponseStore, BufferedResponseStoreStats } from "../render/types.js";
import { LruTtlCache } from "../utils/cache.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";

export function bufferKey(sessionId: string, url: PageUrl): string {
  return `${sessionId}:${url.toString()}`;
}

export class MemoryBufferedResponseStore implements BufferedResponseStore {
  private readonly cache: LruTtlCache<string, BufferedResponse>;

  constructor(maxEntries: number, ttlMs: number) {
    this.cache = new LruTtlCache(maxEntries, ttlMs, (key, value, reason) => {
      emit(TelemetryEvents.BufferEvicted, {
        store: "memory",
        reason,
        url: urlPart(key),
        bytes: value.byteLength,
      });
    });
  }

  async getAndRemove(sessionId: string, url: PageUrl): Promise<BufferedResponse | undefined> {
    // Map get+delete with no await in between: atomic on the event loop
    const response = this.cache.take(bufferKey(sessionId, url));

    emit(response ? TelemetryEvents.BufferHit : TelemetryEvents.BufferMiss, {
      store: "memory",
      url: url.toString(),
    });
    return response;
  }

  async put(sessionId: string, url: PageUrl, response: BufferedResponse): Promise<void> {
    this.cache.set(bufferKey(sessionId, url), response);
    emit(TelemetryEvents.BufferStored, {
      store: "memory",
      url: url.toString(),
      bytes: response.byteLength,
    });
  }

  /** Drop expired entries; returns how many were removed */
  cleanup(): number {
    return this.cache.cleanup();
  }

  /**
   * Sweep expired entries every intervalMs. Responses nobody comes back for
   * would otherwise stay until LRU pushes them out. Returns the stop function.
   */
  startSweeper(intervalMs: number): () => void {
    const timer = setInterval(() => {
      const removed = this.cleanup();
      if (removed > 0) {
        log.debug({ removed }, "Swept expired buffered responses");
      }
    }, intervalMs);
    timer.unref();
    return () => clearInterval(timer);
  }

  stats(): BufferedResponseStoreStats {
    const { size, capacity, ttlMs } = this.cache.stats();
    return { kind: "memory", size, capacity, ttlMs };
  }
}

// keys are "<session>:<url>"; only the url part is safe to log
function urlPart(key: string): string {
  const idx = key.indexOf(":");
  return idx >= 0 ? key.slice(idx + 1) : key;
}
