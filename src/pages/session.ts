/**
 * Page sessions
 *
 * A session starts temporary: it exists for one request and nothing refers to
 * it afterwards. Storing a stateful page binds it; from then on the manager
 * keeps it and the client gets its id in a cookie.
 */

import { randomUUID } from "node:crypto";
import type { SessionFactsSource } from "../render/types.js";
import { LruTtlCache } from "../utils/cache.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";
import type { PageInstance } from "./types.js";

export const SESSION_COOKIE = "PSID";

export class PageSession implements SessionFactsSource {
  private temporary: boolean;
  private readonly pages = new Map<number, PageInstance>();
  private nextPageId = 1;
  private readonly bindListeners: Array<(session: PageSession) => void> = [];

  constructor(
    readonly id: string,
    temporary: boolean
  ) {
    this.temporary = temporary;
  }

  isTemporary(): boolean {
    return this.temporary;
  }

  /**
   * Called once, when a temporary session becomes durable. A durable session
   * never binds again, so it keeps no listeners.
   */
  onBind(listener: (session: PageSession) => void): void {
    if (this.temporary) {
      this.bindListeners.push(listener);
    }
  }

  bind(): void {
    if (!this.temporary) {
      return;
    }
    this.temporary = false;
    const listeners = this.bindListeners.splice(0);
    for (const listener of listeners) {
      listener(this);
    }
  }

  getPage(pageId: number): PageInstance | undefined {
    return this.pages.get(pageId);
  }

  /**
   * Keep a stateful instance; binds the session. Returns the page id.
   */
  storePage(instance: PageInstance): number {
    if (instance.id === undefined) {
      instance.id = this.nextPageId++;
    }
    this.pages.set(instance.id, instance);
    this.bind();
    return instance.id;
  }

  get pageCount(): number {
    return this.pages.size;
  }
}

export class SessionManager {
  private readonly sessions: LruTtlCache<string, PageSession>;

  constructor(maxEntries: number, ttlMs: number) {
    this.sessions = new LruTtlCache(maxEntries, ttlMs, (_id, session, reason) => {
      log.debug({ reason, pages: session.pageCount }, "Page session expired");
    });
  }

  /**
   * Known durable session for the id, or a new temporary one. Every lookup
   * restarts the session's TTL.
   */
  resolve(sessionId: string | undefined): PageSession {
    if (sessionId) {
      const existing = this.sessions.touch(sessionId);
      if (existing) {
        return existing;
      }
    }

    const session = new PageSession(randomUUID(), true);
    session.onBind((bound) => {
      this.sessions.set(bound.id, bound);
      emit(TelemetryEvents.SessionBound, { pages: bound.pageCount });
    });
    return session;
  }

  stats(): { size: number; capacity: number; ttlMs: number } {
    return this.sessions.stats();
  }
}
