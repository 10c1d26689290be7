/**
 * Response Strategy — Types
 *
 * Value types and collaborator contracts for the response-strategy engine.
 * The engine depends only on these interfaces; Fastify, sessions and page
 * instances are adapted to them in src/http and src/pages.
 */

import { z } from "zod";
import type { BufferedResponse } from "./buffered-response.js";
import type { PageUrl } from "./page-url.js";

// ============================================================================
// Policy & Strategy Enums
// ============================================================================

/**
 * Per-handler redirect policy.
 * AUTO_REDIRECT leaves the choice to the decision predicates.
 */
const REDIRECT_POLICIES = ["NEVER_REDIRECT", "AUTO_REDIRECT", "ALWAYS_REDIRECT"] as const;
export const RedirectPolicySchema = z.enum(REDIRECT_POLICIES);
export type RedirectPolicy = z.infer<typeof RedirectPolicySchema>;

/**
 * Application-wide render strategy.
 */
const RENDER_STRATEGIES = ["ONE_PASS_RENDER", "REDIRECT_TO_RENDER", "REDIRECT_TO_BUFFER"] as const;
export const RenderStrategySchema = z.enum(RENDER_STRATEGIES);
export type RenderStrategy = z.infer<typeof RenderStrategySchema>;

// ============================================================================
// Facts
// ============================================================================

/**
 * Everything the engine knows about one request. Resolved once per respond().
 */
export interface PageFacts {
  isAjax: boolean;
  shouldPreserveClientUrl: boolean;
  isOnePassRender: boolean;
  isRedirectToRender: boolean;
  isRedirectToBuffer: boolean;
  isSessionTemporary: boolean;
  enableRedirectForStatelessPage: boolean;
  isNewPageInstance: boolean;
  isPageStateless: boolean;
  redirectPolicy: RedirectPolicy;
}

/**
 * Settings injected at engine construction.
 */
export interface RenderSettings {
  strategy: RenderStrategy;
  enableRedirectForStatelessPage: boolean;
}

// ============================================================================
// Collaborators
// ============================================================================

export interface RequestFactsSource {
  isAjax(): boolean;
  shouldPreserveClientUrl(): boolean;
  /** URL the client currently shows */
  currentUrl(): PageUrl;
}

export interface PageFactsSource {
  /** Must be answered before any instance is created for this request */
  isNewPageInstance(): boolean;
  isPageStateless(): boolean;
}

export interface SessionFactsSource {
  readonly id: string;
  isTemporary(): boolean;
}

/**
 * Live response. write() and sendRedirect() are mutually exclusive.
 */
export interface ResponseSink {
  write(response: BufferedResponse): void;
  sendRedirect(url: PageUrl): void;
}

/**
 * Renders the page into memory. Resolves undefined when another handler took
 * over the response during rendering.
 */
export interface PageRenderInvoker {
  render(url: PageUrl): Promise<BufferedResponse | undefined>;
}

export interface BufferedResponseStoreStats {
  kind: "memory" | "redis";
  size?: number;
  capacity?: number;
  ttlMs: number;
}

export interface BufferedResponseStore {
  /** Atomic take: an entry is returned to at most one caller */
  getAndRemove(sessionId: string, url: PageUrl): Promise<BufferedResponse | undefined>;
  put(sessionId: string, url: PageUrl, response: BufferedResponse): Promise<void>;
  stats(): BufferedResponseStoreStats;
}

/**
 * Everything respond() needs for one request.
 */
export interface RespondContext {
  targetUrl: PageUrl;
  request: RequestFactsSource;
  page: PageFactsSource;
  session: SessionFactsSource;
  redirectPolicy: RedirectPolicy;
  response: ResponseSink;
  renderer: PageRenderInvoker;
}

export type RespondOutcomeKind =
  | "buffered"
  | "write"
  | "redirect"
  | "buffer_and_redirect"
  | "preempted";

export interface RespondOutcome {
  kind: RespondOutcomeKind;
  targetUrl: PageUrl;
  currentUrl: PageUrl;
}
