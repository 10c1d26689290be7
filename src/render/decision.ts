/**
 * Response Strategy — Decision Predicates
 *
 * Pure functions over explicit fact records. No lookups, no side effects.
 */

import type { RedirectPolicy } from "./types.js";

export interface RenderAndWriteFacts {
  ajax: boolean;
  onePassRender: boolean;
  redirectToRender: boolean;
  redirectPolicy: RedirectPolicy;
  shouldPreserveClientUrl: boolean;
  targetEqualsCurrentUrl: boolean;
  newPageInstance: boolean;
  pageStateless: boolean;
}

export interface RedirectToTargetFacts {
  ajax: boolean;
  redirectPolicy: RedirectPolicy;
  redirectToRender: boolean;
  targetEqualsCurrentUrl: boolean;
  newPageInstance: boolean;
  pageStateless: boolean;
  sessionTemporary: boolean;
}

/**
 * Render now and write to the live response, never redirect.
 */
export function shouldRenderAndWrite(facts: RenderAndWriteFacts): boolean {
  const {
    ajax,
    onePassRender,
    redirectToRender,
    redirectPolicy,
    shouldPreserveClientUrl,
    targetEqualsCurrentUrl,
    newPageInstance,
    pageStateless,
  } = facts;

  // explicit opt-out of redirects
  if (redirectPolicy === "NEVER_REDIRECT") return true;

  // one-pass only applies to full-page requests, and loses to a forced redirect
  if (!ajax && onePassRender && redirectPolicy !== "ALWAYS_REDIRECT") return true;

  // existing stateful instance already at its own url
  if (!ajax && targetEqualsCurrentUrl && !pageStateless && !newPageInstance) return true;

  // redirect-to-render with nowhere to go
  if (targetEqualsCurrentUrl && redirectToRender) return true;

  return shouldPreserveClientUrl;
}

/**
 * Redirect to the target url without rendering.
 */
export function shouldRedirectToTarget(facts: RedirectToTargetFacts): boolean {
  const {
    ajax,
    redirectPolicy,
    redirectToRender,
    targetEqualsCurrentUrl,
    newPageInstance,
    pageStateless,
    sessionTemporary,
  } = facts;

  if (redirectPolicy === "ALWAYS_REDIRECT" || redirectToRender) return true;

  if (ajax && targetEqualsCurrentUrl) return true;

  if (!targetEqualsCurrentUrl) {
    // the url itself recreates the instance
    if (newPageInstance) return true;
    // no durable session to hold a buffer for a stateless page
    if (sessionTemporary && pageStateless) return true;
  }

  return false;
}
