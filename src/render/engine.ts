/**
 * Response Strategy Engine
 *
 * Decides, per request, between writing the rendered page, redirecting to the
 * page's canonical url, or rendering into a buffer and redirecting so that the
 * follow-up GET is served from the buffer.
 *
 * CheckBuffer -> Decide -> { WriteDirect | RedirectDirect | RenderThenDecide } -> Done
 *
 * One pass, no retries. Renderer failures propagate to the caller unchanged.
 */

import { emit, TelemetryEvents } from "../utils/telemetry.js";
import { shouldRedirectToTarget, shouldRenderAndWrite } from "./decision.js";
import { resolvePageFacts } from "./facts.js";
import type { PageUrl } from "./page-url.js";
import type {
  BufferedResponseStore,
  PageFacts,
  RenderSettings,
  RespondContext,
  RespondOutcome,
  RespondOutcomeKind,
} from "./types.js";

export class ResponseStrategyEngine {
  constructor(
    private readonly store: BufferedResponseStore,
    private readonly settings: RenderSettings
  ) {}

  getSettings(): RenderSettings {
    return { ...this.settings };
  }

  async respond(ctx: RespondContext): Promise<RespondOutcome> {
    const { targetUrl, response, renderer, session } = ctx;
    const currentUrl = ctx.request.currentUrl();

    const buffered = await this.store.getAndRemove(session.id, targetUrl);
    if (buffered) {
      response.write(buffered);
      return this.finish("buffered", targetUrl, currentUrl);
    }

    const facts = resolvePageFacts(ctx, this.settings);
    const targetEqualsCurrentUrl = targetUrl.equals(currentUrl);

    if (
      shouldRenderAndWrite({
        ajax: facts.isAjax,
        onePassRender: facts.isOnePassRender,
        redirectToRender: facts.isRedirectToRender,
        redirectPolicy: facts.redirectPolicy,
        shouldPreserveClientUrl: facts.shouldPreserveClientUrl,
        targetEqualsCurrentUrl,
        newPageInstance: facts.isNewPageInstance,
        pageStateless: facts.isPageStateless,
      })
    ) {
      return this.renderAndWrite(ctx, currentUrl, currentUrl, facts);
    }

    if (
      shouldRedirectToTarget({
        ajax: facts.isAjax,
        redirectPolicy: facts.redirectPolicy,
        redirectToRender: facts.isRedirectToRender,
        targetEqualsCurrentUrl,
        newPageInstance: facts.isNewPageInstance,
        pageStateless: facts.isPageStateless,
        sessionTemporary: facts.isSessionTemporary,
      })
    ) {
      response.sendRedirect(targetUrl);
      return this.finish("redirect", targetUrl, currentUrl, facts);
    }

    // Fallback: runs the same whether or not REDIRECT_TO_BUFFER is the configured strategy.
    if (facts.isPageStateless && !facts.enableRedirectForStatelessPage) {
      return this.renderAndWrite(ctx, targetUrl, currentUrl, facts);
    }

    const rendered = await renderer.render(targetUrl);
    if (!rendered) {
      return this.preempted(targetUrl, currentUrl, facts);
    }

    // redirecting to the url the client is already on would only loop
    if (targetEqualsCurrentUrl) {
      response.write(rendered);
      return this.finish("write", targetUrl, currentUrl, facts);
    }

    await this.store.put(session.id, targetUrl, rendered);
    response.sendRedirect(targetUrl);
    return this.finish("buffer_and_redirect", targetUrl, currentUrl, facts);
  }

  private async renderAndWrite(
    ctx: RespondContext,
    renderUrl: PageUrl,
    currentUrl: PageUrl,
    facts: PageFacts
  ): Promise<RespondOutcome> {
    const rendered = await ctx.renderer.render(renderUrl);
    if (!rendered) {
      return this.preempted(ctx.targetUrl, currentUrl, facts);
    }
    ctx.response.write(rendered);
    return this.finish("write", ctx.targetUrl, currentUrl, facts);
  }

  private preempted(targetUrl: PageUrl, currentUrl: PageUrl, facts: PageFacts): RespondOutcome {
    emit(TelemetryEvents.RenderPreempted, {
      target_url: targetUrl.toString(),
      current_url: currentUrl.toString(),
    });
    return this.finish("preempted", targetUrl, currentUrl, facts);
  }

  private finish(
    kind: RespondOutcomeKind,
    targetUrl: PageUrl,
    currentUrl: PageUrl,
    facts?: PageFacts
  ): RespondOutcome {
    emit(TelemetryEvents.RespondCompleted, {
      outcome: kind,
      target_url: targetUrl.toString(),
      current_url: currentUrl.toString(),
      render_strategy: this.settings.strategy,
      ...(facts && {
        ajax: facts.isAjax,
        redirect_policy: facts.redirectPolicy,
        page_stateless: facts.isPageStateless,
        new_page_instance: facts.isNewPageInstance,
        session_temporary: facts.isSessionTemporary,
        redirect_to_buffer: facts.isRedirectToBuffer,
      }),
    });
    return { kind, targetUrl, currentUrl };
  }
}
