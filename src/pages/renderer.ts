/**
 * Page renderer
 *
 * Renders a page instance into a BufferedResponse. A page may give up its
 * response mid-render (replaceResponse); the render then yields no result and
 * the replacement is left on the RenderCycle for the caller to run.
 */

import { BufferedResponseWriter, type BufferedResponse } from "../render/buffered-response.js";
import type { PageUrl } from "../render/page-url.js";
import type { PageRenderInvoker } from "../render/types.js";
import type { PageProvider } from "./provider.js";
import { ACTION_PARAM, type PageRegistry } from "./registry.js";
import type { PageRenderContext, ReplacementTarget } from "./types.js";

/**
 * Per-request holder for a response replacement scheduled during rendering
 */
export class RenderCycle {
  private replacement: ReplacementTarget | undefined;

  replaceResponse(target: ReplacementTarget): void {
    this.replacement = target;
  }

  hasReplacement(): boolean {
    return this.replacement !== undefined;
  }

  takeReplacement(): ReplacementTarget | undefined {
    const target = this.replacement;
    this.replacement = undefined;
    return target;
  }
}

export class PageRenderer implements PageRenderInvoker {
  constructor(
    private readonly registry: PageRegistry,
    private readonly provider: PageProvider,
    private readonly cycle: RenderCycle
  ) {}

  async render(url: PageUrl): Promise<BufferedResponse | undefined> {
    const instance = this.provider.getPageInstance();
    const writer = new BufferedResponseWriter();
    const registry = this.registry;
    const provider = this.provider;
    const cycle = this.cycle;

    const ctx: PageRenderContext<unknown> = {
      state: instance.state,
      parameters: instance.parameters,
      url,
      response: writer,
      urlFor(page, parameters = {}) {
        const definition = registry.get(page);
        if (!definition) {
          throw new Error(`No page named "${page}" is mounted`);
        }
        return registry.bookmarkableUrl(definition, parameters).toString();
      },
      actionUrl() {
        return provider.targetUrl().withParameter(ACTION_PARAM, "submit").toString();
      },
      replaceResponse(target) {
        cycle.replaceResponse(target);
      },
    };

    const markup = await instance.definition.render(ctx);
    if (cycle.hasReplacement()) {
      return undefined;
    }

    writer.write(markup);
    return writer.toBufferedResponse();
  }
}
