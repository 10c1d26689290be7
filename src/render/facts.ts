import type {
  PageFacts,
  PageFactsSource,
  RedirectPolicy,
  RenderSettings,
  RequestFactsSource,
  SessionFactsSource,
} from "./types.js";

export interface PageFactsSources {
  request: RequestFactsSource;
  page: PageFactsSource;
  session: SessionFactsSource;
  redirectPolicy: RedirectPolicy;
}

/**
 * Read every fact from its source exactly once.
 * isNewPageInstance is read first; resolving the page afterwards may create one.
 */
export function resolvePageFacts(sources: PageFactsSources, settings: RenderSettings): PageFacts {
  const isNewPageInstance = sources.page.isNewPageInstance();

  return {
    isAjax: sources.request.isAjax(),
    shouldPreserveClientUrl: sources.request.shouldPreserveClientUrl(),
    isOnePassRender: settings.strategy === "ONE_PASS_RENDER",
    isRedirectToRender: settings.strategy === "REDIRECT_TO_RENDER",
    isRedirectToBuffer: settings.strategy === "REDIRECT_TO_BUFFER",
    isSessionTemporary: sources.session.isTemporary(),
    enableRedirectForStatelessPage: settings.enableRedirectForStatelessPage,
    isNewPageInstance,
    isPageStateless: sources.page.isPageStateless(),
    redirectPolicy: sources.redirectPolicy,
  };
}
