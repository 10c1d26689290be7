import type { FastifyRequest } from "fastify";
import { PageUrl } from "../render/page-url.js";
import type { RequestFactsSource } from "../render/types.js";

export const AJAX_HEADER = "x-requested-with";
export const AJAX_HEADER_VALUE = "XMLHttpRequest";
/** Url the browser shows, sent by ajax clients */
export const AJAX_BASE_URL_HEADER = "x-page-base-url";
/** Set by embedding frontends that must keep their own url */
export const PRESERVE_CLIENT_URL_HEADER = "x-preserve-client-url";

function headerValue(request: FastifyRequest, name: string): string | undefined {
  const value = request.headers[name];
  return typeof value === "string" ? value : undefined;
}

/**
 * Request facts read from a Fastify request
 */
export class FastifyRequestFacts implements RequestFactsSource {
  constructor(private readonly request: FastifyRequest) {}

  isAjax(): boolean {
    return headerValue(this.request, AJAX_HEADER)?.toLowerCase() === AJAX_HEADER_VALUE.toLowerCase();
  }

  shouldPreserveClientUrl(): boolean {
    return headerValue(this.request, PRESERVE_CLIENT_URL_HEADER)?.toLowerCase() === "true";
  }

  /**
   * The url the browser shows. For ajax calls that is the base url header;
   * an unreadable header falls back to the request url.
   */
  currentUrl(): PageUrl {
    if (this.isAjax()) {
      const baseUrl = headerValue(this.request, AJAX_BASE_URL_HEADER)?.trim();
      if (baseUrl) {
        const parsed = PageUrl.tryParse(baseUrl);
        if (parsed) {
          return parsed;
        }
        this.request.log.debug({ header: AJAX_BASE_URL_HEADER }, "Ignoring unreadable page base url");
      }
    }
    return PageUrl.parse(this.request.url);
  }
}
