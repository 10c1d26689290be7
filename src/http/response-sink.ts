import type { FastifyReply } from "fastify";
import type { BufferedResponse } from "../render/buffered-response.js";
import type { PageUrl } from "../render/page-url.js";
import type { ResponseSink } from "../render/types.js";
import { ResponseCommittedError } from "../utils/errors.js";

/** Ajax clients navigate to this header's value in script */
export const AJAX_LOCATION_HEADER = "ajax-location";

/**
 * Live response over a Fastify reply. Accepts exactly one write or redirect.
 */
export class FastifyResponseSink implements ResponseSink {
  private committed = false;

  constructor(
    private readonly reply: FastifyReply,
    private readonly ajax: boolean
  ) {}

  write(response: BufferedResponse): void {
    this.commit("write");

    this.reply.code(response.statusCode);
    for (const [name, value] of Object.entries(response.headers)) {
      this.reply.header(name, value);
    }
    for (const cookie of response.cookies) {
      const { name, value, ...options } = cookie;
      this.reply.setCookie(name, value, options);
    }
    this.reply.type(response.contentType);
    void this.reply.send(response.getBody());
  }

  sendRedirect(url: PageUrl): void {
    this.redirectTo(url.toString());
  }

  /**
   * Redirect to any location, including other hosts
   */
  redirectTo(location: string): void {
    this.commit("redirect");

    if (this.ajax) {
      // a 302 would be followed by the XHR itself and its html swapped in
      void this.reply.code(200).header(AJAX_LOCATION_HEADER, location).send();
      return;
    }
    void this.reply.redirect(location, 302);
  }

  private commit(attempted: "write" | "redirect"): void {
    if (this.committed) {
      throw new ResponseCommittedError(attempted);
    }
    this.committed = true;
  }
}
