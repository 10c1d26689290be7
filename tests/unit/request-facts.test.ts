/**
 * Fastify adapters: request facts and the response sink
 *
 * Each adapter is exercised through a throwaway Fastify instance so the
 * request and reply are the real objects.
 */

import { describe, it, expect } from "vitest";
import Fastify from "fastify";
import { FastifyRequestFacts } from "../../src/http/request-facts.js";
import { FastifyResponseSink } from "../../src/http/response-sink.js";
import { PageUrl } from "../../src/render/page-url.js";
import { BufferedResponseWriter } from "../../src/render/buffered-response.js";
import { ResponseCommittedError } from "../../src/utils/errors.js";

async function factsFor(url: string, headers: Record<string, string> = {}) {
  const app = Fastify();
  let facts: { ajax: boolean; preserve: boolean; current: string } | undefined;
  app.get("/*", async (request) => {
    const source = new FastifyRequestFacts(request);
    facts = { ajax: source.isAjax(), preserve: source.shouldPreserveClientUrl(), current: source.currentUrl().toString() };
    return "ok";
  });
  await app.inject({ method: "GET", url, headers });
  await app.close();
  return facts;
}

describe("FastifyRequestFacts", () => {
  it("reads a full-page request", async () => {
    expect(await factsFor("/counter?pageId=1")).toEqual({ ajax: false, preserve: false, current: "/counter?pageId=1" });
  });

  it("takes the browser url from the ajax base url header", async () => {
    expect(
      await factsFor("/counter?pageId=1&action=refresh", {
        "x-requested-with": "xmlhttprequest",
        "x-page-base-url": "/counter?pageId=1",
      })
    ).toEqual({ ajax: true, preserve: false, current: "/counter?pageId=1" });
  });

  it("falls back to the request url when the base url header cannot be parsed", async () => {
    expect(
      await factsFor("/hello?name=Ann", { "x-requested-with": "XMLHttpRequest", "x-page-base-url": "http://[" })
    ).toEqual({ ajax: true, preserve: false, current: "/hello?name=Ann" });
  });

  it("ignores the base url header on full-page requests", async () => {
    expect(await factsFor("/hello", { "x-page-base-url": "/" })).toMatchObject({ current: "/hello" });
  });

  it("reads the preserve-client-url flag", async () => {
    expect(await factsFor("/hello", { "x-preserve-client-url": "TRUE" })).toMatchObject({ preserve: true });
    expect(await factsFor("/hello", { "x-preserve-client-url": "yes" })).toMatchObject({ preserve: false });
  });
});

describe("FastifyResponseSink", () => {
  it("accepts one write or redirect per response", async () => {
    const app = Fastify();
    let second: unknown;
    app.get("/", async (_request, reply) => {
      const sink = new FastifyResponseSink(reply, false);
      sink.sendRedirect(PageUrl.parse("/counter?pageId=1"));
      try {
        sink.write(new BufferedResponseWriter().write("late").toBufferedResponse());
      } catch (error) {
        second = error;
      }
      return reply;
    });

    const res = await app.inject({ method: "GET", url: "/" });
    await app.close();

    expect(res.statusCode).toBe(302);
    expect(res.headers.location).toBe("/counter?pageId=1");
    expect(second).toBeInstanceOf(ResponseCommittedError);
  });
});
