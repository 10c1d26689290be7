/**
 * Page rendering over HTTP
 *
 * Built-in pages through build() and app.inject: POST/redirect/GET through the
 * buffer, stateless redirects, ajax redirects and replaced responses.
 */

import { describe, it, expect, beforeAll, afterAll, vi } from "vitest";
import type { FastifyInstance, LightMyRequestResponse } from "fastify";
import { build } from "../../src/server.js";
import { PageSession, SESSION_COOKIE } from "../../src/pages/session.js";

const AJAX = { "x-requested-with": "XMLHttpRequest" } as const;
const FORM = { "content-type": "application/x-www-form-urlencoded" } as const;

function sessionCookie(res: LightMyRequestResponse): string | undefined {
  return res.cookies.find((c) => c.name === SESSION_COOKIE)?.value;
}

function clearRenderingEnv(): void {
  vi.stubEnv("RENDER_STRATEGY", "");
  vi.stubEnv("REDIRECT_STATELESS_PAGES", "");
  vi.stubEnv("DEFAULT_REDIRECT_POLICY", "");
  vi.stubEnv("BUFFER_STORE", "");
}

describe("built-in pages", () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    clearRenderingEnv();
    app = await build();
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
    vi.unstubAllEnvs();
  });

  describe("stateless pages", () => {
    it("renders the home page without starting a session", async () => {
      const res = await app.inject({ method: "GET", url: "/" });

      expect(res.statusCode).toBe(200);
      expect(res.headers["content-type"]).toBe("text/html; charset=utf-8");
      expect(res.body).toContain("<h1>Home</h1>");
      expect(sessionCookie(res)).toBeUndefined();
    });

    it("renders at its own url and escapes parameters", async () => {
      const res = await app.inject({ method: "GET", url: "/hello?name=%3Cb%3E" });

      expect(res.statusCode).toBe(200);
      expect(res.body).toContain("<h1>Hello, &lt;b&gt;</h1>");
    });

    it("redirects a form post to the bookmarkable url", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/hello?action=submit",
        headers: FORM,
        payload: "name=Bob",
      });

      expect(res.statusCode).toBe(302);
      expect(res.headers.location).toBe("/hello?name=Bob");
      expect(sessionCookie(res)).toBeUndefined();
    });
  });

  describe("stateful pages", () => {
    it("starts a session when the first instance is stored", async () => {
      const res = await app.inject({ method: "GET", url: "/counter" });

      expect(res.statusCode).toBe(200);
      expect(res.body).toContain('<span id="count">0</span>');
      expect(res.body).toContain('action="/counter?pageId=1&amp;action=submit"');

      const cookie = res.cookies.find((c) => c.name === SESSION_COOKIE);
      expect(cookie?.path).toBe("/");
      expect(cookie?.httpOnly).toBe(true);
    });

    it("serves the post result from the buffer after the redirect", async () => {
      const first = await app.inject({ method: "GET", url: "/counter" });
      const sid = sessionCookie(first) ?? "";

      const post = await app.inject({
        method: "POST",
        url: "/counter?pageId=1&action=submit",
        headers: FORM,
        cookies: { [SESSION_COOKIE]: sid },
        payload: "op=increment",
      });
      expect(post.statusCode).toBe(302);
      expect(post.headers.location).toBe("/counter?pageId=1");

      const before = app.respondOutcomes().buffered;
      const get = await app.inject({ method: "GET", url: "/counter?pageId=1", cookies: { [SESSION_COOKIE]: sid } });
      expect(get.statusCode).toBe(200);
      expect(get.body).toContain('<span id="count">1</span>');
      expect(app.respondOutcomes().buffered).toBe(before + 1);

      // buffer is spent; the instance renders itself at its own url
      const again = await app.inject({ method: "GET", url: "/counter?pageId=1", cookies: { [SESSION_COOKIE]: sid } });
      expect(again.statusCode).toBe(200);
      expect(again.body).toContain('<span id="count">1</span>');
      expect(app.respondOutcomes().buffered).toBe(before + 1);
    });

    it("starts a session for a form post that arrives without one", async () => {
      const post = await app.inject({
        method: "POST",
        url: "/counter?pageId=1&action=submit",
        headers: FORM,
        payload: "op=decrement",
      });

      expect(post.statusCode).toBe(302);
      expect(post.headers.location).toBe("/counter?pageId=1");
      const sid = sessionCookie(post);
      expect(sid).toBeDefined();

      const get = await app.inject({ method: "GET", url: "/counter?pageId=1", cookies: { [SESSION_COOKIE]: sid ?? "" } });
      expect(get.body).toContain('<span id="count">-1</span>');
    });

    it("registers no cookie listener on a session that is already bound", async () => {
      const first = await app.inject({ method: "GET", url: "/counter" });
      const sid = sessionCookie(first) ?? "";
      const onBind = vi.spyOn(PageSession.prototype, "onBind");

      try {
        for (let i = 0; i < 20; i++) {
          const res = await app.inject({ method: "GET", url: "/counter?pageId=1", cookies: { [SESSION_COOKIE]: sid } });
          expect(res.statusCode).toBe(200);
          expect(sessionCookie(res)).toBeUndefined();
        }
        expect(onBind).not.toHaveBeenCalled();
      } finally {
        onBind.mockRestore();
      }
    });

    it("redirects an expired page id to a new instance", async () => {
      const first = await app.inject({ method: "GET", url: "/counter" });

      const res = await app.inject({
        method: "GET",
        url: "/counter?pageId=99",
        cookies: { [SESSION_COOKIE]: sessionCookie(first) ?? "" },
      });

      expect(res.statusCode).toBe(302);
      expect(res.headers.location).toBe("/counter");
    });
  });

  describe("ajax requests", () => {
    it("redirect through the Ajax-Location header", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/hello?name=Ann",
        headers: { ...AJAX, "x-page-base-url": "/" },
      });

      expect(res.statusCode).toBe(200);
      expect(res.headers["ajax-location"]).toBe("/hello?name=Ann");
      expect(res.headers.location).toBeUndefined();
      expect(res.body).toBe("");
    });

    it("fall back to the request url when the base url header is unreadable", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/hello?name=Ann",
        headers: { ...AJAX, "x-page-base-url": "http://[" },
      });

      expect(res.statusCode).toBe(200);
      expect(res.headers["ajax-location"]).toBe("/hello?name=Ann");
    });

    it("render in place when the client url must be preserved", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/hello?name=Ann",
        headers: { ...AJAX, "x-page-base-url": "/", "x-preserve-client-url": "true" },
      });

      expect(res.statusCode).toBe(200);
      expect(res.headers["ajax-location"]).toBeUndefined();
      expect(res.body).toContain("<h1>Hello, Ann</h1>");
    });
  });

  describe("replaced responses", () => {
    it("follows a page that hands its response to another page", async () => {
      const res = await app.inject({ method: "GET", url: "/legacy" });

      expect(res.statusCode).toBe(302);
      expect(res.headers.location).toBe("/");
    });
  });

  describe("errors", () => {
    it("answers unknown paths with error.v1", async () => {
      const res = await app.inject({ method: "GET", url: "/nope", headers: { "x-request-id": "req-test-1" } });

      expect(res.statusCode).toBe(404);
      expect(res.headers["x-request-id"]).toBe("req-test-1");
      expect(res.json()).toEqual({
        schema: "error.v1",
        code: "NOT_FOUND",
        message: "Page not found",
        details: { path: "/nope" },
        request_id: "req-test-1",
      });
    });

    it("rejects form posts in an unsupported encoding", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/counter",
        headers: { "content-type": "text/csv" },
        payload: "op,increment",
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().code).toBe("BAD_INPUT");
    });
  });
});

describe("one-pass rendering", () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    clearRenderingEnv();
    vi.stubEnv("RENDER_STRATEGY", "ONE_PASS_RENDER");
    app = await build();
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
    vi.unstubAllEnvs();
  });

  it("answers a form post with the page instead of a redirect", async () => {
    const first = await app.inject({ method: "GET", url: "/counter" });
    expect(first.statusCode).toBe(200);

    const post = await app.inject({
      method: "POST",
      url: "/counter?pageId=1&action=submit",
      headers: FORM,
      cookies: { [SESSION_COOKIE]: sessionCookie(first) ?? "" },
      payload: "op=increment",
    });

    expect(post.statusCode).toBe(200);
    expect(post.body).toContain('<span id="count">1</span>');
    expect(app.respondOutcomes().buffer_and_redirect).toBe(0);
  });
});
