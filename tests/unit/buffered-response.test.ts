import { describe, it, expect } from "vitest";
import {
  BufferedResponse,
  BufferedResponseWriter,
  SerializedBufferedResponseSchema,
} from "../../src/render/buffered-response.js";

describe("BufferedResponseWriter", () => {
  it("defaults to a 200 html response", () => {
    const response = new BufferedResponseWriter().write("<p>hi</p>").toBufferedResponse();

    expect(response.statusCode).toBe(200);
    expect(response.contentType).toBe("text/html; charset=utf-8");
    expect(response.headers).toEqual({});
    expect(response.cookies).toEqual([]);
    expect(response.getText()).toBe("<p>hi</p>");
  });

  it("captures status, headers, cookies and chunks in order", () => {
    const response = new BufferedResponseWriter()
      .setStatus(201)
      .setContentType("text/plain")
      .setHeader("X-Page", "counter")
      .addCookie({ name: "theme", value: "dark", path: "/" })
      .write("a")
      .write(Buffer.from("b"))
      .toBufferedResponse();

    expect(response.statusCode).toBe(201);
    expect(response.contentType).toBe("text/plain");
    expect(response.headers).toEqual({ "x-page": "counter" });
    expect(response.cookies).toEqual([{ name: "theme", value: "dark", path: "/" }]);
    expect(response.getText()).toBe("ab");
    expect(response.byteLength).toBe(2);
  });

  it("is not affected by writes after capture", () => {
    const writer = new BufferedResponseWriter().write("first");
    const response = writer.toBufferedResponse();
    writer.write("second").setHeader("x-late", "1");

    expect(response.getText()).toBe("first");
    expect(response.headers).toEqual({});
  });
});

describe("BufferedResponse serialization", () => {
  it("encodes the body as base64", () => {
    const response = new BufferedResponseWriter().write("héllo").toBufferedResponse();
    const json = response.toJSON();

    expect(json.body).toBe(Buffer.from("héllo", "utf8").toString("base64"));
    expect(SerializedBufferedResponseSchema.safeParse(json).success).toBe(true);
  });

  it("restores status, headers, cookies and body", () => {
    const original = new BufferedResponseWriter()
      .setStatus(404)
      .setHeader("x-page", "missing")
      .addCookie({ name: "seen", value: "1", httpOnly: true })
      .write("<p>gone</p>")
      .toBufferedResponse();

    const restored = BufferedResponse.fromJSON(
      SerializedBufferedResponseSchema.parse(JSON.parse(JSON.stringify(original.toJSON())))
    );

    expect(restored.statusCode).toBe(404);
    expect(restored.headers).toEqual({ "x-page": "missing" });
    expect(restored.cookies).toEqual([{ name: "seen", value: "1", httpOnly: true }]);
    expect(restored.getText()).toBe("<p>gone</p>");
  });

  it("rejects a status outside 100-599", () => {
    const json = { ...new BufferedResponseWriter().toBufferedResponse().toJSON(), statusCode: 42 };
    expect(SerializedBufferedResponseSchema.safeParse(json).success).toBe(false);
  });
});
