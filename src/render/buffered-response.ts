/**
 * Buffered Response
 *
 * A response captured in memory instead of on the live connection. Pages render
 * into a BufferedResponseWriter; the resulting BufferedResponse is immutable and
 * can be replayed onto any ResponseSink, or serialized for an external store.
 */

import { z } from "zod";

export interface BufferedCookie {
  name: string;
  value: string;
  path?: string;
  maxAge?: number;
  httpOnly?: boolean;
}

export interface BufferedResponseInit {
  statusCode: number;
  contentType: string;
  headers: Record<string, string>;
  cookies: BufferedCookie[];
  body: Buffer;
}

const DEFAULT_CONTENT_TYPE = "text/html; charset=utf-8";

/**
 * Serialized form used by external stores (body is base64)
 */
export const SerializedBufferedResponseSchema = z.object({
  statusCode: z.number().int().min(100).max(599),
  contentType: z.string(),
  headers: z.record(z.string()),
  cookies: z.array(
    z.object({
      name: z.string(),
      value: z.string(),
      path: z.string().optional(),
      maxAge: z.number().optional(),
      httpOnly: z.boolean().optional(),
    })
  ),
  body: z.string(),
});
export type SerializedBufferedResponse = z.infer<typeof SerializedBufferedResponseSchema>;

export class BufferedResponse {
  readonly statusCode: number;
  readonly contentType: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly cookies: readonly BufferedCookie[];
  private readonly body: Buffer;

  constructor(init: BufferedResponseInit) {
    this.statusCode = init.statusCode;
    this.contentType = init.contentType;
    this.headers = { ...init.headers };
    this.cookies = init.cookies.map((c) => ({ ...c }));
    this.body = Buffer.from(init.body);
  }

  /** Copy of the captured body */
  getBody(): Buffer {
    return Buffer.from(this.body);
  }

  getText(): string {
    return this.body.toString("utf8");
  }

  get byteLength(): number {
    return this.body.byteLength;
  }

  toJSON(): SerializedBufferedResponse {
    return {
      statusCode: this.statusCode,
      contentType: this.contentType,
      headers: { ...this.headers },
      cookies: this.cookies.map((c) => ({ ...c })),
      body: this.body.toString("base64"),
    };
  }

  static fromJSON(data: SerializedBufferedResponse): BufferedResponse {
    return new BufferedResponse({
      statusCode: data.statusCode,
      contentType: data.contentType,
      headers: data.headers,
      cookies: data.cookies,
      body: Buffer.from(data.body, "base64"),
    });
  }
}

/**
 * Mutable capture target handed to page renders.
 */
export class BufferedResponseWriter {
  private statusCode = 200;
  private contentType = DEFAULT_CONTENT_TYPE;
  private readonly headers: Record<string, string> = {};
  private readonly cookies: BufferedCookie[] = [];
  private readonly chunks: Buffer[] = [];

  setStatus(statusCode: number): this {
    this.statusCode = statusCode;
    return this;
  }

  setContentType(contentType: string): this {
    this.contentType = contentType;
    return this;
  }

  setHeader(name: string, value: string): this {
    this.headers[name.toLowerCase()] = value;
    return this;
  }

  addCookie(cookie: BufferedCookie): this {
    this.cookies.push({ ...cookie });
    return this;
  }

  write(chunk: string | Buffer): this {
    this.chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk));
    return this;
  }

  toBufferedResponse(): BufferedResponse {
    return new BufferedResponse({
      statusCode: this.statusCode,
      contentType: this.contentType,
      headers: this.headers,
      cookies: this.cookies,
      body: Buffer.concat(this.chunks),
    });
  }
}
