/**
 * Test utils — mock HTTP req/res without sockets.
 * Enables deterministic handler tests with no network.
 */

import { Readable } from "node:stream";
import type { IncomingMessage, ServerResponse } from "node:http";

export interface MockReqOptions {
  method?: string;
  url?: string;
  headers?: Record<string, string>;
  /** Strings are sent as-is; anything else as JSON. */
  body?: unknown;
  /** Split the body into chunks of this many characters. */
  chunkSize?: number;
}

export interface MockedResponse {
  readonly statusCode: number;
  readonly headers: Record<string, string>;
  readonly body: string;
  /** Parsed JSON body. */
  json<T = unknown>(): T;
}

function toChunks(text: string, size: number | undefined): string[] {
  if (size === undefined || text.length <= size) return [text];
  const chunks: string[] = [];
  for (let i = 0; i < text.length; i += size) {
    chunks.push(text.slice(i, i + size));
  }
  return chunks;
}

export function mockReq(opts: MockReqOptions = {}): IncomingMessage {
  const bodyStr =
    typeof opts.body === "string" ? opts.body : opts.body !== undefined ? JSON.stringify(opts.body) : "";
  const stream = Readable.from(toChunks(bodyStr, opts.chunkSize));
  const lowerHeaders: Record<string, string> = {};
  for (const [k, v] of Object.entries(opts.headers ?? {})) {
    lowerHeaders[k.toLowerCase()] = v;
  }
  return Object.assign(stream, {
    method: opts.method ?? "GET",
    url: opts.url ?? "/",
    headers: lowerHeaders,
  }) as unknown as IncomingMessage;
}

/** Captures writeHead + end; the handler uses nothing else. */
export function mockRes(): ServerResponse & MockedResponse {
  const captured = { statusCode: 0, headers: {} as Record<string, string>, body: "" };

  const res: MockedResponse & {
    writeHead(code: number, h?: Record<string, string | string[]>): void;
    end(chunk?: string | Buffer): void;
  } = {
    get statusCode() {
      return captured.statusCode;
    },
    get headers() {
      return { ...captured.headers };
    },
    get body() {
      return captured.body;
    },
    writeHead(code, h) {
      captured.statusCode = code;
      for (const [k, v] of Object.entries(h ?? {})) {
        captured.headers[k.toLowerCase()] = Array.isArray(v) ? v.join(", ") : v;
      }
    },
    end(chunk) {
      captured.body = chunk === undefined ? "" : typeof chunk === "string" ? chunk : chunk.toString();
    },
    json<T = unknown>(): T {
      return JSON.parse(captured.body) as T;
    },
  };

  return res as unknown as ServerResponse & MockedResponse;
}

export interface MockReqResResult {
  req: IncomingMessage;
  res: ServerResponse & MockedResponse;
}

export function mockReqRes(opts: MockReqOptions = {}): MockReqResResult {
  return {
    req: mockReq(opts),
    res: mockRes(),
  };
}
