/**
 * Pure HTTP request handler. No server/listen.
 * Injected deps for testability. No domain imports node:http.
 */

import type { IncomingMessage, ServerResponse } from "node:http";
import { ValidationError } from "../domain/errors.js";
import { parseSnapshot } from "../domain/snapshotParser.js";
import type { ParseOptions } from "../domain/snapshotParser.js";
import { buildSnapshotRecord, readSnapshotRecord, renderSnapshotRecord } from "../domain/snapshotRecord.js";
import { apiError, PayloadTooLargeError, toApiError, type ErrorCode } from "./apiErrors.js";

const API = "/api/snapshots";

export interface HandlerDeps {
  parseOptions: ParseOptions;
  maxBodyBytes: number;
  logger?: { error: (err: unknown) => void };
}

function sendJson(res: ServerResponse, statusCode: number, body: unknown): void {
  res.writeHead(statusCode, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function sendText(res: ServerResponse, statusCode: number, body: string): void {
  res.writeHead(statusCode, { "Content-Type": "text/plain; charset=utf-8" });
  res.end(body);
}

function sendError(res: ServerResponse, statusCode: number, code: ErrorCode, message: string, details?: Record<string, unknown>): void {
  sendJson(res, statusCode, apiError(code, message, details));
}

function getPathname(url: string | undefined, host: string | undefined): string {
  if (url === undefined) return "/";
  try {
    const base = host !== undefined ? `http://${host}` : "http://localhost";
    return new URL(url, base).pathname;
  } catch {
    return "/";
  }
}

/** Collects raw bytes and decodes once, so multibyte characters may span chunks. */
function readBody(req: IncomingMessage, maxBytes: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    const onData = (chunk: Buffer | string) => {
      const bytes = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
      size += bytes.length;
      if (size > maxBytes) {
        req.removeListener("data", onData);
        req.removeListener("end", onEnd);
        req.resume();
        reject(new PayloadTooLargeError(maxBytes));
        return;
      }
      chunks.push(bytes);
    };
    const onEnd = () => {
      resolve(Buffer.concat(chunks).toString("utf8"));
    };
    req.on("data", onData);
    req.on("end", onEnd);
    req.on("error", reject);
  });
}

async function readJsonBody(req: IncomingMessage, maxBytes: number): Promise<unknown> {
  const text = await readBody(req, maxBytes);
  try {
    return JSON.parse(text);
  } catch {
    throw new ValidationError("Invalid JSON");
  }
}

export type RequestHandler = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

export function createHandler(deps: HandlerDeps): RequestHandler {
  const logger = deps.logger ?? console;

  async function route(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const pathname = getPathname(req.url, req.headers?.host);
    const method = req.method ?? "GET";

    // --- Health ---
    if (method === "GET" && pathname === "/health") {
      sendJson(res, 200, { status: "ok" });
      return;
    }

    // --- POST /api/snapshots/parse (text) -> { lines } ---
    if (method === "POST" && pathname === `${API}/parse`) {
      const text = await readBody(req, deps.maxBodyBytes);
      const snapshot = parseSnapshot(text, deps.parseOptions);
      sendJson(res, 200, { lines: snapshot.lines });
      return;
    }

    // --- POST /api/snapshots/record (text) -> { record } ---
    if (method === "POST" && pathname === `${API}/record`) {
      const text = await readBody(req, deps.maxBodyBytes);
      const record = buildSnapshotRecord(parseSnapshot(text, deps.parseOptions));
      sendJson(res, 200, { record });
      return;
    }

    // --- POST /api/snapshots/render (JSON record) -> text ---
    if (method === "POST" && pathname === `${API}/render`) {
      const record = readSnapshotRecord(await readJsonBody(req, deps.maxBodyBytes));
      sendText(res, 200, renderSnapshotRecord(record));
      return;
    }

    sendError(res, 404, "NOT_FOUND", "Not Found");
  }

  return async function handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    try {
      await route(req, res);
    } catch (err) {
      const mapped = toApiError(err);
      if (mapped) {
        sendJson(res, mapped.status, mapped.payload);
        return;
      }
      logger.error(err);
      sendError(res, 500, "INTERNAL_ERROR", "Internal Server Error");
    }
  };
}
