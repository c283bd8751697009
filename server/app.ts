/**
 * Wire config into the handler and an HTTP server. Does not listen.
 */

import { createServer, type Server } from "node:http";
import { loadConfig, type ServerConfig } from "./config.js";
import { createHandler, type HandlerDeps, type RequestHandler } from "./handler.js";

export interface App {
  readonly handle: RequestHandler;
  readonly server: Server;
}

export function createApp(config: ServerConfig = loadConfig(), logger: HandlerDeps["logger"] = console): App {
  const handle = createHandler({
    parseOptions: { malformedHeaders: config.malformedHeaders },
    maxBodyBytes: config.maxBodyBytes,
    logger,
  });
  const server = createServer((req, res) => {
    void handle(req, res);
  });
  return { handle, server };
}
