/**
 * Server entry — load config from env, listen.
 */

import { createApp } from "./app.js";
import { loadConfig } from "./config.js";

const config = loadConfig();
const { server } = createApp(config);

server.listen(config.port, config.host, () => {
  console.info(
    `Snapshot parser listening on http://${config.host}:${config.port} (malformed headers: ${config.malformedHeaders})`
  );
});
