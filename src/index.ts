import process from "node:process";
import { loadConfig } from "./config.js";
import { patchLogging } from "./lib/logging.js";
import { initSentry } from "./lib/telemetry.js";
import { createApp } from "./server.js";
import { createHistoryStore } from "./storage/index.js";

patchLogging();
initSentry();

const config = loadConfig();
const app = createApp({ config, history: createHistoryStore(config) });

app.listen(config.port, () => {
  console.info(`[server] tipsplit listening on port ${config.port} (history: ${config.storageBackend})`);
});

process.on("unhandledRejection", (reason) => {
  console.error("[server] unhandled rejection", reason);
});
