import { loadConfig } from "./config.js";
import { createEngine } from "./http/engine.js";
import { startServer } from "./http/server.js";
import { logger } from "./logger.js";

const config = loadConfig();
if (config.logLevel) logger.level = config.logLevel;

const engine = createEngine(config);
const { server, port } = await startServer({
  port: config.port,
  engine,
  summaryMaxSentences: config.summaryMaxSentences,
});

function shutdown(): void {
  server.close(() => process.exit(0));
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

logger.info({ port }, `listening on :${port}`);
