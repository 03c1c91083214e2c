/**
 * Express server entry point.
 */

import "./config/env";
import "./db/migrate";
import { logger } from "@infra/logger";
import { createApp } from "./app";
import { getDataDir } from "./config/dataDir";
import { closeDb } from "./db/index";

const PORT = Number(process.env.PORT) || 3001;

const app = createApp();

const server = app.listen(PORT, () => {
  console.log(`
╔═══════════════════════════════════════════════════════════╗
║                                                           ║
║   🚚 ATS Bridge: Greenhouse → Teamtailor                  ║
║                                                           ║
║   Server running at: http://localhost:${PORT}               ║
║                                                           ║
║   API:        http://localhost:${PORT}/api                  ║
║   Health:     http://localhost:${PORT}/health               ║
║   Dashboard:  http://localhost:${PORT}/dashboard            ║
║                                                           ║
╚═══════════════════════════════════════════════════════════╝
  `);
  logger.info("Server started", { port: PORT, dataDir: getDataDir() });
});

function shutdown(signal: string) {
  logger.info("Shutting down", { signal });
  server.close(() => {
    closeDb();
    process.exit(0);
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
