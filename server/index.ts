import "dotenv/config";
import express from "express";
import { createServer } from "http";
import { loadConfig } from "./config";
import { MemJobStorage } from "./job-storage";
import { logger } from "./logger";
import { registerRoutes } from "./routes";
import { UploadManager } from "./upload-manager";

const config = loadConfig();
const storage = new MemJobStorage();
const uploads = new UploadManager(config, storage);

const app = express();
const server = createServer(app);

app.use(express.json());

async function startServer() {
  registerRoutes(app, { config, storage, uploads });

  server.listen(config.port, "0.0.0.0", () => {
    logger.info(`Phantom QA server running on port ${config.port}`, "server");
    logger.info(`Uploads: ${config.uploadDir}, reports: ${config.reportsDir}, plots: ${config.plotsDir}`, "server");
  });
}

startServer().catch((error: unknown) => {
  logger.error(error, "server");
  process.exitCode = 1;
});
