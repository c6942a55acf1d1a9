#!/usr/bin/env node

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config.js";
import { createRagSystem } from "./rag.js";
import { createServer } from "./server.js";
import Logger from "./utils/logger.js";

async function main() {
  // Configuration comes from environment variables only
  const config = loadConfig();

  // Logs go to stderr unless LOG_FILE is set
  Logger.initialize({
    logFile: config.logFile,
    logLevel: config.logLevel,
    enableConsole: config.development,
  });

  Logger.info("Starting course RAG server...", {
    chatModel: config.chatModel,
    vectorDbPath: config.vectorDbPath,
  });

  const { rag, database } = createRagSystem(config);
  const analytics = await rag.getCourseAnalytics();
  if (analytics.totalCourses === 0) {
    Logger.warn("No courses loaded. Run the seed-store script first.");
  }

  const server = createServer(rag);
  const transport = new StdioServerTransport();

  const shutdown = () => {
    Logger.info("Shutting down");
    database.close();
    process.exit(0);
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  await server.connect(transport);
  Logger.info("Server started successfully.", analytics);
}

main().catch((error) => {
  const errorMessage = error instanceof Error ? error.message : String(error);
  const errorStack = error instanceof Error ? error.stack : undefined;
  Logger.error("Server error", { error: errorMessage, stack: errorStack });
  process.exit(1);
});
