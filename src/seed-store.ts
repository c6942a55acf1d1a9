#!/usr/bin/env node

import { loadConfig } from "./config.js";
import { createRagSystem } from "./rag.js";
import { loadCourseFile } from "./utils/courseLoader.js";
import { errorMessage } from "./utils/errors.js";
import Logger from "./utils/logger.js";

async function seedStore(): Promise<void> {
  const [filePath, flag] = process.argv.slice(2);
  if (!filePath) {
    throw new Error("Usage: seed-store <courses.json> [--clear]");
  }

  const config = loadConfig();
  Logger.initialize({
    logFile: config.logFile,
    logLevel: config.logLevel,
    enableConsole: config.development,
  });

  const { rag, database } = createRagSystem(config);
  try {
    if (flag === "--clear") {
      Logger.info("Clearing existing course data");
      await rag.store.clearAllData();
    }

    const loaded = await loadCourseFile(filePath);
    let added = 0;
    for (const { course, chunks } of loaded) {
      added += await rag.addCourse(course, chunks);
    }

    const analytics = await rag.getCourseAnalytics();
    Logger.info(`Seeded ${added} chunks`, analytics);
  } finally {
    database.close();
  }
}

seedStore().catch((error) => {
  Logger.error("Failed to seed course store", { error: errorMessage(error) });
  process.exit(1);
});
