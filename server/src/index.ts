#!/usr/bin/env node
/**
 * screen-narrator-server entry point
 */

import { startAssistantServer } from "./runtime.js";
import { getAssistantConfig } from "./utils/assistant-config.js";

// Error handlers for debugging
process.on("uncaughtException", (error) => {
  console.error("Uncaught exception:", error);
  console.error("Stack trace:", error.stack);
});

process.on("unhandledRejection", (reason, promise) => {
  console.error("Unhandled rejection at:", promise);
  console.error("Reason:", reason);
});

try {
  await startAssistantServer(getAssistantConfig());
} catch (error) {
  console.error(
    `[server] ${error instanceof Error ? error.message : String(error)}`
  );
  process.exit(1);
}
