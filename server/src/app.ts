/**
 * Express application for the local command surface
 *
 * @module app
 */

import express, { Request, Response } from "express";
import { createCommandsRouter } from "./routes/commands.js";
import { createCredentialRouter } from "./routes/credential.js";
import { createStatusRouter } from "./routes/status.js";
import type { Orchestrator } from "./services/orchestrator.js";

export function createApp(orchestrator: Orchestrator): express.Express {
  const app = express();
  app.use(express.json());

  app.use("/api/status", createStatusRouter(orchestrator));
  app.use("/api/commands", createCommandsRouter(orchestrator));
  app.use("/api/credential", createCredentialRouter(orchestrator));

  // Health check endpoint
  app.get("/health", (_req: Request, res: Response) => {
    res.status(200).json({
      status: "ok",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  // API 404 handler - catch all unmatched API routes (any HTTP method)
  app.all("/api/*", (req: Request, res: Response) => {
    console.error(`[server] 404 for API route: ${req.method} ${req.path}`);
    res.status(404).json({
      success: false,
      data: null,
      message: `API endpoint not found: ${req.method} ${req.path}`,
    });
  });

  return app;
}
