import { Router, Request, Response } from "express";
import type { Orchestrator } from "../services/orchestrator.js";

export function createStatusRouter(orchestrator: Orchestrator): Router {
  const router = Router();

  router.get("/", (_req: Request, res: Response) => {
    res.status(200).json({
      success: true,
      data: orchestrator.status(),
    });
  });

  return router;
}
